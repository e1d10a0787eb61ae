/**
 * @fileoverview Object scanner: oversized files in the working tree and
 * oversized blobs anywhere in a repository's reachable history.
 *
 * Both passes are read-only. The history pass walks every object reachable
 * from any branch or tag, which is the slowest step of a run on large
 * histories.
 *
 * @module ops/scanner
 *
 * @example
 * ```typescript
 * const records = await scanRepository(repository, git, {
 *   thresholdBytes: 100 * 1024 * 1024,
 *   commitSampleSize: 5,
 * })
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { COMMIT_SAMPLE_SIZE, GIT_DIR } from '../constants'
import { toError } from '../errors'
import type { GitEngine, ReachableObject } from '../git/engine'
import type { LargeObjectRecord, ObjectOrigin, Repository } from '../types/inventory'
import { compareStrings } from '../utils/format'
import { isWithin } from '../utils/fs'
import { noopLogger, type Logger } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for scanning one repository.
 */
export interface ScanOptions {
  /** Objects of this size or larger are reported */
  thresholdBytes: number
  /** Referencing commits kept per blob (display only) */
  commitSampleSize?: number
  /** Directories skipped by the working-tree pass */
  exclude?: readonly string[]
  logger?: Logger
}

// ============================================================================
// Ordering
// ============================================================================

const ORIGIN_ORDER: Record<ObjectOrigin, number> = {
  history: 0,
  'working-tree': 1,
}

/**
 * Stable record order: history before working tree, then path, then object id.
 */
export function compareRecords(a: LargeObjectRecord, b: LargeObjectRecord): number {
  return (
    ORIGIN_ORDER[a.origin] - ORIGIN_ORDER[b.origin] ||
    compareStrings(a.path, b.path) ||
    compareStrings(a.objectId ?? '', b.objectId ?? '')
  )
}

// ============================================================================
// Working-tree pass
// ============================================================================

async function collectLargeFiles(
  root: string,
  dir: string,
  thresholdBytes: number,
  exclude: readonly string[],
  out: Array<{ path: string; size: number }>
): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    if (entry.name === GIT_DIR) continue
    const full = path.join(dir, entry.name)

    if (entry.isDirectory()) {
      if (exclude.some((excluded) => isWithin(excluded, full))) continue
      await collectLargeFiles(root, full, thresholdBytes, exclude, out)
    } else if (entry.isFile()) {
      const { size } = await fs.stat(full)
      if (size >= thresholdBytes) {
        out.push({ path: path.relative(root, full).split(path.sep).join('/'), size })
      }
    }
  }
}

/**
 * List regular files at or above the threshold, excluding `.git`.
 */
export async function scanWorkingTree(
  repository: Repository,
  thresholdBytes: number,
  exclude: readonly string[] = []
): Promise<LargeObjectRecord[]> {
  const files: Array<{ path: string; size: number }> = []
  await collectLargeFiles(
    repository.root,
    repository.root,
    thresholdBytes,
    exclude.map((dir) => path.resolve(dir)),
    files
  )

  return files
    .map((file): LargeObjectRecord => ({
      repository: repository.name,
      path: file.path,
      size: file.size,
      origin: 'working-tree',
      objectId: null,
      commits: [],
    }))
    .sort(compareRecords)
}

// ============================================================================
// History pass
// ============================================================================

/**
 * Keep blobs at or above the threshold that were reached through a path,
 * one entry per object id (first occurrence wins).
 */
export function selectOversizedBlobs(objects: readonly ReachableObject[], thresholdBytes: number): ReachableObject[] {
  const seen = new Set<string>()
  const selected: ReachableObject[] = []

  for (const object of objects) {
    if (object.type !== 'blob' || object.size < thresholdBytes || object.path === '') continue
    if (seen.has(object.objectId)) continue
    seen.add(object.objectId)
    selected.push(object)
  }

  return selected
}

/**
 * List blobs at or above the threshold reachable from any branch or tag,
 * each with a bounded sample of the commits that reference it.
 */
export async function scanHistory(
  repository: Repository,
  git: GitEngine,
  thresholdBytes: number,
  commitSampleSize: number = COMMIT_SAMPLE_SIZE,
  logger: Logger = noopLogger
): Promise<LargeObjectRecord[]> {
  const objects = await git.listReachableObjects(repository.root)
  const blobs = selectOversizedBlobs(objects, thresholdBytes)
  logger.debug(`Reachable objects: ${objects.length}, oversized blobs: ${blobs.length}`)

  const records: LargeObjectRecord[] = []
  for (const blob of blobs) {
    const commits = [...new Set(await git.findCommitsForObject(repository.root, blob.objectId, commitSampleSize))]
    if (commits.length === 0) {
      logger.warn(`No referencing commit found for ${blob.path} (${blob.objectId}); it will not be archived`)
    }
    records.push({
      repository: repository.name,
      path: blob.path,
      size: blob.size,
      origin: 'history',
      objectId: blob.objectId,
      commits: commits.slice(0, commitSampleSize),
    })
  }

  return records.sort(compareRecords)
}

// ============================================================================
// Repository scan
// ============================================================================

/**
 * Scan one repository: history records first, then working-tree records.
 *
 * A repository whose history cannot be read, or that has no commits, yields
 * no records. A working-tree failure only drops the working-tree records.
 * Failures are logged and the run continues.
 */
export async function scanRepository(
  repository: Repository,
  git: GitEngine,
  options: ScanOptions
): Promise<LargeObjectRecord[]> {
  const logger = options.logger ?? noopLogger

  let history: LargeObjectRecord[]
  try {
    if (!(await git.hasCommits(repository.root))) {
      logger.warn(`No commits in ${repository.name}; it contributes no rows`)
      return []
    }

    logger.info(`Scanning Git history: ${repository.name}`)
    history = await scanHistory(
      repository,
      git,
      options.thresholdBytes,
      options.commitSampleSize ?? COMMIT_SAMPLE_SIZE,
      logger
    )
  } catch (error) {
    logger.error(`Failed to scan ${repository.name}; it contributes no rows`, toError(error))
    return []
  }

  logger.info(`Scanning working directory: ${repository.name}`)
  try {
    const working = await scanWorkingTree(repository, options.thresholdBytes, options.exclude)
    return [...history, ...working]
  } catch (error) {
    logger.warn(`Failed to scan the working directory of ${repository.name}; keeping history rows only`, {
      error: toError(error).message,
    })
    return history
  }
}
