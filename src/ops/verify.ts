/**
 * @fileoverview Verifier: asserts that no oversized blob is reachable after
 * the rewrite, then compacts the object store.
 *
 * @module ops/verify
 */

import * as path from 'path'
import { GIT_DIR } from '../constants'
import { toError } from '../errors'
import { BATCH_CHECK_FORMAT, type GitEngine } from '../git/engine'
import type { Repository } from '../types/inventory'
import { formatSize } from '../utils/format'
import { directorySize } from '../utils/fs'
import { noopLogger, type Logger } from '../utils/logger'

/**
 * Collaborators of the verifier.
 */
export interface VerifyDeps {
  git: GitEngine
  /** Measures a directory in bytes; defaults to {@link directorySize} */
  measure?: (dir: string) => Promise<number>
  logger?: Logger
}

/**
 * Result of {@link verifyRepository}.
 */
export type VerifyResult =
  | {
      status: 'clean'
      /** `.git` size before compaction, in bytes */
      sizeBefore: number
      /** `.git` size after compaction; null when compaction failed */
      sizeAfter: number | null
    }
  | {
      status: 'still-oversized'
      count: number
      /** Command that lists the remaining offenders */
      diagnostic: string
    }

/**
 * Shell pipeline listing blobs at or above the threshold.
 */
export function diagnosticCommand(repository: Repository, thresholdBytes: number): string {
  return (
    `cd ${repository.root} && git rev-list --objects --all | ` +
    `git cat-file --batch-check='${BATCH_CHECK_FORMAT}' | ` +
    `awk '$1 == "blob" && $3 >= ${thresholdBytes}'`
  )
}

/**
 * Count distinct reachable blobs at or above the threshold.
 */
export async function countOversizedBlobs(git: GitEngine, root: string, thresholdBytes: number): Promise<number> {
  const objects = await git.listReachableObjects(root)
  const ids = new Set<string>()
  for (const object of objects) {
    if (object.type === 'blob' && object.size >= thresholdBytes) ids.add(object.objectId)
  }
  return ids.size
}

/**
 * Re-walk every reachable object and check that none is at or above the
 * threshold. When clean, run aggressive compaction and report the `.git`
 * size before and after.
 */
export async function verifyRepository(
  repository: Repository,
  thresholdBytes: number,
  deps: VerifyDeps
): Promise<VerifyResult> {
  const logger = deps.logger ?? noopLogger
  const measure = deps.measure ?? directorySize
  const gitDir = path.join(repository.root, GIT_DIR)

  const count = await countOversizedBlobs(deps.git, repository.root, thresholdBytes)
  if (count > 0) {
    const diagnostic = diagnosticCommand(repository, thresholdBytes)
    logger.error(`Found ${count} large blob(s) still in history!`)
    logger.info(`Run the following to investigate: ${diagnostic}`)
    return { status: 'still-oversized', count, diagnostic }
  }

  logger.info(`No files larger than ${formatSize(thresholdBytes)} remain in history`)

  const sizeBefore = await measure(gitDir)
  logger.info(`Repository .git size: ${formatSize(sizeBefore)}`)

  logger.info('Running garbage collection...')
  try {
    const output = await deps.git.compact(repository.root)
    if (output) logger.debug(output)
  } catch (error) {
    logger.warn(`Garbage collection failed: ${toError(error).message}`)
    return { status: 'clean', sizeBefore, sizeAfter: null }
  }

  const sizeAfter = await measure(gitDir)
  logger.info(`Repository .git size after gc: ${formatSize(sizeAfter)}`)
  return { status: 'clean', sizeBefore, sizeAfter }
}
