/**
 * @fileoverview Archiver: copies historical blobs to external storage
 * before they are removed from history.
 *
 * @module ops/archive
 */

import type { Readable } from 'stream'
import { ArchiveError, toError } from '../errors'
import type { GitEngine } from '../git/engine'
import { archiveKey, storageLocation, type BlobStore } from '../storage/blob-store'
import type { InventoryRow, Repository } from '../types/inventory'
import { noopLogger, type Logger } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators of the archiver.
 */
export interface ArchiveDeps {
  git: GitEngine
  store: BlobStore
  logger?: Logger
}

/**
 * Result of archiving one blob.
 */
export type ArchiveOutcome =
  | { ok: true; location: string }
  | { ok: false; error: ArchiveError }

/**
 * A blob that could not be archived.
 */
export interface ArchiveFailure {
  path: string
  objectId: string
  error: ArchiveError
}

/**
 * Per-repository archive totals.
 */
export interface ArchiveSummary {
  /** Locations written */
  uploaded: string[]
  failures: ArchiveFailure[]
  /** Rows with no blob to archive (working-tree rows, rows without a commit) */
  skipped: number
}

// ============================================================================
// Archiving
// ============================================================================

/**
 * Stream a blob out of the repository and upload it unmodified.
 *
 * The key defaults to {@link archiveKey} of the repository, first commit and
 * file name; inventory rows pass their own `storageKey`, which may carry the
 * object id as well.
 *
 * Errors never throw: extraction and upload failures come back as an
 * {@link ArchiveError} so that the caller can count them. A failure of the
 * blob stream is reported as an extraction failure even when it surfaces
 * through the upload.
 */
export async function archiveBlob(
  repository: Repository,
  objectId: string,
  firstCommitId: string,
  filename: string,
  deps: ArchiveDeps,
  key: string = archiveKey(repository.name, firstCommitId, filename)
): Promise<ArchiveOutcome> {
  const location = storageLocation(deps.store.bucket, key)
  const extractFailure = (cause: unknown): ArchiveOutcome => ({
    ok: false,
    error: new ArchiveError(`Failed to extract blob: ${objectId}`, 'EXTRACT_FAILED', { objectId, key, cause }),
  })

  let content: Readable
  try {
    content = deps.git.readBlob(repository.root, objectId)
  } catch (cause) {
    return extractFailure(cause)
  }

  const readErrors: Error[] = []
  content.on('error', (error: Error) => readErrors.push(error))

  try {
    await deps.store.put(key, content)
  } catch (cause) {
    const readError = readErrors[0]
    if (readError !== undefined) return extractFailure(readError)
    return {
      ok: false,
      error: new ArchiveError(`Failed to upload: ${location}`, 'UPLOAD_FAILED', { objectId, key, cause }),
    }
  } finally {
    if (!content.destroyed) content.destroy()
  }

  const readError = readErrors[0]
  if (readError !== undefined) return extractFailure(readError)
  return { ok: true, location }
}

/**
 * Archive every history row of a repository that has a blob and a storage key.
 *
 * Keys are expected to be unique per blob (see `buildInventory`). A row whose
 * key was already written with different content is recorded as a failure
 * rather than replacing the earlier upload.
 */
export async function archiveRepository(
  repository: Repository,
  rows: readonly InventoryRow[],
  deps: ArchiveDeps
): Promise<ArchiveSummary> {
  const logger = deps.logger ?? noopLogger
  const summary: ArchiveSummary = { uploaded: [], failures: [], skipped: 0 }
  const owners = new Map<string, string>()

  for (const row of rows) {
    const firstCommit = row.commits[0]
    if (row.objectId === null || row.storageKey === null || firstCommit === undefined) {
      summary.skipped++
      continue
    }

    const owner = owners.get(row.storageKey)
    let outcome: ArchiveOutcome
    if (owner !== undefined && owner !== row.objectId) {
      outcome = {
        ok: false,
        error: new ArchiveError(
          `Storage key ${row.storageKey} already holds blob ${owner}`,
          'UPLOAD_FAILED',
          { objectId: row.objectId, key: row.storageKey }
        ),
      }
    } else {
      owners.set(row.storageKey, row.objectId)
      outcome = await archiveBlob(repository, row.objectId, firstCommit, row.path, deps, row.storageKey)
    }

    if (outcome.ok) {
      summary.uploaded.push(outcome.location)
      logger.info(`Uploaded: ${outcome.location}`)
    } else {
      summary.failures.push({ path: row.path, objectId: row.objectId, error: outcome.error })
      logger.error(outcome.error.message, toError(outcome.error.cause ?? outcome.error))
    }
  }

  logger.info(`Uploaded ${summary.uploaded.length} files, ${summary.failures.length} failures`)
  return summary
}
