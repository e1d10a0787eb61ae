/**
 * @fileoverview History rewriter: removes the inventoried paths from every
 * commit and tag of a repository through a {@link RewriteEngine}.
 *
 * @module ops/rewrite
 */

import { RewriteError } from '../errors'
import type { GitEngine } from '../git/engine'
import type { RewriteEngine } from '../git/rewrite-engine'
import type { Repository, RewriteRequest } from '../types/inventory'
import { noopLogger, type Logger } from '../utils/logger'

/**
 * Collaborators of the rewriter.
 */
export interface RewriteDeps {
  git: GitEngine
  engine: RewriteEngine
  /** Remote whose URL is preserved across the rewrite */
  remote: string
  logger?: Logger
}

/**
 * Result of {@link rewriteHistory}.
 */
export type RewriteResult =
  | { status: 'noop' }
  | {
      status: 'rewritten'
      paths: readonly string[]
      /** Remote URL captured before the rewrite; null when there was none */
      remoteUrl: string | null
      /** Whether the remote had to be added back */
      remoteRestored: boolean
    }

/**
 * Remove `request.paths` from the repository's entire history.
 *
 * The remote URL is captured first because the rewrite engine may drop the
 * remote; it is added back when missing afterwards. An empty request is a
 * no-op.
 *
 * @throws {RewriteError} When the engine fails (`REWRITE_FAILED`) or the
 * remote cannot be restored (`REMOTE_RESTORE_FAILED`)
 */
export async function rewriteHistory(
  repository: Repository,
  request: RewriteRequest,
  deps: RewriteDeps
): Promise<RewriteResult> {
  const logger = deps.logger ?? noopLogger

  if (request.paths.length === 0) {
    logger.warn(`No files to remove from: ${repository.name}`)
    return { status: 'noop' }
  }

  const remoteUrl = await deps.git.getRemoteUrl(repository.root, deps.remote)
  logger.info(`Removing ${request.paths.length} file path(s) from history`, { paths: request.paths })

  try {
    const output = await deps.engine.rewrite(repository.root, request.paths)
    if (output) logger.info(output)
  } catch (cause) {
    throw new RewriteError(`Failed to rewrite history of ${repository.name} with ${deps.engine.name}`, 'REWRITE_FAILED', {
      cause,
    })
  }
  logger.info('History rewritten successfully')

  let remoteRestored = false
  if (remoteUrl !== null && (await deps.git.getRemoteUrl(repository.root, deps.remote)) === null) {
    logger.info(`Restoring remote '${deps.remote}' (${remoteUrl})`)
    try {
      await deps.git.addRemote(repository.root, deps.remote, remoteUrl)
    } catch (cause) {
      throw new RewriteError(`Failed to restore remote '${deps.remote}'`, 'REMOTE_RESTORE_FAILED', {
        cause,
        recovery: `cd ${repository.root} && git remote add ${deps.remote} ${remoteUrl}`,
      })
    }
    remoteRestored = true
  }

  return { status: 'rewritten', paths: request.paths, remoteUrl, remoteRestored }
}
