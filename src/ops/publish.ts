/**
 * @fileoverview Publisher: force-updates the remote with the rewritten
 * branches and tags.
 *
 * @module ops/publish
 */

import { PublishError, toError } from '../errors'
import type { GitEngine } from '../git/engine'
import type { Repository } from '../types/inventory'
import { noopLogger, type Logger } from '../utils/logger'

/**
 * Collaborators and switches of the publisher.
 */
export interface PublishDeps {
  git: GitEngine
  /** Leave the rewritten history local and print the manual commands */
  skip?: boolean
  logger?: Logger
}

/**
 * Result of {@link publishRepository}.
 * - `published`: branches and tags pushed
 * - `partial`: branches pushed, tags failed (tags are best-effort)
 * - `skipped`: publishing disabled; `manualCommands` complete the step
 */
export type PublishResult =
  | { status: 'published' }
  | { status: 'partial'; warning: string }
  | { status: 'skipped'; manualCommands: string[] }

/**
 * Commands an operator runs to publish by hand.
 */
export function manualPushCommands(repository: Repository, remote: string): string[] {
  return [
    `cd ${repository.root} && git push --force --all ${remote}`,
    `cd ${repository.root} && git push --force --tags ${remote}`,
  ]
}

/**
 * Force-push all branches, then all tags, to `remote`.
 *
 * @throws {PublishError} When the remote is missing or the branch push
 * fails; the local rewrite is kept and the error's `recovery` holds the
 * manual commands
 */
export async function publishRepository(
  repository: Repository,
  remote: string,
  deps: PublishDeps
): Promise<PublishResult> {
  const logger = deps.logger ?? noopLogger
  const manualCommands = manualPushCommands(repository, remote)

  if (deps.skip) {
    logger.warn('Force push skipped (--skip-push flag)')
    logger.info(`To push manually: ${manualCommands.join(' ; ')}`)
    return { status: 'skipped', manualCommands }
  }

  if ((await deps.git.getRemoteUrl(repository.root, remote)) === null) {
    throw new PublishError(`Remote '${remote}' not found`, {
      recovery: [`cd ${repository.root} && git remote add ${remote} <remote-url>`, ...manualCommands].join('\n'),
    })
  }

  try {
    const output = await deps.git.pushBranches(repository.root, remote)
    if (output) logger.info(output)
  } catch (cause) {
    throw new PublishError('Failed to force push branches', { cause, recovery: manualCommands.join('\n') })
  }
  logger.info('Force pushed all branches')

  try {
    const output = await deps.git.pushTags(repository.root, remote)
    if (output) logger.info(output)
  } catch (cause) {
    const warning = `Failed to force push tags: ${toError(cause).message}`
    logger.warn(warning)
    return { status: 'partial', warning }
  }
  logger.info('Force pushed all tags')

  return { status: 'published' }
}
