/**
 * @fileoverview Dependency preflight: the external tools a run needs.
 *
 * @module cli/preflight
 */

import type { ExecutionMode } from '../config/run-context'
import { EnvironmentError, toError } from '../errors'
import type { GitEngine } from '../git/engine'
import type { RewriteEngine } from '../git/rewrite-engine'
import type { Logger } from '../utils/logger'

/**
 * Installation hint per tool.
 */
export const INSTALL_HINTS: Readonly<Record<string, string>> = {
  git: 'https://git-scm.com/downloads',
  'git-filter-repo': 'pip install git-filter-repo',
}

/**
 * Check that git (always) and the rewrite engine (execute mode only) can be
 * run, logging their versions.
 *
 * @throws {EnvironmentError} `MISSING_DEPENDENCY`, listing every missing tool
 */
export async function checkDependencies(
  mode: ExecutionMode,
  git: GitEngine,
  rewriter: RewriteEngine,
  logger: Logger
): Promise<void> {
  const missing: string[] = []

  try {
    logger.info(`git: ${await git.version()}`)
  } catch (error) {
    logger.debug(`git --version failed: ${toError(error).message}`)
    missing.push('git')
  }

  if (mode === 'execute') {
    try {
      logger.info(`${rewriter.name}: ${await rewriter.version()}`)
    } catch (error) {
      logger.debug(`${rewriter.name} --version failed: ${toError(error).message}`)
      missing.push(rewriter.name)
    }
  }

  if (missing.length > 0) {
    throw EnvironmentError.missingDependencies(missing)
  }
  logger.info('All dependencies satisfied')
}

/**
 * Lines telling the operator how to install each missing tool.
 */
export function installInstructions(missing: readonly string[]): string[] {
  return [
    'Installation instructions:',
    ...missing.map((tool) => `  ${tool}: ${INSTALL_HINTS[tool] ?? 'install it and make sure it is on PATH'}`),
  ]
}
