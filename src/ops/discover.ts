/**
 * @fileoverview Repository discovery under a parent directory.
 *
 * @module ops/discover
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { DISCOVERY_MAX_DEPTH, GIT_DIR } from '../constants'
import type { Repository } from '../types/inventory'
import { compareStrings } from '../utils/format'
import { isDirectory, isWithin } from '../utils/fs'
import { noopLogger, type Logger } from '../utils/logger'

/**
 * Options for {@link discoverRepositories}.
 */
export interface DiscoverOptions {
  /**
   * Deepest level (relative to the parent) at which a `.git` directory is
   * accepted. The default of 2 finds the parent itself and its direct children.
   */
  maxDepth?: number
  /** Directories never descended into, such as the run's output directory */
  exclude?: readonly string[]
  logger?: Logger
}

/**
 * Find every repository root below `parentDir`.
 *
 * A directory is a repository root when it contains a `.git` directory.
 * Results are ordered by depth, then by name, so repeated runs over the same
 * tree list repositories identically. `.git` directories and symlinks are
 * never descended into.
 *
 * @example
 * const repos = await discoverRepositories('/srv/repos')
 * // [{ root: '/srv/repos/api', name: 'api' }, { root: '/srv/repos/web', name: 'web' }]
 */
export async function discoverRepositories(
  parentDir: string,
  options: DiscoverOptions = {}
): Promise<Repository[]> {
  const maxDepth = options.maxDepth ?? DISCOVERY_MAX_DEPTH
  const exclude = (options.exclude ?? []).map((dir) => path.resolve(dir))
  const logger = options.logger ?? noopLogger
  const root = path.resolve(parentDir)
  const found: Repository[] = []

  let level: string[] = [root]
  for (let depth = 0; depth < maxDepth && level.length > 0; depth++) {
    const next: string[] = []

    for (const dir of level) {
      if (await isDirectory(path.join(dir, GIT_DIR))) {
        const repository: Repository = { root: dir, name: path.basename(dir) }
        found.push(repository)
        logger.info(`Found: ${repository.name}`, { root: dir })
      }

      if (depth + 1 >= maxDepth) continue

      const entries = await fs.readdir(dir, { withFileTypes: true })
      const children = entries
        .filter((entry) => entry.isDirectory() && entry.name !== GIT_DIR)
        .map((entry) => path.join(dir, entry.name))
        .filter((child) => !exclude.some((excluded) => isWithin(excluded, child)))
        .sort(compareStrings)
      next.push(...children)
    }

    level = next
  }

  return found
}
