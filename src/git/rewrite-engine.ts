/**
 * @fileoverview History rewrite engines.
 *
 * A {@link RewriteEngine} removes a set of paths from every commit and tag
 * while keeping all other content and commit metadata. The pipeline only
 * depends on that contract; {@link FilterRepoEngine} fulfils it with
 * git-filter-repo.
 *
 * @module git/rewrite-engine
 */

import { GitCommandError } from '../errors'
import type { CommandExecutor } from './executor'

/**
 * Removes paths from the entire history of a repository.
 */
export interface RewriteEngine {
  /** Name used in logs and dependency checks */
  readonly name: string
  /** Installed engine version */
  version(): Promise<string>
  /**
   * Rewrite history without `paths`.
   *
   * @returns Engine output, for the repository log
   * @throws When the engine fails; the repository may be partially rewritten
   */
  rewrite(root: string, paths: readonly string[]): Promise<string>
}

/**
 * Build the git-filter-repo argument list that drops `paths` from history.
 *
 * @example
 * buildFilterRepoArgs(['a.bin', 'dir/b.iso'])
 * // ['--path', 'a.bin', '--path', 'dir/b.iso', '--invert-paths', '--force']
 */
export function buildFilterRepoArgs(paths: readonly string[]): string[] {
  const args: string[] = []
  for (const path of paths) {
    args.push('--path', path)
  }
  args.push('--invert-paths', '--force')
  return args
}

/**
 * {@link RewriteEngine} backed by the `git-filter-repo` tool.
 *
 * git-filter-repo prunes the commits emptied by the removal, rewrites every
 * ref, and removes the `origin` remote as a safety measure; callers restore
 * the remote afterwards.
 */
export class FilterRepoEngine implements RewriteEngine {
  readonly name: string
  private readonly executor: CommandExecutor

  constructor(executor: CommandExecutor, binary = 'git-filter-repo') {
    this.executor = executor
    this.name = binary
  }

  async version(): Promise<string> {
    const result = await this.executor.run(this.name, ['--version'])
    if (result.exitCode !== 0) {
      throw new GitCommandError(this.name, ['--version'], result.exitCode, result.stderr)
    }
    return result.stdout.toString('utf8').trim()
  }

  async rewrite(root: string, paths: readonly string[]): Promise<string> {
    const args = buildFilterRepoArgs(paths)
    const result = await this.executor.run(this.name, args, { cwd: root })
    const output = [result.stdout.toString('utf8'), result.stderr].map((text) => text.trim()).filter(Boolean).join('\n')
    if (result.exitCode !== 0) {
      throw new GitCommandError(this.name, args, result.exitCode, result.stderr)
    }
    return output
  }
}
