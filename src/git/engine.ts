/**
 * @fileoverview Git engine: the narrow view of the version-control store
 * that the scanner, archiver, rewriter, publisher and verifier rely on.
 *
 * {@link CliGitEngine} drives the `git` binary through a
 * {@link CommandExecutor}; tests substitute an in-memory engine.
 *
 * @module git/engine
 *
 * @example
 * ```typescript
 * const git = new CliGitEngine(createSpawnExecutor())
 * const objects = await git.listReachableObjects('/srv/repos/api')
 * const blobs = objects.filter((o) => o.type === 'blob')
 * ```
 */

import { Readable } from 'stream'
import { GitCommandError } from '../errors'
import type { CommandExecutor, CommandResult } from './executor'

// ============================================================================
// Types
// ============================================================================

/**
 * Git object types as reported by `git cat-file`.
 */
export type ObjectType = 'blob' | 'tree' | 'commit' | 'tag'

/**
 * One object reachable from a branch or tag.
 */
export interface ReachableObject {
  type: ObjectType
  objectId: string
  size: number
  /** Path under which the object was first reached; empty for commits and root trees */
  path: string
}

/**
 * Operations the pipeline needs from the version-control store.
 */
export interface GitEngine {
  /** Installed git version string */
  version(): Promise<string>
  /** Whether at least one ref points at a commit */
  hasCommits(root: string): Promise<boolean>
  /** Every object reachable from any branch or tag, with type, size and path */
  listReachableObjects(root: string): Promise<ReachableObject[]>
  /**
   * Commits whose diff adds or removes the object, oldest first and capped at
   * `limit`. The first entry is the commit that introduced the content.
   */
  findCommitsForObject(root: string, objectId: string, limit: number): Promise<string[]>
  /**
   * Raw content of a blob as a stream. A read failure surfaces as an `error`
   * event on the stream.
   */
  readBlob(root: string, objectId: string): Readable
  /** URL of a remote, or null when it is not configured */
  getRemoteUrl(root: string, remote: string): Promise<string | null>
  addRemote(root: string, remote: string, url: string): Promise<void>
  /** Force-update every branch at the remote; returns the command output */
  pushBranches(root: string, remote: string): Promise<string>
  /** Force-update every tag at the remote; returns the command output */
  pushTags(root: string, remote: string): Promise<string>
  /** Expire unreachable objects and repack; returns the command output */
  compact(root: string): Promise<string>
}

// ============================================================================
// Parsing
// ============================================================================

const OBJECT_TYPES: ReadonlySet<string> = new Set(['blob', 'tree', 'commit', 'tag'])

const OBJECT_ID_PATTERN = /^[0-9a-f]{40}([0-9a-f]{24})?$/

function isObjectType(value: string): value is ObjectType {
  return OBJECT_TYPES.has(value)
}

/**
 * Check that a string is a full SHA-1 or SHA-256 object id.
 */
export function isObjectId(value: string): boolean {
  return OBJECT_ID_PATTERN.test(value)
}

/**
 * Format string handed to `git cat-file --batch-check`.
 */
export const BATCH_CHECK_FORMAT = '%(objecttype) %(objectname) %(objectsize) %(rest)'

/**
 * Parse `git cat-file --batch-check` output in {@link BATCH_CHECK_FORMAT}.
 *
 * The path (`%(rest)`) may itself contain spaces, so only the first three
 * separators are significant. Lines that do not parse (such as
 * `<id> missing`) are skipped.
 *
 * @example
 * parseBatchCheck('blob 3b18e512dba79e4c8300dd08aeb37f8e728b8dad 132120576 assets/old large.bin\n')
 * // [{ type: 'blob', objectId: '3b18…', size: 132120576, path: 'assets/old large.bin' }]
 */
export function parseBatchCheck(output: string): ReachableObject[] {
  const objects: ReachableObject[] = []

  for (const line of output.split('\n')) {
    if (!line) continue
    const first = line.indexOf(' ')
    const second = first === -1 ? -1 : line.indexOf(' ', first + 1)
    if (second === -1) continue
    const third = line.indexOf(' ', second + 1)

    const type = line.slice(0, first)
    const objectId = line.slice(first + 1, second)
    const sizeText = third === -1 ? line.slice(second + 1) : line.slice(second + 1, third)
    const path = third === -1 ? '' : line.slice(third + 1)
    const size = Number(sizeText)

    if (!isObjectType(type) || !isObjectId(objectId) || !Number.isSafeInteger(size)) continue
    objects.push({ type, objectId, size, path })
  }

  return objects
}

/**
 * Split command output into non-empty trimmed lines.
 */
export function outputLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
}

// ============================================================================
// CLI-backed engine
// ============================================================================

/**
 * {@link GitEngine} implemented with the `git` command-line tool.
 */
export class CliGitEngine implements GitEngine {
  private readonly executor: CommandExecutor
  private readonly binary: string

  constructor(executor: CommandExecutor, binary = 'git') {
    this.executor = executor
    this.binary = binary
  }

  /**
   * Run git and throw on a non-zero exit.
   */
  private async git(root: string | undefined, args: string[], input?: string | Buffer): Promise<CommandResult> {
    const result = await this.executor.run(this.binary, args, {
      ...(root !== undefined && { cwd: root }),
      ...(input !== undefined && { input }),
    })
    if (result.exitCode !== 0) {
      throw new GitCommandError(this.binary, args, result.exitCode, result.stderr)
    }
    return result
  }

  async version(): Promise<string> {
    const result = await this.git(undefined, ['--version'])
    return result.stdout.toString('utf8').trim()
  }

  async hasCommits(root: string): Promise<boolean> {
    const result = await this.executor.run(this.binary, ['rev-list', '--all', '--max-count=1'], { cwd: root })
    return result.exitCode === 0 && result.stdout.toString('utf8').trim() !== ''
  }

  async listReachableObjects(root: string): Promise<ReachableObject[]> {
    const revList = await this.git(root, ['rev-list', '--objects', '--all'])
    if (revList.stdout.length === 0) return []
    const check = await this.git(root, ['cat-file', `--batch-check=${BATCH_CHECK_FORMAT}`], revList.stdout)
    return parseBatchCheck(check.stdout.toString('utf8'))
  }

  async findCommitsForObject(root: string, objectId: string, limit: number): Promise<string[]> {
    const result = await this.git(root, ['log', '--all', '--reverse', `--find-object=${objectId}`, '--format=%H'])
    return outputLines(result.stdout.toString('utf8')).filter(isObjectId).slice(0, limit)
  }

  readBlob(root: string, objectId: string): Readable {
    const args = ['cat-file', 'blob', objectId]
    const { stdout, exit } = this.executor.stream(this.binary, args, { cwd: root })
    const binary = this.binary

    async function* content(): AsyncGenerator<Buffer> {
      for await (const chunk of stdout) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
      }
      const { exitCode, stderr } = await exit
      if (exitCode !== 0) {
        throw new GitCommandError(binary, args, exitCode, stderr)
      }
    }

    return Readable.from(content(), { objectMode: false })
  }

  async getRemoteUrl(root: string, remote: string): Promise<string | null> {
    const result = await this.executor.run(this.binary, ['remote', 'get-url', remote], { cwd: root })
    if (result.exitCode !== 0) return null
    const url = result.stdout.toString('utf8').trim()
    return url || null
  }

  async addRemote(root: string, remote: string, url: string): Promise<void> {
    await this.git(root, ['remote', 'add', remote, url])
  }

  async pushBranches(root: string, remote: string): Promise<string> {
    return combined(await this.git(root, ['push', '--force', '--all', remote]))
  }

  async pushTags(root: string, remote: string): Promise<string> {
    return combined(await this.git(root, ['push', '--force', '--tags', remote]))
  }

  async compact(root: string): Promise<string> {
    return combined(await this.git(root, ['gc', '--prune=now', '--aggressive']))
  }
}

/**
 * git reports push and gc progress on stderr; keep both streams for the log.
 */
function combined(result: CommandResult): string {
  return [result.stdout.toString('utf8'), result.stderr].map((text) => text.trim()).filter(Boolean).join('\n')
}
