/**
 * @fileoverview Process execution seam for the git engine.
 *
 * Every external command goes through a {@link CommandExecutor}, so the git
 * engine can be driven by a scripted executor in tests. Commands are spawned
 * without a shell: arguments are never re-parsed, whatever the file names.
 *
 * @module git/executor
 */

import { spawn } from 'child_process'
import type { Readable } from 'stream'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a single command run.
 */
export interface RunOptions {
  /** Working directory */
  cwd?: string
  /** Data written to the child's stdin before it is closed */
  input?: string | Buffer
}

/**
 * Outcome of a finished process.
 */
export interface CommandResult {
  /** Raw standard output (blobs are binary) */
  stdout: Buffer
  /** Standard error decoded as UTF-8 */
  stderr: string
  /** Exit code; -1 when the process was killed by a signal */
  exitCode: number
}

/**
 * How a streamed process ended.
 */
export interface CommandExit {
  /** Exit code; -1 when the process was killed or could not be started */
  exitCode: number
  /** Standard error, or the spawn error message */
  stderr: string
}

/**
 * A process whose standard output is consumed while it runs.
 */
export interface CommandStream {
  stdout: Readable
  /** Settles once the process has exited; never rejects */
  exit: Promise<CommandExit>
}

/**
 * Runs external commands.
 *
 * `run` resolves for any exit code and rejects only when the process cannot
 * be started (for instance ENOENT for a missing binary). `stream` hands out
 * stdout as it is produced, for outputs too large to hold in memory.
 */
export interface CommandExecutor {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
  stream(command: string, args: readonly string[], options?: Pick<RunOptions, 'cwd'>): CommandStream
}

// ============================================================================
// Spawn-backed executor
// ============================================================================

/**
 * Create an executor that spawns real processes.
 *
 * Output is collected in memory without a size cap: object listings of
 * large histories run to hundreds of megabytes.
 */
export function createSpawnExecutor(): CommandExecutor {
  return {
    run(command, args, options = {}) {
      return new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, [...args], {
          cwd: options.cwd,
          stdio: ['pipe', 'pipe', 'pipe'],
        })

        const stdout: Buffer[] = []
        const stderr: Buffer[] = []

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
        child.on('error', reject)
        child.on('close', (code) => {
          resolve({
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr).toString('utf8'),
            exitCode: code ?? -1,
          })
        })

        // A child that exits without reading all of its input raises EPIPE;
        // its exit code already tells the caller what happened.
        child.stdin.on('error', (error: NodeJS.ErrnoException) => {
          if (error.code !== 'EPIPE') reject(error)
        })
        if (options.input !== undefined) {
          child.stdin.end(options.input)
        } else {
          child.stdin.end()
        }
      })
    },

    stream(command, args, options = {}) {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      const stderr: Buffer[] = []
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

      const exit = new Promise<CommandExit>((resolve) => {
        child.on('error', (error) => resolve({ exitCode: -1, stderr: error.message }))
        child.on('close', (code) => {
          resolve({ exitCode: code ?? -1, stderr: Buffer.concat(stderr).toString('utf8') })
        })
      })

      return { stdout: child.stdout, exit }
    },
  }
}
