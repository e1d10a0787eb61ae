/**
 * @fileoverview CLI entry point for git-blob-purge
 *
 * Parses the command line, validates it, checks the external tools and hands
 * a RunContext to the pipeline. Every collaborator can be injected, so the
 * whole command runs in tests without a terminal, git or S3.
 *
 * @module cli/index
 *
 * @example
 * // Preview a directory of repositories
 * import { runCLI } from './cli'
 *
 * const result = await runCLI(['/srv/repos', '--size', '50'])
 * process.exitCode = result.exitCode
 *
 * @example
 * // Parse arguments without running
 * import { parseArgs } from './cli'
 *
 * const parsed = parseArgs(['/srv/repos', '--execute', '--skip-push'])
 * console.log(parsed.args)    // ['/srv/repos']
 * console.log(parsed.options) // { execute: true, skipPush: true }
 */

import cac from 'cac'
import { createRunContext, parseSizeMb, type ExecutionMode, type RunContext } from '../config/run-context'
import { S3_ENDPOINT_ENV, TOOL_NAME, VERSION } from '../constants'
import { EnvironmentError, UsageError, isCleanerError, toError } from '../errors'
import { CliGitEngine, type GitEngine } from '../git/engine'
import { createSpawnExecutor } from '../git/executor'
import { FilterRepoEngine, type RewriteEngine } from '../git/rewrite-engine'
import { runPipeline, type BackupFn, type ConfirmFn, type RunResult } from '../ops/pipeline'
import { S3BlobStore, type BlobStore } from '../storage/blob-store'
import { isDirectory } from '../utils/fs'
import { consoleHandler, createLogger, formatLogLine, LogLevel, type LogHandler } from '../utils/logger'
import { checkDependencies, installInstructions } from './preflight'
import { terminalConfirm } from './prompt'

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators used by a run. Each one defaults to the real implementation.
 */
export interface CLIRuntime {
  git: GitEngine
  rewriter: RewriteEngine
  /** Builds the blob store for a run that archives */
  createStore: (ctx: RunContext) => BlobStore
  /** Receives every log entry */
  logHandler: LogHandler
  backup?: BackupFn
  measure?: (dir: string) => Promise<number>
  /** Run start time */
  now?: Date
}

/**
 * Options for configuring CLI behavior.
 *
 * @example
 * const options: CLIOptions = {
 *   stdout: (msg) => output.push(msg),
 *   stderr: (msg) => errors.push(msg),
 *   confirm: async () => 'YES',
 * }
 */
export interface CLIOptions {
  /** Custom function for standard output */
  stdout?: (msg: string) => void
  /** Custom function for error output; log lines go here too when no handler is given */
  stderr?: (msg: string) => void
  /** Confirmation prompt (defaults to the terminal) */
  confirm?: ConfirmFn
  runtime?: Partial<CLIRuntime>
}

/**
 * Result returned from a CLI invocation.
 */
export interface CLIResult {
  /** Exit code (0 for success, non-zero for failure) */
  exitCode: number
  /** Mode of the run, once the arguments were valid */
  mode?: ExecutionMode
  /** Error object if the invocation failed before or outside the pipeline */
  error?: Error
  /** Pipeline result, when the pipeline ran */
  run?: RunResult
}

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** Positional arguments */
  args: string[]
  /** Options with camelCased keys */
  options: Record<string, unknown>
}

// ============================================================================
// Constants
// ============================================================================

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  'help',
  'h',
  'version',
  'v',
  'execute',
  'size',
  'bucket',
  'remote',
  'skipS3',
  'skipPush',
  'strictArchive',
  'output',
  'verbose',
])

// ============================================================================
// CLI Class
// ============================================================================

/**
 * Command-line interface of git-blob-purge.
 *
 * @example
 * const output: string[] = []
 * const cli = new CLI({ stdout: (msg) => output.push(msg) })
 * const result = await cli.run(['/srv/repos'])
 */
export class CLI {
  /** The name of the CLI tool */
  public name: string

  /** The version of the CLI tool */
  public version: string

  private stdout: (msg: string) => void
  private stderr: (msg: string) => void
  private confirm: ConfirmFn
  private runtime: Partial<CLIRuntime>
  private logHandler: LogHandler

  constructor(options: CLIOptions = {}) {
    this.name = TOOL_NAME
    this.version = VERSION
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
    this.confirm = options.confirm ?? terminalConfirm
    this.runtime = options.runtime ?? {}

    const stderr = options.stderr
    this.logHandler =
      this.runtime.logHandler ?? (stderr !== undefined ? (entry) => stderr(formatLogLine(entry)) : consoleHandler)
  }

  /**
   * Runs the CLI with the provided arguments.
   *
   * @param args - Command-line arguments (excluding 'node' and script name)
   * @returns Exit code and, when the pipeline ran, its result
   *
   * @throws Never throws directly - errors are captured in CLIResult.error
   */
  async run(args: string[]): Promise<CLIResult> {
    let parsed: ParsedArgs
    try {
      parsed = parseArgs(args)
    } catch (err) {
      return this.usageFailure(toError(err))
    }

    if (parsed.options.help || parsed.options.h) {
      this.stdout(this.getHelp())
      return { exitCode: 0 }
    }

    if (parsed.options.version || parsed.options.v) {
      this.stdout(`${this.name} v${this.version}`)
      return { exitCode: 0 }
    }

    for (const key of Object.keys(parsed.options)) {
      if (!KNOWN_FLAGS.has(key)) {
        return this.usageFailure(new UsageError(`Unknown option: ${flagName(key)}`))
      }
    }

    if (parsed.args.length === 0) {
      return this.usageFailure(new UsageError('Parent directory is required'))
    }
    if (parsed.args.length > 1) {
      return this.usageFailure(new UsageError(`Unexpected argument: ${parsed.args[1]}`))
    }

    let ctx: RunContext
    try {
      ctx = createRunContext(
        {
          parentDir: parsed.args[0],
          sizeMb: parsed.options.size === undefined ? undefined : parseSizeMb(parsed.options.size),
          execute: parsed.options.execute === true,
          remote: stringOption(parsed.options, 'remote'),
          bucket: stringOption(parsed.options, 'bucket'),
          skipArchive: parsed.options.skipS3 === true,
          skipPublish: parsed.options.skipPush === true,
          strictArchive: parsed.options.strictArchive === true,
          outputDir: stringOption(parsed.options, 'output'),
          verbose: parsed.options.verbose === true,
        },
        this.runtime.now
      )
    } catch (err) {
      return this.usageFailure(toError(err))
    }

    return this.execute(ctx)
  }

  /**
   * Preflight, then the pipeline.
   */
  private async execute(ctx: RunContext): Promise<CLIResult> {
    const logger = createLogger({
      component: 'cli',
      minLevel: ctx.verbose ? LogLevel.DEBUG : LogLevel.INFO,
      handler: this.logHandler,
    })

    try {
      if (!(await isDirectory(ctx.parentDir))) {
        throw new EnvironmentError(`Directory not found: ${ctx.parentDir}`)
      }

      const executor = createSpawnExecutor()
      const git = this.runtime.git ?? new CliGitEngine(executor)
      const rewriter = this.runtime.rewriter ?? new FilterRepoEngine(executor)
      await checkDependencies(ctx.mode, git, rewriter, logger)

      const needsStore = ctx.mode === 'execute' && !ctx.skipArchive
      const createStore = this.runtime.createStore ?? defaultStore
      const store = needsStore ? createStore(ctx) : undefined

      const result = await runPipeline(ctx, {
        git,
        rewriter,
        ...(store !== undefined && { store }),
        confirm: this.confirm,
        logHandler: this.logHandler,
        print: this.stdout,
        ...(this.runtime.backup !== undefined && { backup: this.runtime.backup }),
        ...(this.runtime.measure !== undefined && { measure: this.runtime.measure }),
      })
      return { exitCode: result.exitCode, mode: ctx.mode, run: result }
    } catch (err) {
      const error = toError(err)
      logger.error(error.message)
      if (error instanceof EnvironmentError && error.missing.length > 0) {
        for (const line of installInstructions(error.missing)) this.stderr(line)
      } else if (!isCleanerError(err)) {
        logger.debug(error.stack ?? error.message)
      }
      return { exitCode: 1, mode: ctx.mode, error }
    }
  }

  private usageFailure(error: Error): CLIResult {
    this.stderr(`Error: ${error.message}\nRun '${this.name} --help' for usage.`)
    return { exitCode: 1, error }
  }

  /**
   * Generates the help text.
   */
  private getHelp(): string {
    return `${this.name} v${this.version}

Find files above a size threshold in every Git repository under a directory,
archive their historical versions to S3 and remove them from history.

Usage: ${this.name} <parent-directory> [options]

Options:
  --execute          Rewrite history (default is a dry-run preview)
  --size <mb>        Size threshold in megabytes (default: 100)
  --bucket <name>    S3 bucket for archived blobs (default: git-large-file-archive)
  --remote <name>    Remote to force-push to (default: origin)
  --skip-s3          Do not archive blobs before removing them
  --skip-push        Do not force-push; print the commands instead
  --strict-archive   Do not rewrite a repository when any archive upload failed
  --output <dir>     Output directory (default: <parent>/git-cleaner-output-<timestamp>)
  --verbose          Debug logging
  -h, --help         Show help
  -v, --version      Show version

Environment:
  ${S3_ENDPOINT_ENV}   S3-compatible endpoint URL
  AWS_REGION, AWS_PROFILE, ...   Standard AWS credential chain

Examples:
  ${this.name} /srv/repos
  ${this.name} /srv/repos --size 50 --execute
  ${this.name} /srv/repos --execute --skip-s3 --skip-push`
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function defaultStore(ctx: RunContext): BlobStore {
  const endpoint = process.env[S3_ENDPOINT_ENV]
  return new S3BlobStore({ bucket: ctx.bucket, ...(endpoint ? { endpoint } : {}) })
}

/**
 * `skipS3` -> `--skip-s3`, `h` -> `-h`.
 */
function flagName(key: string): string {
  if (key.length === 1) return `-${key}`
  return `--${key.replace(/[A-Z]/g, (char) => `-${char.toLowerCase()}`)}`
}

/**
 * Read an option that takes a value; numbers are kept as their text.
 */
function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key]
  if (value === undefined) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw new UsageError(`Option ${flagName(key)} requires a value`)
}

// ============================================================================
// Exported Functions
// ============================================================================

/**
 * Creates a new CLI instance with the provided options.
 */
export function createCLI(options: CLIOptions = {}): CLI {
  return new CLI(options)
}

/**
 * Parses command-line arguments with cac.
 *
 * @example
 * const parsed = parseArgs(['/srv/repos', '--size', '50', '--execute'])
 * // { args: ['/srv/repos'], options: { size: 50, execute: true } }
 */
export function parseArgs(args: string[]): ParsedArgs {
  const cli = cac(TOOL_NAME)

  cli.option('--execute', 'Rewrite history')
  cli.option('--size <mb>', 'Size threshold in megabytes')
  cli.option('--bucket <name>', 'S3 bucket')
  cli.option('--remote <name>', 'Remote name')
  cli.option('--skip-s3', 'Skip archiving')
  cli.option('--skip-push', 'Skip force-push')
  cli.option('--strict-archive', 'Block the rewrite on archive failures')
  cli.option('--output <dir>', 'Output directory')
  cli.option('--verbose', 'Debug logging')
  cli.option('-h, --help', 'Show help')
  cli.option('-v, --version', 'Show version')

  const parsed = cli.parse(['node', TOOL_NAME, ...args], { run: false })

  const options: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(parsed.options)) {
    if (key !== '--') options[key] = value
  }

  return {
    args: parsed.args.map(String),
    options,
  }
}

/**
 * Convenience function to create a CLI and run it with the provided arguments.
 *
 * @example
 * const result = await runCLI(['/srv/repos', '--execute'], {
 *   stdout: (msg) => output.push(msg),
 *   confirm: async () => 'YES',
 * })
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  return createCLI(options).run(args)
}
