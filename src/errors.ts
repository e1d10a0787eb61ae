/**
 * @fileoverview Error hierarchy for git-blob-purge
 *
 * All errors extend from CleanerError, which provides:
 * - Error codes for programmatic handling
 * - Cause chaining for error context
 * - Consistent serialization
 *
 * Errors raised on the destructive path (backup, rewrite, publish) may carry
 * a `recovery` instruction that is shown to the operator verbatim.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * try {
 *   await rewriteHistory(repository, paths, deps)
 * } catch (error) {
 *   if (error instanceof RewriteError) {
 *     logger.error(error.message, error)
 *     if (error.recovery) logger.info(error.recovery)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes shared by every error in the hierarchy.
 */
export type CleanerErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'MISSING_DEPENDENCY'
  | 'COMMAND_FAILED'
  | 'BACKUP_FAILED'
  | 'EXTRACT_FAILED'
  | 'UPLOAD_FAILED'
  | 'REWRITE_FAILED'
  | 'REMOTE_RESTORE_FAILED'
  | 'PUSH_FAILED'
  | 'INTERNAL'

/**
 * Base error class for all git-blob-purge errors.
 *
 * @example
 * ```typescript
 * throw new CleanerError('Operation failed', 'INTERNAL')
 *
 * try {
 *   await riskyOperation()
 * } catch (cause) {
 *   throw new CleanerError('Wrapper error', 'INTERNAL', { cause })
 * }
 * ```
 */
export class CleanerError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: CleanerErrorCode

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  /**
   * Operator-facing instruction for recovering from this error.
   */
  readonly recovery?: string

  constructor(
    message: string,
    code: CleanerErrorCode = 'UNKNOWN',
    options?: { cause?: unknown; recovery?: string }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'CleanerError'
    this.code = code
    this.cause = options?.cause
    this.recovery = options?.recovery

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      recovery: this.recovery,
      stack: this.stack,
    }
  }

  /**
   * Wraps another error as the cause of a new CleanerError.
   */
  static wrap(cause: unknown, message?: string): CleanerError {
    const msg = message || (cause instanceof Error ? cause.message : String(cause))
    return new CleanerError(msg, 'INTERNAL', { cause })
  }
}

// =============================================================================
// Environment and Usage Errors
// =============================================================================

/**
 * Raised before any repository is touched: missing tools, a parent
 * directory that does not exist, nothing to discover.
 */
export class EnvironmentError extends CleanerError {
  /** Tools that could not be found, when the error is about dependencies */
  readonly missing: readonly string[]

  constructor(
    message: string,
    code: CleanerErrorCode = 'NOT_FOUND',
    options?: { cause?: unknown; missing?: readonly string[] }
  ) {
    super(message, code, options)
    this.name = 'EnvironmentError'
    this.missing = options?.missing ?? []
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), missing: this.missing }
  }

  static missingDependencies(missing: readonly string[]): EnvironmentError {
    return new EnvironmentError(
      `Missing required dependencies: ${missing.join(' ')}`,
      'MISSING_DEPENDENCY',
      { missing }
    )
  }
}

/**
 * Raised for invalid command-line input.
 */
export class UsageError extends CleanerError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT')
    this.name = 'UsageError'
  }
}

// =============================================================================
// Git Command Errors
// =============================================================================

/**
 * A git (or rewrite engine) process exited with a non-zero status.
 */
export class GitCommandError extends CleanerError {
  /** Executable that was run */
  readonly command: string
  /** Arguments passed to the executable */
  readonly args: readonly string[]
  /** Process exit code */
  readonly exitCode: number
  /** Captured standard error, trimmed */
  readonly stderr: string

  constructor(command: string, args: readonly string[], exitCode: number, stderr: string) {
    const detail = stderr.trim()
    super(
      `${command} ${args.join(' ')} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`,
      'COMMAND_FAILED'
    )
    this.name = 'GitCommandError'
    this.command = command
    this.args = args
    this.exitCode = exitCode
    this.stderr = detail
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      command: this.command,
      args: this.args,
      exitCode: this.exitCode,
      stderr: this.stderr,
    }
  }
}

// =============================================================================
// Pipeline Stage Errors
// =============================================================================

/**
 * The pre-mutation backup could not be written. The repository is untouched.
 */
export class BackupError extends CleanerError {
  /** Backup artifact that was being written */
  readonly artifact: string

  constructor(message: string, artifact: string, options?: { cause?: unknown }) {
    super(message, 'BACKUP_FAILED', options)
    this.name = 'BackupError'
    this.artifact = artifact
  }
}

/**
 * A blob could not be extracted from the object store or uploaded.
 */
export class ArchiveError extends CleanerError {
  /** Object id of the blob */
  readonly objectId: string
  /** Storage key the blob was meant for */
  readonly key: string

  constructor(
    message: string,
    code: 'EXTRACT_FAILED' | 'UPLOAD_FAILED',
    options: { objectId: string; key: string; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'ArchiveError'
    this.objectId = options.objectId
    this.key = options.key
  }
}

/**
 * History rewrite (or the remote restore that follows it) failed.
 */
export class RewriteError extends CleanerError {
  constructor(
    message: string,
    code: 'REWRITE_FAILED' | 'REMOTE_RESTORE_FAILED' = 'REWRITE_FAILED',
    options?: { cause?: unknown; recovery?: string }
  ) {
    super(message, code, options)
    this.name = 'RewriteError'
  }
}

/**
 * Force-pushing rewritten branches failed. The local rewrite is kept.
 */
export class PublishError extends CleanerError {
  constructor(message: string, options?: { cause?: unknown; recovery?: string }) {
    super(message, 'PUSH_FAILED', options)
    this.name = 'PublishError'
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Type guard for the error hierarchy.
 */
export function isCleanerError(error: unknown): error is CleanerError {
  return error instanceof CleanerError
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
