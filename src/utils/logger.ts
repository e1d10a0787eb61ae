/**
 * @fileoverview Structured logging for git-blob-purge.
 *
 * Log entries are plain objects handed to a pluggable handler. The CLI uses
 * {@link consoleHandler} for progress on stderr and, per repository,
 * {@link teeHandlers} to also append every entry to that repository's log file.
 *
 * @module utils/logger
 *
 * @example Basic usage
 * ```typescript
 * import { createLogger, consoleHandler } from './utils/logger'
 *
 * const logger = createLogger({ component: 'scanner', handler: consoleHandler })
 * logger.info('Scanning history', { repository: 'api' })
 * logger.error('Scan failed', new Error('bad object'), { repository: 'api' })
 * ```
 *
 * @example Per-repository log file
 * ```typescript
 * const handler = teeHandlers(consoleHandler, createFileHandler('/out/logs/api.log'))
 * const repoLogger = createLogger({ component: 'pipeline', handler, context: { repository: 'api' } })
 * ```
 */

import { appendFileSync } from 'fs'

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Priority mapping for log level filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Structured log entry.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  /** Log level */
  level: LogLevel
  /** Log message */
  message: string
  /** Component or module name */
  component?: string
  /** Error information if present */
  error?: {
    name: string
    message: string
    stack?: string
  }
  /** Additional structured data */
  data?: Record<string, unknown>
}

/**
 * Receives every entry that passes the level filter.
 */
export type LogHandler = (entry: LogEntry) => void

/**
 * Logger interface supporting structured logging.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  /**
   * Log an error message with optional error object.
   */
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): Logger
}

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Component or module name */
  component?: string
  /** Minimum log level to output (default: INFO) */
  minLevel?: LogLevel
  /** Additional context to include in all log entries */
  context?: Record<string, unknown>
  /** Log handler (defaults to {@link consoleHandler}) */
  handler?: LogHandler
}

// ============================================================================
// Handlers
// ============================================================================

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR',
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[2m',
  [LogLevel.INFO]: '\x1b[34m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
}

const RESET = '\x1b[0m'

/**
 * Formats an entry as a single human-readable line, e.g. `[INFO] Found: api`.
 * Error details are appended after the message.
 */
export function formatLogLine(entry: LogEntry, options: { color?: boolean; timestamp?: boolean } = {}): string {
  const label = `[${LEVEL_LABELS[entry.level]}]`
  const prefix = options.color ? `${LEVEL_COLORS[entry.level]}${label}${RESET}` : label
  const time = options.timestamp ? ` ${entry.timestamp}` : ''
  const cause = entry.error && entry.error.message !== entry.message ? `: ${entry.error.message}` : ''
  return `${prefix}${time} ${entry.message}${cause}`
}

/**
 * Writes human-readable lines to stderr, coloured when stderr is a TTY.
 * Progress goes to stderr so that stdout carries only the report views.
 */
export function consoleHandler(entry: LogEntry): void {
  process.stderr.write(`${formatLogLine(entry, { color: process.stderr.isTTY === true })}\n`)
}

/**
 * Appends `[LEVEL] <timestamp> message` lines to a file.
 *
 * Appends are synchronous; lines keep the order entries were emitted in.
 */
export function createFileHandler(file: string): LogHandler {
  return (entry) => {
    appendFileSync(file, `${formatLogLine(entry, { timestamp: true })}\n`, 'utf8')
  }
}

/**
 * Fans each entry out to several handlers in order.
 */
export function teeHandlers(...handlers: LogHandler[]): LogHandler {
  return (entry) => {
    for (const handler of handlers) {
      handler(entry)
    }
  }
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a structured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   component: 'pipeline',
 *   minLevel: LogLevel.DEBUG,
 *   handler: consoleHandler,
 * })
 *
 * logger.info('Processing repository', { repository: 'api' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    component,
    minLevel = LogLevel.INFO,
    context = {},
    handler = consoleHandler,
  } = options

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
  }

  function log(
    level: LogLevel,
    message: string,
    error?: Error,
    data?: Record<string, unknown>
  ): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    if (component) {
      entry.component = component
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        ...(error.stack !== undefined && { stack: error.stack }),
      }
    }

    const mergedData = { ...context, ...data }
    if (Object.keys(mergedData).length > 0) {
      entry.data = mergedData
    }

    handler(entry)
  }

  const logger: Logger = {
    debug(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.DEBUG, message, undefined, data)
    },

    info(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.INFO, message, undefined, data)
    },

    warn(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.WARN, message, undefined, data)
    },

    error(message: string, error?: Error, data?: Record<string, unknown>): void {
      log(LogLevel.ERROR, message, error, data)
    },

    child(childContext: Record<string, unknown>): Logger {
      return createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      })
    },
  }

  return logger
}

/**
 * No-op logger that discards all messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
