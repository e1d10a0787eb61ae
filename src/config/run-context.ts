/**
 * @fileoverview Run context: the immutable configuration of one invocation.
 *
 * A RunContext is built once from CLI input and passed explicitly to every
 * component. Nothing in the pipeline reads process-wide state for thresholds,
 * directories or the run timestamp.
 *
 * @module config/run-context
 *
 * @example
 * ```typescript
 * const ctx = createRunContext({ parentDir: '/srv/repos', sizeMb: 50, execute: true })
 * ctx.thresholdBytes // 52428800
 * ctx.reportFile     // '/srv/repos/git-cleaner-output-20261019_101500/large-files-report.csv'
 * ```
 */

import * as path from 'path'
import {
  BYTES_PER_MB,
  COMMIT_SAMPLE_SIZE,
  DEFAULT_BUCKET,
  DEFAULT_REMOTE,
  DEFAULT_SIZE_MB,
  OUTPUT_DIR_PREFIX,
  REPORT_FILE_NAME,
} from '../constants'
import { UsageError } from '../errors'

// ============================================================================
// Types
// ============================================================================

/**
 * Preview lists what would happen; execute mutates repositories.
 */
export type ExecutionMode = 'preview' | 'execute'

/**
 * Raw input collected from the command line.
 */
export interface RunContextInput {
  /** Directory containing the repositories */
  parentDir: string
  /** Size threshold in megabytes */
  sizeMb?: number
  /** Switch to destructive mode */
  execute?: boolean
  /** Remote name */
  remote?: string
  /** Blob storage bucket */
  bucket?: string
  /** Skip uploading blobs before the rewrite */
  skipArchive?: boolean
  /** Skip force-pushing after the rewrite */
  skipPublish?: boolean
  /** Refuse to rewrite a repository when any of its uploads failed */
  strictArchive?: boolean
  /** Override for the per-run output directory */
  outputDir?: string
  /** Debug-level logging */
  verbose?: boolean
}

/**
 * Immutable per-run configuration.
 */
export interface RunContext {
  readonly parentDir: string
  readonly thresholdMb: number
  readonly thresholdBytes: number
  readonly mode: ExecutionMode
  readonly remote: string
  readonly bucket: string
  readonly skipArchive: boolean
  readonly skipPublish: boolean
  readonly strictArchive: boolean
  readonly verbose: boolean
  /** `YYYYMMDD_HHMMSS`, namespaces every artifact of the run */
  readonly timestamp: string
  readonly outputDir: string
  readonly backupDir: string
  readonly logDir: string
  readonly reportFile: string
  /** Referencing commits kept per blob for display */
  readonly commitSampleSize: number
}

// ============================================================================
// Construction
// ============================================================================

function pad2(value: number): string {
  return value.toString().padStart(2, '0')
}

/**
 * Format a date as `YYYYMMDD_HHMMSS` in local time.
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  )
}

/**
 * Validate a threshold given in megabytes.
 *
 * @throws {UsageError} When the value is not a positive integer
 */
export function parseSizeMb(value: unknown): number {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN
  if (!Number.isInteger(numeric) || numeric <= 0) {
    throw new UsageError(`Invalid size threshold: ${String(value)} (expected a positive whole number of MB)`)
  }
  return numeric
}

function requireName(value: string | undefined, fallback: string, label: string): string {
  if (value === undefined) return fallback
  const trimmed = value.trim()
  if (!trimmed) {
    throw new UsageError(`${label} must be a non-empty string`)
  }
  return trimmed
}

/**
 * Build the frozen RunContext for one invocation.
 *
 * @param input - Values collected from the command line
 * @param now - Run start time, used for the artifact timestamp
 * @throws {UsageError} On invalid threshold, remote or bucket
 */
export function createRunContext(input: RunContextInput, now: Date = new Date()): RunContext {
  const parentDir = path.resolve(input.parentDir)
  const thresholdMb = input.sizeMb === undefined ? DEFAULT_SIZE_MB : parseSizeMb(input.sizeMb)
  const timestamp = formatRunTimestamp(now)
  const outputDir = input.outputDir
    ? path.resolve(input.outputDir)
    : path.join(parentDir, `${OUTPUT_DIR_PREFIX}${timestamp}`)

  return Object.freeze({
    parentDir,
    thresholdMb,
    thresholdBytes: thresholdMb * BYTES_PER_MB,
    mode: input.execute ? 'execute' : 'preview',
    remote: requireName(input.remote, DEFAULT_REMOTE, 'Remote name'),
    bucket: requireName(input.bucket, DEFAULT_BUCKET, 'Bucket name'),
    skipArchive: input.skipArchive ?? false,
    skipPublish: input.skipPublish ?? false,
    strictArchive: input.strictArchive ?? false,
    verbose: input.verbose ?? false,
    timestamp,
    outputDir,
    backupDir: path.join(outputDir, 'backups'),
    logDir: path.join(outputDir, 'logs'),
    reportFile: path.join(outputDir, REPORT_FILE_NAME),
    commitSampleSize: COMMIT_SAMPLE_SIZE,
  } satisfies RunContext)
}
