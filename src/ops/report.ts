/**
 * @fileoverview Text views of a run: configuration banner, preview table,
 * confirmation warning and final summary.
 *
 * Every function returns lines; the pipeline decides where they go.
 *
 * @module ops/report
 */

import type { RunContext } from '../config/run-context'
import { DEFAULT_BUCKET, DEFAULT_REMOTE, DEFAULT_SIZE_MB, TOOL_NAME, VERSION } from '../constants'
import type { Inventory } from '../types/inventory'
import { padColumn, truncatePath } from '../utils/format'

// ============================================================================
// Types
// ============================================================================

/**
 * Counters shown in the final summary.
 */
export interface RunSummary {
  /** Repositories discovered */
  total: number
  /** Repositories that went through the pipeline (succeeded + failed) */
  processed: number
  succeeded: number
  /** Repositories with no large files */
  skipped: number
  failed: number
  archiveUploads: number
  archiveFailures: number
}

const RULE = '='.repeat(95)
const HEAVY_RULE = '═'.repeat(63)

/** Width at which preview paths are shortened */
const PATH_COLUMN_MAX = 38

// ============================================================================
// Views
// ============================================================================

/**
 * One-line version string.
 */
export function versionLine(): string {
  return `${TOOL_NAME} v${VERSION}`
}

/**
 * Effective configuration of the run.
 */
export function renderBanner(ctx: RunContext): string[] {
  return [
    versionLine(),
    '',
    'Configuration:',
    `  Parent Directory:  ${ctx.parentDir}`,
    `  Size Threshold:    ${ctx.thresholdMb} MB`,
    `  S3 Bucket:         ${ctx.bucket}${ctx.skipArchive ? ' (upload skipped)' : ''}`,
    `  Git Remote:        ${ctx.remote}${ctx.skipPublish ? ' (push skipped)' : ''}`,
    `  Mode:              ${ctx.mode === 'execute' ? 'EXECUTE' : 'DRY-RUN'}`,
    `  Output Directory:  ${ctx.outputDir}`,
    '',
  ]
}

/**
 * The command that repeats this run in execute mode.
 */
export function executeCommandHint(ctx: RunContext): string {
  const parts = [TOOL_NAME, ctx.parentDir, '--execute']
  if (ctx.thresholdMb !== DEFAULT_SIZE_MB) parts.push('--size', String(ctx.thresholdMb))
  if (ctx.bucket !== DEFAULT_BUCKET) parts.push('--bucket', ctx.bucket)
  if (ctx.remote !== DEFAULT_REMOTE) parts.push('--remote', ctx.remote)
  if (ctx.skipArchive) parts.push('--skip-s3')
  if (ctx.skipPublish) parts.push('--skip-push')
  if (ctx.strictArchive) parts.push('--strict-archive')
  return parts.join(' ')
}

/**
 * Dry-run table of every inventory row.
 */
export function renderPreview(inventory: Inventory, ctx: RunContext): string[] {
  const lines = [
    'DRY-RUN PREVIEW',
    '',
    `The following files exceed ${ctx.thresholdMb}MB and would be processed:`,
    '',
    `${padColumn('REPOSITORY', 30)} ${padColumn('FILE PATH', 40)} ${padColumn('SIZE', 12)} COMMITS`,
    RULE,
  ]

  for (const row of inventory.rows) {
    lines.push(
      `${padColumn(row.repository, 30)} ${padColumn(truncatePath(row.path, PATH_COLUMN_MAX), 40)} ` +
        `${padColumn(row.sizeHuman, 12)} ${row.commits.length} commit(s)`
    )
  }

  lines.push(
    '',
    RULE,
    '',
    'Summary:',
    `  Total files to process: ${inventory.totalFiles}`,
    `  Report saved to: ${ctx.reportFile}`,
    '',
    'To execute these changes, run with --execute flag:',
    `  ${executeCommandHint(ctx)}`,
    ''
  )
  return lines
}

/**
 * Warning shown before the confirmation prompt.
 */
export function renderConfirmation(ctx: RunContext): string[] {
  const steps = [
    ctx.skipArchive ? null : 'Upload large files to S3',
    'PERMANENTLY rewrite Git history',
    ctx.skipPublish ? null : 'Force-push to remote repositories',
  ].filter((step): step is string => step !== null)

  return [
    '',
    HEAVY_RULE,
    '                WARNING: DESTRUCTIVE OPERATION',
    HEAVY_RULE,
    '',
    'This will:',
    ...steps.map((step, index) => `  ${index + 1}. ${step}`),
    '',
    'Commit hashes WILL change. All team members must re-clone.',
    '',
    `Backups will be saved to: ${ctx.backupDir}`,
    '',
  ]
}

/**
 * Counters and output locations after processing.
 */
export function renderSummary(summary: RunSummary, ctx: RunContext): string[] {
  const lines = [
    'Results:',
    `  Repositories processed: ${summary.processed} of ${summary.total}`,
    `  Successful:             ${summary.succeeded}`,
    `  Skipped:                ${summary.skipped}`,
    `  Failed:                 ${summary.failed}`,
  ]
  if (!ctx.skipArchive) {
    lines.push(`  Archived blobs:         ${summary.archiveUploads} (${summary.archiveFailures} failed)`)
  }
  lines.push(
    '',
    'Output files:',
    `  Report:  ${ctx.reportFile}`,
    `  Backups: ${ctx.backupDir}`,
    `  Logs:    ${ctx.logDir}`,
    ''
  )
  return lines
}

/**
 * One-line summary, e.g. `1 of 2 repositories processed, 1 skipped (no large files), 0 failures`.
 */
export function summaryLine(summary: RunSummary): string {
  return (
    `${summary.processed} of ${summary.total} repositories processed, ` +
    `${summary.skipped} skipped (no large files), ${summary.failed} failure${summary.failed === 1 ? '' : 's'}`
  )
}

/**
 * Commands for checking a finished run by hand.
 */
export function renderVerificationCommands(ctx: RunContext): string[] {
  return [
    'Manual Verification Commands:',
    '',
    '# List any remaining large blobs in a repo:',
    'cd <repo-dir>',
    'git rev-list --objects --all | \\',
    "  git cat-file --batch-check='%(objecttype) %(objectname) %(objectsize)' | \\",
    `  awk '$1 == "blob" && $3 >= ${ctx.thresholdBytes}'`,
    '',
    '# Verify S3 uploads:',
    `aws s3 ls s3://${ctx.bucket}/ --recursive`,
    '',
    '# Check repository integrity:',
    'git fsck --full',
  ]
}
