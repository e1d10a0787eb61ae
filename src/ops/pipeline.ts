/**
 * @fileoverview Orchestrator: the run state machine.
 *
 * ```
 * discovering -> scanning -> previewing
 *                         -> confirming -> aborted
 *                                       -> processing -> reporting
 * ```
 *
 * Scanning always covers every repository before anything is decided.
 * Processing walks the repositories one at a time through
 * `backing-up -> archiving -> rewriting -> publishing -> verifying`; a failure
 * ends that repository's walk and is recorded as a tagged outcome, and the
 * next repository is attempted.
 *
 * @module ops/pipeline
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import type { RunContext } from '../config/run-context'
import { CONFIRMATION_TOKEN } from '../constants'
import { CleanerError, EnvironmentError, isCleanerError, toError } from '../errors'
import type { GitEngine } from '../git/engine'
import type { RewriteEngine } from '../git/rewrite-engine'
import type { BlobStore } from '../storage/blob-store'
import type { Inventory, Repository } from '../types/inventory'
import { formatSize } from '../utils/format'
import { isDirectory } from '../utils/fs'
import {
  createFileHandler,
  createLogger,
  LogLevel,
  teeHandlers,
  type LogHandler,
  type Logger,
} from '../utils/logger'
import { archiveRepository, type ArchiveSummary } from './archive'
import { backupRepository, type BackupArtifact, type BackupOptions } from './backup'
import { discoverRepositories } from './discover'
import {
  buildInventory,
  buildRewriteRequest,
  rowsForRepository,
  writeInventoryReport,
  type RepositoryScanner,
} from './inventory'
import { publishRepository, type PublishResult } from './publish'
import {
  renderBanner,
  renderConfirmation,
  renderPreview,
  renderSummary,
  renderVerificationCommands,
  summaryLine,
  type RunSummary,
} from './report'
import { rewriteHistory, type RewriteResult } from './rewrite'
import { verifyRepository, type VerifyResult } from './verify'

// ============================================================================
// Types
// ============================================================================

/**
 * Run-level states.
 */
export type RunPhase =
  | 'discovering'
  | 'scanning'
  | 'previewing'
  | 'confirming'
  | 'aborted'
  | 'processing'
  | 'reporting'

/**
 * Per-repository states inside `processing`, in order.
 */
export type ProcessingStage = 'backing-up' | 'archiving' | 'rewriting' | 'publishing' | 'verifying'

/**
 * Transition notifications, in the order they happen.
 */
export type PipelineEvent =
  | { type: 'phase'; phase: RunPhase }
  | { type: 'stage'; repository: string; stage: ProcessingStage }

/**
 * Asks the operator a question and resolves to the raw answer.
 */
export type ConfirmFn = (question: string) => Promise<string>

/**
 * Writes a backup for one repository.
 */
export type BackupFn = (repository: Repository, options: BackupOptions) => Promise<BackupArtifact>

/**
 * What each stage produced for a repository; null for stages not reached.
 */
export interface RepositoryReport {
  logFile: string
  backup: BackupArtifact | null
  archive: ArchiveSummary | null
  rewrite: RewriteResult | null
  publish: PublishResult | null
  verify: VerifyResult | null
}

/**
 * Tagged result of processing one repository.
 */
export type RepositoryOutcome =
  | { status: 'success'; repository: Repository; report: RepositoryReport }
  | { status: 'skipped'; repository: Repository; reason: string }
  | {
      status: 'failed'
      repository: Repository
      stage: ProcessingStage
      reason: string
      /** Operator instruction for undoing or completing the repository */
      recovery: string | null
      report: RepositoryReport
    }

/**
 * How a run ended.
 * - `nothing-to-clean`: no object reached the threshold
 * - `previewed`: preview mode, nothing touched
 * - `aborted`: confirmation refused, nothing touched
 * - `completed`: repositories were processed
 */
export type RunStatus = 'nothing-to-clean' | 'previewed' | 'aborted' | 'completed'

/**
 * Result of {@link CleanupPipeline.run}.
 */
export interface RunResult {
  status: RunStatus
  inventory: Inventory
  outcomes: RepositoryOutcome[]
  /** Present once the run reaches `reporting` */
  summary: RunSummary | null
  /** 1 when at least one repository failed */
  exitCode: 0 | 1
}

/**
 * Collaborators of the pipeline.
 */
export interface PipelineDeps {
  git: GitEngine
  rewriter: RewriteEngine
  /** Required in execute mode unless archiving is skipped */
  store?: BlobStore
  confirm: ConfirmFn
  /** Receives every log entry (per-repository entries are also written to their log file) */
  logHandler: LogHandler
  /** Writes one line of user-facing output */
  print: (line: string) => void
  /** Defaults to {@link backupRepository} */
  backup?: BackupFn
  /** Measures `.git` before and after compaction */
  measure?: (dir: string) => Promise<number>
  scan?: RepositoryScanner
  onEvent?: (event: PipelineEvent) => void
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * One run over a parent directory.
 *
 * @example
 * ```typescript
 * const pipeline = new CleanupPipeline(ctx, { git, rewriter, store, confirm, logHandler, print })
 * const result = await pipeline.run()
 * process.exitCode = result.exitCode
 * ```
 */
export class CleanupPipeline {
  private readonly ctx: RunContext
  private readonly deps: PipelineDeps
  private readonly logger: Logger
  private readonly minLevel: LogLevel

  constructor(ctx: RunContext, deps: PipelineDeps) {
    if (ctx.mode === 'execute' && !ctx.skipArchive && deps.store === undefined) {
      throw new CleanerError('A blob store is required unless archiving is skipped', 'INVALID_ARGUMENT')
    }
    this.ctx = ctx
    this.deps = deps
    this.minLevel = ctx.verbose ? LogLevel.DEBUG : LogLevel.INFO
    this.logger = createLogger({ component: 'pipeline', minLevel: this.minLevel, handler: deps.logHandler })
  }

  /**
   * Drive the run to a terminal state.
   *
   * @throws {EnvironmentError} When the parent directory is missing or holds
   * no repository; nothing has been touched at that point
   */
  async run(): Promise<RunResult> {
    const { ctx } = this
    this.printLines(renderBanner(ctx))

    this.enter('discovering')
    if (!(await isDirectory(ctx.parentDir))) {
      throw new EnvironmentError(`Directory not found: ${ctx.parentDir}`)
    }
    const repositories = await discoverRepositories(ctx.parentDir, {
      exclude: [ctx.outputDir],
      logger: this.logger,
    })
    if (repositories.length === 0) {
      throw new EnvironmentError(`No Git repositories found in: ${ctx.parentDir}`)
    }
    this.logger.info(`Found ${repositories.length} Git repositories`)

    this.enter('scanning')
    const inventory = await buildInventory(
      repositories,
      this.deps.git,
      {
        thresholdBytes: ctx.thresholdBytes,
        commitSampleSize: ctx.commitSampleSize,
        exclude: [ctx.outputDir],
        logger: this.logger,
      },
      this.deps.scan
    )
    await writeInventoryReport(inventory, ctx.reportFile, ctx.bucket)
    this.logger.info(`Report generated: ${ctx.reportFile}`)

    if (inventory.totalFiles === 0) {
      this.logger.info(`No files larger than ${ctx.thresholdMb}MB found in any repository`)
      this.logger.info('Nothing to clean!')
      return { status: 'nothing-to-clean', inventory, outcomes: [], summary: null, exitCode: 0 }
    }

    if (ctx.mode === 'preview') {
      this.enter('previewing')
      this.printLines(renderPreview(inventory, ctx))
      return { status: 'previewed', inventory, outcomes: [], summary: null, exitCode: 0 }
    }

    this.enter('confirming')
    this.printLines(renderConfirmation(ctx))
    const answer = await this.deps.confirm(`Type '${CONFIRMATION_TOKEN}' (all caps) to proceed: `)
    if (answer !== CONFIRMATION_TOKEN) {
      this.enter('aborted')
      this.logger.info('Aborted by user')
      return { status: 'aborted', inventory, outcomes: [], summary: null, exitCode: 0 }
    }

    this.enter('processing')
    await fs.mkdir(ctx.backupDir, { recursive: true })
    await fs.mkdir(ctx.logDir, { recursive: true })

    const outcomes: RepositoryOutcome[] = []
    for (const repository of inventory.repositories) {
      outcomes.push(await this.processRepository(repository, inventory))
    }

    this.enter('reporting')
    const summary = summarize(outcomes)
    this.report(summary, outcomes)

    return { status: 'completed', inventory, outcomes, summary, exitCode: summary.failed > 0 ? 1 : 0 }
  }

  // ==========================================================================
  // Processing
  // ==========================================================================

  /**
   * Walk one repository through every stage. Never throws.
   */
  private async processRepository(repository: Repository, inventory: Inventory): Promise<RepositoryOutcome> {
    const { ctx, deps } = this
    const rows = rowsForRepository(inventory, repository.name)
    if (rows.length === 0) {
      this.logger.info(`No large files in ${repository.name}, skipping`)
      return { status: 'skipped', repository, reason: 'no large files' }
    }

    const report: RepositoryReport = {
      logFile: path.join(ctx.logDir, `${repository.name}-${ctx.timestamp}.log`),
      backup: null,
      archive: null,
      rewrite: null,
      publish: null,
      verify: null,
    }
    const logger = createLogger({
      component: 'pipeline',
      minLevel: this.minLevel,
      handler: teeHandlers(deps.logHandler, createFileHandler(report.logFile)),
      context: { repository: repository.name },
    })
    const fail = (stage: ProcessingStage, reason: string, recovery: string | null = null): RepositoryOutcome => ({
      status: 'failed',
      repository,
      stage,
      reason,
      recovery,
      report,
    })

    let stage: ProcessingStage = 'backing-up'

    try {
      logger.info(`Processing: ${repository.name}`)
      this.enterStage(repository, stage)
      logger.info('Creating backup...')
      try {
        report.backup = await (deps.backup ?? backupRepository)(repository, {
          backupDir: ctx.backupDir,
          timestamp: ctx.timestamp,
          exclude: [ctx.outputDir],
        })
      } catch (error) {
        logger.error('Backup failed - aborting for safety', causeOf(error))
        return fail(stage, toError(error).message)
      }
      logger.info(`Backup created: ${report.backup.file} (${formatSize(report.backup.bytes)})`)
      const restore = `Restore from backup: ${report.backup.restoreCommand}`

      stage = 'archiving'
      this.enterStage(repository, stage)
      if (ctx.skipArchive || deps.store === undefined) {
        logger.warn('S3 upload skipped (--skip-s3 flag)')
      } else {
        report.archive = await archiveRepository(repository, rows, { git: deps.git, store: deps.store, logger })
        const failed = report.archive.failures.length
        if (failed > 0 && ctx.strictArchive) {
          const reason = `${failed} blob(s) could not be archived; history left unchanged (--strict-archive)`
          logger.error(reason)
          return fail(stage, reason)
        }
      }

      stage = 'rewriting'
      this.enterStage(repository, stage)
      try {
        report.rewrite = await rewriteHistory(repository, buildRewriteRequest(inventory, repository.name), {
          git: deps.git,
          engine: deps.rewriter,
          remote: ctx.remote,
          logger,
        })
      } catch (error) {
        const recovery = [recoveryOf(error), restore].filter((line): line is string => line !== null).join('\n')
        logger.error(toError(error).message, causeOf(error))
        logger.error(recovery)
        return fail(stage, toError(error).message, recovery)
      }

      stage = 'publishing'
      this.enterStage(repository, stage)
      let publishFailure: RepositoryOutcome | null = null
      try {
        report.publish = await publishRepository(repository, ctx.remote, {
          git: deps.git,
          skip: ctx.skipPublish,
          logger,
        })
      } catch (error) {
        const recovery = recoveryOf(error)
        logger.error(toError(error).message, causeOf(error))
        if (recovery !== null) logger.info(`To push manually:\n${recovery}`)
        publishFailure = fail(stage, toError(error).message, recovery)
      }

      // The local rewrite stands even when publishing failed, so it is still verified.
      stage = 'verifying'
      this.enterStage(repository, stage)
      report.verify = await verifyRepository(repository, ctx.thresholdBytes, {
        git: deps.git,
        logger,
        ...(deps.measure !== undefined && { measure: deps.measure }),
      })

      if (publishFailure !== null) return publishFailure
      if (report.verify.status === 'still-oversized') {
        return fail(stage, `${report.verify.count} large blob(s) still in history`, report.verify.diagnostic)
      }

      logger.info(`Repository processed: ${repository.name}`)
      return { status: 'success', repository, report }
    } catch (error) {
      // The per-repository log file may be what failed.
      this.logger.error(`${repository.name}: unexpected failure while ${stage}`, toError(error))
      return fail(
        stage,
        toError(error).message,
        report.backup !== null ? `Restore from backup: ${report.backup.restoreCommand}` : null
      )
    }
  }

  // ==========================================================================
  // Reporting
  // ==========================================================================

  private report(summary: RunSummary, outcomes: readonly RepositoryOutcome[]): void {
    this.printLines(renderSummary(summary, this.ctx))

    if (summary.failed === 0) {
      this.logger.info(summaryLine(summary))
      this.logger.info('All repositories processed successfully!')
      this.printLines(renderVerificationCommands(this.ctx))
      return
    }

    this.logger.error(summaryLine(summary))
    for (const outcome of outcomes) {
      if (outcome.status !== 'failed') continue
      this.logger.error(`${outcome.repository.name} failed while ${outcome.stage}: ${outcome.reason}`)
      if (outcome.recovery !== null) this.logger.info(outcome.recovery)
    }
    this.logger.error('Some repositories failed. Check logs for details.')
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private enter(phase: RunPhase): void {
    this.logger.debug(`Entering ${phase}`)
    this.deps.onEvent?.({ type: 'phase', phase })
  }

  private enterStage(repository: Repository, stage: ProcessingStage): void {
    this.deps.onEvent?.({ type: 'stage', repository: repository.name, stage })
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.deps.print(line)
    }
  }
}

/**
 * Count outcomes and archive totals.
 */
export function summarize(outcomes: readonly RepositoryOutcome[]): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    processed: 0,
    succeeded: 0,
    skipped: 0,
    failed: 0,
    archiveUploads: 0,
    archiveFailures: 0,
  }

  for (const outcome of outcomes) {
    if (outcome.status === 'skipped') {
      summary.skipped++
      continue
    }
    summary.processed++
    if (outcome.status === 'success') summary.succeeded++
    else summary.failed++
    summary.archiveUploads += outcome.report.archive?.uploaded.length ?? 0
    summary.archiveFailures += outcome.report.archive?.failures.length ?? 0
  }

  return summary
}

/**
 * Run a pipeline to completion.
 */
export function runPipeline(ctx: RunContext, deps: PipelineDeps): Promise<RunResult> {
  return new CleanupPipeline(ctx, deps).run()
}

function recoveryOf(error: unknown): string | null {
  return isCleanerError(error) && error.recovery !== undefined ? error.recovery : null
}

/**
 * The underlying error, so that command output reaches the log line.
 */
function causeOf(error: unknown): Error {
  return toError(error instanceof Error && error.cause !== undefined ? error.cause : error)
}
