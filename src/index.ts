/**
 * @fileoverview git-blob-purge - remove oversized files from Git history
 *
 * Finds files at or above a size threshold in every repository under a
 * directory, archives their historical versions to S3, rewrites history
 * without them and force-pushes the result.
 *
 * **Architecture Overview**:
 * - **Config**: the immutable RunContext of one invocation
 * - **Git**: command executor, git engine and rewrite engine capabilities
 * - **Storage**: S3-backed blob store
 * - **Ops**: one module per pipeline step, plus the orchestrator
 * - **CLI**: argument parsing, preflight, confirmation prompt
 *
 * @module git-blob-purge
 *
 * @example
 * ```typescript
 * import {
 *   createRunContext,
 *   runPipeline,
 *   CliGitEngine,
 *   FilterRepoEngine,
 *   createSpawnExecutor,
 *   consoleHandler,
 * } from 'git-blob-purge'
 *
 * const executor = createSpawnExecutor()
 * const ctx = createRunContext({ parentDir: '/srv/repos', sizeMb: 50 })
 * const result = await runPipeline(ctx, {
 *   git: new CliGitEngine(executor),
 *   rewriter: new FilterRepoEngine(executor),
 *   confirm: async () => 'NO',
 *   logHandler: consoleHandler,
 *   print: console.log,
 * })
 * ```
 */

// Config
export {
  createRunContext,
  formatRunTimestamp,
  parseSizeMb,
  type ExecutionMode,
  type RunContext,
  type RunContextInput,
} from './config/run-context'
export * from './constants'

// Errors
export {
  ArchiveError,
  BackupError,
  CleanerError,
  EnvironmentError,
  GitCommandError,
  PublishError,
  RewriteError,
  UsageError,
  isCleanerError,
  toError,
  type CleanerErrorCode,
} from './errors'

// Git
export {
  BATCH_CHECK_FORMAT,
  CliGitEngine,
  isObjectId,
  parseBatchCheck,
  type GitEngine,
  type ObjectType,
  type ReachableObject,
} from './git/engine'
export {
  createSpawnExecutor,
  type CommandExecutor,
  type CommandExit,
  type CommandResult,
  type CommandStream,
  type RunOptions,
} from './git/executor'
export { FilterRepoEngine, buildFilterRepoArgs, type RewriteEngine } from './git/rewrite-engine'

// Storage
export { S3BlobStore, archiveKey, storageLocation, type BlobStore, type S3BlobStoreOptions } from './storage/blob-store'

// Types
export type {
  Inventory,
  InventoryRow,
  LargeObjectRecord,
  ObjectOrigin,
  Repository,
  RewriteRequest,
} from './types/inventory'

// Ops
export { archiveBlob, archiveRepository, type ArchiveOutcome, type ArchiveSummary } from './ops/archive'
export { backupRepository, type BackupArtifact, type BackupOptions } from './ops/backup'
export { discoverRepositories, type DiscoverOptions } from './ops/discover'
export {
  CSV_HEADER,
  buildInventory,
  buildRewriteRequest,
  disambiguateStorageKeys,
  formatInventoryCsv,
  parseInventoryCsv,
  writeInventoryReport,
} from './ops/inventory'
export {
  CleanupPipeline,
  runPipeline,
  summarize,
  type ConfirmFn,
  type PipelineDeps,
  type PipelineEvent,
  type ProcessingStage,
  type RepositoryOutcome,
  type RunPhase,
  type RunResult,
  type RunStatus,
} from './ops/pipeline'
export { publishRepository, type PublishResult } from './ops/publish'
export { rewriteHistory, type RewriteResult } from './ops/rewrite'
export { scanHistory, scanRepository, scanWorkingTree, type ScanOptions } from './ops/scanner'
export { verifyRepository, type VerifyResult } from './ops/verify'

// Utils
export { formatSize } from './utils/format'
export {
  LogLevel,
  consoleHandler,
  createFileHandler,
  createLogger,
  noopLogger,
  teeHandlers,
  type LogEntry,
  type LogHandler,
  type Logger,
} from './utils/logger'

// CLI
export { runCLI, type CLIOptions, type CLIResult } from './cli'
