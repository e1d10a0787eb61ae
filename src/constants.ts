/**
 * @fileoverview Shared defaults for git-blob-purge.
 *
 * @module constants
 */

/** Tool name used in banners, help output and the version string */
export const TOOL_NAME = 'git-blob-purge'

/** Current tool version */
export const VERSION = '1.0.0'

/** Default size threshold in megabytes */
export const DEFAULT_SIZE_MB = 100

/** Default bucket that receives archived blobs */
export const DEFAULT_BUCKET = 'git-large-file-archive'

/** Default remote targeted by the rewrite and the force-push */
export const DEFAULT_REMOTE = 'origin'

/** Bytes per megabyte */
export const BYTES_PER_MB = 1024 * 1024

/**
 * Maximum number of referencing commits recorded per blob.
 * Display only: it never narrows what gets removed.
 */
export const COMMIT_SAMPLE_SIZE = 5

/**
 * Maximum depth (relative to the parent directory) at which a `.git`
 * directory is looked for. Depth 2 finds the parent itself and its children.
 */
export const DISCOVERY_MAX_DEPTH = 2

/** Name of the version-control metadata directory */
export const GIT_DIR = '.git'

/** Token the operator must type to allow destructive execution */
export const CONFIRMATION_TOKEN = 'YES'

/** Prefix of the per-run output directory */
export const OUTPUT_DIR_PREFIX = 'git-cleaner-output-'

/** File name of the tabular report inside the output directory */
export const REPORT_FILE_NAME = 'large-files-report.csv'

/** Environment variable naming an S3-compatible endpoint */
export const S3_ENDPOINT_ENV = 'BLOB_PURGE_S3_ENDPOINT'
