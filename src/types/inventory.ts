/**
 * @fileoverview Core data model: repositories, large-object records and the
 * inventory built from them.
 *
 * @module types/inventory
 */

/**
 * A working copy with a `.git` directory, found under the parent directory.
 */
export interface Repository {
  /** Absolute path of the working copy */
  readonly root: string
  /** Display name (base name of the root) */
  readonly name: string
}

/**
 * Where a large object was found.
 * - `working-tree`: a file currently on disk
 * - `history`: a blob reachable from some branch or tag
 */
export type ObjectOrigin = 'working-tree' | 'history'

/**
 * One oversized object discovered by the scanner.
 */
export interface LargeObjectRecord {
  readonly repository: string
  /** Path relative to the repository root, `/`-separated */
  readonly path: string
  /** Size in bytes */
  readonly size: number
  readonly origin: ObjectOrigin
  /** Blob id; only history records carry one */
  readonly objectId: string | null
  /**
   * Commits that introduce or drop this exact content, oldest first,
   * deduplicated and capped for display. The first one introduced the
   * content. Empty for working-tree records.
   */
  readonly commits: readonly string[]
}

/**
 * A record as it appears in the report.
 */
export interface InventoryRow extends LargeObjectRecord {
  /** Human-readable size, e.g. `126.00 MB` */
  readonly sizeHuman: string
  /**
   * Key of the archived copy inside the bucket, unique per blob within an
   * inventory; null when the record has no blob to archive (working-tree
   * records, or history records without any referencing commit).
   */
  readonly storageKey: string | null
}

/**
 * All large objects of one run, in a stable order, with totals.
 */
export interface Inventory {
  readonly thresholdBytes: number
  readonly repositories: readonly Repository[]
  readonly rows: readonly InventoryRow[]
  readonly totalFiles: number
  readonly totalBytes: number
}

/**
 * Paths to remove from the entire history of one repository.
 */
export interface RewriteRequest {
  readonly repository: string
  /** Distinct paths, sorted; never empty when a rewrite is attempted */
  readonly paths: readonly string[]
}
