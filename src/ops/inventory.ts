/**
 * @fileoverview Inventory builder and its CSV report view.
 *
 * The in-memory {@link Inventory} drives every later step of the pipeline.
 * The CSV file written next to it is a derived view for operators and for
 * tooling that wants to re-read a run; {@link parseInventoryCsv} reads it back.
 *
 * @module ops/inventory
 *
 * @example
 * ```typescript
 * const inventory = await buildInventory(repositories, git, {
 *   thresholdBytes: ctx.thresholdBytes,
 *   commitSampleSize: ctx.commitSampleSize,
 * })
 * await writeInventoryReport(inventory, ctx.reportFile, ctx.bucket)
 * const request = buildRewriteRequest(inventory, 'api')
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import type { GitEngine } from '../git/engine'
import { archiveKey, storageLocation } from '../storage/blob-store'
import type {
  Inventory,
  InventoryRow,
  LargeObjectRecord,
  Repository,
  RewriteRequest,
} from '../types/inventory'
import { compareStrings, formatSize } from '../utils/format'
import { noopLogger, type Logger } from '../utils/logger'
import { scanRepository, type ScanOptions } from './scanner'

// ============================================================================
// Building
// ============================================================================

/**
 * Scans a single repository. Defaults to {@link scanRepository}; tests and
 * alternative engines may supply their own.
 */
export type RepositoryScanner = (
  repository: Repository,
  git: GitEngine,
  options: ScanOptions
) => Promise<LargeObjectRecord[]>

/**
 * Derive the report row of a record.
 */
export function toInventoryRow(record: LargeObjectRecord): InventoryRow {
  const firstCommit = record.commits[0]
  const storageKey =
    record.origin === 'history' && record.objectId !== null && firstCommit !== undefined
      ? archiveKey(record.repository, firstCommit, record.path)
      : null

  return {
    ...record,
    commits: [...record.commits],
    sizeHuman: formatSize(record.size),
    storageKey,
  }
}

/**
 * Give every row whose storage key is shared with a different blob a key
 * that also carries its object id. Two versions of one path introduced by
 * the same commit would otherwise land on the same key.
 */
export function disambiguateStorageKeys(rows: readonly InventoryRow[], logger: Logger = noopLogger): InventoryRow[] {
  const owners = new Map<string, Set<string>>()
  for (const row of rows) {
    if (row.storageKey === null || row.objectId === null) continue
    const ids = owners.get(row.storageKey) ?? new Set<string>()
    ids.add(row.objectId)
    owners.set(row.storageKey, ids)
  }

  return rows.map((row) => {
    const firstCommit = row.commits[0]
    if (row.storageKey === null || row.objectId === null || firstCommit === undefined) return row
    if ((owners.get(row.storageKey)?.size ?? 0) < 2) return row
    const storageKey = archiveKey(row.repository, firstCommit, row.path, row.objectId)
    logger.warn(`Storage key ${row.storageKey} is shared by several blobs; using ${storageKey} for ${row.path}`)
    return { ...row, storageKey }
  })
}

/**
 * Scan every repository, in the given order, into one inventory.
 *
 * Every repository is scanned before anything else happens, so the
 * inventory is complete before any mutation begins.
 */
export async function buildInventory(
  repositories: readonly Repository[],
  git: GitEngine,
  options: ScanOptions,
  scan: RepositoryScanner = scanRepository
): Promise<Inventory> {
  const logger = options.logger ?? noopLogger
  const scanned: InventoryRow[] = []
  let totalBytes = 0

  for (const repository of repositories) {
    const records = await scan(repository, git, options)
    for (const record of records) {
      scanned.push(toInventoryRow(record))
      totalBytes += record.size
    }
    logger.debug(`${repository.name}: ${records.length} large object(s)`)
  }

  const rows = disambiguateStorageKeys(scanned, logger)
  logger.info(`Total large files found: ${rows.length}`)
  logger.info(`Total size: ${formatSize(totalBytes)}`)

  return {
    thresholdBytes: options.thresholdBytes,
    repositories: [...repositories],
    rows,
    totalFiles: rows.length,
    totalBytes,
  }
}

/**
 * Rows belonging to one repository, in inventory order.
 */
export function rowsForRepository(inventory: Inventory, repository: string): InventoryRow[] {
  return inventory.rows.filter((row) => row.repository === repository)
}

/**
 * The distinct paths to remove from one repository's history, whatever the
 * origin of the rows they come from.
 */
export function buildRewriteRequest(inventory: Inventory, repository: string): RewriteRequest {
  const paths = new Set(rowsForRepository(inventory, repository).map((row) => row.path))
  return { repository, paths: [...paths].sort(compareStrings) }
}

// ============================================================================
// CSV view
// ============================================================================

/**
 * Header of the CSV report.
 */
export const CSV_HEADER = [
  'repo-name',
  'file-name',
  'file-size',
  'file-size-human',
  'blob-hash',
  'commit-hash',
  's3-path',
] as const

/** Placeholder for absent values in the CSV report */
export const NOT_APPLICABLE = 'N/A'

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`
}

/**
 * Render the inventory as CSV. Every field is quoted; commit ids are joined
 * with `;`.
 */
export function formatInventoryCsv(inventory: Inventory, bucket: string): string {
  const lines = [CSV_HEADER.join(',')]
  for (const row of inventory.rows) {
    lines.push(
      [
        row.repository,
        row.path,
        String(row.size),
        row.sizeHuman,
        row.objectId ?? NOT_APPLICABLE,
        row.commits.length > 0 ? row.commits.join(';') : NOT_APPLICABLE,
        row.storageKey !== null ? storageLocation(bucket, row.storageKey) : NOT_APPLICABLE,
      ]
        .map(quote)
        .join(',')
    )
  }
  return `${lines.join('\n')}\n`
}

/**
 * Split CSV text into records of fields, honouring quotes, doubled quotes
 * and separators or newlines inside quoted fields.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let quoted = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        field += char
      }
      continue
    }

    if (char === '"') {
      quoted = true
    } else if (char === ',') {
      record.push(field)
      field = ''
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++
      record.push(field)
      records.push(record)
      record = []
      field = ''
    } else {
      field += char
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field)
    records.push(record)
  }

  return records
}

/**
 * Read a CSV report back into inventory rows.
 *
 * @throws {Error} When the header does not match or a row is malformed
 */
export function parseInventoryCsv(text: string): InventoryRow[] {
  const [header, ...records] = parseCsv(text)
  if (!header || header.join(',') !== CSV_HEADER.join(',')) {
    throw new Error('Not a large-file report: unexpected CSV header')
  }

  return records
    .filter((fields) => fields.length > 1 || fields[0] !== '')
    .map((fields, index) => {
      if (fields.length !== CSV_HEADER.length) {
        throw new Error(`Malformed report row ${index + 2}: expected ${CSV_HEADER.length} fields, got ${fields.length}`)
      }
      const [repository, filePath, size, sizeHuman, blob, commits, location] = fields
      const objectId = blob === NOT_APPLICABLE ? null : blob
      const numericSize = Number(size)
      if (!Number.isSafeInteger(numericSize)) {
        throw new Error(`Malformed report row ${index + 2}: invalid size ${size}`)
      }

      return {
        repository,
        path: filePath,
        size: numericSize,
        sizeHuman,
        origin: objectId === null ? 'working-tree' : 'history',
        objectId,
        commits: commits === NOT_APPLICABLE || commits === '' ? [] : commits.split(';'),
        storageKey: location === NOT_APPLICABLE ? null : location.replace(/^s3:\/\/[^/]+\//, ''),
      } satisfies InventoryRow
    })
}

/**
 * Write the CSV view of the inventory, creating the directory if needed.
 */
export async function writeInventoryReport(inventory: Inventory, file: string, bucket: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true })
  await fs.writeFile(file, formatInventoryCsv(inventory, bucket), 'utf8')
}
