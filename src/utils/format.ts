/**
 * @fileoverview Human-readable formatting helpers used by the report views.
 *
 * @module utils/format
 */

const KB = 1024
const MB = KB * 1024
const GB = MB * 1024

/**
 * Truncate (not round) to two decimals, so that a size never reads larger
 * than it is: 1.999 GB prints as `1.99 GB`.
 */
function truncate2(value: number): string {
  return (Math.floor(value * 100) / 100).toFixed(2)
}

/**
 * Format a byte count as a human-readable string.
 *
 * @example
 * formatSize(512)        // '512 bytes'
 * formatSize(1536)       // '1.50 KB'
 * formatSize(132120576)  // '126.00 MB'
 */
export function formatSize(bytes: number): string {
  if (bytes >= GB) return `${truncate2(bytes / GB)} GB`
  if (bytes >= MB) return `${truncate2(bytes / MB)} MB`
  if (bytes >= KB) return `${truncate2(bytes / KB)} KB`
  return `${bytes} bytes`
}

/**
 * Shorten a path to at most `max` characters, keeping its tail.
 *
 * @example
 * truncatePath('a/very/long/path.bin', 10) // '...ath.bin'
 */
export function truncatePath(path: string, max: number): string {
  if (path.length <= max) return path
  const keep = Math.max(max - 3, 0)
  return `...${path.slice(path.length - keep)}`
}

/**
 * Pad a string on the right to a fixed column width.
 */
export function padColumn(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length)
}

/**
 * Locale-independent string ordering, for output that must not depend on
 * the machine it runs on.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
