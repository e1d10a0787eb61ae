/**
 * @fileoverview Small filesystem helpers.
 *
 * @module utils/fs
 */

import * as fs from 'fs/promises'
import * as path from 'path'

/**
 * Whether `target` exists and is a directory.
 */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory()
  } catch (error) {
    if (isMissing(error)) return false
    throw error
  }
}

/**
 * Total size in bytes of the regular files below `dir`. Symlinks are not
 * followed.
 */
export async function directorySize(dir: string): Promise<number> {
  let total = 0
  const entries = await fs.readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const full = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      total += await directorySize(full)
    } else if (entry.isFile()) {
      total += (await fs.stat(full)).size
    }
  }
  return total
}

/**
 * Whether `child` is `parent` or lies beneath it.
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

/**
 * ENOENT / ENOTDIR check for fs errors.
 */
export function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false
  return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}
