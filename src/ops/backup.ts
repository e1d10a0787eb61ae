/**
 * @fileoverview Backup manager: a compressed archive of a repository's full
 * working copy, `.git` included, taken before anything is mutated.
 *
 * @module ops/backup
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { create } from 'tar'
import { BackupError } from '../errors'
import type { Repository } from '../types/inventory'
import { isWithin } from '../utils/fs'

/**
 * A written backup artifact.
 */
export interface BackupArtifact {
  /** Absolute path of the `.tar.gz` file */
  file: string
  /** Size of the artifact in bytes */
  bytes: number
  /** Shell command that restores the working copy in place */
  restoreCommand: string
}

/**
 * Options for {@link backupRepository}.
 */
export interface BackupOptions {
  /** Directory receiving the artifact */
  backupDir: string
  /** Run timestamp used in the file name */
  timestamp: string
  /** Paths left out of the archive (the run's own output directory) */
  exclude?: readonly string[]
}

/**
 * Artifact path for a repository in a run: `<backupDir>/<name>-<timestamp>.tar.gz`.
 */
export function backupFileFor(repository: Repository, backupDir: string, timestamp: string): string {
  return path.join(backupDir, `${repository.name}-${timestamp}.tar.gz`)
}

/**
 * Command that unpacks a backup over the repository's parent directory.
 */
export function restoreCommandFor(repository: Repository, file: string): string {
  return `tar -xzf ${file} -C ${path.dirname(repository.root)}`
}

/**
 * Archive the repository directory into a gzip-compressed tarball.
 *
 * The archive holds a single top-level directory named after the repository,
 * so extracting it next to the original restores it in place.
 *
 * @throws {BackupError} When the archive cannot be written; the repository
 * itself is never modified here
 */
export async function backupRepository(repository: Repository, options: BackupOptions): Promise<BackupArtifact> {
  const file = backupFileFor(repository, options.backupDir, options.timestamp)
  const parent = path.dirname(repository.root)
  const exclude = [...(options.exclude ?? []), file].map((entry) => path.resolve(entry))

  try {
    await fs.mkdir(options.backupDir, { recursive: true })
  } catch (cause) {
    throw new BackupError(`Failed to create backup for: ${repository.name}`, file, { cause })
  }

  try {
    await create(
      {
        gzip: true,
        file,
        cwd: parent,
        portable: true,
        filter: (entryPath: string) => !exclude.some((excluded) => isWithin(excluded, path.resolve(parent, entryPath))),
      },
      [path.basename(repository.root)]
    )
    const { size } = await fs.stat(file)
    return { file, bytes: size, restoreCommand: restoreCommandFor(repository, file) }
  } catch (cause) {
    await fs.rm(file, { force: true })
    throw new BackupError(`Failed to create backup for: ${repository.name}`, file, { cause })
  }
}
