import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { extract } from 'tar'
import { BackupError } from '../../src/errors'
import { backupFileFor, backupRepository, restoreCommandFor } from '../../src/ops/backup'
import type { Repository } from '../../src/types/inventory'

let parent: string
let repository: Repository

beforeEach(() => {
  parent = mkdtempSync(join(tmpdir(), 'blob-purge-backup-'))
  const root = join(parent, 'api')
  mkdirSync(join(root, '.git', 'refs'), { recursive: true })
  writeFileSync(join(root, '.git', 'HEAD'), 'ref: refs/heads/main\n')
  writeFileSync(join(root, 'README.md'), 'hello\n')
  repository = { root, name: 'api' }
})

afterEach(() => {
  rmSync(parent, { recursive: true, force: true })
})

describe('backupFileFor', () => {
  it('should name the artifact after the repository and run', () => {
    expect(backupFileFor(repository, '/out/backups', '20260102_030405')).toBe(
      join('/out/backups', 'api-20260102_030405.tar.gz')
    )
  })
})

describe('restoreCommandFor', () => {
  it('should extract next to the original', () => {
    expect(restoreCommandFor(repository, '/out/backups/api.tar.gz')).toBe(`tar -xzf /out/backups/api.tar.gz -C ${parent}`)
  })
})

describe('backupRepository', () => {
  it('should archive the working copy including .git', async () => {
    const backupDir = join(parent, 'out', 'backups')

    const artifact = await backupRepository(repository, { backupDir, timestamp: '20260102_030405' })

    expect(artifact.file).toBe(join(backupDir, 'api-20260102_030405.tar.gz'))
    expect(artifact.bytes).toBeGreaterThan(0)
    expect(artifact.restoreCommand).toBe(`tar -xzf ${artifact.file} -C ${parent}`)

    const restored = mkdtempSync(join(tmpdir(), 'blob-purge-restore-'))
    try {
      await extract({ file: artifact.file, cwd: restored })
      expect(readFileSync(join(restored, 'api', 'README.md'), 'utf8')).toBe('hello\n')
      expect(readFileSync(join(restored, 'api', '.git', 'HEAD'), 'utf8')).toBe('ref: refs/heads/main\n')
    } finally {
      rmSync(restored, { recursive: true, force: true })
    }
  })

  it('should leave out excluded directories and its own artifact', async () => {
    // Output directory inside the repository being backed up
    const outputDir = join(repository.root, 'git-cleaner-output-20260102_030405')
    const backupDir = join(outputDir, 'backups')
    mkdirSync(join(outputDir, 'logs'), { recursive: true })
    writeFileSync(join(outputDir, 'logs', 'api.log'), 'log\n')

    const artifact = await backupRepository(repository, {
      backupDir,
      timestamp: '20260102_030405',
      exclude: [outputDir],
    })

    const restored = mkdtempSync(join(tmpdir(), 'blob-purge-restore-'))
    try {
      await extract({ file: artifact.file, cwd: restored })
      expect(existsSync(join(restored, 'api', 'README.md'))).toBe(true)
      expect(existsSync(join(restored, 'api', 'git-cleaner-output-20260102_030405'))).toBe(false)
    } finally {
      rmSync(restored, { recursive: true, force: true })
    }
  })

  it('should fail with BackupError when the artifact cannot be written', async () => {
    writeFileSync(join(parent, 'blocker'), 'not a directory')
    const backupDir = join(parent, 'blocker', 'backups')

    const error = await backupRepository(repository, { backupDir, timestamp: '20260102_030405' }).catch(
      (err: unknown) => err
    )

    expect(error).toBeInstanceOf(BackupError)
    expect(error).toMatchObject({
      message: 'Failed to create backup for: api',
      artifact: join(backupDir, 'api-20260102_030405.tar.gz'),
    })
  })
})
