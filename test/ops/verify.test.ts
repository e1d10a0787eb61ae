import { describe, it, expect, beforeEach } from 'vitest'
import { countOversizedBlobs, diagnosticCommand, verifyRepository } from '../../src/ops/verify'
import type { Repository } from '../../src/types/inventory'
import { FakeGitEngine, MB, fakeId } from '../helpers/fakes'

const repository: Repository = { root: '/work/api', name: 'api' }

function measureSequence(...sizes: number[]): { measure: (dir: string) => Promise<number>; dirs: string[] } {
  const dirs: string[] = []
  let index = 0
  return {
    dirs,
    measure: async (dir) => {
      dirs.push(dir)
      const size = sizes[Math.min(index, sizes.length - 1)] ?? 0
      index += 1
      return size
    },
  }
}

describe('diagnosticCommand', () => {
  it('should list blobs at or above the threshold', () => {
    expect(diagnosticCommand(repository, 100 * MB)).toBe(
      "cd /work/api && git rev-list --objects --all | git cat-file --batch-check='%(objecttype) %(objectname) %(objectsize) %(rest)' | awk '$1 == \"blob\" && $3 >= 104857600'"
    )
  })
})

describe('countOversizedBlobs', () => {
  it('should count distinct blob ids at or above the threshold', async () => {
    const git = new FakeGitEngine()
    const shared = fakeId('shared')
    git.addBlob(repository.root, { path: 'a.bin', size: 100 * MB, objectId: shared })
    git.addBlob(repository.root, { path: 'copy/a.bin', size: 100 * MB, objectId: shared })
    git.addBlob(repository.root, { path: 'b.bin', size: 150 * MB })
    git.addBlob(repository.root, { path: 'c.bin', size: 100 * MB - 1 })

    expect(await countOversizedBlobs(git, repository.root, 100 * MB)).toBe(2)
  })
})

describe('verifyRepository', () => {
  let git: FakeGitEngine

  beforeEach(() => {
    git = new FakeGitEngine()
    git.addBlob(repository.root, { path: 'src/main.ts', size: 2048 })
  })

  it('should compact a clean repository and report both sizes', async () => {
    const { measure, dirs } = measureSequence(300 * MB, 20 * MB)

    const result = await verifyRepository(repository, 100 * MB, { git, measure })

    expect(result).toEqual({ status: 'clean', sizeBefore: 300 * MB, sizeAfter: 20 * MB })
    expect(dirs).toEqual(['/work/api/.git', '/work/api/.git'])
    expect(git.calls).toContain('compact /work/api')
  })

  it('should report blobs still above the threshold without compacting', async () => {
    git.addBlob(repository.root, { path: 'assets/video.mp4', size: 200 * MB })
    const { measure } = measureSequence(0)

    const result = await verifyRepository(repository, 100 * MB, { git, measure })

    expect(result).toEqual({
      status: 'still-oversized',
      count: 1,
      diagnostic: diagnosticCommand(repository, 100 * MB),
    })
    expect(git.calls).not.toContain('compact /work/api')
  })

  it('should stay clean with an unknown size when compaction fails', async () => {
    git.failOn('compact', new Error('fatal: gc is already running'))
    const { measure } = measureSequence(300 * MB)

    const result = await verifyRepository(repository, 100 * MB, { git, measure })

    expect(result).toEqual({ status: 'clean', sizeBefore: 300 * MB, sizeAfter: null })
  })
})
