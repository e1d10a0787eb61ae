import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fc from 'fast-check'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { ReachableObject } from '../../src/git/engine'
import {
  compareRecords,
  scanHistory,
  scanRepository,
  scanWorkingTree,
  selectOversizedBlobs,
} from '../../src/ops/scanner'
import type { LargeObjectRecord, Repository } from '../../src/types/inventory'
import { LogLevel, createLogger } from '../../src/utils/logger'
import { FakeGitEngine, MB, createLogCapture, fakeId } from '../helpers/fakes'

let root: string
let repository: Repository

function file(relative: string, size: number): void {
  const full = join(root, relative)
  mkdirSync(join(full, '..'), { recursive: true })
  writeFileSync(full, Buffer.alloc(size))
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'blob-purge-scan-'))
  mkdirSync(join(root, '.git'))
  repository = { root, name: 'api' }
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

// =============================================================================
// Working tree
// =============================================================================

describe('scanWorkingTree', () => {
  it('should report files at or above the threshold', async () => {
    file('exact.bin', 1000)
    file('below.bin', 999)
    file('assets/large.iso', 4000)

    const records = await scanWorkingTree(repository, 1000)

    expect(records).toEqual([
      { repository: 'api', path: 'assets/large.iso', size: 4000, origin: 'working-tree', objectId: null, commits: [] },
      { repository: 'api', path: 'exact.bin', size: 1000, origin: 'working-tree', objectId: null, commits: [] },
    ])
  })

  it('should ignore the .git directory', async () => {
    writeFileSync(join(root, '.git', 'packed.pack'), Buffer.alloc(5000))

    expect(await scanWorkingTree(repository, 1000)).toEqual([])
  })

  it('should skip excluded directories', async () => {
    file('out/backups/api.tar.gz', 5000)
    file('keep.bin', 5000)

    const records = await scanWorkingTree(repository, 1000, [join(root, 'out')])

    expect(records.map((r) => r.path)).toEqual(['keep.bin'])
  })
})

// =============================================================================
// History
// =============================================================================

describe('selectOversizedBlobs', () => {
  const id = (seed: string) => fakeId(seed)

  it('should include the exact threshold and exclude one byte less', () => {
    const objects: ReachableObject[] = [
      { type: 'blob', objectId: id('a'), size: 100, path: 'a.bin' },
      { type: 'blob', objectId: id('b'), size: 99, path: 'b.bin' },
    ]
    expect(selectOversizedBlobs(objects, 100).map((o) => o.path)).toEqual(['a.bin'])
  })

  it('should ignore trees, commits and pathless objects', () => {
    const objects: ReachableObject[] = [
      { type: 'tree', objectId: id('t'), size: 500, path: 'dir' },
      { type: 'commit', objectId: id('c'), size: 500, path: '' },
      { type: 'blob', objectId: id('p'), size: 500, path: '' },
    ]
    expect(selectOversizedBlobs(objects, 100)).toEqual([])
  })

  it('should keep the first path of a blob reached through several', () => {
    const objects: ReachableObject[] = [
      { type: 'blob', objectId: id('x'), size: 500, path: 'old/name.bin' },
      { type: 'blob', objectId: id('x'), size: 500, path: 'new/name.bin' },
    ]
    expect(selectOversizedBlobs(objects, 100)).toEqual([objects[0]])
  })

  it('should select exactly the distinct blobs at or above the threshold', () => {
    const objectArb = fc.record({
      seed: fc.integer({ min: 0, max: 30 }),
      type: fc.constantFrom<'blob' | 'tree'>('blob', 'tree'),
      path: fc.constantFrom('a.bin', 'b.bin', 'dir/c.bin', 'd e.bin'),
    })

    fc.assert(
      fc.property(fc.array(objectArb, { maxLength: 60 }), fc.integer({ min: 1, max: 2000 }), (specs, threshold) => {
        const objects: ReachableObject[] = specs.map((spec) => ({
          type: spec.type,
          objectId: fakeId(`${spec.type}${spec.seed}`),
          size: (spec.seed * 67) % 2001,
          path: spec.path,
        }))

        const selected = selectOversizedBlobs(objects, threshold)

        const expected = new Set(
          objects.filter((o) => o.type === 'blob' && o.size >= threshold).map((o) => o.objectId)
        )
        expect(selected).toHaveLength(expected.size)
        expect(new Set(selected.map((o) => o.objectId))).toEqual(expected)
      })
    )
  })
})

describe('scanHistory', () => {
  it('should attach a bounded, deduplicated commit sample', async () => {
    const git = new FakeGitEngine()
    const c1 = fakeId('c1')
    const c2 = fakeId('c2')
    const blob = git.addBlob(root, { path: 'video.mp4', size: 5000, commits: [c1, c1, c2] })

    const records = await scanHistory(repository, git, 1000, 5)

    expect(records).toEqual([
      { repository: 'api', path: 'video.mp4', size: 5000, origin: 'history', objectId: blob, commits: [c1, c2] },
    ])
  })

  it('should keep a blob with no referencing commit and warn', async () => {
    const git = new FakeGitEngine()
    git.addBlob(root, { path: 'orphan.bin', size: 5000, commits: [] })
    const capture = createLogCapture()

    const records = await scanHistory(repository, git, 1000, 5, createLogger({ handler: capture.handler }))

    expect(records).toHaveLength(1)
    expect(records[0].commits).toEqual([])
    expect(capture.entries.map((e) => e.level)).toEqual([LogLevel.WARN])
  })

  it('should report every oversized version of the same path', async () => {
    const git = new FakeGitEngine()
    git.addBlob(root, { path: 'data.bin', size: 3000, objectId: fakeId('v1') })
    git.addBlob(root, { path: 'data.bin', size: 4000, objectId: fakeId('v2') })

    const records = await scanHistory(repository, git, 1000)

    expect(records.map((r) => r.objectId).sort()).toEqual([fakeId('v1'), fakeId('v2')].sort())
  })
})

// =============================================================================
// Repository
// =============================================================================

describe('scanRepository', () => {
  it('should return history records before working-tree records', async () => {
    const git = new FakeGitEngine()
    const blob = git.addBlob(root, { path: 'z-old.bin', size: 2000 })
    file('a-current.bin', 1500)

    const records = await scanRepository(repository, git, { thresholdBytes: 1000 })

    expect(records.map((r) => [r.origin, r.path])).toEqual([
      ['history', 'z-old.bin'],
      ['working-tree', 'a-current.bin'],
    ])
    expect(records[0].objectId).toBe(blob)
  })

  it('should produce the same records on repeated scans', async () => {
    const git = new FakeGitEngine()
    git.addBlob(root, { path: 'b.bin', size: 2000 })
    git.addBlob(root, { path: 'a.bin', size: 3000 })
    file('c.bin', 1500)

    const first = await scanRepository(repository, git, { thresholdBytes: 1000 })
    const second = await scanRepository(repository, git, { thresholdBytes: 1000 })

    expect(second).toEqual(first)
  })

  it('should yield nothing for a repository without commits', async () => {
    const git = new FakeGitEngine()
    git.repo(root).hasCommits = false
    file('big.bin', 5000)
    const capture = createLogCapture()

    const records = await scanRepository(repository, git, {
      thresholdBytes: 1000,
      logger: createLogger({ handler: capture.handler }),
    })

    expect(records).toEqual([])
    expect(capture.lines()).toEqual(['[WARNING] No commits in api; it contributes no rows'])
  })

  it('should yield nothing when the repository cannot be read', async () => {
    const git = new FakeGitEngine()
    git.failOn('listReachableObjects', new Error('fatal: bad object HEAD'))
    const capture = createLogCapture()

    const records = await scanRepository(repository, git, {
      thresholdBytes: 1000,
      logger: createLogger({ handler: capture.handler }),
    })

    expect(records).toEqual([])
    expect(capture.lines()).toContain('[ERROR] Failed to scan api; it contributes no rows: fatal: bad object HEAD')
  })

  it('should keep history records when the working directory cannot be read', async () => {
    const git = new FakeGitEngine()
    const unreadable: Repository = { root: join(root, 'missing'), name: 'api' }
    git.addBlob(unreadable.root, { path: 'old_large.bin', size: 126 * MB })
    const capture = createLogCapture()

    const records = await scanRepository(unreadable, git, {
      thresholdBytes: 100 * MB,
      logger: createLogger({ handler: capture.handler }),
    })

    expect(records.map((r) => [r.origin, r.path])).toEqual([['history', 'old_large.bin']])
    expect(capture.entries.filter((e) => e.level === LogLevel.WARN).map((e) => [e.message, e.data?.error])).toEqual([
      [
        'Failed to scan the working directory of api; keeping history rows only',
        expect.stringContaining('ENOENT'),
      ],
    ])
  })
})

describe('compareRecords', () => {
  it('should order by origin, path, then object id', () => {
    const make = (origin: LargeObjectRecord['origin'], path: string, objectId: string | null): LargeObjectRecord => ({
      repository: 'api',
      path,
      size: 1,
      origin,
      objectId,
      commits: [],
    })
    const records = [
      make('working-tree', 'a.bin', null),
      make('history', 'b.bin', 'bb'),
      make('history', 'b.bin', 'aa'),
      make('history', 'a.bin', 'cc'),
    ]

    expect(records.sort(compareRecords).map((r) => `${r.origin}:${r.path}:${r.objectId}`)).toEqual([
      'history:a.bin:cc',
      'history:b.bin:aa',
      'history:b.bin:bb',
      'working-tree:a.bin:null',
    ])
  })
})
