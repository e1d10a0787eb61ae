import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { discoverRepositories } from '../../src/ops/discover'
import { createLogger } from '../../src/utils/logger'
import { createLogCapture } from '../helpers/fakes'

let parent: string

function repo(...segments: string[]): string {
  const dir = join(parent, ...segments)
  mkdirSync(join(dir, '.git'), { recursive: true })
  return dir
}

beforeEach(() => {
  parent = mkdtempSync(join(tmpdir(), 'blob-purge-discover-'))
})

afterEach(() => {
  rmSync(parent, { recursive: true, force: true })
})

describe('discoverRepositories', () => {
  it('should find direct children that contain .git, sorted by name', async () => {
    const web = repo('web')
    const api = repo('api')
    mkdirSync(join(parent, 'notes'))
    writeFileSync(join(parent, 'README.md'), 'hello')

    expect(await discoverRepositories(parent)).toEqual([
      { root: api, name: 'api' },
      { root: web, name: 'web' },
    ])
  })

  it('should include the parent itself before its children', async () => {
    repo()
    const child = repo('vendor')

    const repos = await discoverRepositories(parent)

    expect(repos.map((r) => r.root)).toEqual([parent, child])
  })

  it('should not look deeper than the maximum depth', async () => {
    repo('group', 'nested')

    expect(await discoverRepositories(parent)).toEqual([])
    expect((await discoverRepositories(parent, { maxDepth: 3 })).map((r) => r.name)).toEqual(['nested'])
  })

  it('should skip excluded directories', async () => {
    repo('api')
    repo('git-cleaner-output-20260102_030405')

    const repos = await discoverRepositories(parent, { exclude: [join(parent, 'git-cleaner-output-20260102_030405')] })

    expect(repos.map((r) => r.name)).toEqual(['api'])
  })

  it('should not follow symlinked directories', async () => {
    const outside = mkdtempSync(join(tmpdir(), 'blob-purge-outside-'))
    try {
      mkdirSync(join(outside, 'linked', '.git'), { recursive: true })
      symlinkSync(join(outside, 'linked'), join(parent, 'linked'), 'dir')

      expect(await discoverRepositories(parent)).toEqual([])
    } finally {
      rmSync(outside, { recursive: true, force: true })
    }
  })

  it('should log each repository found', async () => {
    repo('api')
    const capture = createLogCapture()

    await discoverRepositories(parent, { logger: createLogger({ handler: capture.handler }) })

    expect(capture.lines()).toEqual(['[INFO] Found: api'])
  })

  it('should return nothing for a directory without repositories', async () => {
    expect(await discoverRepositories(parent)).toEqual([])
  })
})
