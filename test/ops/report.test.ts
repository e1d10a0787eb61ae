import { describe, it, expect } from 'vitest'
import { createRunContext } from '../../src/config/run-context'
import {
  executeCommandHint,
  renderBanner,
  renderConfirmation,
  renderPreview,
  renderSummary,
  renderVerificationCommands,
  summaryLine,
  versionLine,
  type RunSummary,
} from '../../src/ops/report'
import type { Inventory, InventoryRow } from '../../src/types/inventory'
import { MB } from '../helpers/fakes'

const now = new Date(2026, 9, 19, 10, 15, 0)
const OUTPUT = '/srv/repos/git-cleaner-output-20261019_101500'

function row(overrides: Partial<InventoryRow>): InventoryRow {
  return {
    repository: 'api',
    path: 'assets/video.mp4',
    size: 126 * MB,
    sizeHuman: '126.00 MB',
    origin: 'history',
    objectId: 'a'.repeat(40),
    commits: ['c'.repeat(40), 'd'.repeat(40)],
    storageKey: `api/${'a'.repeat(40)}/assets/video.mp4`,
    ...overrides,
  }
}

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    total: 2,
    processed: 1,
    succeeded: 1,
    skipped: 1,
    failed: 0,
    archiveUploads: 3,
    archiveFailures: 0,
    ...overrides,
  }
}

describe('versionLine', () => {
  it('should name the tool and version', () => {
    expect(versionLine()).toBe('git-blob-purge v1.0.0')
  })
})

describe('renderBanner', () => {
  it('should show the effective configuration', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', skipArchive: true }, now)

    expect(renderBanner(ctx)).toEqual([
      'git-blob-purge v1.0.0',
      '',
      'Configuration:',
      '  Parent Directory:  /srv/repos',
      '  Size Threshold:    100 MB',
      '  S3 Bucket:         git-large-file-archive (upload skipped)',
      '  Git Remote:        origin',
      '  Mode:              DRY-RUN',
      `  Output Directory:  ${OUTPUT}`,
      '',
    ])
  })
})

describe('executeCommandHint', () => {
  it('should omit defaults', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos' }, now)
    expect(executeCommandHint(ctx)).toBe('git-blob-purge /srv/repos --execute')
  })

  it('should repeat every non-default option', () => {
    const ctx = createRunContext(
      {
        parentDir: '/srv/repos',
        sizeMb: 50,
        bucket: 'archive',
        remote: 'upstream',
        skipArchive: true,
        skipPublish: true,
        strictArchive: true,
      },
      now
    )
    expect(executeCommandHint(ctx)).toBe(
      'git-blob-purge /srv/repos --execute --size 50 --bucket archive --remote upstream --skip-s3 --skip-push --strict-archive'
    )
  })
})

describe('renderPreview', () => {
  it('should list one aligned row per record', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', sizeMb: 5 }, now)
    const inventory: Inventory = {
      thresholdBytes: 5 * MB,
      repositories: [{ root: '/srv/repos/api', name: 'api' }],
      rows: [row({})],
      totalFiles: 1,
      totalBytes: 126 * MB,
    }

    const lines = renderPreview(inventory, ctx)

    expect(lines[0]).toBe('DRY-RUN PREVIEW')
    expect(lines[2]).toBe('The following files exceed 5MB and would be processed:')
    expect(lines[4]).toBe(`${'REPOSITORY'.padEnd(30)} ${'FILE PATH'.padEnd(40)} ${'SIZE'.padEnd(12)} COMMITS`)
    expect(lines[5]).toBe('='.repeat(95))
    expect(lines[6]).toBe(`${'api'.padEnd(30)} ${'assets/video.mp4'.padEnd(40)} ${'126.00 MB'.padEnd(12)} 2 commit(s)`)
    expect(lines).toContain('  Total files to process: 1')
    expect(lines).toContain(`  Report saved to: ${OUTPUT}/large-files-report.csv`)
    expect(lines).toContain('  git-blob-purge /srv/repos --execute --size 5')
  })

  it('should keep the tail of long paths', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos' }, now)
    const longPath = 'very/deeply/nested/directory/tree/with/a/huge/file.bin'
    const inventory: Inventory = {
      thresholdBytes: 100 * MB,
      repositories: [{ root: '/srv/repos/api', name: 'api' }],
      rows: [row({ path: longPath, origin: 'working-tree', objectId: null, commits: [], storageKey: null })],
      totalFiles: 1,
      totalBytes: 126 * MB,
    }

    const [, , , , , , line] = renderPreview(inventory, ctx)

    expect(line).toBe(`${'api'.padEnd(30)} ${`...${longPath.slice(-35)}`.padEnd(40)} ${'126.00 MB'.padEnd(12)} 0 commit(s)`)
  })
})

describe('renderConfirmation', () => {
  it('should number every step that will run', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', execute: true }, now)
    const lines = renderConfirmation(ctx)

    expect(lines).toContain('                WARNING: DESTRUCTIVE OPERATION')
    expect(lines).toContain('  1. Upload large files to S3')
    expect(lines).toContain('  2. PERMANENTLY rewrite Git history')
    expect(lines).toContain('  3. Force-push to remote repositories')
    expect(lines).toContain(`Backups will be saved to: ${OUTPUT}/backups`)
  })

  it('should leave out skipped steps', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', execute: true, skipArchive: true, skipPublish: true }, now)
    const steps = renderConfirmation(ctx).filter((line) => /^ {2}\d\./.test(line))

    expect(steps).toEqual(['  1. PERMANENTLY rewrite Git history'])
  })
})

describe('renderSummary', () => {
  it('should show counters and output locations', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', execute: true }, now)

    expect(renderSummary(summary({ archiveFailures: 1 }), ctx)).toEqual([
      'Results:',
      '  Repositories processed: 1 of 2',
      '  Successful:             1',
      '  Skipped:                1',
      '  Failed:                 0',
      '  Archived blobs:         3 (1 failed)',
      '',
      'Output files:',
      `  Report:  ${OUTPUT}/large-files-report.csv`,
      `  Backups: ${OUTPUT}/backups`,
      `  Logs:    ${OUTPUT}/logs`,
      '',
    ])
  })

  it('should hide archive counters when uploads were skipped', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', execute: true, skipArchive: true }, now)
    expect(renderSummary(summary(), ctx).some((line) => line.includes('Archived blobs'))).toBe(false)
  })
})

describe('summaryLine', () => {
  it('should count skipped repositories separately', () => {
    expect(summaryLine(summary())).toBe('1 of 2 repositories processed, 1 skipped (no large files), 0 failures')
  })

  it('should use the singular for one failure', () => {
    expect(summaryLine(summary({ processed: 2, succeeded: 1, skipped: 0, failed: 1 }))).toBe(
      '2 of 2 repositories processed, 0 skipped (no large files), 1 failure'
    )
  })
})

describe('renderVerificationCommands', () => {
  it('should use the run threshold and bucket', () => {
    const ctx = createRunContext({ parentDir: '/srv/repos', sizeMb: 50, bucket: 'archive' }, now)
    const lines = renderVerificationCommands(ctx)

    expect(lines).toContain(`  awk '$1 == "blob" && $3 >= 52428800'`)
    expect(lines).toContain('aws s3 ls s3://archive/ --recursive')
    expect(lines).toContain('git fsck --full')
  })
})
