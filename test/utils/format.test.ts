import { describe, it, expect } from 'vitest'
import { compareStrings, formatSize, padColumn, truncatePath } from '../../src/utils/format'

describe('formatSize', () => {
  it('should print small counts in bytes', () => {
    expect(formatSize(0)).toBe('0 bytes')
    expect(formatSize(512)).toBe('512 bytes')
    expect(formatSize(1023)).toBe('1023 bytes')
  })

  it('should switch unit at each power of 1024', () => {
    expect(formatSize(1024)).toBe('1.00 KB')
    expect(formatSize(1536)).toBe('1.50 KB')
    expect(formatSize(1024 * 1024)).toBe('1.00 MB')
    expect(formatSize(126 * 1024 * 1024)).toBe('126.00 MB')
    expect(formatSize(3 * 1024 * 1024 * 1024)).toBe('3.00 GB')
  })

  it('should truncate rather than round', () => {
    expect(formatSize(2 * 1024 * 1024 * 1024 - 1)).toBe('1.99 GB')
    expect(formatSize(1024 * 1024 - 1)).toBe('1023.99 KB')
  })
})

describe('truncatePath', () => {
  it('should keep short paths unchanged', () => {
    expect(truncatePath('assets/video.mp4', 38)).toBe('assets/video.mp4')
    expect(truncatePath('x'.repeat(38), 38)).toBe('x'.repeat(38))
  })

  it('should keep the tail of long paths behind an ellipsis', () => {
    expect(truncatePath('a/very/long/path.bin', 10)).toBe('...ath.bin')

    const long = `${'d/'.repeat(20)}file.bin`
    const shortened = truncatePath(long, 38)
    expect(shortened).toHaveLength(38)
    expect(shortened).toBe(`...${long.slice(long.length - 35)}`)
  })
})

describe('padColumn', () => {
  it('should pad to the column width', () => {
    expect(padColumn('ab', 4)).toBe('ab  ')
  })

  it('should leave values at or over the width alone', () => {
    expect(padColumn('abcdef', 4)).toBe('abcdef')
  })
})

describe('compareStrings', () => {
  it('should order by code point', () => {
    expect(compareStrings('B', 'a')).toBe(-1)
    expect(compareStrings('b', 'a')).toBe(1)
    expect(compareStrings('a', 'a')).toBe(0)
    expect(['b.bin', 'A.bin', 'a.bin'].sort(compareStrings)).toEqual(['A.bin', 'a.bin', 'b.bin'])
  })
})
