import { describe, it, expect } from 'vitest'
import {
  binaryDiff,
  computeHunks,
  diffLines,
  splitLines,
  unifiedDiff,
  unifiedHunks,
} from '../../src/ops/line-diff'

function numbered(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `l${i + 1}\n`)
}

describe('splitLines', () => {
  it('keeps line terminators', () => {
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n'])
  })

  it('keeps a final line without newline', () => {
    expect(splitLines('a\nb')).toEqual(['a\n', 'b'])
  })

  it('handles empty text and blank lines', () => {
    expect(splitLines('')).toEqual([])
    expect(splitLines('\n\n')).toEqual(['\n', '\n'])
  })
})

describe('diffLines', () => {
  it('marks deleted lines', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'c'])).toEqual([
      { kind: 'equal', line: 'a' },
      { kind: 'delete', line: 'b' },
      { kind: 'equal', line: 'c' },
    ])
  })

  it('emits deletions before insertions for a replacement', () => {
    expect(diffLines(['x'], ['y'])).toEqual([
      { kind: 'delete', line: 'x' },
      { kind: 'insert', line: 'y' },
    ])
  })

  it('handles empty sides', () => {
    expect(diffLines([], ['a'])).toEqual([{ kind: 'insert', line: 'a' }])
    expect(diffLines(['a'], [])).toEqual([{ kind: 'delete', line: 'a' }])
    expect(diffLines([], [])).toEqual([])
  })
})

describe('computeHunks', () => {
  it('reports replaced base ranges', () => {
    expect(computeHunks(['a\n', 'b\n', 'c\n'], ['a\n', 'X\n', 'c\n'])).toEqual([
      { start: 1, end: 2, lines: ['X\n'] },
    ])
  })

  it('reports insertions as empty ranges', () => {
    expect(computeHunks(['a\n'], ['a\n', 'b\n'])).toEqual([{ start: 1, end: 1, lines: ['b\n'] }])
  })

  it('returns nothing for identical input', () => {
    expect(computeHunks(['a\n'], ['a\n'])).toEqual([])
  })
})

describe('unifiedHunks', () => {
  it('splits changes far apart into separate hunks', () => {
    const before = numbered(20)
    const after = [...before]
    after[1] = 'X\n'
    after[18] = 'Y\n'

    const hunks = unifiedHunks(before, after)

    expect(hunks.map((h) => [h.oldStart, h.oldCount, h.newStart, h.newCount])).toEqual([
      [1, 5, 1, 5],
      [16, 5, 16, 5],
    ])
  })

  it('joins changes separated by at most twice the context', () => {
    const before = numbered(10)
    const after = [...before]
    after[1] = 'X\n'
    after[8] = 'Y\n'

    const hunks = unifiedHunks(before, after)

    expect(hunks).toHaveLength(1)
    expect([hunks[0]?.oldStart, hunks[0]?.oldCount]).toEqual([1, 10])
  })

  it('honours the context option', () => {
    const hunks = unifiedHunks(splitLines('a\nb\nc\n'), splitLines('a\nB\nc\n'), { context: 0 })
    expect(hunks).toEqual([
      {
        oldStart: 2,
        oldCount: 1,
        newStart: 2,
        newCount: 1,
        edits: [
          { kind: 'delete', line: 'b\n' },
          { kind: 'insert', line: 'B\n' },
        ],
      },
    ])
  })
})

describe('unifiedDiff', () => {
  it('renders a modification', () => {
    expect(unifiedDiff('f.txt', 'a\nb\nc\n', 'a\nB\nc\n')).toBe(
      'diff --grove a/f.txt b/f.txt\n' +
        '--- a/f.txt\n' +
        '+++ b/f.txt\n' +
        '@@ -1,3 +1,3 @@\n' +
        ' a\n' +
        '-b\n' +
        '+B\n' +
        ' c\n'
    )
  })

  it('renders an added file against /dev/null', () => {
    expect(unifiedDiff('n.txt', undefined, 'x\n')).toBe(
      'diff --grove a/n.txt b/n.txt\n--- /dev/null\n+++ b/n.txt\n@@ -0,0 +1,1 @@\n+x\n'
    )
  })

  it('renders a deleted file against /dev/null', () => {
    expect(unifiedDiff('n.txt', 'x\n', undefined)).toBe(
      'diff --grove a/n.txt b/n.txt\n--- a/n.txt\n+++ /dev/null\n@@ -1,1 +0,0 @@\n-x\n'
    )
  })

  it('marks a last line without newline', () => {
    expect(unifiedDiff('f', 'a\n', 'a\nb')).toBe(
      'diff --grove a/f b/f\n--- a/f\n+++ b/f\n@@ -1,1 +1,2 @@\n a\n+b\n\\ No newline at end of file\n'
    )
  })

  it('is empty for identical texts', () => {
    expect(unifiedDiff('f', 'same\n', 'same\n')).toBe('')
  })
})

describe('binaryDiff', () => {
  it('reports that binary files differ', () => {
    expect(binaryDiff('img.png')).toBe('diff --grove a/img.png b/img.png\nBinary files a/img.png and b/img.png differ\n')
  })
})
