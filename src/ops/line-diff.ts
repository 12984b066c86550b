/**
 * @fileoverview Line Diff
 *
 * Line-level edit scripts and unified diff rendering.
 *
 * Lines keep their terminators (`"a\n"`), so a final line without a
 * newline differs from the same line with one and the original text is
 * recovered by joining. The edit script comes from a longest common
 * subsequence table; where several scripts are equally short, deletions
 * are emitted before insertions.
 *
 * @module ops/line-diff
 */

import { DEFAULT_CONTEXT_LINES } from '../constants'

// ============================================================================
// Types
// ============================================================================

export type EditKind = 'equal' | 'delete' | 'insert'

export interface LineEdit {
  kind: EditKind
  line: string
}

/**
 * A base range `[start, end)` replaced by `lines`.
 */
export interface LineHunk {
  start: number
  end: number
  lines: string[]
}

export interface UnifiedHunk {
  oldStart: number
  oldCount: number
  newStart: number
  newCount: number
  edits: LineEdit[]
}

export interface UnifiedDiffOptions {
  /** Unchanged lines around each change (default: 3) */
  context?: number
}

// ============================================================================
// Edit Script
// ============================================================================

/**
 * Splits text into lines, each keeping its trailing `\n`.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? []
}

/**
 * LCS-based edit script turning `a` into `b`.
 */
export function diffLines(a: readonly string[], b: readonly string[]): LineEdit[] {
  const m = a.length
  const n = b.length

  // suffix[i][j] = LCS length of a[i..] and b[j..]
  const suffix: number[][] = []
  for (let i = 0; i <= m; i++) {
    suffix.push(new Array<number>(n + 1).fill(0))
  }
  for (let i = m - 1; i >= 0; i--) {
    const row = suffix[i]
    const below = suffix[i + 1]
    for (let j = n - 1; j >= 0; j--) {
      row[j] = a[i] === b[j] ? below[j + 1] + 1 : Math.max(below[j], row[j + 1])
    }
  }

  const edits: LineEdit[] = []
  let i = 0
  let j = 0
  while (i < m && j < n) {
    if (a[i] === b[j]) {
      edits.push({ kind: 'equal', line: a[i] })
      i++
      j++
    } else if (suffix[i + 1][j] >= suffix[i][j + 1]) {
      edits.push({ kind: 'delete', line: a[i] })
      i++
    } else {
      edits.push({ kind: 'insert', line: b[j] })
      j++
    }
  }
  for (; i < m; i++) edits.push({ kind: 'delete', line: a[i] })
  for (; j < n; j++) edits.push({ kind: 'insert', line: b[j] })

  return edits
}

/**
 * Groups an edit script into replaced base ranges.
 */
export function computeHunks(base: readonly string[], target: readonly string[]): LineHunk[] {
  const hunks: LineHunk[] = []
  let current: LineHunk | undefined
  let baseIndex = 0

  for (const edit of diffLines(base, target)) {
    if (edit.kind === 'equal') {
      if (current) {
        hunks.push(current)
        current = undefined
      }
      baseIndex++
      continue
    }
    current ??= { start: baseIndex, end: baseIndex, lines: [] }
    if (edit.kind === 'delete') {
      baseIndex++
      current.end = baseIndex
    } else {
      current.lines.push(edit.line)
    }
  }
  if (current) {
    hunks.push(current)
  }

  return hunks
}

// ============================================================================
// Unified Diff
// ============================================================================

/**
 * Groups changes into hunks with surrounding context. Changes separated by
 * at most `2 * context` unchanged lines share a hunk.
 */
export function unifiedHunks(
  oldLines: readonly string[],
  newLines: readonly string[],
  options: UnifiedDiffOptions = {}
): UnifiedHunk[] {
  const context = options.context ?? DEFAULT_CONTEXT_LINES
  const edits = diffLines(oldLines, newLines)

  // [first, last] edit indexes of each run of changes, joined across short gaps
  const groups: Array<[number, number]> = []
  edits.forEach((edit, index) => {
    if (edit.kind === 'equal') return
    const last = groups[groups.length - 1]
    if (last && index - last[1] - 1 <= 2 * context) {
      last[1] = index
    } else {
      groups.push([index, index])
    }
  })

  const hunks: UnifiedHunk[] = []
  for (const [first, last] of groups) {
    const from = Math.max(0, first - context)
    const to = Math.min(edits.length, last + context + 1)

    let oldBefore = 0
    let newBefore = 0
    for (const edit of edits.slice(0, from)) {
      if (edit.kind !== 'insert') oldBefore++
      if (edit.kind !== 'delete') newBefore++
    }

    const hunkEdits = edits.slice(from, to)
    const oldCount = hunkEdits.filter((edit) => edit.kind !== 'insert').length
    const newCount = hunkEdits.filter((edit) => edit.kind !== 'delete').length

    hunks.push({
      oldStart: oldCount === 0 ? oldBefore : oldBefore + 1,
      oldCount,
      newStart: newCount === 0 ? newBefore : newBefore + 1,
      newCount,
      edits: hunkEdits,
    })
  }

  return hunks
}

const EDIT_PREFIX: Record<EditKind, string> = {
  equal: ' ',
  delete: '-',
  insert: '+',
}

function formatEditLine(edit: LineEdit): string {
  const prefix = EDIT_PREFIX[edit.kind]
  if (edit.line.endsWith('\n')) {
    return prefix + edit.line
  }
  return `${prefix}${edit.line}\n\\ No newline at end of file\n`
}

export function formatUnifiedHunks(hunks: readonly UnifiedHunk[]): string {
  let out = ''
  for (const hunk of hunks) {
    out += `@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@\n`
    for (const edit of hunk.edits) {
      out += formatEditLine(edit)
    }
  }
  return out
}

/**
 * Unified diff of one file. `undefined` text means the file is absent on
 * that side. Returns an empty string when the texts are equal.
 */
export function unifiedDiff(
  path: string,
  oldText: string | undefined,
  newText: string | undefined,
  options: UnifiedDiffOptions = {}
): string {
  if (oldText === newText) {
    return ''
  }
  const hunks = unifiedHunks(splitLines(oldText ?? ''), splitLines(newText ?? ''), options)
  return (
    `diff --grove a/${path} b/${path}\n` +
    `--- ${oldText === undefined ? '/dev/null' : `a/${path}`}\n` +
    `+++ ${newText === undefined ? '/dev/null' : `b/${path}`}\n` +
    formatUnifiedHunks(hunks)
  )
}

export function binaryDiff(path: string): string {
  return `diff --grove a/${path} b/${path}\nBinary files a/${path} and b/${path} differ\n`
}
