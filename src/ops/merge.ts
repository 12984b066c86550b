/**
 * @fileoverview Three-Way Merge
 *
 * Line-level merging of file contents and path-level merging of flattened
 * trees.
 *
 * ## Content merge
 *
 * 1. Compute the hunks turning base into head, and base into other
 * 2. Walk both hunk lists in base order, clustering hunks whose base ranges
 *    overlap or that start at the same line (two insertions at one point)
 * 3. A cluster touched by one side takes that side's lines
 * 4. A cluster touched by both sides takes their common result when both
 *    produce the same lines, and becomes a conflict otherwise
 *
 * ```
 * <<<<<<< HEAD
 * head lines
 * =======
 * other lines
 * >>>>>>> MERGE_HEAD
 * ```
 *
 * Conflicts are returned as data; nothing here throws for them.
 *
 * @module ops/merge
 */

import { CONFLICT_MARKER_OURS, CONFLICT_MARKER_SEPARATOR, CONFLICT_MARKER_THEIRS } from '../constants'
import { readBlob, writeBlob } from '../core/objects/io'
import type { FlatTree } from '../core/objects/types'
import type { ObjectStore } from '../types/storage'
import { type LineHunk, computeHunks, splitLines } from './line-diff'
import { decodeText } from './tree-diff'

// ============================================================================
// Types
// ============================================================================

export interface ConflictLabels {
  /** Label after `<<<<<<<` (default: HEAD) */
  head: string
  /** Label after `>>>>>>>` (default: MERGE_HEAD) */
  other: string
}

export const DEFAULT_CONFLICT_LABELS: ConflictLabels = {
  head: 'HEAD',
  other: 'MERGE_HEAD',
}

export interface ContentMergeResult {
  content: string
  conflicted: boolean
}

export interface TreeMergeResult {
  /** Merged path → blob oid */
  tree: FlatTree
  /** Paths written with conflict markers, sorted */
  conflicts: string[]
}

interface SidedHunk extends LineHunk {
  side: 'head' | 'other'
}

interface Cluster {
  start: number
  end: number
  head: LineHunk[]
  other: LineHunk[]
}

const encoder = new TextEncoder()

// ============================================================================
// Content Merge
// ============================================================================

function clusterHunks(head: readonly LineHunk[], other: readonly LineHunk[]): Cluster[] {
  const ordered: SidedHunk[] = [
    ...head.map((hunk): SidedHunk => ({ ...hunk, side: 'head' })),
    ...other.map((hunk): SidedHunk => ({ ...hunk, side: 'other' })),
  ].sort((a, b) => a.start - b.start || (a.side === b.side ? 0 : a.side === 'head' ? -1 : 1))

  const clusters: Cluster[] = []
  let current: Cluster | undefined
  for (const hunk of ordered) {
    if (!current || !(hunk.start < current.end || hunk.start === current.start)) {
      current = { start: hunk.start, end: hunk.end, head: [], other: [] }
      clusters.push(current)
    }
    current.end = Math.max(current.end, hunk.end)
    current[hunk.side].push(hunk)
  }
  return clusters
}

/**
 * Base lines `[start, end)` with `hunks` (all inside that range) applied.
 */
function applyHunks(base: readonly string[], start: number, end: number, hunks: readonly LineHunk[]): string[] {
  const out: string[] = []
  let pos = start
  for (const hunk of hunks) {
    out.push(...base.slice(pos, hunk.start), ...hunk.lines)
    pos = hunk.end
  }
  out.push(...base.slice(pos, end))
  return out
}

function sameLines(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i])
}

/**
 * Text of a conflict section, ending in a newline unless empty.
 */
function section(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`
}

export function formatConflict(headText: string, otherText: string, labels: ConflictLabels): string {
  return (
    `${CONFLICT_MARKER_OURS} ${labels.head}\n` +
    section(headText) +
    `${CONFLICT_MARKER_SEPARATOR}\n` +
    section(otherText) +
    `${CONFLICT_MARKER_THEIRS} ${labels.other}\n`
  )
}

/**
 * Three-way merge of text contents.
 *
 * @example
 * ```typescript
 * mergeContent('A\nB\nC\n', 'X\nB\nC\n', 'A\nB\nZ\n')
 * // { content: 'X\nB\nZ\n', conflicted: false }
 * ```
 */
export function mergeContent(
  base: string,
  head: string,
  other: string,
  labels: ConflictLabels = DEFAULT_CONFLICT_LABELS
): ContentMergeResult {
  if (head === other || other === base) {
    return { content: head, conflicted: false }
  }
  if (head === base) {
    return { content: other, conflicted: false }
  }

  const baseLines = splitLines(base)
  const headLines = splitLines(head)
  const otherLines = splitLines(other)
  const clusters = clusterHunks(computeHunks(baseLines, headLines), computeHunks(baseLines, otherLines))

  let content = ''
  let conflicted = false
  let pos = 0

  for (const cluster of clusters) {
    content += baseLines.slice(pos, cluster.start).join('')
    pos = cluster.end

    const headRegion = applyHunks(baseLines, cluster.start, cluster.end, cluster.head)
    if (cluster.other.length === 0) {
      content += headRegion.join('')
      continue
    }
    const otherRegion = applyHunks(baseLines, cluster.start, cluster.end, cluster.other)
    if (cluster.head.length === 0 || sameLines(headRegion, otherRegion)) {
      content += otherRegion.join('')
      continue
    }

    conflicted = true
    content = section(content) + formatConflict(headRegion.join(''), otherRegion.join(''), labels)
  }
  content += baseLines.slice(pos).join('')

  return { content, conflicted }
}

/**
 * Whole-file conflict between two versions; an absent version is shown as
 * deleted with an empty section.
 */
export function wholeFileConflict(
  head: Uint8Array | undefined,
  other: Uint8Array | undefined,
  labels: ConflictLabels = DEFAULT_CONFLICT_LABELS
): Uint8Array {
  const parts: Uint8Array[] = []
  const marker = (text: string) => parts.push(encoder.encode(text))
  const body = (bytes: Uint8Array | undefined) => {
    if (!bytes || bytes.length === 0) return
    parts.push(bytes)
    if (bytes[bytes.length - 1] !== 0x0a) marker('\n')
  }

  marker(`${CONFLICT_MARKER_OURS} ${labels.head}${head ? '' : ' (deleted)'}\n`)
  body(head)
  marker(`${CONFLICT_MARKER_SEPARATOR}\n`)
  body(other)
  marker(`${CONFLICT_MARKER_THEIRS} ${labels.other}${other ? '' : ' (deleted)'}\n`)

  return Buffer.concat(parts)
}

// ============================================================================
// Tree Merge
// ============================================================================

async function readOptionalBlob(objects: ObjectStore, oid: string | undefined): Promise<Uint8Array | undefined> {
  return oid === undefined ? undefined : readBlob(objects, oid)
}

/**
 * Merges one path changed differently on both sides. Returns the merged
 * blob oid and whether it holds conflict markers.
 */
async function mergePath(
  objects: ObjectStore,
  baseOid: string | undefined,
  headOid: string | undefined,
  otherOid: string | undefined,
  labels: ConflictLabels
): Promise<{ oid: string; conflicted: boolean }> {
  const base = await readOptionalBlob(objects, baseOid)
  const head = await readOptionalBlob(objects, headOid)
  const other = await readOptionalBlob(objects, otherOid)

  const baseText = base === undefined ? '' : decodeText(base)
  const headText = head === undefined ? undefined : decodeText(head)
  const otherText = other === undefined ? undefined : decodeText(other)
  if (baseText === undefined || headText === undefined || otherText === undefined) {
    return { oid: await writeBlob(objects, wholeFileConflict(head, other, labels)), conflicted: true }
  }

  const merged = mergeContent(baseText, headText, otherText, labels)
  return { oid: await writeBlob(objects, merged.content), conflicted: merged.conflicted }
}

/**
 * Path-level three-way merge of flattened trees. Merged blobs are written
 * to `objects`.
 */
export async function mergeTrees(
  objects: ObjectStore,
  base: FlatTree,
  head: FlatTree,
  other: FlatTree,
  labels: ConflictLabels = DEFAULT_CONFLICT_LABELS
): Promise<TreeMergeResult> {
  const tree: FlatTree = new Map()
  const conflicts: string[] = []
  const paths = [...new Set([...base.keys(), ...head.keys(), ...other.keys()])].sort()

  for (const path of paths) {
    const baseOid = base.get(path)
    const headOid = head.get(path)
    const otherOid = other.get(path)

    let result: string | undefined
    if (headOid === otherOid || otherOid === baseOid) {
      result = headOid
    } else if (headOid === baseOid) {
      result = otherOid
    } else {
      const merged = await mergePath(objects, baseOid, headOid, otherOid, labels)
      result = merged.oid
      if (merged.conflicted) {
        conflicts.push(path)
      }
    }

    if (result !== undefined) {
      tree.set(path, result)
    }
  }

  return { tree, conflicts }
}
