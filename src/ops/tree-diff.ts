/**
 * @fileoverview Tree Diff Operations
 *
 * Compares snapshots as flat path → blob-oid maps. Trees from the object
 * store are flattened first; the index and the working directory are
 * already flat.
 *
 * ```typescript
 * const from = await flattenTree(objects, headTreeOid)
 * const to = await flattenTree(objects, otherTreeOid)
 *
 * for (const change of changedFiles(from, to)) {
 *   console.log(`${change.status}: ${change.path}`)
 * }
 * process.stdout.write(await diffTrees(objects, from, to))
 * ```
 *
 * @module ops/tree-diff
 */

import { BINARY_CHECK_BYTES } from '../constants'
import { readBlob, readTree } from '../core/objects/io'
import type { FlatTree } from '../core/objects/types'
import type { ObjectReader } from '../types/storage'
import { type UnifiedDiffOptions, binaryDiff, unifiedDiff } from './line-diff'

/**
 * Status of a path between two snapshots.
 *
 * @enum {string}
 */
export enum DiffStatus {
  ADDED = 'added',
  MODIFIED = 'modified',
  DELETED = 'deleted',
}

export interface ChangedFile {
  path: string
  status: DiffStatus
}

const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Content with a NUL byte in its first {@link BINARY_CHECK_BYTES} bytes is
 * binary.
 */
export function isBinaryContent(content: Uint8Array): boolean {
  const checkLength = Math.min(content.length, BINARY_CHECK_BYTES)
  for (let i = 0; i < checkLength; i++) {
    if (content[i] === 0x00) {
      return true
    }
  }
  return false
}

/**
 * Text of a blob, or undefined when it is binary or not valid UTF-8.
 * A leading byte order mark is kept so the text re-encodes to the same bytes.
 */
export function decodeText(content: Uint8Array): string | undefined {
  if (isBinaryContent(content)) return undefined
  try {
    return textDecoder.decode(content)
  } catch (error) {
    if (error instanceof TypeError) return undefined
    throw error
  }
}

/**
 * Path → blob oid for every blob below `treeOid`, with `/`-joined paths.
 */
export async function flattenTree(objects: ObjectReader, treeOid: string, basePath = ''): Promise<FlatTree> {
  const result: FlatTree = new Map()
  const tree = await readTree(objects, treeOid)

  for (const entry of tree.entries) {
    const path = basePath + entry.name
    if (entry.type === 'tree') {
      for (const [subPath, oid] of await flattenTree(objects, entry.oid, `${path}/`)) {
        result.set(subPath, oid)
      }
    } else {
      result.set(path, entry.oid)
    }
  }

  return result
}

/**
 * Paths whose oid differs between `from` and `to`, sorted by path.
 */
export function changedFiles(from: FlatTree, to: FlatTree): ChangedFile[] {
  const paths = new Set([...from.keys(), ...to.keys()])
  const changes: ChangedFile[] = []

  for (const path of [...paths].sort()) {
    const before = from.get(path)
    const after = to.get(path)
    if (before === after) continue
    if (before === undefined) {
      changes.push({ path, status: DiffStatus.ADDED })
    } else if (after === undefined) {
      changes.push({ path, status: DiffStatus.DELETED })
    } else {
      changes.push({ path, status: DiffStatus.MODIFIED })
    }
  }

  return changes
}

async function readOptionalBlob(objects: ObjectReader, oid: string | undefined): Promise<Uint8Array | undefined> {
  return oid === undefined ? undefined : readBlob(objects, oid)
}

/**
 * Unified diff of one path between two blobs (either may be absent).
 */
export async function diffBlobs(
  objects: ObjectReader,
  path: string,
  fromOid: string | undefined,
  toOid: string | undefined,
  options: UnifiedDiffOptions = {}
): Promise<string> {
  const before = await readOptionalBlob(objects, fromOid)
  const after = await readOptionalBlob(objects, toOid)

  const beforeText = before === undefined ? undefined : decodeText(before)
  const afterText = after === undefined ? undefined : decodeText(after)
  if ((before !== undefined && beforeText === undefined) || (after !== undefined && afterText === undefined)) {
    return binaryDiff(path)
  }

  return unifiedDiff(path, beforeText, afterText, options)
}

/**
 * Unified diff of every changed path, concatenated in path order.
 */
export async function diffTrees(
  objects: ObjectReader,
  from: FlatTree,
  to: FlatTree,
  options: UnifiedDiffOptions = {}
): Promise<string> {
  let output = ''
  for (const { path } of changedFiles(from, to)) {
    output += await diffBlobs(objects, path, from.get(path), to.get(path), options)
  }
  return output
}
