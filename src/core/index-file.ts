/**
 * @fileoverview Staging index
 *
 * The index is the flat snapshot the next commit is built from, stored at
 * `<repo>/.grove/index` as a JSON object mapping paths to blob oids with
 * keys in sorted order. It is loaded lazily and written back only when
 * modified.
 *
 * @module core/index-file
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { CorruptObjectError } from '../errors'
import { isErrnoCode } from '../storage/fs-errors'
import { isValidOid } from '../utils/hash'
import type { FlatTree } from './objects/types'

export const INDEX_FILE = 'index'

/**
 * Object.fromEntries defines own properties, so a path such as `__proto__`
 * survives serialization.
 */
export function serializeIndex(entries: FlatTree): string {
  const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return `${JSON.stringify(Object.fromEntries(sorted), null, 2)}\n`
}

export function parseIndex(text: string): FlatTree {
  const parsed: unknown = JSON.parse(text)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CorruptObjectError('Malformed index: expected a JSON object')
  }
  const entries: FlatTree = new Map()
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string' || !isValidOid(value)) {
      throw new CorruptObjectError(`Malformed index entry for ${key}`)
    }
    entries.set(key, value)
  }
  return entries
}

export class StagingIndex {
  private dirty = false

  private constructor(
    readonly filePath: string,
    private current: FlatTree
  ) {}

  static async load(gitDir: string): Promise<StagingIndex> {
    const filePath = path.join(gitDir, INDEX_FILE)
    try {
      return new StagingIndex(filePath, parseIndex(await fs.readFile(filePath, 'utf8')))
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return new StagingIndex(filePath, new Map())
      }
      throw error
    }
  }

  get entries(): ReadonlyMap<string, string> {
    return this.current
  }

  get modified(): boolean {
    return this.dirty
  }

  /** Copy of the entries */
  snapshot(): FlatTree {
    return new Map(this.current)
  }

  get(path: string): string | undefined {
    return this.current.get(path)
  }

  has(path: string): boolean {
    return this.current.has(path)
  }

  set(path: string, oid: string): void {
    if (this.current.get(path) === oid) return
    this.current.set(path, oid)
    this.dirty = true
  }

  remove(path: string): boolean {
    const removed = this.current.delete(path)
    this.dirty ||= removed
    return removed
  }

  replace(entries: FlatTree): void {
    this.current = new Map(entries)
    this.dirty = true
  }

  async save(): Promise<void> {
    if (!this.dirty) return
    await fs.writeFile(this.filePath, serializeIndex(this.current))
    this.dirty = false
  }
}
