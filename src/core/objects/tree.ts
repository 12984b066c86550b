/**
 * Tree Object
 *
 * A tree stores one directory level. Payload format, one line per entry,
 * sorted by name:
 *
 *   "<type> <oid> <name>\n"
 *
 * Sorting by plain code-unit order makes the payload (and so the oid) a pure
 * function of the entry set.
 *
 * @module core/objects/tree
 */

import { CorruptObjectError, InvalidPathError } from '../../errors'
import { isValidOid } from '../../utils/hash'
import { type TreeEntry, isTreeEntryType } from './types'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

// =============================================================================
// Entry Utilities
// =============================================================================

/**
 * Returns why `name` cannot be a tree entry name, or null when it can.
 */
export function checkEntryName(name: string): string | null {
  if (name.length === 0) return 'empty name'
  if (name === '.' || name === '..') return 'reserved name'
  if (name.includes('/')) return 'contains path separator'
  if (name.includes('\n')) return 'contains newline'
  if (name.includes('\0')) return 'contains null byte'
  return null
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function sortTreeEntries(entries: readonly TreeEntry[]): TreeEntry[] {
  return [...entries].sort((a, b) => compareNames(a.name, b.name))
}

/**
 * Parses a tree payload. Names may contain spaces: only the first two
 * spaces of a line are separators.
 */
export function parseTreeEntries(payload: Uint8Array, oid?: string): TreeEntry[] {
  const text = decoder.decode(payload)
  if (text.length === 0) {
    return []
  }
  if (!text.endsWith('\n')) {
    throw new CorruptObjectError('Tree payload is not newline terminated', oid)
  }

  const entries: TreeEntry[] = []
  for (const line of text.slice(0, -1).split('\n')) {
    const firstSpace = line.indexOf(' ')
    const secondSpace = firstSpace === -1 ? -1 : line.indexOf(' ', firstSpace + 1)
    if (secondSpace === -1) {
      throw new CorruptObjectError(`Malformed tree entry "${line}"`, oid)
    }

    const type = line.slice(0, firstSpace)
    const entryOid = line.slice(firstSpace + 1, secondSpace)
    const name = line.slice(secondSpace + 1)

    if (!isTreeEntryType(type)) {
      throw new CorruptObjectError(`Unknown tree entry type "${type}"`, oid)
    }
    if (!isValidOid(entryOid)) {
      throw new CorruptObjectError(`Invalid oid in tree entry "${line}"`, oid)
    }
    const problem = checkEntryName(name)
    if (problem) {
      throw new CorruptObjectError(`Invalid tree entry name "${name}": ${problem}`, oid)
    }

    entries.push({ type, oid: entryOid, name })
  }
  return entries
}

export function serializeTreeEntries(entries: readonly TreeEntry[]): Uint8Array {
  return encoder.encode(entries.map((entry) => `${entry.type} ${entry.oid} ${entry.name}\n`).join(''))
}

// =============================================================================
// Tree Class
// =============================================================================

export class Tree {
  readonly type = 'tree' as const
  readonly entries: readonly TreeEntry[]

  /**
   * @param entries - Entries in any order; they are validated and sorted
   * @throws InvalidPathError for an invalid or duplicate name
   */
  constructor(entries: readonly TreeEntry[]) {
    const seen = new Set<string>()
    for (const entry of entries) {
      const problem = checkEntryName(entry.name)
      if (problem) {
        throw new InvalidPathError(entry.name, problem)
      }
      if (seen.has(entry.name)) {
        throw new InvalidPathError(entry.name, 'duplicate tree entry')
      }
      if (!isValidOid(entry.oid)) {
        throw new CorruptObjectError(`Invalid oid for tree entry "${entry.name}": ${entry.oid}`)
      }
      seen.add(entry.name)
    }
    this.entries = sortTreeEntries(entries)
  }

  static parse(payload: Uint8Array, oid?: string): Tree {
    return new Tree(parseTreeEntries(payload, oid))
  }

  serialize(): Uint8Array {
    return serializeTreeEntries(this.entries)
  }

  isEmpty(): boolean {
    return this.entries.length === 0
  }

  getEntry(name: string): TreeEntry | undefined {
    return this.entries.find((entry) => entry.name === name)
  }
}
