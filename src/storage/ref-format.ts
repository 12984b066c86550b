/**
 * Ref file format shared by the ref backends.
 *
 * @module storage/ref-format
 */

import type { RefValue } from '../types/storage'

/** Refs stored outside the `refs/` hierarchy */
export const SPECIAL_REFS = ['HEAD', 'MERGE_HEAD'] as const

const SYMBOLIC_PREFIX = 'ref:'

/**
 * Parses ref file content. Blank content means the ref is unset.
 */
export function parseRefFile(content: string): RefValue | undefined {
  const trimmed = content.trim()
  if (trimmed.length === 0) {
    return undefined
  }
  if (trimmed.startsWith(SYMBOLIC_PREFIX)) {
    return { symbolic: true, value: trimmed.slice(SYMBOLIC_PREFIX.length).trim() }
  }
  return { symbolic: false, value: trimmed }
}

export function serializeRefFile(ref: RefValue): string {
  return ref.symbolic ? `${SYMBOLIC_PREFIX} ${ref.value}\n` : `${ref.value}\n`
}
