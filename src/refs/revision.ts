/**
 * @fileoverview Revision lookup
 *
 * Turns user input into an oid:
 *
 * 1. `@` is shorthand for `HEAD`
 * 2. `<name>`, `refs/<name>`, `refs/tags/<name>`, `refs/heads/<name>`, first
 *    set ref wins
 * 3. a full 40-hex oid is taken as is
 * 4. a hex prefix of at least `minPrefixLength` characters matching exactly
 *    one stored object
 *
 * @module refs/revision
 */

import { AmbiguousOidError, UnknownRevisionError } from '../errors'
import type { ObjectStore } from '../types/storage'
import { isHex, isValidOid } from '../utils/hash'
import { HEAD, type RefStore, isValidRefName } from './storage'

/** Default minimum length of a short oid */
export const DEFAULT_MIN_PREFIX_LENGTH = 4

export interface RevisionOptions {
  minPrefixLength?: number
}

/**
 * Ref names tried for a revision, most specific first.
 */
export function candidateRefNames(name: string): string[] {
  return [name, `refs/${name}`, `refs/tags/${name}`, `refs/heads/${name}`].filter(isValidRefName)
}

/**
 * @throws UnknownRevisionError when nothing matches
 * @throws AmbiguousOidError when a short oid matches several objects
 */
export async function resolveRevision(
  refs: RefStore,
  objects: Pick<ObjectStore, 'findByPrefix'>,
  revision: string,
  options: RevisionOptions = {}
): Promise<string> {
  const name = revision === '@' ? HEAD : revision

  for (const candidate of candidateRefNames(name)) {
    const oid = await refs.getOid(candidate)
    if (oid !== undefined) {
      return oid
    }
  }

  const lower = name.toLowerCase()
  if (isValidOid(lower)) {
    return lower
  }

  const minPrefixLength = options.minPrefixLength ?? DEFAULT_MIN_PREFIX_LENGTH
  if (lower.length >= minPrefixLength && isHex(lower)) {
    const matches = await objects.findByPrefix(lower)
    if (matches.length > 1) {
      throw new AmbiguousOidError(lower, matches)
    }
    const [match] = matches
    if (match !== undefined) {
      return match
    }
  }

  throw new UnknownRevisionError(revision)
}
