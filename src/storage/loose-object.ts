/**
 * @fileoverview Loose object framing.
 *
 * Each object is kept as `type || 0x00 || payload`, uncompressed. The same
 * bytes are hashed to produce the oid, and copied as-is between repositories.
 *
 * @module storage/loose-object
 */

import { CorruptObjectError, TypeMismatchError } from '../errors'
import type { ObjectType, StoredObject } from '../core/objects/types'
import { isObjectType } from '../core/objects/types'
import { frameObject, sha1Hex } from '../utils/hash'

const decoder = new TextDecoder()

export function encodeLooseObject(type: ObjectType, payload: Uint8Array): Uint8Array {
  return frameObject(type, payload)
}

/**
 * Splits framed bytes into type and payload.
 *
 * @throws CorruptObjectError when the header is missing or names an unknown type
 */
export function decodeLooseObject(raw: Uint8Array, oid?: string): StoredObject {
  const nul = raw.indexOf(0)
  if (nul === -1) {
    throw new CorruptObjectError('Object has no type header', oid)
  }
  const type = decoder.decode(raw.subarray(0, nul))
  if (!isObjectType(type)) {
    throw new CorruptObjectError(`Unknown object type "${type}"`, oid)
  }
  return { type, payload: raw.slice(nul + 1) }
}

/**
 * Applies the optional type check of `ObjectReader.get`.
 */
export function expectType(oid: string, object: StoredObject, expectedType?: ObjectType): StoredObject {
  if (expectedType !== undefined && object.type !== expectedType) {
    throw new TypeMismatchError(oid, expectedType, object.type)
  }
  return object
}

/**
 * Throws unless `raw` hashes to `oid`.
 */
export function verifyLooseObject(oid: string, raw: Uint8Array): void {
  const actual = sha1Hex(raw)
  if (actual !== oid) {
    throw new CorruptObjectError(`Object content hashes to ${actual}`, oid)
  }
  decodeLooseObject(raw, oid)
}
