/**
 * @fileoverview SHA-1 hashing for stored objects.
 *
 * An object's id is the SHA-1 of its framed bytes: `type || 0x00 || payload`.
 * The same framing is what the object store writes to disk, so a raw object
 * file can be verified by hashing it as-is.
 *
 * @module utils/hash
 */

import * as crypto from 'crypto'

const encoder = new TextEncoder()

/** Length of a full hex object id */
export const OID_LENGTH = 40

const OID_PATTERN = /^[0-9a-f]{40}$/
const HEX_PATTERN = /^[0-9a-f]+$/

/**
 * SHA-1 of raw bytes as a 40-character lowercase hex string.
 */
export function sha1Hex(data: Uint8Array): string {
  return crypto.createHash('sha1').update(data).digest('hex')
}

/**
 * Frames a payload with its type header: `type || 0x00 || payload`.
 */
export function frameObject(type: string, payload: Uint8Array): Uint8Array {
  const header = encoder.encode(type)
  const framed = new Uint8Array(header.length + 1 + payload.length)
  framed.set(header, 0)
  framed[header.length] = 0
  framed.set(payload, header.length + 1)
  return framed
}

/**
 * Computes the object id for a type and payload without storing anything.
 *
 * @example
 * ```typescript
 * hashObject('blob', new TextEncoder().encode('hello\n'))
 * ```
 */
export function hashObject(type: string, payload: Uint8Array): string {
  return sha1Hex(frameObject(type, payload))
}

export function isValidOid(value: string): boolean {
  return OID_PATTERN.test(value)
}

export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value)
}
