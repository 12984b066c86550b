/**
 * @fileoverview Storage Interface Types
 *
 * The interfaces every storage backend implements. The engines only depend on
 * these, so the filesystem backends and the in-memory test backends are
 * interchangeable.
 *
 * - {@link ObjectReader} - read side used by graph walks, diff and merge
 * - {@link ObjectStore} - full append-only object store
 * - {@link RefBackend} - raw ref persistence, wrapped by `RefStore`
 *
 * @module types/storage
 */

import type { ObjectType, StoredObject } from '../core/objects/types'

/**
 * Read access to objects.
 */
export interface ObjectReader {
  /**
   * @throws ObjectNotFoundError when absent
   * @throws TypeMismatchError when `expectedType` is given and differs
   */
  get(oid: string, expectedType?: ObjectType): Promise<StoredObject>

  exists(oid: string): Promise<boolean>
}

/**
 * Content-addressed, append-only object store. There is no update or delete:
 * an oid is a permanent name for its content.
 */
export interface ObjectStore extends ObjectReader {
  /**
   * Stores a payload and returns its oid. Writing content that is already
   * present is a successful no-op.
   */
  put(type: ObjectType, payload: Uint8Array): Promise<string>

  /**
   * All stored oids starting with `prefix`, sorted.
   */
  findByPrefix(prefix: string): Promise<string[]>

  /**
   * The framed bytes (`type || 0x00 || payload`) of an object.
   */
  readRaw(oid: string): Promise<Uint8Array>

  /**
   * Stores framed bytes under `oid` after checking they hash to it.
   */
  writeRaw(oid: string, raw: Uint8Array): Promise<void>
}

/**
 * Value of a ref: either an oid or the name of another ref.
 */
export type RefValue =
  | { symbolic: false; value: string }
  | { symbolic: true; value: string }

/**
 * Raw ref persistence. No dereferencing happens at this level.
 */
export interface RefBackend {
  /** Stored value of `name`, or undefined when unset */
  read(name: string): Promise<RefValue | undefined>
  write(name: string, value: RefValue): Promise<void>
  /** Returns whether an entry was removed */
  remove(name: string): Promise<boolean>
  /** Every stored name: HEAD and MERGE_HEAD when set, then refs under `refs/` */
  listNames(): Promise<string[]>
}
