/**
 * @fileoverview In-memory storage backends.
 *
 * Same contracts as the filesystem backends, without touching disk. Used by
 * the unit tests of the graph, diff and merge engines.
 *
 * @module storage/memory
 *
 * @example
 * ```typescript
 * const objects = new MemoryObjectStore()
 * const refs = new RefStore(new MemoryRefBackend())
 * const oid = await objects.put('blob', new TextEncoder().encode('hi\n'))
 * ```
 */

import { ObjectNotFoundError } from '../errors'
import type { ObjectType, StoredObject } from '../core/objects/types'
import type { ObjectStore, RefBackend, RefValue } from '../types/storage'
import { hashObject } from '../utils/hash'
import { decodeLooseObject, encodeLooseObject, expectType, verifyLooseObject } from './loose-object'
import { SPECIAL_REFS } from './ref-format'

export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Uint8Array>()

  async put(type: ObjectType, payload: Uint8Array): Promise<string> {
    const oid = hashObject(type, payload)
    if (!this.objects.has(oid)) {
      this.objects.set(oid, encodeLooseObject(type, payload))
    }
    return oid
  }

  async get(oid: string, expectedType?: ObjectType): Promise<StoredObject> {
    return expectType(oid, decodeLooseObject(await this.readRaw(oid), oid), expectedType)
  }

  async exists(oid: string): Promise<boolean> {
    return this.objects.has(oid)
  }

  async findByPrefix(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((oid) => oid.startsWith(prefix)).sort()
  }

  async readRaw(oid: string): Promise<Uint8Array> {
    const raw = this.objects.get(oid)
    if (!raw) {
      throw new ObjectNotFoundError(oid)
    }
    return raw.slice()
  }

  async writeRaw(oid: string, raw: Uint8Array): Promise<void> {
    verifyLooseObject(oid, raw)
    if (!this.objects.has(oid)) {
      this.objects.set(oid, raw.slice())
    }
  }

  /** Number of stored objects */
  get size(): number {
    return this.objects.size
  }

  oids(): string[] {
    return [...this.objects.keys()].sort()
  }
}

export class MemoryRefBackend implements RefBackend {
  private readonly refs = new Map<string, RefValue>()

  async read(name: string): Promise<RefValue | undefined> {
    const ref = this.refs.get(name)
    return ref ? { ...ref } : undefined
  }

  async write(name: string, value: RefValue): Promise<void> {
    this.refs.set(name, { ...value })
  }

  async remove(name: string): Promise<boolean> {
    return this.refs.delete(name)
  }

  async listNames(): Promise<string[]> {
    const special = SPECIAL_REFS.filter((name) => this.refs.has(name))
    const refs = [...this.refs.keys()].filter((name) => name.startsWith('refs/')).sort()
    return [...special, ...refs]
  }
}
