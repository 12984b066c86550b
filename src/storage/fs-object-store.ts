/**
 * @fileoverview Filesystem object store.
 *
 * One file per object under the objects directory, named by oid. Files are
 * created exclusively, so writing an object that already exists (including
 * a concurrent writer of the same content) is a no-op.
 *
 * @module storage/fs-object-store
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { ObjectNotFoundError } from '../errors'
import type { ObjectType, StoredObject } from '../core/objects/types'
import type { ObjectStore } from '../types/storage'
import { hashObject, isHex } from '../utils/hash'
import { decodeLooseObject, encodeLooseObject, expectType, verifyLooseObject } from './loose-object'
import { isErrnoCode } from './fs-errors'

export class FileObjectStore implements ObjectStore {
  constructor(readonly objectsDir: string) {}

  private objectPath(oid: string): string {
    // Only hex names ever reach the filesystem
    if (!isHex(oid)) {
      throw new ObjectNotFoundError(oid)
    }
    return path.join(this.objectsDir, oid)
  }

  async put(type: ObjectType, payload: Uint8Array): Promise<string> {
    const oid = hashObject(type, payload)
    await this.writeFramed(oid, encodeLooseObject(type, payload))
    return oid
  }

  async get(oid: string, expectedType?: ObjectType): Promise<StoredObject> {
    const raw = await this.readRaw(oid)
    return expectType(oid, decodeLooseObject(raw, oid), expectedType)
  }

  async exists(oid: string): Promise<boolean> {
    if (!isHex(oid)) return false
    try {
      await fs.access(this.objectPath(oid))
      return true
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false
      throw error
    }
  }

  async findByPrefix(prefix: string): Promise<string[]> {
    const names = await fs.readdir(this.objectsDir)
    return names.filter((name) => name.startsWith(prefix) && isHex(name)).sort()
  }

  async readRaw(oid: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(this.objectPath(oid)))
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        throw new ObjectNotFoundError(oid)
      }
      throw error
    }
  }

  async writeRaw(oid: string, raw: Uint8Array): Promise<void> {
    verifyLooseObject(oid, raw)
    await this.writeFramed(oid, raw)
  }

  private async writeFramed(oid: string, raw: Uint8Array): Promise<void> {
    try {
      await fs.writeFile(this.objectPath(oid), raw, { flag: 'wx' })
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) return
      throw error
    }
  }
}
