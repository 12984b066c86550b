/**
 * Typed reads and writes over an object store.
 *
 * @module core/objects/io
 */

import type { ObjectReader, ObjectStore } from '../../types/storage'
import { Commit } from './commit'
import { Tree } from './tree'
import type { CommitData, TreeEntry } from './types'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export async function readCommit(objects: ObjectReader, oid: string): Promise<Commit> {
  const { payload } = await objects.get(oid, 'commit')
  return Commit.parse(payload, oid)
}

export async function readTree(objects: ObjectReader, oid: string): Promise<Tree> {
  const { payload } = await objects.get(oid, 'tree')
  return Tree.parse(payload, oid)
}

export async function readBlob(objects: ObjectReader, oid: string): Promise<Uint8Array> {
  return (await objects.get(oid, 'blob')).payload
}

export async function readBlobText(objects: ObjectReader, oid: string): Promise<string> {
  return decoder.decode(await readBlob(objects, oid))
}

export async function writeBlob(objects: ObjectStore, content: Uint8Array | string): Promise<string> {
  return objects.put('blob', typeof content === 'string' ? encoder.encode(content) : content)
}

export async function writeTreeObject(objects: ObjectStore, entries: readonly TreeEntry[]): Promise<string> {
  return objects.put('tree', new Tree(entries).serialize())
}

export async function writeCommit(objects: ObjectStore, data: CommitData): Promise<string> {
  return objects.put('commit', new Commit(data).serialize())
}
