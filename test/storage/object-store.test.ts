import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { CorruptObjectError, ObjectNotFoundError, TypeMismatchError } from '../../src/errors'
import { FileObjectStore } from '../../src/storage/fs-object-store'
import { MemoryObjectStore } from '../../src/storage/memory'
import { decodeLooseObject, encodeLooseObject } from '../../src/storage/loose-object'
import type { ObjectStore } from '../../src/types/storage'
import { hashObject } from '../../src/utils/hash'
import { makeTempDir, removeDir } from '../helpers/fixtures'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

interface StoreFixture {
  store: ObjectStore
  cleanup(): Promise<void>
}

const backends: Array<[string, () => Promise<StoreFixture>]> = [
  ['MemoryObjectStore', async () => ({ store: new MemoryObjectStore(), cleanup: async () => {} })],
  [
    'FileObjectStore',
    async () => {
      const dir = await makeTempDir('grove-objects-')
      return { store: new FileObjectStore(dir), cleanup: () => removeDir(dir) }
    },
  ],
]

describe.each(backends)('%s', (_name, create) => {
  let fixture: StoreFixture

  beforeEach(async () => {
    fixture = await create()
  })

  afterEach(async () => {
    await fixture.cleanup()
  })

  it('stores a payload under the hash of its framed bytes', async () => {
    const payload = encoder.encode('hello\n')
    const oid = await fixture.store.put('blob', payload)

    expect(oid).toBe(hashObject('blob', payload))
    const object = await fixture.store.get(oid)
    expect(object.type).toBe('blob')
    expect(decoder.decode(object.payload)).toBe('hello\n')
  })

  it('is idempotent for identical content', async () => {
    const first = await fixture.store.put('blob', encoder.encode('same'))
    const second = await fixture.store.put('blob', encoder.encode('same'))
    expect(second).toBe(first)
    expect(await fixture.store.findByPrefix('')).toEqual([first])
  })

  it('reports missing objects', async () => {
    const oid = 'f'.repeat(40)
    expect(await fixture.store.exists(oid)).toBe(false)
    await expect(fixture.store.get(oid)).rejects.toBeInstanceOf(ObjectNotFoundError)
    await expect(fixture.store.readRaw(oid)).rejects.toBeInstanceOf(ObjectNotFoundError)
  })

  it('checks the expected type', async () => {
    const oid = await fixture.store.put('blob', encoder.encode('data'))
    await expect(fixture.store.get(oid, 'tree')).rejects.toBeInstanceOf(TypeMismatchError)
    expect((await fixture.store.get(oid, 'blob')).type).toBe('blob')
  })

  it('finds objects by prefix', async () => {
    const oid = await fixture.store.put('blob', encoder.encode('prefix lookup'))
    expect(await fixture.store.findByPrefix(oid.slice(0, 6))).toEqual([oid])
    expect(await fixture.store.findByPrefix(oid)).toEqual([oid])
  })

  it('copies raw objects between stores', async () => {
    const oid = await fixture.store.put('commit', encoder.encode('raw'))
    const raw = await fixture.store.readRaw(oid)

    const other = new MemoryObjectStore()
    await other.writeRaw(oid, raw)
    expect(decoder.decode((await other.get(oid, 'commit')).payload)).toBe('raw')
  })

  it('rejects raw bytes that do not hash to the oid', async () => {
    const raw = encodeLooseObject('blob', encoder.encode('tampered'))
    await expect(fixture.store.writeRaw('0'.repeat(40), raw)).rejects.toBeInstanceOf(CorruptObjectError)
    expect(await fixture.store.exists('0'.repeat(40))).toBe(false)
  })
})

describe('FileObjectStore layout', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir('grove-objects-')
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('writes one uncompressed file per object', async () => {
    const store = new FileObjectStore(dir)
    const oid = await store.put('blob', encoder.encode('on disk'))

    const content = await fs.readFile(path.join(dir, oid))
    expect(content.toString('utf8')).toBe('blob\0on disk')
  })

  it('ignores non-hex names when searching by prefix', async () => {
    const store = new FileObjectStore(dir)
    const oid = await store.put('blob', encoder.encode('x'))
    await fs.writeFile(path.join(dir, 'notes.tmp'), 'junk')

    expect(await store.findByPrefix('')).toEqual([oid])
    expect(await store.exists('notes.tmp')).toBe(false)
  })

  it('fails on a file with an unknown type header', async () => {
    const store = new FileObjectStore(dir)
    const oid = 'e'.repeat(40)
    await fs.writeFile(path.join(dir, oid), 'weird\0payload')

    await expect(store.get(oid)).rejects.toThrow('Unknown object type "weird"')
  })
})

describe('decodeLooseObject', () => {
  it('requires a NUL separated header', () => {
    expect(() => decodeLooseObject(encoder.encode('blob without header'))).toThrow('Object has no type header')
  })
})
