import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { CorruptObjectError } from '../../src/errors'
import { StagingIndex, parseIndex, serializeIndex } from '../../src/core/index-file'
import { makeTempDir, removeDir } from '../helpers/fixtures'

const OID_A = 'a'.repeat(40)
const OID_B = 'b'.repeat(40)

describe('index format', () => {
  it('serializes sorted keys as JSON', () => {
    expect(serializeIndex(new Map([['z.txt', OID_B], ['a.txt', OID_A]]))).toBe(
      `{\n  "a.txt": "${OID_A}",\n  "z.txt": "${OID_B}"\n}\n`
    )
  })

  it('serializes an empty index', () => {
    expect(serializeIndex(new Map())).toBe('{}\n')
  })

  it('parses entries', () => {
    expect(parseIndex(`{"dir/f": "${OID_A}"}`)).toEqual(new Map([['dir/f', OID_A]]))
  })

  it('rejects malformed content', () => {
    expect(() => parseIndex('[]')).toThrow(CorruptObjectError)
    expect(() => parseIndex('{"a": 1}')).toThrow('Malformed index entry for a')
    expect(() => parseIndex('{"a": "short"}')).toThrow(CorruptObjectError)
  })
})

describe('StagingIndex', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir('grove-index-')
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('starts empty without a file', async () => {
    const index = await StagingIndex.load(dir)
    expect(index.entries.size).toBe(0)
    expect(index.modified).toBe(false)
  })

  it('saves only when modified', async () => {
    const index = await StagingIndex.load(dir)
    await index.save()
    await expect(fs.stat(path.join(dir, 'index'))).rejects.toThrow()

    index.set('a.txt', OID_A)
    expect(index.modified).toBe(true)
    await index.save()
    expect(index.modified).toBe(false)

    const reloaded = await StagingIndex.load(dir)
    expect(reloaded.get('a.txt')).toBe(OID_A)
  })

  it('does not mark unchanged values as modified', async () => {
    await fs.writeFile(path.join(dir, 'index'), serializeIndex(new Map([['a.txt', OID_A]])))
    const index = await StagingIndex.load(dir)

    index.set('a.txt', OID_A)
    expect(index.remove('missing')).toBe(false)
    expect(index.modified).toBe(false)

    expect(index.remove('a.txt')).toBe(true)
    expect(index.modified).toBe(true)
  })

  it('replaces all entries', async () => {
    const index = await StagingIndex.load(dir)
    index.set('old', OID_A)
    index.replace(new Map([['new', OID_B]]))
    expect(index.has('old')).toBe(false)
    expect(index.snapshot()).toEqual(new Map([['new', OID_B]]))
  })

  it('keeps a path named __proto__ across save and load', async () => {
    const index = await StagingIndex.load(dir)
    index.set('__proto__', OID_A)
    index.set('b.txt', OID_B)
    await index.save()

    const reloaded = await StagingIndex.load(dir)
    expect([...reloaded.entries.keys()]).toEqual(['__proto__', 'b.txt'])
    expect(reloaded.get('__proto__')).toBe(OID_A)
  })

  it('returns snapshots detached from the index', async () => {
    const index = await StagingIndex.load(dir)
    index.set('a', OID_A)
    const copy = index.snapshot()
    copy.set('b', OID_B)
    expect(index.has('b')).toBe(false)
  })
})
