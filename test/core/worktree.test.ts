import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { InvalidPathError } from '../../src/errors'
import { writeBlob } from '../../src/core/objects/io'
import {
  flattenDirectory,
  hashDirectory,
  isIgnored,
  listFiles,
  materialize,
  readWorkingFile,
  toRepoPath,
} from '../../src/core/worktree'
import { MemoryObjectStore } from '../../src/storage/memory'
import { hashObject } from '../../src/utils/hash'
import { exists, makeTempDir, readText, removeDir, writeFiles } from '../helpers/fixtures'

describe('path helpers', () => {
  it('isIgnored matches the repository directory at any depth', () => {
    expect(isIgnored('.grove/HEAD')).toBe(true)
    expect(isIgnored('sub/.grove/config')).toBe(true)
    expect(isIgnored('src/.grovey')).toBe(false)
  })

  it('toRepoPath resolves against cwd', () => {
    const root = path.resolve('/work/project')
    expect(toRepoPath(root, path.join(root, 'src'), 'a.ts')).toBe('src/a.ts')
    expect(toRepoPath(root, root, '.')).toBe('')
  })

  it('toRepoPath rejects paths outside the root or inside .grove', () => {
    const root = path.resolve('/work/project')
    expect(() => toRepoPath(root, root, '../other')).toThrow(InvalidPathError)
    expect(() => toRepoPath(root, root, '.grove/HEAD')).toThrow('inside .grove')
  })
})

describe('working directory', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTempDir('grove-worktree-')
    await writeFiles(root, {
      'b.txt': 'b\n',
      'a/x.txt': 'x\n',
      'a/deep/y.txt': 'y\n',
      '.grove/HEAD': 'ref: refs/heads/master\n',
    })
  })

  afterEach(async () => {
    await removeDir(root)
  })

  it('lists files sorted, skipping .grove', async () => {
    expect(await listFiles(root)).toEqual(['a/deep/y.txt', 'a/x.txt', 'b.txt'])
    expect(await listFiles(root, 'a')).toEqual(['a/deep/y.txt', 'a/x.txt'])
  })

  it('reads missing files and directories as undefined', async () => {
    expect(await readWorkingFile(root, 'nope.txt')).toBeUndefined()
    expect(await readWorkingFile(root, 'a')).toBeUndefined()
  })

  it('hashDirectory computes oids without storing', async () => {
    const hashes = await hashDirectory(root)
    expect(hashes.get('b.txt')).toBe(hashObject('blob', new TextEncoder().encode('b\n')))
    expect(hashes.size).toBe(3)
  })

  it('flattenDirectory stores blobs', async () => {
    const objects = new MemoryObjectStore()
    const snapshot = await flattenDirectory(objects, root)
    expect(snapshot).toEqual(await hashDirectory(root))
    expect(objects.size).toBe(3)
  })

  it('materialize replaces the contents but keeps .grove', async () => {
    const objects = new MemoryObjectStore()
    const oid = await writeBlob(objects, 'fresh\n')

    await materialize(objects, root, new Map([['new/file.txt', oid]]))

    expect(await listFiles(root)).toEqual(['new/file.txt'])
    expect(await readText(root, 'new/file.txt')).toBe('fresh\n')
    expect(await exists(path.join(root, '.grove', 'HEAD'))).toBe(true)
    expect(await exists(path.join(root, 'a'))).toBe(false)
  })

  it('materialize keeps nested .grove directories', async () => {
    await writeFiles(root, { 'a/.grove/config': 'nested\n' })
    const objects = new MemoryObjectStore()
    const oid = await writeBlob(objects, 'fresh\n')

    await materialize(objects, root, new Map([['new/file.txt', oid]]))

    expect(await readText(root, 'a/.grove/config')).toBe('nested\n')
    expect(await exists(path.join(root, 'a', 'x.txt'))).toBe(false)
    expect(await exists(path.join(root, 'a', 'deep'))).toBe(false)
    expect(await listFiles(root)).toEqual(['new/file.txt'])
  })

  it('materialize refuses to write into .grove', async () => {
    const objects = new MemoryObjectStore()
    const oid = await writeBlob(objects, 'evil\n')
    await expect(materialize(objects, root, new Map([['.grove/HEAD', oid]]))).rejects.toBeInstanceOf(InvalidPathError)
    expect(await fs.readFile(path.join(root, '.grove', 'HEAD'), 'utf8')).toBe('ref: refs/heads/master\n')
  })
})
