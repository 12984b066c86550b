/**
 * @fileoverview Working directory access
 *
 * Reads the working directory into flat snapshots and writes snapshots
 * back out. Paths are repository-relative and `/`-separated; anything below
 * a `.grove` directory is never read or touched.
 *
 * @module core/worktree
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { REPO_DIR_NAME } from '../constants'
import { InvalidPathError } from '../errors'
import { isErrnoCode } from '../storage/fs-errors'
import type { ObjectStore } from '../types/storage'
import { hashObject } from '../utils/hash'
import { readBlob, writeBlob } from './objects/io'
import type { FlatTree } from './objects/types'

export function isIgnored(relativePath: string): boolean {
  return relativePath.split('/').includes(REPO_DIR_NAME)
}

/**
 * Repository-relative form of a user supplied path (relative to `cwd`).
 *
 * @throws InvalidPathError when the path lies outside `root` or inside the
 * repository directory
 */
export function toRepoPath(root: string, cwd: string, userPath: string): string {
  const relative = path.relative(root, path.resolve(cwd, userPath))
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new InvalidPathError(userPath, 'outside the working directory')
  }
  const repoPath = relative.split(path.sep).join('/')
  if (isIgnored(repoPath)) {
    throw new InvalidPathError(userPath, `inside ${REPO_DIR_NAME}`)
  }
  return repoPath
}

function toFsPath(root: string, repoPath: string): string {
  return path.join(root, ...repoPath.split('/'))
}

/**
 * Regular files below `root/relative`, sorted.
 */
export async function listFiles(root: string, relative = ''): Promise<string[]> {
  const files: string[] = []

  async function walk(repoDir: string): Promise<void> {
    const entries = await fs.readdir(repoDir ? toFsPath(root, repoDir) : root, { withFileTypes: true })
    for (const entry of entries) {
      if (entry.name === REPO_DIR_NAME) continue
      const entryPath = repoDir ? `${repoDir}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        await walk(entryPath)
      } else if (entry.isFile()) {
        files.push(entryPath)
      }
    }
  }

  await walk(relative)
  return files.sort()
}

export async function readWorkingFile(root: string, repoPath: string): Promise<Uint8Array | undefined> {
  try {
    return new Uint8Array(await fs.readFile(toFsPath(root, repoPath)))
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EISDIR')) return undefined
    throw error
  }
}

/**
 * Hashes every working file into `objects` and returns the snapshot.
 */
export async function flattenDirectory(objects: ObjectStore, root: string): Promise<FlatTree> {
  const snapshot: FlatTree = new Map()
  for (const file of await listFiles(root)) {
    const content = await readWorkingFile(root, file)
    if (content !== undefined) {
      snapshot.set(file, await writeBlob(objects, content))
    }
  }
  return snapshot
}

/**
 * Blob oids of every working file, computed without storing anything.
 */
export async function hashDirectory(root: string): Promise<FlatTree> {
  const snapshot: FlatTree = new Map()
  for (const file of await listFiles(root)) {
    const content = await readWorkingFile(root, file)
    if (content !== undefined) {
      snapshot.set(file, hashObject('blob', content))
    }
  }
  return snapshot
}

/**
 * Removes every file under `root` except those inside a repository directory
 * at any depth. Directories are removed once nothing is left in them.
 */
export async function emptyDirectory(root: string): Promise<void> {
  for (const entry of await fs.readdir(root, { withFileTypes: true })) {
    if (entry.name === REPO_DIR_NAME) continue
    const target = path.join(root, entry.name)
    if (entry.isDirectory()) {
      await emptyDirectory(target)
      if ((await fs.readdir(target)).length === 0) {
        await fs.rmdir(target)
      }
    } else {
      await fs.rm(target, { force: true })
    }
  }
}

/**
 * Replaces the working directory contents with `snapshot`.
 */
export async function materialize(objects: ObjectStore, root: string, snapshot: FlatTree): Promise<void> {
  await emptyDirectory(root)
  for (const [repoPath, oid] of snapshot) {
    if (isIgnored(repoPath)) {
      throw new InvalidPathError(repoPath, `inside ${REPO_DIR_NAME}`)
    }
    const target = toFsPath(root, repoPath)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, await readBlob(objects, oid))
  }
}
