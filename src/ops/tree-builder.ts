/**
 * @fileoverview Tree Builder - builds tree objects from a flat index
 *
 * Turns `path → blob oid` entries into nested tree objects, writing each
 * subtree before its parent and returning the root tree oid.
 *
 * ```typescript
 * const index = new Map([
 *   ['README.md', readmeOid],
 *   ['src/main.ts', mainOid],
 * ])
 * const rootOid = await buildTreeFromIndex(objects, index)
 * ```
 *
 * @module ops/tree-builder
 */

import { InvalidPathError } from '../errors'
import { checkEntryName } from '../core/objects/tree'
import { writeTreeObject } from '../core/objects/io'
import type { FlatTree, TreeEntry } from '../core/objects/types'
import type { ObjectStore } from '../types/storage'

/**
 * Intermediate directory node used while building.
 *
 * @internal
 */
export interface TreeNode {
  /** Full path from repository root ('' for the root) */
  path: string
  /** Subdirectories by name */
  directories: Map<string, TreeNode>
  /** Blob oids by name */
  files: Map<string, string>
}

function createNode(path: string): TreeNode {
  return { path, directories: new Map(), files: new Map() }
}

/**
 * @throws InvalidPathError for malformed paths and for a path used both as
 * a file and as a directory
 */
export function validatePath(path: string): string[] {
  const parts = path.split('/')
  for (const part of parts) {
    const problem = checkEntryName(part)
    if (problem !== null) {
      throw new InvalidPathError(path, problem)
    }
  }
  return parts
}

/**
 * Build a directory hierarchy from index entries
 */
export function buildTreeHierarchy(index: FlatTree): TreeNode {
  const root = createNode('')

  for (const [path, oid] of index) {
    const parts = validatePath(path)
    const fileName = parts.pop() ?? path
    let current = root

    for (const part of parts) {
      if (current.files.has(part)) {
        throw new InvalidPathError(path, `${current.path}${part} is a file`)
      }
      let next = current.directories.get(part)
      if (!next) {
        next = createNode(`${current.path}${part}/`)
        current.directories.set(part, next)
      }
      current = next
    }

    if (current.directories.has(fileName)) {
      throw new InvalidPathError(path, 'is a directory')
    }
    current.files.set(fileName, oid)
  }

  return root
}

async function writeNode(objects: ObjectStore, node: TreeNode): Promise<string> {
  const entries: TreeEntry[] = []
  for (const [name, child] of node.directories) {
    entries.push({ type: 'tree', oid: await writeNode(objects, child), name })
  }
  for (const [name, oid] of node.files) {
    entries.push({ type: 'blob', oid, name })
  }
  return writeTreeObject(objects, entries)
}

/**
 * Writes the trees for `index` and returns the root tree oid. An empty
 * index yields the empty tree.
 */
export async function buildTreeFromIndex(objects: ObjectStore, index: FlatTree): Promise<string> {
  return writeNode(objects, buildTreeHierarchy(index))
}
