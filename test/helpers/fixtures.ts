import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { writeBlob, writeCommit } from '../../src/core/objects/io'
import { buildTreeFromIndex } from '../../src/ops/tree-builder'
import type { ObjectStore } from '../../src/types/storage'

// ============================================================================
// Object Fixtures
// ============================================================================

/**
 * Stores `files` as a snapshot and commits it with the given parents.
 */
export async function commitFiles(
  objects: ObjectStore,
  files: Record<string, string>,
  parents: string[] = [],
  message = 'Test commit'
): Promise<string> {
  const index = new Map<string, string>()
  for (const [file, content] of Object.entries(files)) {
    index.set(file, await writeBlob(objects, content))
  }
  const tree = await buildTreeFromIndex(objects, index)
  return writeCommit(objects, { tree, parents, message })
}

/**
 * Builds a graph of commits from a `name → parent names` listing. Parents
 * must be listed before their children.
 *
 * @example
 * const oids = await buildGraph(objects, { A: [], B: ['A'], C: ['A'], M: ['B', 'C'] })
 */
export async function buildGraph(
  objects: ObjectStore,
  graph: Record<string, string[]>
): Promise<Record<string, string>> {
  const oids: Record<string, string> = {}
  for (const [name, parentNames] of Object.entries(graph)) {
    const parents = parentNames.map((parent) => {
      const oid = oids[parent]
      if (oid === undefined) throw new Error(`parent ${parent} of ${name} not built yet`)
      return oid
    })
    oids[name] = await commitFiles(objects, { 'name.txt': `${name}\n` }, parents, name)
  }
  return oids
}

/**
 * Looks up a named commit from {@link buildGraph}.
 */
export function oidOf(oids: Record<string, string>, name: string): string {
  const oid = oids[name]
  if (oid === undefined) throw new Error(`unknown commit ${name}`)
  return oid
}

// ============================================================================
// Filesystem Fixtures
// ============================================================================

export async function makeTempDir(prefix = 'grove-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const target = path.join(root, ...file.split('/'))
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, content)
  }
}

export async function readText(root: string, file: string): Promise<string> {
  return fs.readFile(path.join(root, ...file.split('/')), 'utf8')
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target)
    return true
  } catch {
    return false
  }
}
