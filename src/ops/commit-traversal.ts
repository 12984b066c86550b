/**
 * @fileoverview Commit Graph Traversal
 *
 * Walks parent links for log, ancestry checks and sync.
 *
 * ## Walk order
 *
 * A deque is seeded with the start oids in the order given. Each popped
 * commit is yielded once; its first parent goes to the **front** of the deque
 * (so a first-parent chain is followed to its root before anything else) and
 * any further parents go to the **back**. The order depends only on the
 * graph and the start list, which keeps `log` and merge-base tie-breaking
 * reproducible.
 *
 * ```typescript
 * for await (const oid of iterCommitsAndParents(provider, [headOid])) {
 *   console.log(oid)
 * }
 * ```
 *
 * @module ops/commit-traversal
 */

import { readCommit, readTree } from '../core/objects/io'
import type { CommitData } from '../core/objects/types'
import type { ObjectReader } from '../types/storage'

// ============================================================================
// Types
// ============================================================================

/**
 * Source of parsed commits. Throws `ObjectNotFoundError` for unknown oids.
 */
export interface CommitProvider {
  getCommit(oid: string): Promise<CommitData>
}

/**
 * A provider reading commits from an object store, caching parsed commits
 * for the lifetime of the provider.
 */
export function createCommitProvider(objects: ObjectReader): CommitProvider {
  const cache = new Map<string, CommitData>()
  return {
    async getCommit(oid: string): Promise<CommitData> {
      const cached = cache.get(oid)
      if (cached) return cached
      const commit = await readCommit(objects, oid)
      cache.set(oid, commit)
      return commit
    },
  }
}

// ============================================================================
// Walking
// ============================================================================

/**
 * Yields every commit reachable from `startOids` (inclusive) exactly once.
 * Undefined or empty start entries are skipped.
 */
export async function* iterCommitsAndParents(
  provider: CommitProvider,
  startOids: Iterable<string | undefined>
): AsyncGenerator<string> {
  const queue: string[] = []
  for (const oid of startOids) {
    if (oid) queue.push(oid)
  }
  const visited = new Set<string>()

  let oid = queue.shift()
  while (oid !== undefined) {
    if (!visited.has(oid)) {
      visited.add(oid)
      yield oid

      const { parents } = await provider.getCommit(oid)
      const [first, ...rest] = parents
      if (first !== undefined) {
        queue.unshift(first)
      }
      queue.push(...rest)
    }
    oid = queue.shift()
  }
}

/**
 * True when `candidate` is `of` or one of its ancestors.
 */
export async function isAncestor(provider: CommitProvider, candidate: string, of: string): Promise<boolean> {
  for await (const oid of iterCommitsAndParents(provider, [of])) {
    if (oid === candidate) {
      return true
    }
  }
  return false
}

/**
 * Yields every object reachable from the given commits: each commit oid,
 * followed by its root tree and the subtrees and blobs below it. Each
 * object is yielded once, even when shared between commits.
 */
export async function* iterObjectsInCommits(
  objects: ObjectReader,
  commitOids: Iterable<string | undefined>,
  provider: CommitProvider = createCommitProvider(objects)
): AsyncGenerator<string> {
  const visited = new Set<string>()

  async function* iterObjectsInTree(treeOid: string): AsyncGenerator<string> {
    visited.add(treeOid)
    yield treeOid
    const tree = await readTree(objects, treeOid)
    for (const entry of tree.entries) {
      if (visited.has(entry.oid)) continue
      if (entry.type === 'tree') {
        yield* iterObjectsInTree(entry.oid)
      } else {
        visited.add(entry.oid)
        yield entry.oid
      }
    }
  }

  for await (const commitOid of iterCommitsAndParents(provider, commitOids)) {
    yield commitOid
    const { tree } = await provider.getCommit(commitOid)
    if (!visited.has(tree)) {
      yield* iterObjectsInTree(tree)
    }
  }
}

/**
 * Set form of {@link iterObjectsInCommits}.
 */
export async function collectObjects(
  objects: ObjectReader,
  commitOids: Iterable<string | undefined>
): Promise<Set<string>> {
  const reachable = new Set<string>()
  for await (const oid of iterObjectsInCommits(objects, commitOids)) {
    reachable.add(oid)
  }
  return reachable
}
