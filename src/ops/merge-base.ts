/**
 * @fileoverview Merge Base Finding
 *
 * Finds a common ancestor of two commits to serve as the base of a
 * three-way merge.
 *
 * ## Algorithm
 *
 * Two breadth-first walks, one from each commit, advance in lockstep: each
 * round pops one commit from side A, then one from side B. The first commit
 * popped on one side that the other side has already visited is returned.
 * It is always an ancestor of both commits (or one of the commits itself);
 * on criss-cross histories it is not guaranteed to be the lowest one.
 *
 * ```typescript
 * if (await isFastForward(provider, headOid, otherOid)) {
 *   // move head to other
 * }
 * const base = await findMergeBase(provider, headOid, otherOid)
 * ```
 *
 * @module ops/merge-base
 */

import { NoCommonAncestorError } from '../errors'
import { type CommitProvider, isAncestor } from './commit-traversal'

export type { CommitProvider }

interface Walk {
  queue: string[]
  visited: Set<string>
}

function startWalk(oid: string): Walk {
  return { queue: [oid], visited: new Set() }
}

/**
 * Advances `walk` by one commit.
 *
 * @returns the popped commit when `other` has already visited it
 */
async function step(provider: CommitProvider, walk: Walk, other: Walk): Promise<string | undefined> {
  let oid = walk.queue.shift()
  while (oid !== undefined && walk.visited.has(oid)) {
    oid = walk.queue.shift()
  }
  if (oid === undefined) {
    return undefined
  }

  walk.visited.add(oid)
  if (other.visited.has(oid)) {
    return oid
  }

  const { parents } = await provider.getCommit(oid)
  for (const parent of parents) {
    if (!walk.visited.has(parent)) {
      walk.queue.push(parent)
    }
  }
  return undefined
}

/**
 * @throws NoCommonAncestorError when the histories are disjoint
 */
export async function findMergeBase(provider: CommitProvider, a: string, b: string): Promise<string> {
  if (a === b) {
    return a
  }

  const walkA = startWalk(a)
  const walkB = startWalk(b)

  while (walkA.queue.length > 0 || walkB.queue.length > 0) {
    const fromA = await step(provider, walkA, walkB)
    if (fromA !== undefined) return fromA
    const fromB = await step(provider, walkB, walkA)
    if (fromB !== undefined) return fromB
  }

  throw new NoCommonAncestorError(a, b)
}

/**
 * Whether merging `other` into `head` is a fast-forward: head is already in
 * other's history.
 */
export function isFastForward(provider: CommitProvider, head: string, other: string): Promise<boolean> {
  return isAncestor(provider, head, other)
}
