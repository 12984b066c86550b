import { describe, it, expect } from 'vitest'
import { NoCommonAncestorError } from '../../src/errors'
import { createCommitProvider } from '../../src/ops/commit-traversal'
import { findMergeBase, isFastForward } from '../../src/ops/merge-base'
import { MemoryObjectStore } from '../../src/storage/memory'
import { buildGraph, oidOf } from '../helpers/fixtures'

async function setup(graph: Record<string, string[]>) {
  const objects = new MemoryObjectStore()
  const oids = await buildGraph(objects, graph)
  const provider = createCommitProvider(objects)
  return {
    base: (a: string, b: string) => findMergeBase(provider, oidOf(oids, a), oidOf(oids, b)),
    oid: (name: string) => oidOf(oids, name),
    fastForward: (head: string, other: string) => isFastForward(provider, oidOf(oids, head), oidOf(oids, other)),
  }
}

describe('findMergeBase', () => {
  it('returns the commit itself for identical inputs', async () => {
    const { base, oid } = await setup({ A: [] })
    expect(await base('A', 'A')).toBe(oid('A'))
  })

  it('returns the ancestor on a linear history', async () => {
    // A <- B <- C
    const { base, oid } = await setup({ A: [], B: ['A'], C: ['B'] })
    expect(await base('C', 'A')).toBe(oid('A'))
    expect(await base('A', 'C')).toBe(oid('A'))
    expect(await base('B', 'C')).toBe(oid('B'))
  })

  it('finds the fork point of diverged branches', async () => {
    //   A <- B <- D
    //    \
    //     C <- E
    const { base, oid } = await setup({ A: [], B: ['A'], C: ['A'], D: ['B'], E: ['C'] })
    expect(await base('D', 'E')).toBe(oid('A'))
    expect(await base('E', 'D')).toBe(oid('A'))
  })

  it('walks through merge commits', async () => {
    //   A <- B <- M
    //    \       /
    //     C <---' <- D
    const { base, oid } = await setup({ A: [], B: ['A'], C: ['A'], M: ['B', 'C'], D: ['C'] })
    expect(await base('M', 'D')).toBe(oid('C'))
  })

  it('throws for unrelated histories', async () => {
    const { base } = await setup({ X: [], Y: [] })
    await expect(base('X', 'Y')).rejects.toBeInstanceOf(NoCommonAncestorError)
  })
})

describe('isFastForward', () => {
  it('holds when HEAD is in the history of the other commit', async () => {
    const { fastForward } = await setup({ A: [], B: ['A'], C: ['A'] })
    expect(await fastForward('A', 'B')).toBe(true)
    expect(await fastForward('B', 'B')).toBe(true)
    expect(await fastForward('B', 'A')).toBe(false)
    expect(await fastForward('B', 'C')).toBe(false)
  })

  it('follows second parents behind a chain of commits', async () => {
    //   P <- B <- M2 <- M1 <- A
    //    \                   /
    //     Y <---------------'
    const { fastForward } = await setup({ P: [], B: ['P'], Y: ['P'], M2: ['B'], M1: ['M2'], A: ['M1', 'Y'] })
    expect(await fastForward('B', 'A')).toBe(true)
    expect(await fastForward('Y', 'A')).toBe(true)
    expect(await fastForward('A', 'B')).toBe(false)
  })
})
