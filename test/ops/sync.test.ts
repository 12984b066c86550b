import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { NoSuchLocalRefError, NonFastForwardError, UnknownRemoteError } from '../../src/errors'
import { Repository } from '../../src/core/repository'
import { readCommit } from '../../src/core/objects/io'
import { FileRemoteTransport, fetch, push, qualifyBranchName, type RemoteTransport } from '../../src/ops/sync'
import { RefStore } from '../../src/refs/storage'
import { MemoryObjectStore, MemoryRefBackend } from '../../src/storage/memory'
import type { ObjectStore } from '../../src/types/storage'
import { hashObject } from '../../src/utils/hash'
import { LogLevel, createLogger, type LogEntry } from '../../src/utils/logger'
import { commitFiles, makeTempDir, readText, removeDir, writeFiles } from '../helpers/fixtures'

// ============================================================================
// In-process remote
// ============================================================================

class MemoryTransport implements RemoteTransport {
  readonly objects = new MemoryObjectStore()
  readonly refs = new RefStore(new MemoryRefBackend())

  constructor(readonly name = 'memory') {}

  hasObject(oid: string): Promise<boolean> {
    return this.objects.exists(oid)
  }

  readObject(oid: string): Promise<Uint8Array> {
    return this.objects.readRaw(oid)
  }

  writeObject(oid: string, raw: Uint8Array): Promise<void> {
    return this.objects.writeRaw(oid, raw)
  }

  listRefs(prefix: string): Promise<Map<string, string>> {
    return this.refs.listOids(prefix)
  }

  getRef(name: string): Promise<string | undefined> {
    return this.refs.getOid(name)
  }

  async updateRef(name: string, oid: string): Promise<void> {
    await this.refs.update(name, { symbolic: false, value: oid })
  }
}

async function copyAll(from: MemoryObjectStore, to: ObjectStore): Promise<void> {
  for (const oid of from.oids()) {
    await to.writeRaw(oid, await from.readRaw(oid))
  }
}

const encoder = new TextEncoder()

describe('fetch', () => {
  let local: { objects: MemoryObjectStore; refs: RefStore }
  let remote: MemoryTransport

  beforeEach(() => {
    local = { objects: new MemoryObjectStore(), refs: new RefStore(new MemoryRefBackend()) }
    remote = new MemoryTransport()
  })

  it('copies reachable objects and records remote branches', async () => {
    const c1 = await commitFiles(remote.objects, { 'a.txt': 'a\n' })
    const c2 = await commitFiles(remote.objects, { 'a.txt': 'a\n', 'b.txt': 'b\n' }, [c1])
    const side = await commitFiles(remote.objects, { 'side.txt': 's\n' }, [c1])
    await remote.updateRef('refs/heads/master', c2)
    await remote.updateRef('refs/heads/side', side)
    await remote.updateRef('refs/tags/v1', c1)

    const result = await fetch(local, remote)

    expect(new Set(result.copied)).toEqual(new Set(remote.objects.oids()))
    expect(result.copied[0]).toBe(c2)
    expect(result.refs).toEqual(new Map([
      ['refs/remote/master', c2],
      ['refs/remote/side', side],
    ]))
    expect(await local.refs.getOid('refs/remote/master')).toBe(c2)
    expect(await local.refs.getOid('refs/tags/v1')).toBeUndefined()
  })

  it('copies nothing the second time', async () => {
    const c1 = await commitFiles(remote.objects, { 'a.txt': 'a\n' })
    await remote.updateRef('refs/heads/master', c1)

    await fetch(local, remote)
    const again = await fetch(local, remote)

    expect(again.copied).toEqual([])
    expect(again.refs.get('refs/remote/master')).toBe(c1)
  })

  it('skips objects already present locally', async () => {
    const c1 = await commitFiles(remote.objects, { 'a.txt': 'a\n' })
    await copyAll(remote.objects, local.objects)
    const c2 = await commitFiles(remote.objects, { 'a.txt': 'changed\n' }, [c1])
    await remote.updateRef('refs/heads/master', c2)

    const { copied } = await fetch(local, remote)

    const tree = (await readCommit(remote.objects, c2)).tree
    expect(copied).toEqual([c2, tree, hashObject('blob', encoder.encode('changed\n'))])
  })

  it('logs start and completion', async () => {
    const entries: LogEntry[] = []
    const logger = createLogger({ component: 'sync', handler: (entry) => entries.push(entry) })
    await remote.updateRef('refs/heads/master', await commitFiles(remote.objects, { 'a.txt': 'a\n' }))

    await fetch(local, remote, { logger })

    expect(entries.map((entry) => entry.message)).toEqual(['Fetch started', 'Fetch completed'])
    expect(entries[1]?.data).toEqual({ remote: 'memory', copied: 3, refs: 1 })
  })

  it('logs and rethrows failures', async () => {
    const entries: LogEntry[] = []
    const logger = createLogger({ minLevel: LogLevel.ERROR, handler: (entry) => entries.push(entry) })
    await remote.updateRef('refs/heads/master', '9'.repeat(40))

    await expect(fetch(local, remote, { logger })).rejects.toThrow('Object not found')
    expect(entries.map((entry) => entry.message)).toEqual(['Fetch failed'])
    expect(entries[0]?.error?.code).toBe('OBJECT_NOT_FOUND')
  })
})

describe('push', () => {
  let local: { objects: MemoryObjectStore; refs: RefStore }
  let remote: MemoryTransport

  beforeEach(() => {
    local = { objects: new MemoryObjectStore(), refs: new RefStore(new MemoryRefBackend()) }
    remote = new MemoryTransport()
  })

  it('sends everything to an empty remote', async () => {
    const c1 = await commitFiles(local.objects, { 'a.txt': 'a\n' })
    await local.refs.update('refs/heads/master', { symbolic: false, value: c1 })

    const result = await push(local, remote, 'master')

    expect(result.refName).toBe('refs/heads/master')
    expect(result.oid).toBe(c1)
    expect(result.previousOid).toBeUndefined()
    expect(new Set(result.copied)).toEqual(new Set(local.objects.oids()))
    expect(await remote.getRef('refs/heads/master')).toBe(c1)
  })

  it('sends only what the remote lacks', async () => {
    const c1 = await commitFiles(local.objects, { 'a.txt': 'a\n' })
    const c2 = await commitFiles(local.objects, { 'a.txt': 'a\n', 'b.txt': 'b\n' }, [c1])
    await local.refs.update('refs/heads/master', { symbolic: false, value: c2 })
    await push(local, remote, 'master')

    // remote only knows c1
    const stale = new MemoryTransport()
    const c1Closure = new MemoryObjectStore()
    await commitFiles(c1Closure, { 'a.txt': 'a\n' })
    await copyAll(c1Closure, stale.objects)
    await stale.updateRef('refs/heads/master', c1)

    const result = await push(local, stale, 'refs/heads/master')

    const tree = (await readCommit(local.objects, c2)).tree
    expect(result.previousOid).toBe(c1)
    expect(result.copied).toEqual([c2, tree, hashObject('blob', encoder.encode('b\n'))])
    expect(await stale.getRef('refs/heads/master')).toBe(c2)
  })

  it('ignores remote refs that name trees', async () => {
    const c1 = await commitFiles(local.objects, { 'a.txt': 'a\n' })
    await local.refs.update('refs/heads/master', { symbolic: false, value: c1 })
    await push(local, remote, 'master')
    await remote.updateRef('refs/tags/snapshot', (await readCommit(local.objects, c1)).tree)
    const c2 = await commitFiles(local.objects, { 'a.txt': 'a\n', 'b.txt': 'b\n' }, [c1])
    await local.refs.update('refs/heads/master', { symbolic: false, value: c2 })

    const result = await push(local, remote, 'master')

    const tree = (await readCommit(local.objects, c2)).tree
    expect(result.previousOid).toBe(c1)
    expect(result.copied).toEqual([c2, tree, hashObject('blob', encoder.encode('b\n'))])
    expect(await remote.getRef('refs/heads/master')).toBe(c2)
  })

  it('rejects a non-fast-forward update', async () => {
    const c1 = await commitFiles(local.objects, { 'a.txt': 'a\n' })
    await local.refs.update('refs/heads/master', { symbolic: false, value: c1 })
    const theirs = await commitFiles(remote.objects, { 'a.txt': 'theirs\n' })
    await remote.updateRef('refs/heads/master', theirs)

    await expect(push(local, remote, 'master')).rejects.toBeInstanceOf(NonFastForwardError)
    expect(await remote.getRef('refs/heads/master')).toBe(theirs)
  })

  it('requires the local branch to exist', async () => {
    await expect(push(local, remote, 'nope')).rejects.toBeInstanceOf(NoSuchLocalRefError)
  })
})

describe('qualifyBranchName', () => {
  it('prefixes short branch names', () => {
    expect(qualifyBranchName('master')).toBe('refs/heads/master')
    expect(qualifyBranchName('refs/tags/v1')).toBe('refs/tags/v1')
  })
})

describe('between repositories on disk', () => {
  let upstreamDir: string
  let cloneDir: string
  let upstream: Repository
  let clone: Repository

  beforeEach(async () => {
    upstreamDir = await makeTempDir('grove-upstream-')
    cloneDir = await makeTempDir('grove-clone-')
    upstream = await Repository.init(upstreamDir, { env: {} })
    clone = await Repository.init(cloneDir, { env: {} })
  })

  afterEach(async () => {
    await upstream.close()
    await clone.close()
    await removeDir(upstreamDir)
    await removeDir(cloneDir)
  })

  it('fetches, merges and pushes back', async () => {
    await writeFiles(upstreamDir, { 'a.txt': 'from upstream\n' })
    await upstream.add(['.'])
    const first = await upstream.commit('upstream work')

    const fetched = await clone.fetch(upstreamDir)
    expect(fetched.refs.get('refs/remote/master')).toBe(first)

    expect((await clone.merge('remote/master')).kind).toBe('fast-forward')
    expect(await readText(cloneDir, 'a.txt')).toBe('from upstream\n')

    await writeFiles(cloneDir, { 'a.txt': 'from clone\n' })
    await clone.add(['a.txt'])
    const second = await clone.commit('clone work')

    const pushed = await clone.push(upstreamDir, 'master')
    expect(pushed.previousOid).toBe(first)
    expect(await upstream.refs.getOid('refs/heads/master')).toBe(second)
    expect(await upstream.objects.exists(second)).toBe(true)
  })

  it('rejects a push over diverged history', async () => {
    await writeFiles(upstreamDir, { 'a.txt': 'one\n' })
    await upstream.add(['.'])
    await upstream.commit('upstream')

    await writeFiles(cloneDir, { 'a.txt': 'two\n' })
    await clone.add(['.'])
    await clone.commit('clone')

    await expect(clone.push(upstreamDir, 'master')).rejects.toBeInstanceOf(NonFastForwardError)
  })

  it('resolves configured remote names', async () => {
    await writeFiles(upstreamDir, { 'a.txt': 'one\n' })
    await upstream.add(['.'])
    const oid = await upstream.commit('upstream')

    const relative = path.relative(cloneDir, upstreamDir)
    await fs.appendFile(path.join(cloneDir, '.grove', 'config'), `[remote "origin"]\n\tpath = ${relative}\n`)
    const configured = await Repository.open(cloneDir, { env: {} })

    const result = await configured.fetch('origin')
    await configured.close()
    expect(result.refs.get('refs/remote/master')).toBe(oid)
  })

  it('rejects unknown remotes', async () => {
    await expect(clone.fetch('nowhere')).rejects.toBeInstanceOf(UnknownRemoteError)
    await expect(FileRemoteTransport.open(path.join(cloneDir, 'missing'))).rejects.toBeInstanceOf(UnknownRemoteError)
  })
})
