/**
 * @fileoverview Repository Sync
 *
 * Object and ref transfer between two repositories:
 *
 * - **fetch**: copy every object reachable from the remote's branches that
 *   is missing locally, then record each remote branch under
 *   `refs/remote/<branch>`
 * - **push**: refuse unless the remote branch is an ancestor of the local
 *   one, copy the objects the remote lacks, then move the remote branch
 *
 * Objects travel as raw framed bytes; the receiving store verifies that
 * they hash to their oid. The remote ref update at the end of a push is not
 * a compare-and-swap: concurrent pushers race and the last writer wins.
 *
 * @module ops/sync
 *
 * @example
 * ```typescript
 * const remote = await FileRemoteTransport.open('../upstream')
 * const { copied } = await fetch(local, remote)
 * await push(local, remote, 'refs/heads/master')
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { REPO_DIR_NAME } from '../constants'
import { NoSuchLocalRefError, NonFastForwardError, UnknownRemoteError } from '../errors'
import { REF_PREFIXES, RefStore } from '../refs/storage'
import { FileObjectStore } from '../storage/fs-object-store'
import { FileRefBackend } from '../storage/fs-ref-backend'
import { isErrnoCode } from '../storage/fs-errors'
import type { ObjectReader, ObjectStore } from '../types/storage'
import type { Logger } from '../utils/logger'
import { collectObjects, createCommitProvider, isAncestor, iterObjectsInCommits } from './commit-traversal'

// ============================================================================
// Types
// ============================================================================

/**
 * Access to another repository's objects and refs.
 */
export interface RemoteTransport {
  /** Display name (path or configured remote name) */
  readonly name: string
  /** Reader for graph walks over the remote's objects */
  readonly objects: ObjectReader
  hasObject(oid: string): Promise<boolean>
  /** Raw framed object bytes */
  readObject(oid: string): Promise<Uint8Array>
  writeObject(oid: string, raw: Uint8Array): Promise<void>
  /** Dereferenced ref values under `prefix` */
  listRefs(prefix: string): Promise<Map<string, string>>
  getRef(name: string): Promise<string | undefined>
  updateRef(name: string, oid: string): Promise<void>
}

/**
 * The local side of a sync.
 */
export interface SyncTarget {
  objects: ObjectStore
  refs: RefStore
}

export interface SyncOptions {
  logger?: Logger
}

export interface FetchResult {
  /** Objects copied into the local store, in walk order */
  copied: string[]
  /** Remote-tracking refs written locally → oid */
  refs: Map<string, string>
}

export interface PushResult {
  refName: string
  oid: string
  /** Remote value before the push, if the ref existed */
  previousOid?: string
  /** Objects copied to the remote */
  copied: string[]
}

// ============================================================================
// File Transport
// ============================================================================

/**
 * Transport over a repository on the local filesystem.
 */
export class FileRemoteTransport implements RemoteTransport {
  readonly objects: FileObjectStore
  private readonly refs: RefStore

  constructor(
    readonly name: string,
    readonly gitDir: string
  ) {
    this.objects = new FileObjectStore(path.join(gitDir, 'objects'))
    this.refs = new RefStore(new FileRefBackend(gitDir))
  }

  /**
   * @param workDir - working directory of the remote repository
   * @throws UnknownRemoteError when `workDir` holds no repository
   */
  static async open(workDir: string, name: string = workDir): Promise<FileRemoteTransport> {
    const gitDir = path.join(workDir, REPO_DIR_NAME)
    try {
      const stat = await fs.stat(gitDir)
      if (stat.isDirectory()) {
        return new FileRemoteTransport(name, gitDir)
      }
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT') && !isErrnoCode(error, 'ENOTDIR')) throw error
    }
    throw new UnknownRemoteError(name)
  }

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

// ============================================================================
// Fetch
// ============================================================================

/**
 * Copies the remote's branches and their history into the local store.
 * Running it again without remote changes copies nothing.
 */
export async function fetch(local: SyncTarget, remote: RemoteTransport, options: SyncOptions = {}): Promise<FetchResult> {
  const logger = options.logger?.child({ remote: remote.name })
  logger?.info('Fetch started')

  try {
    const branches = await remote.listRefs(REF_PREFIXES.HEADS)

    const copied: string[] = []
    for await (const oid of iterObjectsInCommits(remote.objects, branches.values())) {
      if (await local.objects.exists(oid)) continue
      await local.objects.writeRaw(oid, await remote.readObject(oid))
      copied.push(oid)
      logger?.debug('Copied object', { oid })
    }

    const refs = new Map<string, string>()
    for (const [name, oid] of branches) {
      const trackingName = REF_PREFIXES.REMOTE + name.slice(REF_PREFIXES.HEADS.length)
      await local.refs.update(trackingName, { symbolic: false, value: oid }, { deref: false })
      refs.set(trackingName, oid)
    }

    logger?.info('Fetch completed', { copied: copied.length, refs: refs.size })
    return { copied, refs }
  } catch (error) {
    logger?.error('Fetch failed', error instanceof Error ? error : undefined)
    throw error
  }
}

// ============================================================================
// Push
// ============================================================================

/**
 * `master` → `refs/heads/master`; names under `refs/` are kept.
 */
export function qualifyBranchName(name: string): string {
  return name.startsWith('refs/') ? name : REF_PREFIXES.HEADS + name
}

/**
 * Sends the local value of `refName` and the objects the remote lacks.
 *
 * @throws NoSuchLocalRefError when the ref is unset locally
 * @throws NonFastForwardError when the remote value is not an ancestor of
 * the local one
 */
export async function push(
  local: SyncTarget,
  remote: RemoteTransport,
  refName: string,
  options: SyncOptions = {}
): Promise<PushResult> {
  const name = qualifyBranchName(refName)
  const logger = options.logger?.child({ remote: remote.name, ref: name })
  logger?.info('Push started')

  try {
    const localOid = await local.refs.getOid(name)
    if (localOid === undefined) {
      throw new NoSuchLocalRefError(name)
    }

    const provider = createCommitProvider(local.objects)
    const remoteOid = await remote.getRef(name)
    if (remoteOid !== undefined && !(await isAncestor(provider, remoteOid, localOid))) {
      throw new NonFastForwardError(name, localOid, remoteOid)
    }

    // Remote tags may name trees or blobs; only commits seed the closure
    const knownRemote: string[] = []
    for (const oid of (await remote.listRefs('refs/')).values()) {
      if ((await local.objects.exists(oid)) && (await local.objects.get(oid)).type === 'commit') {
        knownRemote.push(oid)
      }
    }
    const alreadyThere = await collectObjects(local.objects, knownRemote)

    const copied: string[] = []
    for await (const oid of iterObjectsInCommits(local.objects, [localOid], provider)) {
      if (alreadyThere.has(oid)) continue
      await remote.writeObject(oid, await local.objects.readRaw(oid))
      copied.push(oid)
    }

    await remote.updateRef(name, localOid)

    logger?.info('Push completed', { oid: localOid, copied: copied.length })
    return { refName: name, oid: localOid, copied, ...(remoteOid !== undefined && { previousOid: remoteOid }) }
  } catch (error) {
    logger?.error('Push failed', error instanceof Error ? error : undefined)
    throw error
  }
}
