/**
 * @fileoverview Repository Handle
 *
 * A {@link Repository} bundles the object store, the ref store, the staging
 * index, the working directory and the configuration of one repository and
 * implements the user-facing operations on top of the engine modules.
 * There is no process-wide state: every operation goes through a handle.
 *
 * @module core/repository
 *
 * @example
 * ```typescript
 * import { Repository, withRepository } from './core/repository'
 *
 * await Repository.init('/work/project').then((repo) => repo.close())
 *
 * await withRepository('/work/project', async (repo) => {
 *   await repo.add(['.'])
 *   const oid = await repo.commit('Initial import')
 *   await repo.createBranch('feature', oid)
 * })
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { DEFAULT_BRANCH, REPO_DIR_NAME } from '../constants'
import { EmptyMessageError, InvalidPathError, NotARepositoryError, RepositoryExistsError } from '../errors'
import { createCommitProvider, isAncestor, iterCommitsAndParents, type CommitProvider } from '../ops/commit-traversal'
import { findMergeBase, isFastForward } from '../ops/merge-base'
import { mergeTrees } from '../ops/merge'
import {
  FileRemoteTransport,
  type FetchResult,
  type PushResult,
  type RemoteTransport,
  fetch as fetchRemote,
  push as pushRemote,
  qualifyBranchName,
} from '../ops/sync'
import { buildTreeFromIndex } from '../ops/tree-builder'
import { type ChangedFile, DiffStatus, changedFiles, diffTrees, flattenTree } from '../ops/tree-diff'
import { resolveRevision } from '../refs/revision'
import { HEAD, MERGE_HEAD, REF_PREFIXES, RefStore, isValidRefName, validateRefName } from '../refs/storage'
import { FileObjectStore } from '../storage/fs-object-store'
import { FileRefBackend } from '../storage/fs-ref-backend'
import { isErrnoCode } from '../storage/fs-errors'
import { type LogEntry, type Logger, createLogger } from '../utils/logger'
import { CONFIG_FILE, DEFAULT_CONFIG_TEXT, type GroveConfig, loadConfig } from './config'
import { StagingIndex } from './index-file'
import { type Commit, readCommit, writeCommit } from './objects'
import type { FlatTree, ObjectType } from './objects/types'
import { flattenDirectory, hashDirectory, listFiles, materialize, readWorkingFile, toRepoPath } from './worktree'

// ============================================================================
// Types
// ============================================================================

export interface RepositoryOptions {
  /** Environment consulted for config overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Receives log entries (default: console) */
  logHandler?: (entry: LogEntry) => void
}

export interface UpdateWorkingOptions {
  /** Also rewrite the working directory */
  updateWorking?: boolean
}

export interface LogItem {
  oid: string
  commit: Commit
  /** Refs (including HEAD) pointing at this commit */
  refs: string[]
}

export interface ShowResult {
  oid: string
  commit: Commit
  /** Unified diff against the first parent */
  diff: string
}

export interface DiffRequest {
  /** Compare from this commit instead of the index or HEAD */
  commit?: string
  /** Compare against the index instead of the working directory */
  cached?: boolean
}

export interface BranchInfo {
  name: string
  oid: string
  current: boolean
}

export interface StatusReport {
  /** Current branch name; undefined when HEAD is detached */
  branch?: string
  /** Commit HEAD resolves to; undefined before the first commit */
  head?: string
  /** Commit being merged, when a merge is in progress */
  mergeHead?: string
  /** HEAD tree → index */
  staged: ChangedFile[]
  /** index → working directory, tracked paths only */
  unstaged: ChangedFile[]
  untracked: string[]
}

export type MergeKind = 'up-to-date' | 'fast-forward' | 'merged' | 'conflict'

export interface MergeOutcome {
  kind: MergeKind
  /** Commit merged in */
  other: string
  base?: string
  /** Paths left with conflict markers */
  conflicts: string[]
}

// ============================================================================
// Repository
// ============================================================================

export class Repository {
  readonly objects: FileObjectStore
  readonly refs: RefStore
  readonly logger: Logger

  private readonly provider: CommitProvider
  private readonly logHandler: ((entry: LogEntry) => void) | undefined
  private stagingIndex: StagingIndex | undefined

  private constructor(
    readonly root: string,
    readonly gitDir: string,
    readonly config: GroveConfig,
    options: RepositoryOptions
  ) {
    this.objects = new FileObjectStore(path.join(gitDir, 'objects'))
    this.refs = new RefStore(new FileRefBackend(gitDir), { maxDepth: config.maxSymrefDepth })
    this.provider = createCommitProvider(this.objects)
    this.logHandler = options.logHandler
    this.logger = this.loggerFor('repository')
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * @throws NotARepositoryError when `root` has no repository directory
   */
  static async open(root: string, options: RepositoryOptions = {}): Promise<Repository> {
    const resolved = path.resolve(root)
    const gitDir = path.join(resolved, REPO_DIR_NAME)
    try {
      const stat = await fs.stat(gitDir)
      if (!stat.isDirectory()) {
        throw new NotARepositoryError(resolved)
      }
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'ENOTDIR')) {
        throw new NotARepositoryError(resolved)
      }
      throw error
    }
    const config = await loadConfig(gitDir, options.env ?? process.env)
    return new Repository(resolved, gitDir, config, options)
  }

  /**
   * Creates the repository layout with HEAD on the default branch.
   *
   * @throws RepositoryExistsError when a repository directory already exists
   */
  static async init(root: string, options: RepositoryOptions = {}): Promise<Repository> {
    const resolved = path.resolve(root)
    const gitDir = path.join(resolved, REPO_DIR_NAME)
    await fs.mkdir(resolved, { recursive: true })
    try {
      await fs.mkdir(gitDir)
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        throw new RepositoryExistsError(gitDir)
      }
      throw error
    }

    await fs.mkdir(path.join(gitDir, 'objects'))
    await fs.mkdir(path.join(gitDir, 'refs', 'heads'), { recursive: true })
    await fs.mkdir(path.join(gitDir, 'refs', 'tags'))
    await fs.writeFile(path.join(gitDir, CONFIG_FILE), DEFAULT_CONFIG_TEXT)

    const repo = await Repository.open(resolved, options)
    await repo.refs.update(HEAD, { symbolic: true, value: REF_PREFIXES.HEADS + DEFAULT_BRANCH }, { deref: false })
    repo.logger.info('Initialized repository', { gitDir })
    return repo
  }

  /**
   * Writes the index back if it was modified.
   */
  async close(): Promise<void> {
    await this.stagingIndex?.save()
  }

  loggerFor(component: string): Logger {
    return createLogger({
      component,
      minLevel: this.config.logLevel,
      context: { repo: this.root },
      ...(this.logHandler && { handler: this.logHandler }),
    })
  }

  async index(): Promise<StagingIndex> {
    this.stagingIndex ??= await StagingIndex.load(this.gitDir)
    return this.stagingIndex
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Objects and revisions
  // ─────────────────────────────────────────────────────────────────────────

  resolve(revision: string): Promise<string> {
    return resolveRevision(this.refs, this.objects, revision, { minPrefixLength: this.config.minPrefixLength })
  }

  hashObject(data: Uint8Array, type: ObjectType = 'blob'): Promise<string> {
    return this.objects.put(type, data)
  }

  async catFile(revision: string, expectedType?: ObjectType): Promise<Uint8Array> {
    const oid = await this.resolve(revision)
    return (await this.objects.get(oid, expectedType)).payload
  }

  getCommit(oid: string): Promise<Commit> {
    return readCommit(this.objects, oid)
  }

  /**
   * Tree oid of a revision naming a commit or a tree.
   */
  async resolveTree(revision: string): Promise<string> {
    const oid = await this.resolve(revision)
    const { type } = await this.objects.get(oid)
    if (type === 'commit') {
      return (await this.getCommit(oid)).tree
    }
    await this.objects.get(oid, 'tree')
    return oid
  }

  private async headTree(): Promise<FlatTree> {
    const head = await this.refs.getOid(HEAD)
    return head === undefined ? new Map() : flattenTree(this.objects, (await this.getCommit(head)).tree)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Index and trees
  // ─────────────────────────────────────────────────────────────────────────

  async writeTree(): Promise<string> {
    const index = await this.index()
    return buildTreeFromIndex(this.objects, index.snapshot())
  }

  async readTree(treeOid: string, options: UpdateWorkingOptions = {}): Promise<FlatTree> {
    const snapshot = await flattenTree(this.objects, treeOid)
    const index = await this.index()
    index.replace(snapshot)
    if (options.updateWorking) {
      await materialize(this.objects, this.root, snapshot)
    }
    return snapshot
  }

  /**
   * Replaces the index with the three-way merge of the given trees.
   *
   * @returns the conflicted paths
   */
  async readTreeMerged(
    baseTree: string,
    headTree: string,
    otherTree: string,
    options: UpdateWorkingOptions = {}
  ): Promise<string[]> {
    const { tree, conflicts } = await mergeTrees(
      this.objects,
      await flattenTree(this.objects, baseTree),
      await flattenTree(this.objects, headTree),
      await flattenTree(this.objects, otherTree)
    )
    const index = await this.index()
    index.replace(tree)
    if (options.updateWorking) {
      await materialize(this.objects, this.root, tree)
    }
    return conflicts
  }

  /**
   * Stages files and directories (recursively). A tracked path that no
   * longer exists on disk is unstaged.
   *
   * @param paths - relative to `cwd`
   * @returns the repository paths staged or removed
   */
  async add(paths: readonly string[], cwd: string = this.root): Promise<string[]> {
    const index = await this.index()
    const touched: string[] = []

    for (const userPath of paths) {
      const repoPath = toRepoPath(this.root, cwd, userPath)
      const prefix = repoPath === '' ? '' : `${repoPath}/`
      const stat = await fs.stat(path.join(this.root, repoPath)).catch((error: unknown) => {
        if (isErrnoCode(error, 'ENOENT')) return undefined
        throw error
      })

      const onDisk = new Set<string>()
      if (stat?.isDirectory()) {
        for (const file of await listFiles(this.root, repoPath)) {
          onDisk.add(file)
        }
      } else if (stat?.isFile()) {
        onDisk.add(repoPath)
      }

      const tracked = [...index.entries.keys()].filter((p) => p === repoPath || p.startsWith(prefix))
      if (onDisk.size === 0 && tracked.length === 0) {
        throw new InvalidPathError(userPath, 'did not match any files')
      }

      for (const file of onDisk) {
        const content = await readWorkingFile(this.root, file)
        if (content !== undefined) {
          index.set(file, await this.hashObject(content))
          touched.push(file)
        }
      }
      for (const file of tracked) {
        if (!onDisk.has(file)) {
          index.remove(file)
          touched.push(file)
        }
      }
    }

    return touched.sort()
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commits and history
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Records the index as a new commit on HEAD. An in-progress merge
   * contributes the second parent and is concluded.
   *
   * @throws EmptyMessageError for a blank message
   */
  async commit(message: string): Promise<string> {
    if (message.trim() === '') {
      throw new EmptyMessageError()
    }

    const tree = await this.writeTree()
    const parents: string[] = []
    for (const ref of [HEAD, MERGE_HEAD]) {
      const oid = await this.refs.getOid(ref)
      if (oid !== undefined) parents.push(oid)
    }

    const oid = await writeCommit(this.objects, { tree, parents, message })
    await this.refs.delete(MERGE_HEAD)
    await this.refs.update(HEAD, { symbolic: false, value: oid })
    this.logger.info('Committed', { oid, parents: parents.length })
    return oid
  }

  /**
   * Commits reachable from `revision` in walk order, each with the refs
   * pointing at it.
   */
  async log(revision = '@'): Promise<LogItem[]> {
    const start = await this.resolve(revision)

    const refsByOid = new Map<string, string[]>()
    for (const [name, oid] of await this.refs.listOids()) {
      refsByOid.set(oid, [...(refsByOid.get(oid) ?? []), name])
    }

    const items: LogItem[] = []
    for await (const oid of iterCommitsAndParents(this.provider, [start])) {
      items.push({ oid, commit: await this.getCommit(oid), refs: refsByOid.get(oid) ?? [] })
    }
    return items
  }

  async show(revision = '@'): Promise<ShowResult> {
    const oid = await this.resolve(revision)
    const commit = await this.getCommit(oid)
    const [parent] = commit.parents
    const from = parent === undefined ? new Map<string, string>() : await flattenTree(this.objects, (await this.getCommit(parent)).tree)
    const to = await flattenTree(this.objects, commit.tree)
    return { oid, commit, diff: await diffTrees(this.objects, from, to) }
  }

  async diff(request: DiffRequest = {}): Promise<string> {
    const index = await this.index()

    let from: FlatTree
    if (request.commit !== undefined) {
      from = await flattenTree(this.objects, await this.resolveTree(request.commit))
    } else if (request.cached) {
      from = await this.headTree()
    } else {
      from = index.snapshot()
    }
    const to = request.cached ? index.snapshot() : await flattenDirectory(this.objects, this.root)

    return diffTrees(this.objects, from, to)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Branches, tags and HEAD
  // ─────────────────────────────────────────────────────────────────────────

  async currentBranch(): Promise<string | undefined> {
    const head = await this.refs.get(HEAD, { deref: false })
    if (head?.symbolic && head.value.startsWith(REF_PREFIXES.HEADS)) {
      return head.value.slice(REF_PREFIXES.HEADS.length)
    }
    return undefined
  }

  async createBranch(name: string, start = '@'): Promise<string> {
    const refName = REF_PREFIXES.HEADS + name
    validateRefName(refName)
    const oid = await this.resolve(start)
    await this.getCommit(oid)
    await this.refs.update(refName, { symbolic: false, value: oid }, { deref: false })
    this.logger.info('Created branch', { name, oid })
    return oid
  }

  async listBranches(): Promise<BranchInfo[]> {
    const current = await this.currentBranch()
    const branches: BranchInfo[] = []
    for (const [refName, oid] of await this.refs.listOids(REF_PREFIXES.HEADS)) {
      const name = refName.slice(REF_PREFIXES.HEADS.length)
      branches.push({ name, oid, current: name === current })
    }
    return branches
  }

  async createTag(name: string, revision = '@'): Promise<string> {
    const refName = REF_PREFIXES.TAGS + name
    validateRefName(refName)
    const oid = await this.resolve(revision)
    await this.refs.update(refName, { symbolic: false, value: oid }, { deref: false })
    return oid
  }

  async listTags(): Promise<Map<string, string>> {
    const tags = new Map<string, string>()
    for (const [refName, oid] of await this.refs.listOids(REF_PREFIXES.TAGS)) {
      tags.set(refName.slice(REF_PREFIXES.TAGS.length), oid)
    }
    return tags
  }

  /**
   * Materializes a commit. HEAD follows the branch when `name` is a branch
   * and is detached otherwise.
   */
  async checkout(name: string): Promise<string> {
    const oid = await this.resolve(name)
    const commit = await this.getCommit(oid)
    await this.readTree(commit.tree, { updateWorking: true })

    const branchRef = REF_PREFIXES.HEADS + name
    const isBranch = isValidRefName(branchRef) && (await this.refs.getOid(branchRef)) !== undefined
    if (isBranch) {
      await this.refs.update(HEAD, { symbolic: true, value: branchRef }, { deref: false })
    } else {
      await this.refs.update(HEAD, { symbolic: false, value: oid }, { deref: false })
    }
    this.logger.info('Checked out', { name, oid, detached: !isBranch })
    return oid
  }

  /**
   * Moves HEAD (through the current branch) to `revision` and abandons an
   * in-progress merge. `hard` also resets the index and working directory.
   */
  async reset(revision: string, options: { hard?: boolean } = {}): Promise<string> {
    const oid = await this.resolve(revision)
    const commit = await this.getCommit(oid)
    await this.refs.update(HEAD, { symbolic: false, value: oid })
    await this.refs.delete(MERGE_HEAD)
    if (options.hard) {
      await this.readTree(commit.tree, { updateWorking: true })
    }
    return oid
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  async status(): Promise<StatusReport> {
    const index = (await this.index()).snapshot()
    const working = await hashDirectory(this.root)

    const report: StatusReport = {
      staged: changedFiles(await this.headTree(), index),
      unstaged: changedFiles(index, working).filter((change) => change.status !== DiffStatus.ADDED),
      untracked: [...working.keys()].filter((file) => !index.has(file)).sort(),
    }

    const branch = await this.currentBranch()
    const head = await this.refs.getOid(HEAD)
    const mergeHead = await this.refs.getOid(MERGE_HEAD)
    if (branch !== undefined) report.branch = branch
    if (head !== undefined) report.head = head
    if (mergeHead !== undefined) report.mergeHead = mergeHead
    return report
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Merging
  // ─────────────────────────────────────────────────────────────────────────

  async mergeBase(a: string, b: string): Promise<string> {
    return findMergeBase(this.provider, await this.resolve(a), await this.resolve(b))
  }

  /**
   * Merges `revision` into HEAD. A true merge leaves the result in the
   * index and working directory with MERGE_HEAD set; `commit` concludes it.
   */
  async merge(revision: string): Promise<MergeOutcome> {
    const other = await this.resolve(revision)
    const otherCommit = await this.getCommit(other)
    const head = await this.refs.getOid(HEAD)

    if (head === undefined) {
      await this.readTree(otherCommit.tree, { updateWorking: true })
      await this.refs.update(HEAD, { symbolic: false, value: other })
      this.logger.info('Merge fast-forwarded', { other })
      return { kind: 'fast-forward', other, conflicts: [] }
    }

    if (await isAncestor(this.provider, other, head)) {
      this.logger.info('Merge up to date', { other })
      return { kind: 'up-to-date', other, base: other, conflicts: [] }
    }
    if (await isFastForward(this.provider, head, other)) {
      await this.readTree(otherCommit.tree, { updateWorking: true })
      await this.refs.update(HEAD, { symbolic: false, value: other })
      this.logger.info('Merge fast-forwarded', { other })
      return { kind: 'fast-forward', other, base: head, conflicts: [] }
    }

    const base = await findMergeBase(this.provider, head, other)

    await this.refs.update(MERGE_HEAD, { symbolic: false, value: other }, { deref: false })
    const conflicts = await this.readTreeMerged(
      (await this.getCommit(base)).tree,
      (await this.getCommit(head)).tree,
      otherCommit.tree,
      { updateWorking: true }
    )

    const kind: MergeKind = conflicts.length > 0 ? 'conflict' : 'merged'
    if (conflicts.length > 0) {
      this.logger.warn('Merge produced conflicts', { other, base, conflicts })
    } else {
      this.logger.info('Merged without conflicts', { other, base })
    }
    return { kind, other, base, conflicts }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Remotes
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Transport for a configured remote name or a path (relative to the
   * working directory root).
   *
   * @throws UnknownRemoteError
   */
  async openRemote(remote: string): Promise<RemoteTransport> {
    const configured = this.config.remotes.get(remote)
    const target = path.resolve(this.root, configured?.path ?? remote)
    return FileRemoteTransport.open(target, remote)
  }

  async fetch(remote: string): Promise<FetchResult> {
    return fetchRemote(this, await this.openRemote(remote), { logger: this.loggerFor('sync') })
  }

  async push(remote: string, branch: string): Promise<PushResult> {
    return pushRemote(this, await this.openRemote(remote), qualifyBranchName(branch), { logger: this.loggerFor('sync') })
  }
}

/**
 * Opens the repository at `root`, runs `fn` and closes the handle, also
 * when `fn` throws.
 */
export async function withRepository<T>(
  root: string,
  fn: (repo: Repository) => Promise<T>,
  options: RepositoryOptions = {}
): Promise<T> {
  const repo = await Repository.open(root, options)
  try {
    return await fn(repo)
  } finally {
    await repo.close()
  }
}
