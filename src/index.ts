/**
 * @fileoverview grove - a minimal distributed version control system
 *
 * Library entry point. Everything the CLI does is available here:
 *
 * - **Objects**: content-addressed blobs, trees and commits
 * - **Storage**: filesystem and in-memory object stores and ref backends
 * - **Refs**: symbolic and direct refs, revision lookup
 * - **Graph**: history walks, ancestry, merge bases
 * - **Diff/Merge**: unified diffs, line-level three-way merge, tree merge
 * - **Sync**: fetch and push between repositories
 * - **Repository**: the handle tying it all to a working directory
 *
 * @module grove
 *
 * @example
 * ```typescript
 * import { Repository, withRepository } from 'grove-vcs'
 *
 * const repo = await Repository.init('/work/project')
 * await repo.close()
 *
 * await withRepository('/work/project', async (repo) => {
 *   await repo.add(['.'])
 *   await repo.commit('Initial import')
 *   console.log(await repo.status())
 * })
 * ```
 */

// =============================================================================
// Errors
// =============================================================================

export {
  GroveError,
  ObjectError,
  ObjectNotFoundError,
  TypeMismatchError,
  CorruptObjectError,
  RefError,
  RefCycleError,
  InvalidRefNameError,
  UnknownRevisionError,
  AmbiguousOidError,
  NoCommonAncestorError,
  NonFastForwardError,
  NoSuchLocalRefError,
  UnknownRemoteError,
  RepositoryError,
  NotARepositoryError,
  RepositoryExistsError,
  EmptyMessageError,
  InvalidPathError,
  ConfigError,
  isGroveError,
  hasErrorCode,
  type GroveErrorCode,
} from './errors'

// =============================================================================
// Objects
// =============================================================================

export * from './core/objects'
export { hashObject, frameObject, isValidOid, sha1Hex } from './utils/hash'

// =============================================================================
// Storage
// =============================================================================

export type { ObjectReader, ObjectStore, RefBackend, RefValue } from './types/storage'
export { FileObjectStore, FileRefBackend, MemoryObjectStore, MemoryRefBackend } from './storage'

// =============================================================================
// Refs
// =============================================================================

export {
  RefStore,
  HEAD,
  MERGE_HEAD,
  REF_PREFIXES,
  validateRefName,
  isValidRefName,
  type ResolvedRef,
  type DerefOptions,
} from './refs/storage'
export { resolveRevision, type RevisionOptions } from './refs/revision'

// =============================================================================
// Graph
// =============================================================================

export {
  type CommitProvider,
  createCommitProvider,
  iterCommitsAndParents,
  isAncestor,
  iterObjectsInCommits,
  collectObjects,
} from './ops/commit-traversal'
export { findMergeBase } from './ops/merge-base'

// =============================================================================
// Diff / Merge
// =============================================================================

export { diffLines, splitLines, unifiedDiff, type LineEdit } from './ops/line-diff'
export { DiffStatus, type ChangedFile, flattenTree, changedFiles, diffTrees, isBinaryContent, decodeText } from './ops/tree-diff'
export { mergeContent, mergeTrees, type ConflictLabels, type ContentMergeResult, type TreeMergeResult } from './ops/merge'
export { buildTreeFromIndex } from './ops/tree-builder'

// =============================================================================
// Sync
// =============================================================================

export {
  type RemoteTransport,
  type FetchResult,
  type PushResult,
  FileRemoteTransport,
  fetch,
  push,
} from './ops/sync'

// =============================================================================
// Repository
// =============================================================================

export {
  Repository,
  withRepository,
  type RepositoryOptions,
  type StatusReport,
  type MergeOutcome,
  type LogItem,
} from './core/repository'
export { loadConfig, type GroveConfig } from './core/config'

// =============================================================================
// Logging / CLI
// =============================================================================

export { createLogger, noopLogger, LogLevel, type Logger, type LogEntry } from './utils/logger'
export { CLI, runCLI, parseArgs, type CLIResult, type CommandContext } from './cli'
