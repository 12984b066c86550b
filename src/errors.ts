/**
 * @fileoverview Error Hierarchy for grove
 *
 * Every error raised by the engine extends {@link GroveError}, which carries:
 * - a `code` for programmatic handling
 * - an optional `cause` for error chaining
 * - `toJSON()` for structured logging
 *
 * Errors are grouped in families (objects, refs, revisions, graph, sync,
 * repository). Each concrete class narrows the family's `code`.
 *
 * Merge conflicts are not errors: the merge engine reports them as data.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { GroveError, NonFastForwardError } from './errors'
 *
 * try {
 *   await push(repo, remote, 'refs/heads/master')
 * } catch (error) {
 *   if (error instanceof NonFastForwardError) {
 *     console.log(`fetch and merge ${error.remoteOid} first`)
 *   } else if (error instanceof GroveError) {
 *     console.log(`${error.code}: ${error.message}`)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes shared by every error family.
 */
export type GroveErrorCode =
  | 'UNKNOWN'
  | 'INTERNAL'
  | ObjectErrorCode
  | RefErrorCode
  | RevisionErrorCode
  | GraphErrorCode
  | SyncErrorCode
  | RepositoryErrorCode

/**
 * Base class for all grove errors.
 */
export class GroveError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: GroveErrorCode

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  constructor(message: string, code: GroveErrorCode = 'UNKNOWN', options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'GroveError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    }
  }
}

// =============================================================================
// Object Errors
// =============================================================================

export type ObjectErrorCode = 'OBJECT_NOT_FOUND' | 'TYPE_MISMATCH' | 'CORRUPT_OBJECT'

/**
 * Store integrity violations. These are never recovered silently: a missing
 * or malformed object means the repository is corrupt or incompletely synced.
 */
export class ObjectError extends GroveError {
  /** The oid of the offending object, if known */
  readonly oid?: string

  constructor(message: string, code: ObjectErrorCode, options?: { oid?: string; cause?: unknown }) {
    super(message, code, options)
    this.name = 'ObjectError'
    this.oid = options?.oid
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), oid: this.oid }
  }
}

export class ObjectNotFoundError extends ObjectError {
  constructor(oid: string) {
    super(`Object not found: ${oid}`, 'OBJECT_NOT_FOUND', { oid })
    this.name = 'ObjectNotFoundError'
  }
}

export class TypeMismatchError extends ObjectError {
  readonly expected: string
  readonly actual: string

  constructor(oid: string, expected: string, actual: string) {
    super(`Expected ${expected} but got ${actual}: ${oid}`, 'TYPE_MISMATCH', { oid })
    this.name = 'TypeMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

export class CorruptObjectError extends ObjectError {
  constructor(message: string, oid?: string) {
    super(oid ? `${message} (${oid})` : message, 'CORRUPT_OBJECT', { oid })
    this.name = 'CorruptObjectError'
  }
}

// =============================================================================
// Ref Errors
// =============================================================================

export type RefErrorCode = 'REF_CYCLE' | 'INVALID_REF_NAME'

export class RefError extends GroveError {
  readonly refName: string

  constructor(message: string, code: RefErrorCode, refName: string) {
    super(message, code)
    this.name = 'RefError'
    this.refName = refName
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), refName: this.refName }
  }
}

/**
 * A symbolic ref chain did not terminate within the configured number of
 * hops. Indicates corruption of the refs directory.
 */
export class RefCycleError extends RefError {
  readonly chain: string[]

  constructor(chain: string[]) {
    super(`Symbolic ref chain does not terminate: ${chain.join(' -> ')}`, 'REF_CYCLE', chain[0] ?? '')
    this.name = 'RefCycleError'
    this.chain = chain
  }
}

export class InvalidRefNameError extends RefError {
  readonly reason: string

  constructor(refName: string, reason: string) {
    super(`Invalid ref name "${refName}": ${reason}`, 'INVALID_REF_NAME', refName)
    this.name = 'InvalidRefNameError'
    this.reason = reason
  }
}

// =============================================================================
// Revision Errors
// =============================================================================

export type RevisionErrorCode = 'UNKNOWN_REVISION' | 'AMBIGUOUS_OID'

/**
 * User-input resolution failures. Not fatal to the process.
 */
export class UnknownRevisionError extends GroveError {
  readonly revision: string

  constructor(revision: string) {
    super(`Unknown revision: ${revision}`, 'UNKNOWN_REVISION')
    this.name = 'UnknownRevisionError'
    this.revision = revision
  }
}

export class AmbiguousOidError extends GroveError {
  readonly prefix: string
  readonly candidates: string[]

  constructor(prefix: string, candidates: string[]) {
    super(`Short oid ${prefix} is ambiguous: ${candidates.join(', ')}`, 'AMBIGUOUS_OID')
    this.name = 'AmbiguousOidError'
    this.prefix = prefix
    this.candidates = candidates
  }
}

// =============================================================================
// Graph Errors
// =============================================================================

export type GraphErrorCode = 'NO_COMMON_ANCESTOR'

export class NoCommonAncestorError extends GroveError {
  readonly commits: [string, string]

  constructor(a: string, b: string) {
    super(`No common ancestor between ${a} and ${b}`, 'NO_COMMON_ANCESTOR')
    this.name = 'NoCommonAncestorError'
    this.commits = [a, b]
  }
}

// =============================================================================
// Sync Errors
// =============================================================================

export type SyncErrorCode = 'NON_FAST_FORWARD' | 'NO_SUCH_LOCAL_REF' | 'UNKNOWN_REMOTE'

/**
 * The remote ref is not an ancestor of the local value. Recoverable by
 * fetching, merging and pushing again.
 */
export class NonFastForwardError extends GroveError {
  readonly refName: string
  readonly localOid: string
  readonly remoteOid: string

  constructor(refName: string, localOid: string, remoteOid: string) {
    super(`Rejected non-fast-forward push of ${refName}: ${remoteOid} is not an ancestor of ${localOid}`, 'NON_FAST_FORWARD')
    this.name = 'NonFastForwardError'
    this.refName = refName
    this.localOid = localOid
    this.remoteOid = remoteOid
  }
}

export class NoSuchLocalRefError extends GroveError {
  readonly refName: string

  constructor(refName: string) {
    super(`Local ref ${refName} does not exist`, 'NO_SUCH_LOCAL_REF')
    this.name = 'NoSuchLocalRefError'
    this.refName = refName
  }
}

export class UnknownRemoteError extends GroveError {
  readonly remote: string

  constructor(remote: string) {
    super(`Not a repository or configured remote: ${remote}`, 'UNKNOWN_REMOTE')
    this.name = 'UnknownRemoteError'
    this.remote = remote
  }
}

// =============================================================================
// Repository Errors
// =============================================================================

export type RepositoryErrorCode =
  | 'NOT_A_REPOSITORY'
  | 'REPOSITORY_EXISTS'
  | 'EMPTY_MESSAGE'
  | 'INVALID_PATH'
  | 'CONFIG_INVALID'

export class RepositoryError extends GroveError {
  constructor(message: string, code: RepositoryErrorCode, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'RepositoryError'
  }
}

export class NotARepositoryError extends RepositoryError {
  readonly path: string

  constructor(path: string) {
    super(`Not a grove repository: ${path}`, 'NOT_A_REPOSITORY')
    this.name = 'NotARepositoryError'
    this.path = path
  }
}

export class RepositoryExistsError extends RepositoryError {
  readonly path: string

  constructor(path: string) {
    super(`Repository already exists: ${path}`, 'REPOSITORY_EXISTS')
    this.name = 'RepositoryExistsError'
    this.path = path
  }
}

export class EmptyMessageError extends RepositoryError {
  constructor() {
    super('Aborting commit due to empty commit message', 'EMPTY_MESSAGE')
    this.name = 'EmptyMessageError'
  }
}

export class InvalidPathError extends RepositoryError {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`Invalid path "${path}": ${reason}`, 'INVALID_PATH')
    this.name = 'InvalidPathError'
    this.path = path
  }
}

export class ConfigError extends RepositoryError {
  readonly key: string

  constructor(key: string, value: string, reason: string) {
    super(`Invalid config value ${key}=${value}: ${reason}`, 'CONFIG_INVALID')
    this.name = 'ConfigError'
    this.key = key
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isGroveError(error: unknown): error is GroveError {
  return error instanceof GroveError
}

export function hasErrorCode<T extends GroveErrorCode>(error: unknown, code: T): error is GroveError & { code: T } {
  return error instanceof GroveError && error.code === code
}
