/**
 * @fileoverview Reference Store
 *
 * Ref management on top of a raw {@link RefBackend}:
 * - **Direct refs** hold an oid (branch tips, tags, detached HEAD)
 * - **Symbolic refs** hold another ref name (`HEAD -> refs/heads/master`)
 *
 * Symbolic chains are followed with an explicit loop bounded by
 * `maxDepth`; a chain that does not end within that many hops is reported
 * as a {@link RefCycleError}. Resolution never writes.
 *
 * @module refs/storage
 *
 * @example
 * ```typescript
 * const refs = new RefStore(new FileRefBackend('/repo/.grove'))
 *
 * await refs.update('HEAD', { symbolic: true, value: 'refs/heads/master' }, { deref: false })
 * // Advances refs/heads/master, not HEAD itself
 * await refs.update('HEAD', { symbolic: false, value: commitOid })
 *
 * const { name, value } = await refs.resolve('HEAD')
 * // name === 'refs/heads/master', value?.value === commitOid
 * ```
 */

import { InvalidRefNameError, RefCycleError } from '../errors'
import type { RefBackend, RefValue } from '../types/storage'
import { isValidOid } from '../utils/hash'
import { SPECIAL_REFS } from '../storage/ref-format'

// ============================================================================
// Constants
// ============================================================================

export const HEAD = 'HEAD'
export const MERGE_HEAD = 'MERGE_HEAD'

export const REF_PREFIXES = {
  HEADS: 'refs/heads/',
  TAGS: 'refs/tags/',
  REMOTE: 'refs/remote/',
} as const

/** Default bound on symbolic hops during resolution */
export const DEFAULT_MAX_SYMREF_DEPTH = 10

// ============================================================================
// Types
// ============================================================================

export interface ResolvedRef {
  /** Terminal name: the last name in the chain (the ref that holds the oid) */
  name: string
  /** Value stored at the terminal name; undefined when unset */
  value: RefValue | undefined
}

export interface DerefOptions {
  deref?: boolean
}

export interface RefStoreOptions {
  maxDepth?: number
}

// ============================================================================
// Validation
// ============================================================================

const INVALID_CHARS = /[\x00-\x20\x7f~^:?*[\\]/

/**
 * @throws InvalidRefNameError when `name` is not `HEAD`, `MERGE_HEAD` or a
 * well-formed name under `refs/`
 */
export function validateRefName(name: string): void {
  if (SPECIAL_REFS.some((special) => special === name)) {
    return
  }
  if (!name.startsWith('refs/')) {
    throw new InvalidRefNameError(name, 'must be HEAD, MERGE_HEAD or start with refs/')
  }
  if (INVALID_CHARS.test(name)) {
    throw new InvalidRefNameError(name, 'contains control characters, spaces or one of ~^:?*[\\')
  }
  if (name.endsWith('/') || name.endsWith('.') || name.endsWith('.lock')) {
    throw new InvalidRefNameError(name, 'cannot end with "/", "." or ".lock"')
  }
  for (const segment of name.split('/')) {
    if (segment.length === 0) {
      throw new InvalidRefNameError(name, 'contains an empty path segment')
    }
    if (segment.startsWith('.')) {
      throw new InvalidRefNameError(name, 'a path segment cannot start with "."')
    }
  }
  if (name.includes('..')) {
    throw new InvalidRefNameError(name, 'cannot contain ".."')
  }
}

export function isValidRefName(name: string): boolean {
  try {
    validateRefName(name)
    return true
  } catch {
    return false
  }
}

function validateRefValue(name: string, value: RefValue): void {
  if (value.symbolic) {
    validateRefName(value.value)
  } else if (!isValidOid(value.value)) {
    throw new InvalidRefNameError(name, `value is not an object id: ${value.value}`)
  }
}

// ============================================================================
// RefStore
// ============================================================================

export class RefStore {
  readonly maxDepth: number

  constructor(
    private readonly backend: RefBackend,
    options: RefStoreOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_SYMREF_DEPTH
  }

  /**
   * Follows symbolic refs from `name` until a direct ref or an unset ref.
   * With `deref: false` the ref itself is returned as stored.
   *
   * @throws RefCycleError after `maxDepth` symbolic hops
   */
  async resolve(name: string, options: DerefOptions = {}): Promise<ResolvedRef> {
    const deref = options.deref ?? true
    const chain: string[] = []
    let current = name

    for (let hop = 0; hop <= this.maxDepth; hop++) {
      chain.push(current)
      const ref = await this.backend.read(current)
      if (!deref || ref === undefined || !ref.symbolic) {
        return { name: current, value: ref }
      }
      current = ref.value
    }

    throw new RefCycleError([...chain, current])
  }

  async get(name: string, options: DerefOptions = {}): Promise<RefValue | undefined> {
    return (await this.resolve(name, options)).value
  }

  /**
   * Oid a name points to after dereferencing, or undefined.
   */
  async getOid(name: string): Promise<string | undefined> {
    const value = await this.get(name)
    return value && !value.symbolic ? value.value : undefined
  }

  /**
   * Writes `value`. With `deref` (the default) the write lands on the
   * terminal ref of the chain starting at `name`, so updating `HEAD`
   * advances the current branch.
   */
  async update(name: string, value: RefValue, options: DerefOptions = {}): Promise<void> {
    validateRefName(name)
    validateRefValue(name, value)

    const target = (options.deref ?? true) ? (await this.resolve(name)).name : name
    validateRefName(target)
    await this.backend.write(target, value)
  }

  /**
   * Removes the entry at `name` itself unless `deref` is requested.
   */
  async delete(name: string, options: DerefOptions = {}): Promise<boolean> {
    const target = options.deref ? (await this.resolve(name)).name : name
    return this.backend.remove(target)
  }

  /**
   * Every ref whose name starts with `prefix` and whose value is set:
   * HEAD and MERGE_HEAD first, then refs under `refs/` in name order.
   */
  async list(prefix = '', options: DerefOptions = {}): Promise<Map<string, RefValue>> {
    const refs = new Map<string, RefValue>()
    for (const name of await this.backend.listNames()) {
      if (!name.startsWith(prefix)) continue
      const value = await this.get(name, options)
      if (value !== undefined) {
        refs.set(name, value)
      }
    }
    return refs
  }

  /**
   * Oids of the set refs under `prefix`, dereferenced.
   */
  async listOids(prefix = ''): Promise<Map<string, string>> {
    const oids = new Map<string, string>()
    for (const [name, value] of await this.list(prefix)) {
      if (!value.symbolic) {
        oids.set(name, value.value)
      }
    }
    return oids
  }
}
