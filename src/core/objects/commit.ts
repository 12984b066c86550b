/**
 * Commit Object
 *
 * Payload format:
 *
 *   tree <oid>
 *   parent <oid>      (zero, one or two lines, in order)
 *
 *   <message>
 *
 * The message is followed by a single newline, which parsing strips again.
 *
 * @module core/objects/commit
 */

import { CorruptObjectError } from '../../errors'
import { isValidOid } from '../../utils/hash'
import type { CommitData } from './types'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/** A merge commit has exactly this many parents */
export const MAX_PARENTS = 2

export class Commit implements CommitData {
  readonly type = 'commit' as const
  readonly tree: string
  readonly parents: string[]
  readonly message: string

  /**
   * @throws CorruptObjectError for an invalid tree/parent oid, too many
   * parents or an empty message
   */
  constructor(data: CommitData) {
    if (!isValidOid(data.tree)) {
      throw new CorruptObjectError(`Invalid tree oid: ${data.tree}`)
    }
    if (data.parents.length > MAX_PARENTS) {
      throw new CorruptObjectError(`A commit has at most ${MAX_PARENTS} parents, got ${data.parents.length}`)
    }
    for (const parent of data.parents) {
      if (!isValidOid(parent)) {
        throw new CorruptObjectError(`Invalid parent oid: ${parent}`)
      }
    }
    if (data.message.trim().length === 0) {
      throw new CorruptObjectError('Commit message is empty')
    }

    this.tree = data.tree
    this.parents = [...data.parents]
    this.message = data.message
  }

  static parse(payload: Uint8Array, oid?: string): Commit {
    const text = decoder.decode(payload)
    const separator = text.indexOf('\n\n')
    if (separator === -1) {
      throw new CorruptObjectError('Commit has no header/message separator', oid)
    }

    let tree: string | undefined
    const parents: string[] = []

    for (const line of text.slice(0, separator).split('\n')) {
      const space = line.indexOf(' ')
      const key = space === -1 ? line : line.slice(0, space)
      const value = space === -1 ? '' : line.slice(space + 1)

      if (key === 'tree' && tree === undefined) {
        tree = value
      } else if (key === 'parent') {
        parents.push(value)
      } else {
        throw new CorruptObjectError(`Unexpected commit header "${line}"`, oid)
      }
    }

    if (tree === undefined) {
      throw new CorruptObjectError('Commit has no tree', oid)
    }

    let message = text.slice(separator + 2)
    if (message.endsWith('\n')) {
      message = message.slice(0, -1)
    }

    try {
      return new Commit({ tree, parents, message })
    } catch (error) {
      if (error instanceof CorruptObjectError && oid !== undefined) {
        throw new CorruptObjectError(error.message, oid)
      }
      throw error
    }
  }

  serialize(): Uint8Array {
    let text = `tree ${this.tree}\n`
    for (const parent of this.parents) {
      text += `parent ${parent}\n`
    }
    text += `\n${this.message}\n`
    return encoder.encode(text)
  }

  isMerge(): boolean {
    return this.parents.length === MAX_PARENTS
  }

  /**
   * First line of the message.
   */
  get subject(): string {
    const newline = this.message.indexOf('\n')
    return newline === -1 ? this.message : this.message.slice(0, newline)
  }
}
