/**
 * Low-level object commands
 *
 *   grove hash-object [-t <type>] <file>   store a file, print its oid
 *   grove cat-file [-t <type>] <rev>       print an object's payload
 *   grove write-tree                       write the index as trees
 *   grove read-tree [-u] <tree-ish>        load a tree into the index
 *   grove merge-base <a> <b>               print a common ancestor
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { isObjectType, type ObjectType } from '../../core/objects/types'
import type { CommandContext, CommandOptions } from '../index'
import { booleanOption, inRepository, requireArg, stringOption, writeBlock } from '../context'

const decoder = new TextDecoder()

function typeOption(options: CommandOptions): ObjectType | undefined {
  const type = stringOption(options, 'type')
  if (type === undefined) return undefined
  if (!isObjectType(type)) {
    throw new Error(`invalid object type: ${type}`)
  }
  return type
}

export async function hashObjectCommand(ctx: CommandContext): Promise<void> {
  const file = requireArg(ctx, 0, 'hash-object [-t <type>] <file>')
  const type = typeOption(ctx.options) ?? 'blob'
  const content = new Uint8Array(await fs.readFile(path.resolve(ctx.cwd, file)))

  await inRepository(ctx, async (repo) => {
    ctx.stdout(await repo.hashObject(content, type))
  })
}

export async function catFileCommand(ctx: CommandContext): Promise<void> {
  const revision = requireArg(ctx, 0, 'cat-file [-t <type>] <object>')
  const type = typeOption(ctx.options)

  await inRepository(ctx, async (repo) => {
    writeBlock(ctx, decoder.decode(await repo.catFile(revision, type)))
  })
}

export async function writeTreeCommand(ctx: CommandContext): Promise<void> {
  await inRepository(ctx, async (repo) => {
    ctx.stdout(await repo.writeTree())
  })
}

export async function readTreeCommand(ctx: CommandContext): Promise<void> {
  const revision = requireArg(ctx, 0, 'read-tree [-u] <tree-ish>')
  const updateWorking = booleanOption(ctx.options, 'update')

  await inRepository(ctx, async (repo) => {
    await repo.readTree(await repo.resolveTree(revision), { updateWorking })
  })
}

export async function mergeBaseCommand(ctx: CommandContext): Promise<void> {
  const a = requireArg(ctx, 0, 'merge-base <commit> <commit>')
  const b = requireArg(ctx, 1, 'merge-base <commit> <commit>')

  await inRepository(ctx, async (repo) => {
    ctx.stdout(await repo.mergeBase(a, b))
  })
}
