/**
 * @fileoverview grove add command
 *
 * Stages files and directories. Directories are added recursively; a
 * tracked path that was deleted from disk is removed from the index.
 *
 * @module cli/commands/add
 *
 * @example
 * // grove add README.md src
 */

import type { CommandContext } from '../index'
import { inRepository } from '../context'

export async function addCommand(ctx: CommandContext): Promise<void> {
  const paths = [...ctx.args, ...ctx.rawArgs]
  if (paths.length === 0) {
    throw new Error('usage: grove add <path>...')
  }
  await inRepository(ctx, (repo) => repo.add(paths, ctx.cwd))
}
