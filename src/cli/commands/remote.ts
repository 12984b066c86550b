/**
 * grove fetch / push commands
 *
 * The remote is a configured remote name or a path to another working
 * directory:
 *
 *   grove fetch ../upstream
 *   grove push origin master
 */

import type { CommandContext } from '../index'
import { inRepository, requireArg, shortOid } from '../context'

export async function fetchCommand(ctx: CommandContext): Promise<void> {
  const remote = requireArg(ctx, 0, 'fetch <remote>')

  await inRepository(ctx, async (repo) => {
    const { copied, refs } = await repo.fetch(remote)
    for (const [name, oid] of refs) {
      ctx.stdout(`${shortOid(oid)} ${name}`)
    }
    ctx.stdout(`Fetched ${copied.length} object${copied.length === 1 ? '' : 's'}`)
  })
}

export async function pushCommand(ctx: CommandContext): Promise<void> {
  const remote = requireArg(ctx, 0, 'push <remote> <branch>')
  const branch = requireArg(ctx, 1, 'push <remote> <branch>')

  await inRepository(ctx, async (repo) => {
    const result = await repo.push(remote, branch)
    const from = result.previousOid !== undefined ? shortOid(result.previousOid) : '(new)'
    ctx.stdout(`${from}..${shortOid(result.oid)} ${result.refName} (${result.copied.length} objects)`)
  })
}
