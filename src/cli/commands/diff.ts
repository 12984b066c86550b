/**
 * grove diff command
 *
 *   grove diff                 index → working tree
 *   grove diff --cached        HEAD → index
 *   grove diff <rev>           <rev> → working tree
 *   grove diff --cached <rev>  <rev> → index
 */

import type { CommandContext } from '../index'
import { booleanOption, inRepository, writeBlock } from '../context'

export async function diffCommand(ctx: CommandContext): Promise<void> {
  const cached = booleanOption(ctx.options, 'cached')
  const commit = ctx.args[0]

  await inRepository(ctx, async (repo) => {
    writeBlock(ctx, await repo.diff({ cached, ...(commit !== undefined && { commit }) }))
  })
}
