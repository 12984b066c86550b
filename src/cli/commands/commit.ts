/**
 * grove commit command
 *
 * Records the index as a new commit on HEAD:
 *
 *   grove commit -m "Fix tree parsing"
 */

import type { CommandContext } from '../index'
import { inRepository, shortOid, stringOption } from '../context'

export async function commitCommand(ctx: CommandContext): Promise<void> {
  const message = stringOption(ctx.options, 'message')
  if (message === undefined) {
    throw new Error('usage: grove commit -m <message>')
  }

  await inRepository(ctx, async (repo) => {
    const oid = await repo.commit(message)
    const branch = await repo.currentBranch()
    const commit = await repo.getCommit(oid)
    ctx.stdout(`[${branch ?? 'detached HEAD'} ${shortOid(oid)}] ${commit.subject}`)
  })
}
