/**
 * grove checkout / reset commands
 *
 * `checkout <name>` materializes a commit; a branch name keeps HEAD
 * attached to the branch, anything else detaches it.
 * `reset [--hard] <rev>` moves HEAD (through the branch) to a commit.
 */

import type { CommandContext } from '../index'
import { booleanOption, inRepository, requireArg, shortOid } from '../context'

export async function checkoutCommand(ctx: CommandContext): Promise<void> {
  const name = requireArg(ctx, 0, 'checkout <branch|commit>')

  await inRepository(ctx, async (repo) => {
    const oid = await repo.checkout(name)
    const branch = await repo.currentBranch()
    ctx.stdout(branch !== undefined ? `Switched to branch '${branch}'` : `HEAD is now at ${shortOid(oid)}`)
  })
}

export async function resetCommand(ctx: CommandContext): Promise<void> {
  const revision = requireArg(ctx, 0, 'reset [--hard] <commit>')
  const hard = booleanOption(ctx.options, 'hard')

  await inRepository(ctx, async (repo) => {
    const oid = await repo.reset(revision, { hard })
    const commit = await repo.getCommit(oid)
    ctx.stdout(`HEAD is now at ${shortOid(oid)} ${commit.subject}`)
  })
}
