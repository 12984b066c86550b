/**
 * grove merge command
 *
 * Merges a revision into HEAD. A true merge leaves its result staged with
 * MERGE_HEAD set; `grove commit` records the merge commit.
 */

import type { CommandContext } from '../index'
import { inRepository, requireArg, shortOid } from '../context'

export async function mergeCommand(ctx: CommandContext): Promise<void> {
  const revision = requireArg(ctx, 0, 'merge <commit>')

  await inRepository(ctx, async (repo) => {
    const outcome = await repo.merge(revision)
    switch (outcome.kind) {
      case 'up-to-date':
        ctx.stdout('Already up to date.')
        break
      case 'fast-forward':
        ctx.stdout(`Fast-forward to ${shortOid(outcome.other)}`)
        break
      case 'merged':
        ctx.stdout('Merged in working tree. Please commit.')
        break
      case 'conflict':
        for (const path of outcome.conflicts) {
          ctx.stdout(`CONFLICT (content): Merge conflict in ${path}`)
        }
        throw new Error('Automatic merge failed; fix conflicts and then commit the result.')
    }
  })
}
