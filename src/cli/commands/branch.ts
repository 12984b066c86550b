/**
 * grove branch / tag commands
 *
 *   grove branch                  list branches, current one starred
 *   grove branch <name> [start]   create a branch at start (default: HEAD)
 *   grove tag                     list tags
 *   grove tag <name> [rev]        create a lightweight tag
 */

import type { CommandContext } from '../index'
import { inRepository, shortOid } from '../context'

export async function branchCommand(ctx: CommandContext): Promise<void> {
  const [name, start] = ctx.args

  await inRepository(ctx, async (repo) => {
    if (name !== undefined) {
      const oid = await repo.createBranch(name, start)
      ctx.stdout(`Branch ${name} created at ${shortOid(oid)}`)
      return
    }

    for (const branch of await repo.listBranches()) {
      ctx.stdout(`${branch.current ? '* ' : '  '}${branch.name}`)
    }
  })
}

export async function tagCommand(ctx: CommandContext): Promise<void> {
  const [name, revision] = ctx.args

  await inRepository(ctx, async (repo) => {
    if (name !== undefined) {
      await repo.createTag(name, revision)
      return
    }

    for (const tag of (await repo.listTags()).keys()) {
      ctx.stdout(tag)
    }
  })
}
