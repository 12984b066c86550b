/**
 * grove init command
 *
 * Creates `.grove` in the target directory (default: the working directory).
 */

import * as path from 'path'
import { Repository } from '../../core/repository'
import { createLineHandler } from '../../utils/logger'
import type { CommandContext } from '../index'

export async function initCommand(ctx: CommandContext): Promise<void> {
  const target = path.resolve(ctx.cwd, ctx.args[0] ?? '.')
  const repo = await Repository.init(target, { env: ctx.env, logHandler: createLineHandler(ctx.stderr) })
  await repo.close()
  ctx.stdout(`Initialized empty grove repository in ${repo.gitDir}`)
}
