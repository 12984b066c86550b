/**
 * grove log / show commands
 *
 * `log [rev]` lists history in walk order (first-parent chains first);
 * `show [rev]` prints one commit and its diff against the first parent.
 */

import type { LogItem } from '../../core/repository'
import type { CommandContext } from '../index'
import { booleanOption, inRepository, shortOid, stringOption, writeBlock } from '../context'

/**
 * Full entry: header with decorations, parents of merges, indented message.
 */
export function formatLogItem(item: LogItem): string {
  const decorations = item.refs.length > 0 ? ` (${item.refs.join(', ')})` : ''
  const lines = [`commit ${item.oid}${decorations}`]
  if (item.commit.isMerge()) {
    lines.push(`Merge: ${item.commit.parents.map(shortOid).join(' ')}`)
  }
  lines.push('')
  for (const line of item.commit.message.split('\n')) {
    lines.push(line === '' ? '' : `    ${line}`)
  }
  lines.push('')
  return lines.join('\n')
}

export function formatOneline(item: LogItem): string {
  const decorations = item.refs.length > 0 ? ` (${item.refs.join(', ')})` : ''
  return `${shortOid(item.oid)}${decorations} ${item.commit.subject}`
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const count = Number(value)
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`invalid commit count: ${value}`)
  }
  return count
}

export async function logCommand(ctx: CommandContext): Promise<void> {
  const limit = parseCount(stringOption(ctx.options, 'maxCount'))
  const oneline = booleanOption(ctx.options, 'oneline')

  await inRepository(ctx, async (repo) => {
    const items = await repo.log(ctx.args[0] ?? '@')
    for (const item of items.slice(0, limit)) {
      ctx.stdout(oneline ? formatOneline(item) : formatLogItem(item))
    }
  })
}

export async function showCommand(ctx: CommandContext): Promise<void> {
  await inRepository(ctx, async (repo) => {
    const { oid, commit, diff } = await repo.show(ctx.args[0] ?? '@')
    ctx.stdout(formatLogItem({ oid, commit, refs: [] }))
    writeBlock(ctx, diff)
  })
}
