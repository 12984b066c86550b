/**
 * grove status command
 *
 * Shows the branch (or detached HEAD), an in-progress merge, staged and
 * unstaged changes, and untracked files.
 */

import type { StatusReport } from '../../core/repository'
import { type ChangedFile, DiffStatus } from '../../ops/tree-diff'
import type { CommandContext } from '../index'
import { inRepository, shortOid } from '../context'

const STATUS_LABELS: Record<DiffStatus, string> = {
  [DiffStatus.ADDED]: 'new file',
  [DiffStatus.MODIFIED]: 'modified',
  [DiffStatus.DELETED]: 'deleted',
}

function formatChanges(title: string, changes: readonly ChangedFile[]): string[] {
  if (changes.length === 0) return []
  return ['', `${title}:`, ...changes.map((change) => `\t${`${STATUS_LABELS[change.status]}:`.padEnd(10)}${change.path}`)]
}

export function formatStatus(report: StatusReport): string {
  const lines: string[] = []

  if (report.branch !== undefined) {
    lines.push(`On branch ${report.branch}`)
  } else if (report.head !== undefined) {
    lines.push(`HEAD detached at ${shortOid(report.head)}`)
  }
  if (report.mergeHead !== undefined) {
    lines.push(`Merging with ${shortOid(report.mergeHead)}`)
  }

  lines.push(...formatChanges('Changes to be committed', report.staged))
  lines.push(...formatChanges('Changes not staged for commit', report.unstaged))
  if (report.untracked.length > 0) {
    lines.push('', 'Untracked files:', ...report.untracked.map((file) => `\t${file}`))
  }

  return lines.join('\n')
}

export async function statusCommand(ctx: CommandContext): Promise<void> {
  await inRepository(ctx, async (repo) => {
    ctx.stdout(formatStatus(await repo.status()))
  })
}
