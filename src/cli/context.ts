/**
 * Helpers shared by the command handlers.
 *
 * @module cli/context
 */

import { type Repository, withRepository } from '../core/repository'
import { createLineHandler } from '../utils/logger'
import type { CommandContext, CommandOptions } from './index'

/**
 * Runs `fn` against the repository at `ctx.cwd`, logging to stderr.
 */
export function inRepository<T>(ctx: CommandContext, fn: (repo: Repository) => Promise<T>): Promise<T> {
  return withRepository(ctx.cwd, fn, { env: ctx.env, logHandler: createLineHandler(ctx.stderr) })
}

/**
 * String value of an option. Numeric-looking values arrive as numbers from
 * the parser and are turned back into strings.
 */
export function stringOption(options: CommandOptions, name: string): string | undefined {
  const value = options[name]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

export function booleanOption(options: CommandOptions, name: string): boolean {
  return options[name] === true
}

/**
 * @throws Error with a usage line when the positional argument is missing
 */
export function requireArg(ctx: CommandContext, index: number, usage: string): string {
  const value = ctx.args[index]
  if (value === undefined) {
    throw new Error(`usage: grove ${usage}`)
  }
  return value
}

/**
 * Writes multi-line output without the trailing newline `stdout` adds back.
 */
export function writeBlock(ctx: CommandContext, text: string): void {
  if (text !== '') {
    ctx.stdout(text.endsWith('\n') ? text.slice(0, -1) : text)
  }
}

export function shortOid(oid: string): string {
  return oid.slice(0, 10)
}
