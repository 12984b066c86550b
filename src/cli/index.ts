/**
 * @fileoverview CLI Entry Point for grove
 *
 * Argument parsing, command routing and error reporting for the `grove`
 * command. Each subcommand is a thin handler over a {@link Repository}
 * operation; output goes through injectable `stdout`/`stderr` functions so
 * the whole surface can be driven from tests.
 *
 * @module cli/index
 *
 * @example
 * // Run the CLI programmatically
 * import { runCLI } from './cli'
 *
 * const output: string[] = []
 * const result = await runCLI(['log', '--oneline'], {
 *   cwd: '/work/project',
 *   stdout: (msg) => output.push(msg),
 * })
 * console.log(result.exitCode)
 *
 * @example
 * // Parse arguments without running
 * import { parseArgs } from './cli'
 *
 * const parsed = parseArgs(['commit', '-m', 'Fix parser'])
 * console.log(parsed.command) // 'commit'
 * console.log(parsed.options.m) // 'Fix parser'
 */

import cac from 'cac'
import { resolve } from 'path'
import { addCommand } from './commands/add'
import { branchCommand, tagCommand } from './commands/branch'
import { checkoutCommand, resetCommand } from './commands/checkout'
import { commitCommand } from './commands/commit'
import { diffCommand } from './commands/diff'
import { initCommand } from './commands/init'
import { logCommand, showCommand } from './commands/log'
import { mergeCommand } from './commands/merge'
import {
  catFileCommand,
  hashObjectCommand,
  mergeBaseCommand,
  readTreeCommand,
  writeTreeCommand,
} from './commands/plumbing'
import { fetchCommand, pushCommand } from './commands/remote'
import { statusCommand } from './commands/status'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for configuring CLI behavior.
 */
export interface CLIOptions {
  /** Working directory for command execution (default: process.cwd()) */
  cwd?: string
  /** Custom function for standard output */
  stdout?: (msg: string) => void
  /** Custom function for error output */
  stderr?: (msg: string) => void
  /** Environment handed to the repository (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Result returned from CLI command execution.
 */
export interface CLIResult {
  /** Exit code (0 for success, non-zero for failure) */
  exitCode: number
  /** The command that was executed, if any */
  command?: string
  /** Error object if command failed */
  error?: Error
}

/** Parsed option values keyed by (camelCased) option name */
export type CommandOptions = Record<string, unknown>

/**
 * Parsed command-line arguments structure.
 *
 * @example
 * // Parsing 'grove -C repo diff --cached'
 * const parsed: ParsedArgs = {
 *   command: 'diff',
 *   args: [],
 *   options: { cached: true, C: 'repo', cwd: 'repo' },
 *   rawArgs: [],
 *   cwd: '/abs/path/to/repo'
 * }
 */
export interface ParsedArgs {
  /** The subcommand to execute (e.g., 'status', 'diff') */
  command?: string
  /** Positional arguments after the command */
  args: string[]
  /** Key-value pairs of parsed options/flags */
  options: CommandOptions
  /** Arguments after '--' separator (passed through unchanged) */
  rawArgs: string[]
  /** Working directory for command execution */
  cwd: string
}

/**
 * Context object passed to command handlers.
 */
export interface CommandContext {
  /** Current working directory for the command */
  cwd: string
  /** Positional arguments passed to the command */
  args: string[]
  /** Parsed options/flags for the command */
  options: CommandOptions
  /** Raw arguments after '--' separator */
  rawArgs: string[]
  /** Function to write to standard output */
  stdout: (msg: string) => void
  /** Function to write to standard error */
  stderr: (msg: string) => void
  /** Environment for repository configuration */
  env: NodeJS.ProcessEnv
}

/**
 * Command handlers throw to report failure.
 */
export type CommandHandler = (ctx: CommandContext) => void | Promise<void>

// ============================================================================
// Constants
// ============================================================================

/** One-line description of every subcommand, in help order */
const SUBCOMMANDS: Record<string, string> = {
  init: 'Create an empty repository',
  add: 'Add file contents to the index',
  commit: 'Record the index as a new commit',
  status: 'Show the working tree status',
  diff: 'Show changes between commits, the index and the working tree',
  log: 'Show commit history',
  show: 'Show a commit and its changes',
  branch: 'List or create branches',
  tag: 'List or create tags',
  checkout: 'Switch branches or detach HEAD at a commit',
  reset: 'Move HEAD to a commit',
  merge: 'Join another history into the current branch',
  'merge-base': 'Find a common ancestor of two commits',
  fetch: 'Download objects and branches from another repository',
  push: 'Update a branch in another repository',
  'hash-object': 'Store a file as a blob',
  'cat-file': 'Print the contents of an object',
  'write-tree': 'Write the index as a tree object',
  'read-tree': 'Read a tree into the index',
}

/** Current CLI version */
const VERSION = '0.1.0'

/** CLI name */
const NAME = 'grove'

function isSubcommand(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUBCOMMANDS, name)
}

// ============================================================================
// CLI Class
// ============================================================================

/**
 * Main CLI class for the grove command-line interface.
 *
 * @example
 * const output: string[] = []
 * const cli = new CLI({ stdout: (msg) => output.push(msg) })
 * cli.registerCommand('status', statusCommand)
 * const result = await cli.run(['status'])
 */
export class CLI {
  /** The name of the CLI tool */
  public name: string

  /** The version of the CLI tool */
  public version: string

  /** Registered command handlers */
  private handlers: Map<string, CommandHandler> = new Map()

  private stdout: (msg: string) => void

  private stderr: (msg: string) => void

  private env: NodeJS.ProcessEnv

  constructor(options: { name?: string; version?: string; stdout?: (msg: string) => void; stderr?: (msg: string) => void; env?: NodeJS.ProcessEnv } = {}) {
    this.name = options.name ?? NAME
    this.version = options.version ?? VERSION
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
    this.env = options.env ?? process.env
  }

  registerCommand(name: string, handler: CommandHandler): void {
    this.handlers.set(name, handler)
  }

  /**
   * Parses arguments and executes the matching handler.
   *
   * @param args - Command-line arguments (excluding 'node' and script name)
   * @param options.cwd - Base directory for relative `--cwd` values
   * @throws Never throws directly - errors are captured in CLIResult.error
   */
  async run(args: string[], options: { cwd?: string } = {}): Promise<CLIResult> {
    const parsed = parseArgs(args, options.cwd)

    if (parsed.options.help) {
      this.stdout(parsed.command && isSubcommand(parsed.command) ? this.getSubcommandHelp(parsed.command) : this.getHelp())
      return { exitCode: 0, ...(parsed.command !== undefined && { command: parsed.command }) }
    }

    if (!parsed.command && parsed.options.version) {
      this.stdout(`${this.name} ${this.version}`)
      return { exitCode: 0 }
    }

    if (!parsed.command) {
      this.stdout(this.getHelp())
      return { exitCode: 0 }
    }

    const handler = this.handlers.get(parsed.command)
    if (!handler) {
      const suggestion = this.suggestCommand(parsed.command)
      let errorMsg = `error: unknown command '${parsed.command}'`
      if (suggestion) {
        errorMsg += `\nDid you mean '${suggestion}'?`
      }
      errorMsg += `\nRun '${this.name} --help' for available commands.`
      this.stderr(errorMsg)
      return { exitCode: 1, command: parsed.command, error: new Error(`Unknown command: ${parsed.command}`) }
    }

    try {
      await handler({
        cwd: parsed.cwd,
        args: parsed.args,
        options: parsed.options,
        rawArgs: parsed.rawArgs,
        stdout: this.stdout,
        stderr: this.stderr,
        env: this.env,
      })
      return { exitCode: 0, command: parsed.command }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`error: ${error.message}`)
      return { exitCode: 1, command: parsed.command, error }
    }
  }

  private getHelp(): string {
    const width = Math.max(...Object.keys(SUBCOMMANDS).map((name) => name.length)) + 2
    const commands = Object.entries(SUBCOMMANDS)
      .map(([name, description]) => `  ${name.padEnd(width)}${description}`)
      .join('\n')

    return `${this.name} v${this.version}

Usage: ${this.name} [options] <command> [args...]

Commands:
${commands}

Options:
  -h, --help     Show help
  -v, --version  Show version
  -C, --cwd      Set the working directory`
  }

  private getSubcommandHelp(command: string): string {
    return `${this.name} ${command}

${SUBCOMMANDS[command] ?? 'Command help'}

Usage: ${this.name} ${command} [options] [args...]`
  }

  /**
   * Closest known command within 3 edits, or null.
   */
  private suggestCommand(input: string): string | null {
    let minDistance = Infinity
    let suggestion: string | null = null

    for (const cmd of Object.keys(SUBCOMMANDS)) {
      const distance = levenshteinDistance(input, cmd)
      if (distance < minDistance && distance <= 3) {
        minDistance = distance
        suggestion = cmd
      }
    }

    return suggestion
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Minimum number of single-character edits turning `a` into `b`.
 *
 * @example
 * levenshteinDistance('status', 'staus') // Returns 1
 */
export function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = []

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i]
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1]
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1
        )
      }
    }
  }

  return matrix[b.length][a.length]
}

// ============================================================================
// Exported Functions
// ============================================================================

export function createCLI(options: CLIOptions & { name?: string; version?: string } = {}): CLI {
  return new CLI(options)
}

/**
 * Parses command-line arguments with cac.
 *
 * @param args - Arguments excluding 'node' and the script name
 * @param baseCwd - Directory `--cwd` is resolved against (default: process.cwd())
 *
 * @example
 * const parsed = parseArgs(['-C', '/repo', 'reset', '--hard', 'HEAD'])
 * // parsed.command === 'reset', parsed.args === ['HEAD'], parsed.options.hard === true
 */
export function parseArgs(args: string[], baseCwd: string = process.cwd()): ParsedArgs {
  const cli = cac(NAME)

  // Global options
  cli.option('-C, --cwd <path>', 'Set the working directory')
  cli.option('-h, --help', 'Show help')
  cli.option('-v, --version', 'Show version')

  // commit
  cli.option('-m, --message <message>', 'Commit message')

  // hash-object / cat-file
  cli.option('-t, --type <type>', 'Object type')

  // diff
  cli.option('--cached', 'Compare the index instead of the working tree')

  // log
  cli.option('-n, --max-count <count>', 'Limit the number of commits')
  cli.option('--oneline', 'Show each commit on a single line')

  // read-tree
  cli.option('-u, --update', 'Also update the working tree')

  // reset
  cli.option('--hard', 'Also reset the index and working tree')

  const parsed = cli.parse(['node', NAME, ...args], { run: false })

  let command: string | undefined
  const commandArgs: string[] = []
  for (const arg of parsed.args) {
    if (command === undefined) {
      command = arg
    } else {
      commandArgs.push(arg)
    }
  }

  const options: CommandOptions = { ...parsed.options }
  const separated = options['--']
  delete options['--']
  const rawArgs = Array.isArray(separated) ? separated.map(String) : []

  const cwdOption = options.cwd
  const cwd = typeof cwdOption === 'string' ? resolve(baseCwd, cwdOption) : baseCwd

  return {
    ...(command !== undefined && { command }),
    args: commandArgs,
    options,
    rawArgs,
    cwd,
  }
}

/**
 * Creates a CLI with every grove command registered.
 */
export function createGroveCLI(options: CLIOptions = {}): CLI {
  const cli = createCLI(options)

  cli.registerCommand('init', initCommand)
  cli.registerCommand('add', addCommand)
  cli.registerCommand('commit', commitCommand)
  cli.registerCommand('status', statusCommand)
  cli.registerCommand('diff', diffCommand)
  cli.registerCommand('log', logCommand)
  cli.registerCommand('show', showCommand)
  cli.registerCommand('branch', branchCommand)
  cli.registerCommand('tag', tagCommand)
  cli.registerCommand('checkout', checkoutCommand)
  cli.registerCommand('reset', resetCommand)
  cli.registerCommand('merge', mergeCommand)
  cli.registerCommand('merge-base', mergeBaseCommand)
  cli.registerCommand('fetch', fetchCommand)
  cli.registerCommand('push', pushCommand)
  cli.registerCommand('hash-object', hashObjectCommand)
  cli.registerCommand('cat-file', catFileCommand)
  cli.registerCommand('write-tree', writeTreeCommand)
  cli.registerCommand('read-tree', readTreeCommand)

  return cli
}

/**
 * Creates the full CLI and runs it once.
 *
 * @example
 * const result = await runCLI(['status'], { cwd: '/work/project' })
 * process.exitCode = result.exitCode
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  return createGroveCLI(options).run(args, options.cwd !== undefined ? { cwd: options.cwd } : {})
}
