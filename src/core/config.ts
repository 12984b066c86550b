/**
 * @fileoverview Repository configuration
 *
 * INI-style file at `<repo>/.grove/config`:
 *
 * ```ini
 * [core]
 *     minPrefixLength = 4
 *     maxSymrefDepth = 10
 *     logLevel = warn
 * [remote "origin"]
 *     path = ../upstream
 * ```
 *
 * Absent keys take their defaults. `GROVE_LOG_LEVEL` in the environment
 * overrides `core.logLevel`.
 *
 * @module core/config
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { ConfigError } from '../errors'
import { isErrnoCode } from '../storage/fs-errors'
import { DEFAULT_MAX_SYMREF_DEPTH } from '../refs/storage'
import { DEFAULT_MIN_PREFIX_LENGTH } from '../refs/revision'
import { LogLevel, parseLogLevel } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

export interface RemoteConfig {
  name: string
  /** Remote working directory, as written (relative paths are relative to the repository root) */
  path: string
}

export interface GroveConfig {
  minPrefixLength: number
  maxSymrefDepth: number
  logLevel: LogLevel
  remotes: Map<string, RemoteConfig>
}

/** section name → key → value; subsections keep their quoted form (`remote "origin"`) */
export type ConfigSections = Map<string, Map<string, string>>

export const CONFIG_FILE = 'config'
export const LOG_LEVEL_ENV = 'GROVE_LOG_LEVEL'

export const DEFAULT_LOG_LEVEL = LogLevel.WARN

export const DEFAULT_CONFIG_TEXT =
  '[core]\n' +
  `\tminPrefixLength = ${DEFAULT_MIN_PREFIX_LENGTH}\n` +
  `\tmaxSymrefDepth = ${DEFAULT_MAX_SYMREF_DEPTH}\n` +
  `\tlogLevel = ${DEFAULT_LOG_LEVEL}\n`

export function defaultConfig(): GroveConfig {
  return {
    minPrefixLength: DEFAULT_MIN_PREFIX_LENGTH,
    maxSymrefDepth: DEFAULT_MAX_SYMREF_DEPTH,
    logLevel: DEFAULT_LOG_LEVEL,
    remotes: new Map(),
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Splits config text into sections. Blank lines and `#`/`;` comments are
 * skipped; keys before any section header are ignored.
 */
export function parseConfigText(text: string): ConfigSections {
  const sections: ConfigSections = new Map()
  let current: Map<string, string> | undefined

  for (const line of text.split('\n')) {
    const trimmed = line.trim()
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) continue

    const header = trimmed.match(/^\[\s*([A-Za-z][\w.-]*)(?:\s+"([^"]*)")?\s*\]$/)
    if (header) {
      const [, name, sub] = header
      const key = sub === undefined ? name.toLowerCase() : `${name.toLowerCase()} "${sub}"`
      current = sections.get(key) ?? new Map()
      sections.set(key, current)
      continue
    }

    const entry = trimmed.match(/^([A-Za-z][\w-]*)\s*=\s*(.*)$/)
    if (entry && current) {
      const [, key, value] = entry
      current.set(key, value.trim())
    }
  }

  return sections
}

function parsePositiveInt(key: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigError(key, value, 'expected a positive integer')
  }
  return Number(value)
}

function parseLevel(key: string, value: string | undefined): LogLevel {
  if (value === undefined) return DEFAULT_LOG_LEVEL
  const level = parseLogLevel(value)
  if (level === undefined) {
    throw new ConfigError(key, value, `expected one of ${Object.values(LogLevel).join(', ')}`)
  }
  return level
}

/**
 * @throws ConfigError for invalid numbers or log levels
 */
export function resolveConfig(sections: ConfigSections, env: NodeJS.ProcessEnv = {}): GroveConfig {
  const core = sections.get('core') ?? new Map<string, string>()
  const envLevel = env[LOG_LEVEL_ENV]

  const remotes = new Map<string, RemoteConfig>()
  for (const [section, values] of sections) {
    const match = section.match(/^remote "(.+)"$/)
    const remotePath = values.get('path')
    if (match && remotePath !== undefined) {
      remotes.set(match[1], { name: match[1], path: remotePath })
    }
  }

  return {
    minPrefixLength: parsePositiveInt('core.minPrefixLength', core.get('minPrefixLength'), DEFAULT_MIN_PREFIX_LENGTH),
    maxSymrefDepth: parsePositiveInt('core.maxSymrefDepth', core.get('maxSymrefDepth'), DEFAULT_MAX_SYMREF_DEPTH),
    logLevel: envLevel
      ? parseLevel(LOG_LEVEL_ENV, envLevel)
      : parseLevel('core.logLevel', core.get('logLevel')),
    remotes,
  }
}

/**
 * Reads `<gitDir>/config`. A missing file yields the defaults.
 */
export async function loadConfig(gitDir: string, env: NodeJS.ProcessEnv = process.env): Promise<GroveConfig> {
  let text = ''
  try {
    text = await fs.readFile(path.join(gitDir, CONFIG_FILE), 'utf8')
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) throw error
  }
  return resolveConfig(parseConfigText(text), env)
}
