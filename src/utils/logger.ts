/**
 * @fileoverview Structured logging for grove.
 *
 * Entries are plain objects serialized as one JSON line each. The repository
 * handle, the sync protocol and the CLI each log through a component logger;
 * tests pass {@link noopLogger} or a capturing handler.
 *
 * @module utils/logger
 *
 * @example
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'sync', minLevel: LogLevel.DEBUG })
 * logger.info('Fetch completed', { copied: 12 })
 *
 * const remoteLogger = logger.child({ remote: '../upstream' })
 * remoteLogger.debug('Copying object', { oid })
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Structured log entry.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  /** Component name, e.g. 'repository' or 'sync' */
  component?: string
  error?: {
    name: string
    message: string
    code?: string
  }
  /** Merged logger context and call data */
  data?: Record<string, unknown>
}

/**
 * Logger handed to the repository handle, the sync operations and the CLI.
 */
export interface Logger {
  /**
   * Diagnostic detail, such as each object copied during a fetch.
   */
  debug(message: string, data?: Record<string, unknown>): void

  /**
   * A completed step worth recording: a commit, a merge outcome, a fetch.
   */
  info(message: string, data?: Record<string, unknown>): void

  /**
   * Something the user has to act on, such as a merge that left conflicts.
   */
  warn(message: string, data?: Record<string, unknown>): void

  /**
   * A failed operation. The error's name, message and code (when it has one)
   * are recorded; the stack is not.
   */
  error(message: string, error?: Error, data?: Record<string, unknown>): void

  /**
   * Logger with the same component, level and handler whose entries also
   * carry `context`.
   *
   * @example
   * const remoteLogger = logger.child({ remote: 'origin' })
   */
  child(context: Record<string, unknown>): Logger
}

export interface LoggerOptions {
  /** Component name recorded on every entry */
  component?: string
  /** Minimum level to output (default: INFO) */
  minLevel?: LogLevel
  /** Context included in every entry */
  context?: Record<string, unknown>
  /** Receives each entry that passes the level filter (default: console) */
  handler?: (entry: LogEntry) => void
}

// ============================================================================
// Handlers
// ============================================================================

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.info(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
}

function consoleHandler(entry: LogEntry): void {
  CONSOLE_METHODS[entry.level](JSON.stringify(entry))
}

/**
 * Handler writing one JSON line per entry to the given sink.
 * The CLI uses it to keep log output on stderr.
 */
export function createLineHandler(write: (line: string) => void): (entry: LogEntry) => void {
  return (entry) => write(JSON.stringify(entry))
}

/**
 * Parses a level name (case-insensitive). Returns undefined for unknown names.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase()
  return Object.values(LogLevel).find((level) => level === normalized)
}

// ============================================================================
// Logger Implementation
// ============================================================================

function describeError(error: Error): NonNullable<LogEntry['error']> {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
  return { name: error.name, message: error.message, ...(code !== undefined && { code }) }
}

/**
 * Creates a logger. Entries below `minLevel` are dropped before they are
 * built; `data` is omitted when neither the context nor the call adds any.
 *
 * @example
 * const logger = createLogger({ component: 'repository', context: { repo: root } })
 * logger.info('Committed', { oid })
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { component, minLevel = LogLevel.INFO, context = {}, handler = consoleHandler } = options
  const threshold = LOG_LEVEL_PRIORITY[minLevel]

  const emit = (level: LogLevel, message: string, error?: Error, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < threshold) return

    const merged = { ...context, ...data }
    handler({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(component !== undefined && { component }),
      ...(error !== undefined && { error: describeError(error) }),
      ...(Object.keys(merged).length > 0 && { data: merged }),
    })
  }

  return {
    debug: (message, data) => emit(LogLevel.DEBUG, message, undefined, data),
    info: (message, data) => emit(LogLevel.INFO, message, undefined, data),
    warn: (message, data) => emit(LogLevel.WARN, message, undefined, data),
    error: (message, error, data) => emit(LogLevel.ERROR, message, error, data),
    child: (childContext) =>
      createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      }),
  }
}

/**
 * Logger that discards everything.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
