import { describe, it, expect, vi } from 'vitest'
import { NonFastForwardError } from '../../src/errors'
import {
  LogLevel,
  createLineHandler,
  createLogger,
  noopLogger,
  parseLogLevel,
  type LogEntry,
} from '../../src/utils/logger'

function capture() {
  const entries: LogEntry[] = []
  return { entries, handler: (entry: LogEntry) => entries.push(entry) }
}

describe('createLogger', () => {
  it('filters entries below the minimum level', () => {
    const { entries, handler } = capture()
    const logger = createLogger({ minLevel: LogLevel.WARN, handler })

    logger.debug('debug')
    logger.info('info')
    logger.warn('warn')
    logger.error('error')

    expect(entries.map((entry) => entry.level)).toEqual([LogLevel.WARN, LogLevel.ERROR])
  })

  it('defaults to INFO', () => {
    const { entries, handler } = capture()
    const logger = createLogger({ handler })
    logger.debug('hidden')
    logger.info('shown')
    expect(entries.map((entry) => entry.message)).toEqual(['shown'])
  })

  it('adds component, context and data', () => {
    const { entries, handler } = capture()
    const logger = createLogger({ component: 'sync', context: { remote: 'origin' }, handler })

    logger.info('Fetch completed', { copied: 3 })

    expect(entries[0]).toMatchObject({
      level: LogLevel.INFO,
      message: 'Fetch completed',
      component: 'sync',
      data: { remote: 'origin', copied: 3 },
    })
    expect(typeof entries[0]?.timestamp).toBe('string')
  })

  it('omits data when there is none', () => {
    const { entries, handler } = capture()
    createLogger({ handler }).info('plain')
    expect(entries[0]?.data).toBeUndefined()
    expect(entries[0]?.component).toBeUndefined()
  })

  it('leaves out empty data and error stacks from the JSON line', () => {
    const lines: string[] = []
    createLogger({ handler: createLineHandler((line) => lines.push(line)) }).error('Fetch failed', new Error('gone'))

    expect(Object.keys(JSON.parse(lines[0] ?? '{}'))).toEqual(['timestamp', 'level', 'message', 'error'])
    expect(JSON.parse(lines[0] ?? '{}').error).toEqual({ name: 'Error', message: 'gone' })
  })

  it('serializes errors with their code', () => {
    const { entries, handler } = capture()
    const error = new NonFastForwardError('refs/heads/master', 'a'.repeat(40), 'b'.repeat(40))

    createLogger({ handler }).error('Push failed', error)

    expect(entries[0]?.error).toEqual({
      name: 'NonFastForwardError',
      message: error.message,
      code: 'NON_FAST_FORWARD',
    })
  })

  it('child loggers merge context and keep the level', () => {
    const { entries, handler } = capture()
    const parent = createLogger({ component: 'sync', minLevel: LogLevel.INFO, context: { repo: '/r' }, handler })
    const child = parent.child({ remote: 'origin' })

    child.debug('hidden')
    child.info('shown', { oid: 'x' })

    expect(entries).toHaveLength(1)
    expect(entries[0]?.component).toBe('sync')
    expect(entries[0]?.data).toEqual({ repo: '/r', remote: 'origin', oid: 'x' })
  })

  it('writes JSON to the console by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    try {
      createLogger({ component: 'repository' }).warn('careful')
      expect(warn).toHaveBeenCalledTimes(1)
      const line = warn.mock.calls[0]?.[0]
      expect(typeof line).toBe('string')
      expect(JSON.parse(String(line))).toMatchObject({ level: 'warn', message: 'careful', component: 'repository' })
    } finally {
      warn.mockRestore()
    }
  })
})

describe('createLineHandler', () => {
  it('writes one JSON line per entry', () => {
    const lines: string[] = []
    const logger = createLogger({ handler: createLineHandler((line) => lines.push(line)) })

    logger.info('one')
    logger.warn('two')

    expect(lines).toHaveLength(2)
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ level: 'warn', message: 'two' })
  })
})

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG)
    expect(parseLogLevel(' ERROR ')).toBe(LogLevel.ERROR)
  })

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined()
  })
})

describe('noopLogger', () => {
  it('returns itself for children', () => {
    expect(noopLogger.child({ a: 1 })).toBe(noopLogger)
  })
})
