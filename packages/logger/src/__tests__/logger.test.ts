import { describe, expect, it } from 'vitest'
import { createLogger, redactContext, type LogLevel } from '../index.js'

function captureLogger(level: LogLevel = 'debug') {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = []
  const logger = createLogger('harvester', {
    level,
    format: 'json',
    sink: (lineLevel, line) => {
      const entry: unknown = JSON.parse(line)
      if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
        lines.push({ level: lineLevel, entry: Object.fromEntries(Object.entries(entry)) })
      }
    },
  })
  return { logger, lines }
}

describe('createLogger', () => {
  it('writes one JSON entry per call with service and message', () => {
    const { logger, lines } = captureLogger()

    logger.info('Run started', { targetDate: '2025-08-19' })

    expect(lines).toHaveLength(1)
    expect(lines[0].level).toBe('info')
    expect(lines[0].entry.service).toBe('harvester')
    expect(lines[0].entry.message).toBe('Run started')
    expect(lines[0].entry.targetDate).toBe('2025-08-19')
  })

  it('drops entries below the configured level', () => {
    const { logger, lines } = captureLogger('warn')

    logger.debug('noise')
    logger.info('still noise')
    logger.warn('kept')

    expect(lines.map(line => line.entry.message)).toEqual(['kept'])
  })

  it('extends the component path and inherits context in child loggers', () => {
    const { logger, lines } = captureLogger()

    const child = logger.child('store', { runId: 'run-1' }).child('save')
    child.error('Write failed', { path: 'data/draws.json' }, new Error('EACCES'))

    expect(lines[0].entry.component).toBe('store:save')
    expect(lines[0].entry.runId).toBe('run-1')
    expect(lines[0].entry.error).toMatchObject({ name: 'Error', message: 'EACCES' })
  })
})

describe('redactContext', () => {
  it('masks values of sensitive keys only', () => {
    expect(redactContext({ apiKey: 'test-secret', authorization: 'Bearer x', page: 2 })).toEqual({
      apiKey: '[REDACTED]',
      authorization: '[REDACTED]',
      page: 2,
    })
  })
})
