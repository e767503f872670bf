import { describe, expect, it } from 'vitest'
import { captureLogger } from '../../ingestion/draws/__tests__/helpers.js'
import { createRunId, createWorkflowLogger, hashValue, sanitizeUrl } from '../structured-log.js'

describe('sanitizeUrl', () => {
  it('keeps host and path but drops the query string', () => {
    expect(sanitizeUrl('https://api.example.test/draws?openDate=2025-08-19&token=x')).toEqual({
      urlHost: 'api.example.test',
      urlPath: '/draws',
    })
  })

  it('hashes values that are not URLs', () => {
    expect(sanitizeUrl('not a url')).toEqual({ urlHash: hashValue('not a url') })
    expect(hashValue('not a url')).toHaveLength(16)
    expect(sanitizeUrl(undefined)).toEqual({})
  })
})

describe('createWorkflowLogger', () => {
  it('adds the workflow envelope and drops empty fields', () => {
    const { logger, lines } = captureLogger()
    const log = createWorkflowLogger(logger, { workflow: 'harvest', stage: 'acquire', runId: 'run-1' })

    log.info('HARVEST_STATE', { to: 'TRY_API', source: undefined })

    expect(lines[0].entry).toMatchObject({
      message: 'HARVEST_STATE',
      event_name: 'HARVEST_STATE',
      workflow: 'harvest',
      stage: 'acquire',
      runId: 'run-1',
      to: 'TRY_API',
    })
    expect(lines[0].entry).not.toHaveProperty('source')
  })

  it('lets a child change the stage but not the workflow', () => {
    const { logger, lines } = captureLogger()
    const log = createWorkflowLogger(logger, { workflow: 'harvest', stage: 'acquire' })

    log.child({ stage: 'merge', workflow: 'other', attempt: 2 }).warn('DRAW_CONFLICT')

    expect(lines[0].level).toBe('warn')
    expect(lines[0].entry).toMatchObject({ workflow: 'harvest', stage: 'merge', attempt: 2 })
  })

  it('forwards the error at every level', () => {
    const { logger, lines } = captureLogger()
    const log = createWorkflowLogger(logger, { workflow: 'harvest', stage: 'acquire' })

    log.debug('PAGE_FETCHED', {}, new Error('slow'))
    log.info('HARVEST_STATE', {}, new Error('retried'))

    expect(lines.map(line => line.entry.error)).toEqual([
      expect.objectContaining({ message: 'slow' }),
      expect.objectContaining({ message: 'retried' }),
    ])
  })
})

describe('createRunId', () => {
  it('is stable for a given instant', () => {
    const now = new Date('2025-08-19T02:00:00Z')
    expect(createRunId(now)).toBe(createRunId(now))
    expect(createRunId(now)).toMatch(/^run_[0-9a-z]+_[0-9a-f]{6}$/)
  })
})
