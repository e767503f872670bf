import { describe, expect, it } from 'vitest'
import { exportStore, serializeStore } from '../codec.js'
import { isComplete } from '../normalize.js'
import { reconcile } from '../reconcile.js'
import { captureLogger, record, storeOf } from './helpers.js'

describe('reconcile', () => {
  it('inserts new periods and exports them in ascending numeric order', () => {
    const result = reconcile(new Map(), [record('114000010', 1, 5), record('114000009', 2, 6)])

    expect(result.added).toBe(2)
    expect(result.changed).toBe(true)
    expect(exportStore(result.store).map(entry => entry.period)).toEqual(['114000009', '114000010'])
  })

  it('never replaces a complete record with an incomplete one', () => {
    const existing = storeOf(record('114000001', 1, 5, '2025-08-19'))

    const result = reconcile(existing, [record('114000001', 30)])

    expect(result.store.get('114000001')).toEqual(record('114000001', 1, 5, '2025-08-19'))
    expect(result.changed).toBe(false)
    expect(result.added + result.upgraded + result.conflicts).toBe(0)
  })

  it('upgrades an incomplete record to a complete one', () => {
    const existing = storeOf(record('114000001', 1))

    const result = reconcile(existing, [record('114000001', 1, 9)])

    expect(result.upgraded).toBe(1)
    expect(result.store.get('114000001')?.superNumber).toBe(9)
    expect(result.changed).toBe(true)
  })

  it('keeps the first complete record when two complete ones disagree', () => {
    const { logger, lines } = captureLogger()
    const existing = storeOf(record('114000001', 1, 5))

    const result = reconcile(existing, [record('114000001', 1, 6)], logger)

    expect(result.conflicts).toBe(1)
    expect(result.store.get('114000001')?.superNumber).toBe(5)
    expect(result.changed).toBe(false)
    expect(lines.map(line => [line.level, line.entry.message, line.entry.period])).toEqual([
      ['warn', 'DRAW_CONFLICT', '114000001'],
    ])
  })

  it('reports no change when fetched rows are already stored', () => {
    const existing = storeOf(record('114000001', 1, 5), record('114000002', 2, 6), record('114000003', 3, 7))

    const result = reconcile(existing, [record('114000002', 2, 6), record('114000003', 3, 7)])

    expect(result.changed).toBe(false)
    expect(result.added).toBe(0)
  })

  it('is idempotent', () => {
    const existing = storeOf(record('114000001', 1), record('114000002', 2, 6))
    const incoming = [record('114000001', 1, 5), record('114000003', 3), record('114000003', 3, 8)]

    const once = reconcile(existing, incoming)
    const twice = reconcile(once.store, incoming)

    expect(serializeStore(twice.store)).toBe(serializeStore(once.store))
    expect(twice.changed).toBe(false)
  })

  it('keeps complete entries complete across later merges', () => {
    let store = storeOf(record('114000001', 1, 5))
    for (const incoming of [[record('114000001', 2)], [record('114000001', 3, 7)], [record('114000001', 4)]]) {
      store = reconcile(store, incoming).store
      const current = store.get('114000001')
      expect(current && isComplete(current)).toBe(true)
    }
  })

  it('does not mutate the existing store', () => {
    const existing = storeOf(record('114000001', 1, 5))

    reconcile(existing, [record('114000002', 2, 6)])

    expect([...existing.keys()]).toEqual(['114000001'])
  })
})
