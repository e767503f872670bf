/**
 * Merge/Reconciliation Store
 *
 * Upsert keyed by period, never deleting. An existing entry is replaced
 * only by a strictly more complete record, so a complete entry can never
 * regress. Two complete records that disagree resolve first-complete-wins:
 * the stored one stays and the incoming one is counted as a conflict.
 *
 * `changed` compares serialized exports, so a merge that only re-inserts
 * identical records is not a change and triggers no write.
 */

import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'
import { serializeStore } from './codec.js'
import { isComplete } from './normalize.js'
import type { DrawRecord, DrawStore, ReconcileResult } from './types.js'

export function sameContent(a: DrawRecord, b: DrawRecord): boolean {
  return (
    a.period === b.period &&
    (a.date ?? '') === (b.date ?? '') &&
    a.superNumber === b.superNumber &&
    a.balls.length === b.balls.length &&
    a.balls.every((ball, i) => ball === b.balls[i])
  )
}

/**
 * Whether `incoming` may replace `current` for the same period: only a
 * complete record over an incomplete one.
 */
export function supersedes(current: DrawRecord, incoming: DrawRecord): boolean {
  return !isComplete(current) && isComplete(incoming)
}

export function reconcile(
  existing: DrawStore,
  incoming: readonly DrawRecord[],
  logger: ILogger = loggers.store
): ReconcileResult {
  const store: DrawStore = new Map(existing)
  let added = 0
  let upgraded = 0
  let conflicts = 0

  for (const record of incoming) {
    const current = store.get(record.period)

    if (!current) {
      store.set(record.period, record)
      added++
      continue
    }

    if (!isComplete(current)) {
      if (supersedes(current, record)) {
        store.set(record.period, record)
        upgraded++
      }
      continue
    }

    if (isComplete(record) && !sameContent(current, record)) {
      conflicts++
      logger.warn('DRAW_CONFLICT', {
        period: record.period,
        storedSuper: current.superNumber,
        incomingSuper: record.superNumber,
      })
    }
  }

  return {
    store,
    changed: serializeStore(existing) !== serializeStore(store),
    added,
    upgraded,
    conflicts,
  }
}
