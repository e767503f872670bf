/**
 * Conversion between DrawRecord and the persisted byte-schema, plus the
 * canonical export order shared by the merge step, the gateway and audit.
 */

import { z } from 'zod'
import { parseDrawDate } from './kit/dates.js'
import { isPlainObject } from './kit/json.js'
import { canonicalPeriod, isValidDrawRecord } from './normalize.js'
import type { DrawRecord, DrawStore, StoredDrawRecord } from './types.js'

export const storedRecordSchema = z.object({
  period: z.union([
    z.string().regex(/^\d+$/).transform(canonicalPeriod),
    z.number().int().nonnegative().transform(String),
  ]),
  date: z.string().default(''),
  balls: z.array(z.number().int()),
  super: z.number().int().nullable().default(null),
})

export function toStoredRecord(record: DrawRecord): StoredDrawRecord {
  return {
    period: record.period,
    date: record.date ?? '',
    balls: [...record.balls].sort((a, b) => a - b),
    super: record.superNumber ?? null,
  }
}

/**
 * Persisted entry → DrawRecord, or undefined when it breaks an invariant.
 */
export function parseStoredRecord(raw: unknown): DrawRecord | undefined {
  const parsed = storedRecordSchema.safeParse(raw)
  if (!parsed.success) return undefined

  const { period, date, balls, super: superNumber } = parsed.data
  const record: DrawRecord = {
    period,
    balls: [...balls].sort((a, b) => a - b),
  }
  const isoDate = parseDrawDate(date)
  if (isoDate) record.date = isoDate
  if (superNumber !== null) record.superNumber = superNumber

  return isValidDrawRecord(record) ? record : undefined
}

/**
 * Lenient variant used when loading: an entry whose only fault is its
 * super number loads as an incomplete record, so a later run can upgrade it.
 */
export function recoverStoredRecord(raw: unknown): DrawRecord | undefined {
  const record = parseStoredRecord(raw)
  if (record || !isPlainObject(raw)) return record
  return parseStoredRecord({ ...raw, super: null })
}

/**
 * Numeric order of digit-string periods without converting to a number,
 * so periods longer than 15 digits still compare exactly.
 */
export function comparePeriods(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '')
  const right = b.replace(/^0+(?=\d)/, '')
  if (left.length !== right.length) {
    return left.length - right.length
  }
  if (left !== right) {
    return left < right ? -1 : 1
  }
  return a < b ? -1 : a > b ? 1 : 0
}

export function exportStore(store: DrawStore): StoredDrawRecord[] {
  return [...store.values()]
    .sort((a, b) => comparePeriods(a.period, b.period))
    .map(toStoredRecord)
}

export function serializeStore(store: DrawStore): string {
  return `${JSON.stringify(exportStore(store), null, 2)}\n`
}

export function maxPeriod(store: DrawStore): string | null {
  let max: string | null = null
  for (const period of store.keys()) {
    if (max === null || comparePeriods(period, max) > 0) {
      max = period
    }
  }
  return max
}
