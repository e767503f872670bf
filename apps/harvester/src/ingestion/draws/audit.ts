/**
 * Store audit
 *
 * Reads the persisted file as-is (the gateway's load() silently drops what
 * it cannot use) and reports every entry that breaks the record invariants,
 * the export order, or looks suspicious: missing super numbers and gaps in
 * the period sequence within one draw date.
 */

import { readFile } from 'node:fs/promises'
import { comparePeriods, parseStoredRecord } from './codec.js'
import { safeJsonParse } from './kit/json.js'
import { isComplete } from './normalize.js'
import type { DrawRecord } from './types.js'

export type AuditProblemKind =
  | 'UNREADABLE'
  | 'NOT_A_LIST'
  | 'INVALID_RECORD'
  | 'DUPLICATE_PERIOD'
  | 'OUT_OF_ORDER'
  | 'INCOMPLETE'
  | 'PERIOD_GAP'

export interface AuditProblem {
  kind: AuditProblemKind
  /** Position in the persisted list */
  index?: number
  period?: string
  message: string
}

export interface AuditReport {
  entries: number
  valid: number
  problems: AuditProblem[]
}

function describePeriod(entry: unknown): string | undefined {
  if (typeof entry !== 'object' || entry === null || !('period' in entry)) return undefined
  const { period } = entry
  return typeof period === 'string' || typeof period === 'number' ? String(period) : undefined
}

export function auditEntries(entries: readonly unknown[]): AuditReport {
  const problems: AuditProblem[] = []
  const seen = new Set<string>()
  let previous: DrawRecord | undefined
  let valid = 0

  entries.forEach((entry, index) => {
    const record = parseStoredRecord(entry)
    if (!record) {
      problems.push({
        kind: 'INVALID_RECORD',
        index,
        period: describePeriod(entry),
        message: 'entry breaks the record invariants',
      })
      return
    }
    valid++

    if (seen.has(record.period)) {
      problems.push({ kind: 'DUPLICATE_PERIOD', index, period: record.period, message: 'period appears more than once' })
    }
    seen.add(record.period)

    if (!isComplete(record)) {
      problems.push({ kind: 'INCOMPLETE', index, period: record.period, message: 'no super number' })
    }

    if (previous) {
      if (comparePeriods(previous.period, record.period) > 0) {
        problems.push({
          kind: 'OUT_OF_ORDER',
          index,
          period: record.period,
          message: `follows ${previous.period}`,
        })
      } else if (record.date && record.date === previous.date) {
        const missing = BigInt(record.period) - BigInt(previous.period) - 1n
        if (missing > 0n) {
          problems.push({
            kind: 'PERIOD_GAP',
            index,
            period: record.period,
            message: `${missing} period(s) missing after ${previous.period} on ${record.date}`,
          })
        }
      }
    }
    previous = record
  })

  return { entries: entries.length, valid, problems }
}

export async function auditStoreFile(path: string): Promise<AuditReport> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return { entries: 0, valid: 0, problems: [{ kind: 'UNREADABLE', message: reason }] }
  }

  const parsed = safeJsonParse(text)
  if (!parsed.ok) {
    return { entries: 0, valid: 0, problems: [{ kind: 'UNREADABLE', message: parsed.error }] }
  }
  if (!Array.isArray(parsed.value)) {
    return { entries: 0, valid: 0, problems: [{ kind: 'NOT_A_LIST', message: 'top-level value is not a list' }] }
  }

  return auditEntries(parsed.value)
}
