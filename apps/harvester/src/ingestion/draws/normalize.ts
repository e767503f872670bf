/**
 * Record Normalizer
 *
 * Maps one heterogeneous upstream item to a DrawRecord or a rejection.
 * Each logical field has an ordered table of source keys and a coercion;
 * the first key whose value coerces wins.
 *
 * Balls come from, in order:
 * 1. the first ball-list field present (array, or string holding digits)
 * 2. twenty individually named slots (no1..no20, n01..n20, ...)
 * 3. a scan of every numeric token in the item's string/array values,
 *    skipping the fields already used for period, date and super number
 * keeping the first 20 distinct values in 1..80, in document order.
 *
 * Super number: explicit in-range field, else the 21st in-range token of
 * the ball source, else the last of the 20 balls in source order.
 */

import { parseDrawDate } from './kit/dates.js'
import { isPlainObject } from './kit/json.js'
import { distinctFirst, firstInteger, isBall, tokensOf } from './kit/tokens.js'
import type {
  DrawRecord,
  NormalizeRejectReason,
  NormalizeResult,
  NormalizedBatch,
  RawDrawItem,
} from './types.js'
import { BALL_COUNT, MAX_BALL, MIN_BALL } from './types.js'

export interface FieldRule<T> {
  keys: readonly string[]
  coerce: (value: unknown) => T | undefined
}

/** `'0114046629'` and `114046629` name the same draw. */
export function canonicalPeriod(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '')
}

function coercePeriod(value: unknown): string | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? String(value) : undefined
  }
  if (typeof value !== 'string') return undefined
  const digits = value.match(/\d+/)?.[0]
  return digits === undefined ? undefined : canonicalPeriod(digits)
}

function coerceBall(value: unknown): number | undefined {
  const n = firstInteger(value)
  return n !== undefined && isBall(n) ? n : undefined
}

export const PERIOD_FIELD: FieldRule<string> = {
  keys: ['period', 'drawTerm', 'term', 'issue', 'issueNo', 'drawNo', 'draw', 'periodNo', 'qihao', 'expect'],
  coerce: coercePeriod,
}

export const DATE_FIELD: FieldRule<string> = {
  keys: ['date', 'drawDate', 'openDate', 'lotteryDate', 'dDate', 'openTime', 'opentime', 'drawTime'],
  coerce: parseDrawDate,
}

export const SUPER_FIELD: FieldRule<number> = {
  keys: ['super', 'superNo', 'superNumber', 'starNo', 'starNumber', 'bullEyeTop', 'specialNumber', 'special'],
  coerce: coerceBall,
}

export const BALL_LIST_KEYS: readonly string[] = [
  'balls',
  'numbers',
  'winNo',
  'winNumbers',
  'openShowOrder',
  'bigShowOrder',
  'drawNumberAppear',
  'drawNumberSize',
  'opennum',
  'openCode',
  'nums',
  'result',
  'no',
]

export const BALL_SLOT_PREFIXES: readonly string[] = ['no', 'n', 'ball', 'num', 'b']

interface Resolved<T> {
  key: string
  value: T
}

export function resolveField<T>(item: RawDrawItem, rule: FieldRule<T>): Resolved<T> | undefined {
  for (const key of rule.keys) {
    const value = rule.coerce(item[key])
    if (value !== undefined) {
      return { key, value }
    }
  }
  return undefined
}

// A scalar such as `result: 'OK'` or a row number under `no` is not a list.
function isBallList(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0
  return typeof value === 'string' && tokensOf(value).length > 0
}

/** In-range tokens of the chosen ball source, in order, duplicates kept. */
interface BallSource {
  origin: 'list' | 'slots' | 'scan'
  tokens: number[]
}

function fromBallList(item: RawDrawItem): BallSource | undefined {
  const key = BALL_LIST_KEYS.find(candidate => isBallList(item[candidate]))
  if (!key) return undefined
  return { origin: 'list', tokens: tokensOf(item[key]).filter(isBall) }
}

function slotValue(item: RawDrawItem, prefix: string, slot: number): number | undefined {
  return (
    coerceBall(item[`${prefix}${slot}`]) ??
    coerceBall(item[`${prefix}${String(slot).padStart(2, '0')}`])
  )
}

function fromSlots(item: RawDrawItem): BallSource | undefined {
  for (const prefix of BALL_SLOT_PREFIXES) {
    const tokens: number[] = []
    for (let slot = 1; slot <= BALL_COUNT; slot++) {
      const value = slotValue(item, prefix, slot)
      if (value === undefined) break
      tokens.push(value)
    }
    if (tokens.length < BALL_COUNT || new Set(tokens).size < BALL_COUNT) continue

    const extra = slotValue(item, prefix, BALL_COUNT + 1)
    return { origin: 'slots', tokens: extra === undefined ? tokens : [...tokens, extra] }
  }
  return undefined
}

function fromScan(item: RawDrawItem, skipKeys: Set<string>): BallSource {
  const tokens: number[] = []
  for (const [key, value] of Object.entries(item)) {
    if (skipKeys.has(key)) continue
    if (typeof value === 'string' || Array.isArray(value)) {
      tokens.push(...tokensOf(value).filter(isBall))
    }
  }
  return { origin: 'scan', tokens }
}

function reject(reason: NormalizeRejectReason, details?: string): NormalizeResult {
  return { ok: false, reason, details }
}

export function normalizeDrawItem(raw: unknown): NormalizeResult {
  if (!isPlainObject(raw)) {
    return reject('NOT_AN_OBJECT')
  }

  const period = resolveField(raw, PERIOD_FIELD)
  if (!period) {
    return reject('MISSING_PERIOD')
  }
  const date = resolveField(raw, DATE_FIELD)
  const explicitSuper = resolveField(raw, SUPER_FIELD)

  const skipKeys = new Set([period.key])
  if (date) skipKeys.add(date.key)
  if (explicitSuper) skipKeys.add(explicitSuper.key)
  const source = fromBallList(raw) ?? fromSlots(raw) ?? fromScan(raw, skipKeys)

  const drawn = distinctFirst(source.tokens, BALL_COUNT)
  if (drawn.length < BALL_COUNT) {
    return reject('INSUFFICIENT_BALLS', `${source.origin}: ${drawn.length} distinct`)
  }

  const superNumber =
    explicitSuper?.value ?? (source.tokens.length > BALL_COUNT ? source.tokens[BALL_COUNT] : drawn[BALL_COUNT - 1])

  const record: DrawRecord = {
    period: period.value,
    balls: [...drawn].sort((a, b) => a - b),
    superNumber,
  }
  if (date) {
    record.date = date.value
  }
  return { ok: true, record }
}

export function normalizeBatch(items: unknown[]): NormalizedBatch {
  const batch: NormalizedBatch = { records: [], rejected: 0, rejectReasons: {} }
  for (const item of items) {
    const result = normalizeDrawItem(item)
    if (result.ok) {
      batch.records.push(result.record)
    } else {
      batch.rejected++
      batch.rejectReasons[result.reason] = (batch.rejectReasons[result.reason] ?? 0) + 1
    }
  }
  return batch
}

/**
 * DrawRecord invariants: 20 distinct balls in range, optional super in range.
 */
export function isValidDrawRecord(record: DrawRecord): boolean {
  if (!record.period || !/^\d+$/.test(record.period)) return false
  if (record.balls.length !== BALL_COUNT) return false
  if (new Set(record.balls).size !== BALL_COUNT) return false
  if (!record.balls.every(ball => Number.isInteger(ball) && ball >= MIN_BALL && ball <= MAX_BALL)) {
    return false
  }
  return record.superNumber === undefined || isBall(record.superNumber)
}

export function isComplete(record: DrawRecord): boolean {
  return record.balls.length === BALL_COUNT && record.superNumber !== undefined
}
