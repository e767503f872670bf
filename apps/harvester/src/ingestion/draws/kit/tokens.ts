import { MAX_BALL, MIN_BALL } from '../types.js'

const DIGIT_RUN = /\d+/g

/**
 * ASCII digit runs in document order, as integers. Surrounding punctuation
 * and whitespace are ignored: ' 07,' → [7], '01|02' → [1, 2].
 */
export function digitTokens(value: string): number[] {
  return (value.match(DIGIT_RUN) ?? []).map(token => Number.parseInt(token, 10))
}

export function isBall(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_BALL && value <= MAX_BALL
}

/**
 * Numeric tokens of a scalar or (nested) array value, in order.
 */
export function tokensOf(value: unknown): number[] {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? [value] : []
  }
  if (typeof value === 'string') {
    return digitTokens(value)
  }
  if (Array.isArray(value)) {
    return value.flatMap(item => tokensOf(item))
  }
  return []
}

/**
 * First integer found in a scalar value, or undefined.
 */
export function firstInteger(value: unknown): number | undefined {
  if (typeof value !== 'number' && typeof value !== 'string') return undefined
  return tokensOf(value)[0]
}

/**
 * First `limit` distinct values, keeping document order.
 */
export function distinctFirst(values: number[], limit: number): number[] {
  const seen = new Set<number>()
  for (const value of values) {
    if (seen.size >= limit) break
    seen.add(value)
  }
  return [...seen]
}
