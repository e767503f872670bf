/**
 * Response Extractor
 *
 * Finds the record list inside an arbitrary decoded payload by trying known
 * container key paths in order. A miss is an empty list, not an error.
 */

import { firstInteger } from './kit/tokens.js'
import { getPath } from './kit/json.js'

/** '' is the bare top-level array. */
export const LIST_PATHS = [
  'content.bingoQueryResult',
  'content.list',
  'content.rows',
  'content.data',
  'data.list',
  'data.rows',
  'data.items',
  'data.records',
  'data',
  'result.list',
  'result',
  'results',
  'rows',
  'items',
  'list',
  'records',
  '',
] as const

export const TOTAL_PATHS = [
  'content.totalSize',
  'content.total',
  'content.totalCount',
  'data.total',
  'data.totalCount',
  'data.totalSize',
  'totalSize',
  'totalCount',
  'total',
] as const

export interface ExtractedList {
  items: unknown[]
  /** Key path that matched, when any */
  path?: string
}

export function extractList(payload: unknown): ExtractedList {
  for (const path of LIST_PATHS) {
    const candidate = getPath(payload, path)
    if (Array.isArray(candidate) && candidate.length > 0) {
      return { items: candidate, path }
    }
  }
  return { items: [] }
}

/**
 * Explicit total-row-count hint, when the payload carries one.
 */
export function extractTotalHint(payload: unknown): number | undefined {
  for (const path of TOTAL_PATHS) {
    const total = firstInteger(getPath(payload, path))
    if (total !== undefined) {
      return total
    }
  }
  return undefined
}
