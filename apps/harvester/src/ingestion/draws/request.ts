import { formatDate } from './kit/dates.js'
import type { CandidateRequestShape, DrawRequest } from './types.js'

export interface RequestParams {
  /** ISO target date */
  date: string
  /** Logical page, always 1-based */
  page: number
  pageSize: number
  pageSizeKey: string
  headers: Record<string, string>
}

/**
 * Page value actually sent for a logical page under the shape's origin.
 */
export function pageValue(shape: CandidateRequestShape, page: number): number {
  return page - 1 + shape.pageIndexOrigin
}

/**
 * Turn a candidate shape into one concrete HTTP request. GET carries the
 * parameters in the query string, POST as a JSON body.
 */
export function buildRequest(shape: CandidateRequestShape, params: RequestParams): DrawRequest {
  const date = formatDate(params.date, shape.dateFormat)
  const page = pageValue(shape, params.page)

  if (shape.method === 'GET') {
    const url = new URL(shape.endpoint)
    url.searchParams.set(shape.dateKey, date)
    url.searchParams.set(shape.pageKey, String(page))
    url.searchParams.set(params.pageSizeKey, String(params.pageSize))
    return {
      url: url.toString(),
      method: 'GET',
      headers: { ...params.headers },
    }
  }

  return {
    url: shape.endpoint,
    method: 'POST',
    headers: { ...params.headers, 'content-type': 'application/json' },
    body: JSON.stringify({
      [shape.dateKey]: date,
      [shape.pageKey]: page,
      [params.pageSizeKey]: params.pageSize,
    }),
  }
}
