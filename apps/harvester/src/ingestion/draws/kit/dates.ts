import type { DateFormat } from '../types.js'

const ROC_YEAR_OFFSET = 1911

const WESTERN = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:\D|$)/
const ROC = /^(\d{2,3})[-/.](\d{1,2})[-/.](\d{1,2})(?:\D|$)/
const COMPACT = /^(\d{4})(\d{2})(\d{2})(?:\D|$)/

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

function toIsoDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined
  }
  return `${year}-${pad2(month)}-${pad2(day)}`
}

/**
 * Render an ISO date (YYYY-MM-DD) the way a candidate shape sends it.
 */
export function formatDate(isoDate: string, format: DateFormat): string {
  const [year, month, day] = isoDate.split('-')
  switch (format) {
    case 'iso':
      return isoDate
    case 'slash':
      return `${year}/${month}/${day}`
    case 'roc':
      return `${Number(year) - ROC_YEAR_OFFSET}/${month}/${day}`
    case 'compact':
      return `${year}${month}${day}`
  }
}

/**
 * Parse any supported upstream date rendering (optionally followed by a
 * time) back to ISO. Impossible dates yield undefined.
 */
export function parseDrawDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined
  const text = value.trim()
  if (!text) return undefined

  const western = text.match(WESTERN)
  if (western) {
    return toIsoDate(Number(western[1]), Number(western[2]), Number(western[3]))
  }

  const roc = text.match(ROC)
  if (roc) {
    return toIsoDate(Number(roc[1]) + ROC_YEAR_OFFSET, Number(roc[2]), Number(roc[3]))
  }

  const compact = text.match(COMPACT)
  if (compact) {
    return toIsoDate(Number(compact[1]), Number(compact[2]), Number(compact[3]))
  }

  return undefined
}
