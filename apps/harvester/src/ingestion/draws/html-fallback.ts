/**
 * HTML Fallback Extractor
 *
 * Second, lower-confidence extractor used once the API candidate space is
 * exhausted. It produces the same output as the Record Normalizer: every
 * match is turned into a raw item ({ period, date, numbers }) and passed
 * through normalizeDrawItem, so the DrawRecord invariants hold unchanged.
 *
 * Two passes over a document:
 * 1. structural: innermost repeating regions (rows, list items, cards)
 *    whose text carries a period-like token and at least 20 in-range
 *    numbers once dates and times are stripped
 * 2. textual: when the structural pass finds nothing, walk the document
 *    line by line; a period-like token opens a draw and the in-range
 *    numbers that follow are collected until the next period
 */

import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { ArtifactWriter, htmlArtifactName } from './artifacts.js'
import { parseDrawDate } from './kit/dates.js'
import { documentLines, innermostRegionTexts, loadHtml } from './kit/html.js'
import { digitTokens, isBall } from './kit/tokens.js'
import { normalizeBatch } from './normalize.js'
import { systemClock, type Clock } from './pacer.js'
import type { DrawTransport } from './transport.js'
import type { DrawRecord, NormalizedBatch, RawDrawItem } from './types.js'
import { BALL_COUNT } from './types.js'

const PERIOD_TOKEN = /(?<!\d)\d{8,10}(?!\d)/
const DATE_TOKEN = /(?<!\d)\d{2,4}[-/.]\d{1,2}[-/.]\d{1,2}(?!\d)/g
const TIME_TOKEN = /(?<!\d)\d{1,2}:\d{2}(?::\d{2})?(?!\d)/g

/** 20 balls plus a possible super number */
const MAX_TOKENS = BALL_COUNT + 1

interface ScannedText {
  period?: string
  date?: string
  numbers: number[]
}

/**
 * Split one piece of text into its period token, first date and the
 * in-range numbers left once both (and any clock time) are removed.
 */
export function scanText(text: string): ScannedText {
  const dateMatch = text.match(DATE_TOKEN)?.[0]
  let rest = text.replace(DATE_TOKEN, ' ').replace(TIME_TOKEN, ' ')

  const period = rest.match(PERIOD_TOKEN)?.[0]
  if (period) {
    rest = rest.replace(period, ' ')
  }

  return {
    period,
    date: dateMatch ? parseDrawDate(dateMatch) : undefined,
    numbers: digitTokens(rest).filter(isBall),
  }
}

function toRawItem(scanned: ScannedText & { period: string }): RawDrawItem {
  const item: RawDrawItem = {
    period: scanned.period,
    numbers: scanned.numbers.slice(0, MAX_TOKENS),
  }
  if (scanned.date) {
    item.date = scanned.date
  }
  return item
}

function hasPeriod(scanned: ScannedText): scanned is ScannedText & { period: string } {
  return scanned.period !== undefined
}

function regionItems(html: string): RawDrawItem[] {
  const $ = loadHtml(html)
  const accept = (text: string): boolean => {
    const scanned = scanText(text)
    return scanned.period !== undefined && scanned.numbers.length >= BALL_COUNT
  }

  return innermostRegionTexts($, accept)
    .map(scanText)
    .filter(hasPeriod)
    .map(toRawItem)
}

function lineItems(html: string): RawDrawItem[] {
  const items: RawDrawItem[] = []
  let current: (ScannedText & { period: string }) | undefined

  const flush = () => {
    if (current && current.numbers.length >= BALL_COUNT) {
      items.push(toRawItem(current))
    }
  }

  for (const line of documentLines(loadHtml(html))) {
    const scanned = scanText(line)
    if (hasPeriod(scanned)) {
      flush()
      current = scanned
      continue
    }
    if (!current) continue

    current.date ??= scanned.date
    if (current.numbers.length < MAX_TOKENS) {
      current.numbers.push(...scanned.numbers)
    }
  }
  flush()

  return items
}

function uniqueByPeriod(records: DrawRecord[]): DrawRecord[] {
  const seen = new Set<string>()
  return records.filter(record => {
    if (seen.has(record.period)) return false
    seen.add(record.period)
    return true
  })
}

/**
 * Extract draw records from one HTML document.
 */
export function extractDrawsFromHtml(html: string): NormalizedBatch {
  let batch = normalizeBatch(regionItems(html))
  if (batch.records.length === 0) {
    batch = normalizeBatch(lineItems(html))
  }
  return { ...batch, records: uniqueByPeriod(batch.records) }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch and poll
// ═══════════════════════════════════════════════════════════════════════════════

export interface HtmlFallbackOptions {
  urls: string[]
  headers: Record<string, string>
  /** Sleep-then-recheck retries per URL when a document yields nothing */
  pollRetries: number
  pollWaitMs: number
}

export interface HtmlFallbackDeps {
  transport: DrawTransport
  artifacts?: ArtifactWriter
  clock?: Clock
  logger?: ILogger
}

export interface HtmlFallbackResult {
  records: DrawRecord[]
  rejected: number
  documentsFetched: number
  url?: string
}

export class HtmlFallback {
  private readonly options: HtmlFallbackOptions
  private readonly transport: DrawTransport
  private readonly artifacts: ArtifactWriter
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(options: HtmlFallbackOptions, deps: HtmlFallbackDeps) {
    this.options = options
    this.transport = deps.transport
    this.artifacts = deps.artifacts ?? new ArtifactWriter()
    this.clock = deps.clock ?? systemClock
    this.log = deps.logger ?? loggers.html
  }

  async run(): Promise<HtmlFallbackResult> {
    let rejected = 0
    let documentsFetched = 0
    const headers = { ...this.options.headers, accept: 'text/html,application/xhtml+xml' }

    for (const [index, url] of this.options.urls.entries()) {
      for (let attempt = 0; attempt <= this.options.pollRetries; attempt++) {
        if (attempt > 0) {
          await this.clock.sleep(this.options.pollWaitMs)
        }

        const { outcome } = await this.transport.execute({ url, method: 'GET', headers }, 'text')
        if (outcome.kind !== 'success') {
          this.log.debug('HTML document unavailable', {
            ...sanitizeUrl(url),
            outcome: outcome.kind,
          })
          break
        }

        documentsFetched++
        await this.artifacts.write(htmlArtifactName(index, attempt), outcome.body)

        const batch = extractDrawsFromHtml(outcome.body)
        rejected += batch.rejected
        if (batch.records.length > 0) {
          this.log.info('HTML fallback yielded draws', {
            ...sanitizeUrl(url),
            records: batch.records.length,
            attempt,
          })
          return { records: batch.records, rejected, documentsFetched, url }
        }

        this.log.debug('HTML document had no draws', {
          ...sanitizeUrl(url),
          attempt,
          pollRetriesLeft: this.options.pollRetries - attempt,
        })
      }
    }

    return { records: [], rejected, documentsFetched }
  }
}
