/**
 * Pagination Controller
 *
 * Drives one candidate shape through increasing pages until a stop signal.
 * Stop priority: an explicit total-count hint decides on its own; without
 * one, a page shorter than pageSize ends the run; the maxPages ceiling
 * bounds everything. An empty page, a failed fetch, a first page with no
 * usable record, or a page that only repeats periods already collected
 * (upstream ignoring the page parameter) also stop it.
 */

import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'
import { ArtifactWriter, apiArtifactName } from './artifacts.js'
import { extractList, extractTotalHint } from './extract.js'
import { normalizeBatch } from './normalize.js'
import { buildRequest } from './request.js'
import type { DrawTransport } from './transport.js'
import type {
  CandidateRequestShape,
  DrawRecord,
  PaginationResult,
  PaginationStopReason,
} from './types.js'

export interface PaginationOptions {
  targetDate: string
  pageSize: number
  maxPages: number
  pageSizeKey: string
  headers: Record<string, string>
}

export interface PaginationDeps {
  transport: DrawTransport
  artifacts?: ArtifactWriter
  logger?: ILogger
}

export class PaginationController {
  private readonly options: PaginationOptions
  private readonly transport: DrawTransport
  private readonly artifacts: ArtifactWriter
  private readonly log: ILogger

  constructor(options: PaginationOptions, deps: PaginationDeps) {
    this.options = options
    this.transport = deps.transport
    this.artifacts = deps.artifacts ?? new ArtifactWriter()
    this.log = deps.logger ?? loggers.pagination
  }

  async run(shape: CandidateRequestShape): Promise<PaginationResult> {
    const records: DrawRecord[] = []
    const seen = new Set<string>()
    let rejected = 0
    let rowsSeen = 0
    let totalHint: number | undefined
    let pagesFetched = 0

    const stop = (
      stopReason: PaginationStopReason,
      firstOutcome?: PaginationResult['firstOutcome']
    ): PaginationResult => {
      this.log.debug('Pagination stopped', {
        shapeIndex: shape.index,
        stopReason,
        pagesFetched,
        records: records.length,
        rejected,
      })
      return { records, pagesFetched, rejected, stopReason, firstOutcome }
    }

    for (let page = 1; page <= this.options.maxPages; page++) {
      const request = buildRequest(shape, {
        date: this.options.targetDate,
        page,
        pageSize: this.options.pageSize,
        pageSizeKey: this.options.pageSizeKey,
        headers: this.options.headers,
      })

      const { outcome } = await this.transport.execute(request, 'json')
      pagesFetched = page

      if (outcome.kind !== 'success') {
        const reason = outcome.kind === 'empty' ? 'EMPTY_PAGE' : 'FETCH_FAILED'
        return stop(reason, page === 1 ? outcome.kind : undefined)
      }

      await this.artifacts.write(
        apiArtifactName(this.options.targetDate, shape.index, page),
        outcome.body
      )

      const { items } = extractList(outcome.payload)
      if (items.length === 0) {
        return stop('EMPTY_PAGE', page === 1 ? 'empty' : undefined)
      }

      const batch = normalizeBatch(items)
      rejected += batch.rejected
      rowsSeen += items.length

      if (page === 1 && batch.records.length === 0) {
        this.log.debug('First page had no usable record', {
          shapeIndex: shape.index,
          rejectReasons: batch.rejectReasons,
        })
        return stop('NO_RECORDS')
      }

      const fresh = batch.records.filter(record => !seen.has(record.period))
      if (page > 1 && batch.records.length > 0 && fresh.length === 0) {
        return stop('REPEATED_PAGE')
      }
      for (const record of fresh) {
        seen.add(record.period)
        records.push(record)
      }

      totalHint ??= extractTotalHint(outcome.payload)
      if (totalHint !== undefined) {
        if (rowsSeen >= totalHint) {
          return stop('TOTAL_REACHED')
        }
        continue
      }

      if (items.length < this.options.pageSize) {
        return stop('SHORT_PAGE')
      }
    }

    return stop('MAX_PAGES')
  }
}
