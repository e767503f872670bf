/**
 * Harvest run service
 *
 * One run: load the store once, acquire records for the target date through
 * the fallback orchestrator, reconcile, and write at most once (only when
 * the merge changed the serialized store and this is not a dry run).
 */

import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'
import type { CandidateFile, HarvestSettings } from '../../config/settings.js'
import { createRunId, createWorkflowLogger } from '../../config/structured-log.js'
import { ArtifactWriter } from './artifacts.js'
import { maxPeriod } from './codec.js'
import { CandidateSpace } from './explorer.js'
import { HtmlFallback } from './html-fallback.js'
import { FallbackOrchestrator } from './orchestrator.js'
import { RequestPacer, systemClock, type Clock } from './pacer.js'
import { PaginationController } from './pagination.js'
import { reconcile } from './reconcile.js'
import { JsonFileDrawStore, type DrawStoreGateway } from './store.js'
import { DrawTransport } from './transport.js'
import type { HarvestReport } from './types.js'

export interface HarvestOptions {
  dryRun?: boolean
  gateway?: DrawStoreGateway
  clock?: Clock
  runId?: string
  logger?: ILogger
}

export async function runHarvest(
  settings: HarvestSettings,
  candidates: CandidateFile,
  options: HarvestOptions = {}
): Promise<HarvestReport> {
  const clock = options.clock ?? systemClock
  const gateway = options.gateway ?? new JsonFileDrawStore(settings.storePath)
  const log = createWorkflowLogger(options.logger ?? loggers.orchestrator, {
    workflow: 'harvest',
    stage: 'acquire',
    runId: options.runId ?? createRunId(new Date(clock.now())),
    targetDate: settings.targetDate,
  })

  const existing = await gateway.load()
  const previousMaxPeriod = maxPeriod(existing)

  const transport = new DrawTransport({
    retryPolicy: settings.retry,
    timeoutMs: settings.requestTimeoutMs,
    pacer: new RequestPacer(settings.requestDelayMs, clock),
    clock,
  })
  const artifacts = new ArtifactWriter(settings.artifactsDir)

  const orchestrator = new FallbackOrchestrator({
    candidates: new CandidateSpace(candidates.dimensions),
    pagination: new PaginationController(
      {
        targetDate: settings.targetDate,
        pageSize: settings.pageSize,
        maxPages: settings.maxPages,
        pageSizeKey: candidates.pageSizeKey,
        headers: candidates.headers,
      },
      { transport, artifacts }
    ),
    html: new HtmlFallback(
      {
        urls: candidates.htmlUrls,
        headers: candidates.headers,
        pollRetries: settings.htmlPollRetries,
        pollWaitMs: settings.htmlPollWaitMs,
      },
      { transport, artifacts, clock }
    ),
    log,
  })

  const acquisition = await orchestrator.run()

  const merged = reconcile(existing, acquisition.records)
  const written = merged.changed && !options.dryRun
  if (written) {
    await gateway.save(merged.store)
  }

  const report: HarvestReport = {
    state: acquisition.state,
    targetDate: settings.targetDate,
    source: acquisition.source,
    fetched: acquisition.records.length,
    rejected: acquisition.rejected,
    added: merged.added,
    upgraded: merged.upgraded,
    conflicts: merged.conflicts,
    total: merged.store.size,
    previousMaxPeriod,
    newMaxPeriod: maxPeriod(merged.store),
    changed: merged.changed,
    written,
    pinnedShape: acquisition.pinnedShape,
    stopReason: acquisition.stopReason,
  }

  log.child({ stage: 'merge' }).info('HARVEST_RUN_SUMMARY', {
    state: report.state,
    source: report.source,
    fetched: report.fetched,
    rejected: report.rejected,
    added: report.added,
    upgraded: report.upgraded,
    conflicts: report.conflicts,
    total: report.total,
    previousMaxPeriod: report.previousMaxPeriod,
    newMaxPeriod: report.newMaxPeriod,
    changed: report.changed,
    written: report.written,
    dryRun: options.dryRun === true,
  })

  return report
}
