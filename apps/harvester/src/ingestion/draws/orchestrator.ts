/**
 * Fallback Orchestrator
 *
 * Run state machine: TRY_API → TRY_HTML → DONE | EXHAUSTED.
 *
 * TRY_API walks the candidate space lazily. The first shape whose
 * pagination run yields at least one normalized record is pinned, its run
 * is kept, and the machine moves to DONE without touching the rest of the
 * space. A space exhausted with zero records moves to TRY_HTML, whose
 * yield decides between DONE and EXHAUSTED. EXHAUSTED is a normal outcome
 * (the source may not have published yet).
 */

import type { WorkflowLogger } from '../../config/structured-log.js'
import { describeShape } from './explorer.js'
import type { HtmlFallback } from './html-fallback.js'
import type { PaginationController } from './pagination.js'
import type { AcquisitionResult, CandidateRequestShape, HarvestState } from './types.js'

export interface OrchestratorDeps {
  /** Restartable; consumed at most once per run */
  candidates: Iterable<CandidateRequestShape>
  pagination: PaginationController
  html: HtmlFallback
  log: WorkflowLogger
}

export class FallbackOrchestrator {
  private readonly deps: OrchestratorDeps
  private state: HarvestState = 'TRY_API'

  constructor(deps: OrchestratorDeps) {
    this.deps = deps
  }

  get currentState(): HarvestState {
    return this.state
  }

  async run(): Promise<AcquisitionResult> {
    const { candidates, pagination, html, log } = this.deps
    this.state = 'TRY_API'
    log.info('HARVEST_STATE', { to: 'TRY_API' })

    let candidatesTried = 0
    let rejected = 0

    for (const shape of candidates) {
      candidatesTried++
      const result = await pagination.run(shape)
      rejected += result.rejected

      if (result.records.length > 0) {
        log.info('CANDIDATE_PINNED', {
          shapeIndex: shape.index,
          shape: describeShape(shape),
          records: result.records.length,
          pagesFetched: result.pagesFetched,
          stopReason: result.stopReason,
        })
        this.transition('DONE', { source: 'api', candidatesTried })
        return {
          state: 'DONE',
          records: result.records,
          rejected,
          source: 'api',
          pinnedShape: shape,
          stopReason: result.stopReason,
          candidatesTried,
        }
      }

      log.debug('CANDIDATE_ABANDONED', {
        shapeIndex: shape.index,
        stopReason: result.stopReason,
        firstOutcome: result.firstOutcome,
      })
    }

    this.transition('TRY_HTML', { candidatesTried })
    const fallback = await html.run()
    rejected += fallback.rejected

    if (fallback.records.length > 0) {
      this.transition('DONE', { source: 'html', documentsFetched: fallback.documentsFetched })
      return {
        state: 'DONE',
        records: fallback.records,
        rejected,
        source: 'html',
        candidatesTried,
      }
    }

    this.transition('EXHAUSTED', { candidatesTried, documentsFetched: fallback.documentsFetched })
    return { state: 'EXHAUSTED', records: [], rejected, candidatesTried }
  }

  private transition(to: HarvestState, meta: Record<string, unknown>): void {
    const from = this.state
    this.state = to
    this.deps.log.info('HARVEST_STATE', { from, to, ...meta })
  }
}
