/**
 * Transport Client
 *
 * Executes one logical call for one request under a bounded timeout and
 * classifies the result. Uses native fetch.
 *
 * Retry rules:
 * - server_error (5xx) and transport_failure: retried on the same request
 *   with linear or fixed backoff, up to retryPolicy.maxRetries
 * - client_error (4xx): never retried; the caller moves to the next shape
 * - success / empty: returned as-is
 */

import type { ILogger } from '@drawledger/logger'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { safeJsonParse } from './kit/json.js'
import { RequestPacer, systemClock, type Clock } from './pacer.js'
import type {
  DrawRequest,
  FetchAttemptResult,
  FetchOutcome,
  ResponseDecoding,
  RetryPolicy,
} from './types.js'
import { DEFAULT_RETRY_POLICY } from './types.js'

export const DEFAULT_TIMEOUT_MS = 15_000

export interface DrawTransportOptions {
  retryPolicy?: RetryPolicy
  timeoutMs?: number
  /** Shared across every call of a run; omit for no pacing */
  pacer?: RequestPacer
  clock?: Clock
  logger?: ILogger
}

export function isRetryable(outcome: FetchOutcome): boolean {
  return outcome.kind === 'server_error' || outcome.kind === 'transport_failure'
}

export function retryDelayMs(policy: RetryPolicy, retry: number): number {
  return policy.backoff === 'linear' ? policy.delayMs * retry : policy.delayMs
}

export class DrawTransport {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly pacer: RequestPacer
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(options: DrawTransportOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.clock = options.clock ?? systemClock
    this.pacer = options.pacer ?? new RequestPacer(0, this.clock)
    this.log = options.logger ?? loggers.transport
  }

  async execute(request: DrawRequest, decoding: ResponseDecoding): Promise<FetchAttemptResult> {
    const startTime = this.clock.now()
    const maxAttempts = this.retryPolicy.maxRetries + 1
    let outcome: FetchOutcome = { kind: 'transport_failure', cause: 'not attempted' }
    let attempts = 0

    while (attempts < maxAttempts) {
      if (attempts > 0) {
        const delay = retryDelayMs(this.retryPolicy, attempts)
        this.log.debug('Retrying request', {
          ...sanitizeUrl(request.url),
          attempt: attempts + 1,
          delayMs: delay,
          previous: outcome.kind,
        })
        await this.clock.sleep(delay)
      }

      await this.pacer.acquire()
      attempts++
      outcome = await this.fetchOnce(request, decoding)

      if (!isRetryable(outcome)) {
        break
      }
    }

    if (isRetryable(outcome)) {
      this.log.warn('Request failed after retries', {
        ...sanitizeUrl(request.url),
        attempts,
        outcome: outcome.kind,
        statusCode: outcome.kind === 'server_error' ? outcome.statusCode : undefined,
        cause: outcome.kind === 'transport_failure' ? outcome.cause : undefined,
      })
    }

    return {
      outcome,
      attempts,
      durationMs: this.clock.now() - startTime,
    }
  }

  /**
   * Single attempt (no retries). Never throws.
   */
  private async fetchOnce(request: DrawRequest, decoding: ResponseDecoding): Promise<FetchOutcome> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status >= 500) {
        return { kind: 'server_error', statusCode: response.status }
      }
      if (!response.ok) {
        return { kind: 'client_error', statusCode: response.status }
      }

      const body = await response.text()
      if (body.trim().length === 0) {
        return { kind: 'empty', statusCode: response.status, reason: 'EMPTY_BODY' }
      }

      if (decoding === 'text') {
        return { kind: 'success', statusCode: response.status, body, payload: body }
      }

      const parsed = safeJsonParse(body)
      if (!parsed.ok) {
        return { kind: 'empty', statusCode: response.status, reason: 'INVALID_JSON' }
      }
      return { kind: 'success', statusCode: response.status, body, payload: parsed.value }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return { kind: 'transport_failure', cause: `timed out after ${this.timeoutMs}ms` }
      }
      return {
        kind: 'transport_failure',
        cause: error instanceof Error ? error.message : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
