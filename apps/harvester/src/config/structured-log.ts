/**
 * Structured logging helpers for harvest workflows.
 *
 * Adds the common envelope fields to every event and keeps query strings
 * (dates, page numbers, tokens) out of logged URLs.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@drawledger/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  targetDate?: string
  shapeIndex?: number
  page?: number
  attempt?: number
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug(event: string, meta?: LogMeta, err?: unknown): void
  info(event: string, meta?: LogMeta, err?: unknown): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<WorkflowContext>): WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogMeta): LogMeta => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta, err) => base.debug(event, payload(event, meta), err),
    info: (event, meta, err) => base.info(event, payload(event, meta), err),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: extra =>
      createWorkflowLogger(base, {
        ...context,
        ...compact(extra),
        workflow: context.workflow,
        stage: extra.stage ?? context.stage,
      }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

export function createRunId(now: Date = new Date()): string {
  return `run_${now.getTime().toString(36)}_${hashValue(now.toISOString()).slice(0, 6)}`
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
