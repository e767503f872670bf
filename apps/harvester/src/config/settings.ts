/**
 * Run configuration.
 *
 * Environment variables (optionally overridden per run by CLI flags) and the
 * candidates file are validated with zod into plain values. Nothing here is
 * cached in module state, so every run and every test gets its own settings.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { safeJsonParse } from '../ingestion/draws/kit/json.js'
import type { CandidateDimensions, RetryPolicy } from '../ingestion/draws/types.js'
import { ConfigError, zodIssues } from './errors.js'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export const DEFAULT_CANDIDATES_PATH = fileURLToPath(
  new URL('../../config/candidates.json', import.meta.url)
)

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

const envSchema = z.object({
  OPEN_DATE: z.string().regex(ISO_DATE, 'must be YYYY-MM-DD').optional(),
  DRAW_TIME_ZONE: z
    .string()
    .refine(isValidTimeZone, 'must be an IANA time zone')
    .default('Asia/Taipei'),
  PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(50),
  MAX_PAGES: z.coerce.number().int().min(1).max(1000).default(20),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(1000),
  RETRY_BACKOFF: z.enum(['linear', 'fixed']).default('linear'),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(400),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(15_000),
  HTML_POLL_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  HTML_POLL_WAIT_MS: z.coerce.number().int().min(0).max(60_000).default(2000),
  DRAW_STORE_PATH: z.string().min(1).default('data/draws.json'),
  DRAW_CANDIDATES_PATH: z.string().min(1).optional(),
  ARTIFACTS_DIR: z.string().min(1).optional(),
})

const candidateFileSchema = z.object({
  endpoints: z.array(z.string().url()),
  dateKeys: z.array(z.string().min(1)),
  dateFormats: z.array(z.enum(['iso', 'slash', 'roc', 'compact'])),
  pageKeys: z.array(z.string().min(1)),
  methods: z.array(z.enum(['GET', 'POST'])),
  pageIndexOrigins: z.array(z.union([z.literal(0), z.literal(1)])),
  pageSizeKey: z.string().min(1).default('pageSize'),
  headers: z.record(z.string()).default({}),
  htmlUrls: z.array(z.string().url()).default([]),
})

export interface HarvestSettings {
  targetDate: string
  timeZone: string
  pageSize: number
  maxPages: number
  retry: RetryPolicy
  requestDelayMs: number
  requestTimeoutMs: number
  htmlPollRetries: number
  htmlPollWaitMs: number
  storePath: string
  candidatesPath: string
  artifactsDir?: string
}

export interface CandidateFile {
  dimensions: CandidateDimensions
  pageSizeKey: string
  headers: Record<string, string>
  htmlUrls: string[]
}

/**
 * Calendar date (YYYY-MM-DD) of `now` in the given zone.
 */
export function todayInZone(timeZone: string, now: Date = new Date()): string {
  // sv-SE formats dates as YYYY-MM-DD
  return new Intl.DateTimeFormat('sv-SE', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now)
}

function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const next: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || value.trim() === '') continue
    next[key] = value.trim()
  }
  return next
}

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  now: Date = new Date()
): HarvestSettings {
  const parsed = envSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    throw new ConfigError('Invalid harvest environment', {
      cause: parsed.error,
      details: { issues: zodIssues(parsed.error) },
    })
  }

  const value = parsed.data
  return {
    targetDate: value.OPEN_DATE ?? todayInZone(value.DRAW_TIME_ZONE, now),
    timeZone: value.DRAW_TIME_ZONE,
    pageSize: value.PAGE_SIZE,
    maxPages: value.MAX_PAGES,
    retry: {
      maxRetries: value.MAX_RETRIES,
      delayMs: value.RETRY_DELAY_MS,
      backoff: value.RETRY_BACKOFF,
    },
    requestDelayMs: value.REQUEST_DELAY_MS,
    requestTimeoutMs: value.REQUEST_TIMEOUT_MS,
    htmlPollRetries: value.HTML_POLL_RETRIES,
    htmlPollWaitMs: value.HTML_POLL_WAIT_MS,
    storePath: resolve(value.DRAW_STORE_PATH),
    candidatesPath: value.DRAW_CANDIDATES_PATH
      ? resolve(value.DRAW_CANDIDATES_PATH)
      : DEFAULT_CANDIDATES_PATH,
    artifactsDir: value.ARTIFACTS_DIR ? resolve(value.ARTIFACTS_DIR) : undefined,
  }
}

export function parseCandidateFile(raw: unknown): CandidateFile {
  const parsed = candidateFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError('Invalid candidates file', {
      cause: parsed.error,
      details: { issues: zodIssues(parsed.error) },
    })
  }

  const { pageSizeKey, headers, htmlUrls, ...dimensions } = parsed.data
  return { dimensions, pageSizeKey, headers, htmlUrls }
}

export async function loadCandidateFile(path: string): Promise<CandidateFile> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Candidates file not readable: ${path}`, { cause: error })
  }

  const json = safeJsonParse(text)
  if (!json.ok) {
    throw new ConfigError(`Candidates file is not valid JSON: ${path}`, {
      details: { error: json.error },
    })
  }

  return parseCandidateFile(json.value)
}
