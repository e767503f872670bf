import { vi } from 'vitest'
import { createLogger, type ILogger, type LogLevel } from '@drawledger/logger'
import { isPlainObject } from '../kit/json.js'
import type { Clock } from '../pacer.js'
import type { CandidateRequestShape, DrawRecord, DrawStore } from '../types.js'
import type { DrawStoreGateway } from '../store.js'

export interface FakeClock extends Clock {
  sleeps: number[]
  advance(ms: number): void
}

/** Virtual time: sleep resolves at once and moves the clock forward. */
export function fakeClock(start = 0): FakeClock {
  let now = start
  const sleeps: number[] = []
  return {
    sleeps,
    now: () => now,
    sleep: async ms => {
      sleeps.push(ms)
      now += ms
    },
    advance: ms => {
      now += ms
    },
  }
}

type FetchInput = Parameters<typeof fetch>[0]
type FetchInit = Parameters<typeof fetch>[1]

function urlOf(input: FetchInput): string {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

export function stubFetch(handler: (url: string, init?: FetchInit) => Response | Promise<Response>) {
  const mock = vi.fn(async (input: FetchInput, init?: FetchInit) => handler(urlOf(input), init))
  vi.stubGlobal('fetch', mock)
  return mock
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/html' } })
}

/** Twenty consecutive balls starting at `first`. */
export function ballsFrom(first: number): number[] {
  return Array.from({ length: 20 }, (_, i) => first + i)
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/** Upstream-style item as the lottery API returns it. */
export function apiItem(period: number, first: number, superNumber: number): Record<string, unknown> {
  return {
    drawTerm: period,
    dDate: '2025-08-19T00:00:00',
    openShowOrder: ballsFrom(first).map(pad2),
    bullEyeTop: pad2(superNumber),
  }
}

export function apiPage(items: unknown[], totalSize?: number): Response {
  return jsonResponse({ rtCode: 0, content: { bingoQueryResult: items, totalSize } })
}

export function record(period: string, first: number, superNumber?: number, date?: string): DrawRecord {
  const draw: DrawRecord = { period, balls: ballsFrom(first) }
  if (superNumber !== undefined) draw.superNumber = superNumber
  if (date !== undefined) draw.date = date
  return draw
}

export function storeOf(...records: DrawRecord[]): DrawStore {
  return new Map(records.map(draw => [draw.period, draw]))
}

export function shape(overrides: Partial<CandidateRequestShape> = {}): CandidateRequestShape {
  return {
    index: 0,
    endpoint: 'https://api.example.test/draws',
    dateKey: 'openDate',
    dateFormat: 'iso',
    pageKey: 'pageNum',
    method: 'GET',
    pageIndexOrigin: 1,
    ...overrides,
  }
}

export class MemoryGateway implements DrawStoreGateway {
  readonly saved: DrawStore[] = []
  private current: DrawStore

  constructor(initial: DrawStore = new Map()) {
    this.current = new Map(initial)
  }

  async load(): Promise<DrawStore> {
    return new Map(this.current)
  }

  async save(store: DrawStore): Promise<void> {
    this.saved.push(store)
    this.current = new Map(store)
  }
}

export interface CapturedLine {
  level: LogLevel
  entry: Record<string, unknown>
}

export function captureLogger(): { logger: ILogger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = []
  const logger = createLogger('harvester', {
    level: 'debug',
    format: 'json',
    sink: (level, line) => {
      const entry: unknown = JSON.parse(line)
      if (isPlainObject(entry)) {
        lines.push({ level, entry })
      }
    },
  })
  return { logger, lines }
}
