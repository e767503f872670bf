/**
 * Draw Ingestion Core Types
 *
 * Canonical draw records, candidate request shapes, fetch outcomes and the
 * run report shared by every stage of the acquisition pipeline.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Canonical Record
// ═══════════════════════════════════════════════════════════════════════════════

export const BALL_COUNT = 20
export const MIN_BALL = 1
export const MAX_BALL = 80

/**
 * One draw event.
 *
 * IMPORTANT: only the normalizer constructs these. A candidate that fails the
 * ball count, range or distinctness check is rejected, never stored.
 */
export interface DrawRecord {
  /** Opaque numeric-string identifier, unique per draw */
  period: string

  /** ISO calendar date (YYYY-MM-DD) when known */
  date?: string

  /** Exactly 20 distinct integers in 1..80, ascending */
  balls: number[]

  /** Highlighted number in 1..80 when known */
  superNumber?: number
}

/**
 * Persisted byte-schema of one record. Unknown date is stored as ''.
 */
export interface StoredDrawRecord {
  period: string
  date: string
  balls: number[]
  super: number | null
}

/** period → record. Loaded once per run, never shrinks. */
export type DrawStore = Map<string, DrawRecord>

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate Request Shapes
// ═══════════════════════════════════════════════════════════════════════════════

export type DateFormat = 'iso' | 'slash' | 'roc' | 'compact'

export type HttpMethod = 'GET' | 'POST'

export type PageIndexOrigin = 0 | 1

/**
 * One concrete guess at the upstream parameter contract.
 */
export interface CandidateRequestShape {
  /** Position in the deterministic candidate order (0-based) */
  index: number
  endpoint: string
  dateKey: string
  dateFormat: DateFormat
  pageKey: string
  method: HttpMethod
  pageIndexOrigin: PageIndexOrigin
}

/**
 * Dimension lists the explorer multiplies together. Data, not code: loaded
 * from the candidates file and passed in by value.
 */
export interface CandidateDimensions {
  endpoints: string[]
  dateKeys: string[]
  dateFormats: DateFormat[]
  pageKeys: string[]
  methods: HttpMethod[]
  pageIndexOrigins: PageIndexOrigin[]
}

export interface DrawRequest {
  url: string
  method: HttpMethod
  headers: Record<string, string>
  body?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Transport Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export type EmptyResultReason = 'EMPTY_BODY' | 'INVALID_JSON'

/**
 * Classification of one network call (after its own retries).
 *
 * client_error never retries and tells the explorer to advance;
 * server_error and transport_failure are retried on the same shape.
 */
export type FetchOutcome =
  | { kind: 'success'; statusCode: number; body: string; payload: unknown }
  | { kind: 'empty'; statusCode: number; reason: EmptyResultReason }
  | { kind: 'client_error'; statusCode: number }
  | { kind: 'server_error'; statusCode: number }
  | { kind: 'transport_failure'; cause: string }

export interface FetchAttemptResult {
  outcome: FetchOutcome
  /** Network calls made, including retries */
  attempts: number
  durationMs: number
}

export type ResponseDecoding = 'json' | 'text'

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number
  delayMs: number
  backoff: 'linear' | 'fixed'
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  delayMs: 1000,
  backoff: 'linear',
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization
// ═══════════════════════════════════════════════════════════════════════════════

export type NormalizeRejectReason =
  | 'NOT_AN_OBJECT'
  | 'MISSING_PERIOD'
  | 'INSUFFICIENT_BALLS'

export type NormalizeResult =
  | { ok: true; record: DrawRecord }
  | { ok: false; reason: NormalizeRejectReason; details?: string }

/** Raw upstream item. Anything may be missing or oddly typed. */
export type RawDrawItem = Record<string, unknown>

export interface NormalizedBatch {
  records: DrawRecord[]
  rejected: number
  rejectReasons: Partial<Record<NormalizeRejectReason, number>>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pagination
// ═══════════════════════════════════════════════════════════════════════════════

export type PaginationStopReason =
  | 'TOTAL_REACHED'
  | 'EMPTY_PAGE'
  | 'SHORT_PAGE'
  | 'MAX_PAGES'
  | 'NO_RECORDS'
  | 'FETCH_FAILED'
  | 'REPEATED_PAGE'

export interface PaginationResult {
  records: DrawRecord[]
  pagesFetched: number
  rejected: number
  stopReason: PaginationStopReason
  /** Outcome of the first page, when the run stopped on it */
  firstOutcome?: FetchOutcome['kind']
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestration and Reporting
// ═══════════════════════════════════════════════════════════════════════════════

export type HarvestState = 'TRY_API' | 'TRY_HTML' | 'DONE' | 'EXHAUSTED'

export type HarvestSource = 'api' | 'html'

export interface AcquisitionResult {
  state: Extract<HarvestState, 'DONE' | 'EXHAUSTED'>
  records: DrawRecord[]
  rejected: number
  source?: HarvestSource
  pinnedShape?: CandidateRequestShape
  stopReason?: PaginationStopReason
  candidatesTried: number
}

export interface ReconcileResult {
  store: DrawStore
  changed: boolean
  added: number
  upgraded: number
  conflicts: number
}

export interface HarvestReport {
  state: AcquisitionResult['state']
  targetDate: string
  source?: HarvestSource
  fetched: number
  rejected: number
  added: number
  upgraded: number
  conflicts: number
  total: number
  previousMaxPeriod: string | null
  newMaxPeriod: string | null
  changed: boolean
  written: boolean
  pinnedShape?: CandidateRequestShape
  stopReason?: PaginationStopReason
}
