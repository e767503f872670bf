/**
 * Error classification for harvest runs.
 *
 * Upstream trouble (4xx, 5xx, timeouts, empty or malformed payloads) is a
 * value, not an exception. Only configuration mistakes, persistence write
 * failures and bugs are thrown, and the CLI maps them to exit codes here.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'config' // Invalid environment, flags or candidates file
  | 'persistence' // Store could not be written
  | 'internal' // Unexpected failure inside the orchestration loop

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  PERSISTENCE_WRITE_FAILED: 'PERSISTENCE_WRITE_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/** sysexits.h: EX_CONFIG and EX_IOERR */
const EXIT_CODES: Record<ErrorCategory, number> = {
  config: 78,
  persistence: 74,
  internal: 1,
}

export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isOperational: boolean
  exitCode: number
  details?: Record<string, unknown>
}

export class HarvestError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly isOperational: boolean
  readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    category: ErrorCategory,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown>; isOperational?: boolean } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'HarvestError'
    this.code = code
    this.category = category
    this.isOperational = options.isOperational ?? true
    this.details = options.details
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(ERROR_CODES.CONFIGURATION_ERROR, 'config', message, options)
    this.name = 'ConfigError'
  }
}

export class PersistenceWriteError extends HarvestError {
  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.PERSISTENCE_WRITE_FAILED, 'persistence', `Failed to write draw store: ${path}`, {
      cause,
      details: { path },
    })
    this.name = 'PersistenceWriteError'
  }
}

export function zodIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof HarvestError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isOperational: error.isOperational,
      exitCode: EXIT_CODES[error.category],
      details: error.details,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'config',
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: 'Configuration validation failed',
      isOperational: true,
      exitCode: EXIT_CODES.config,
      details: { issues: zodIssues(error) },
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: error instanceof Error ? error.message || 'An unexpected error occurred' : String(error),
    isOperational: false,
    exitCode: EXIT_CODES.internal,
  }
}
