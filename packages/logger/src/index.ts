/**
 * @drawledger/logger
 *
 * Structured logging for drawledger applications.
 *
 * - JSON lines in production, coloured single lines in development
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 * - Values of sensitive keys are masked before output
 *
 * Environment variables (read on every call so tests can flip them):
 * - LOG_LEVEL: debug | info | warn | error | fatal. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every formatted line. Defaults to the console method for the level. */
export type LogSink = (level: LogLevel, line: string) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  sink?: LogSink
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

const REDACTED = '[REDACTED]'
const SENSITIVE_KEY_PATTERN = /(token|secret|password|authorization|cookie|api[-_]?key)/i

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

function resolveFormat(options: LoggerOptions): LogFormat {
  if (options.format) return options.format
  const fromEnv = process.env.LOG_FORMAT?.toLowerCase()
  if (fromEnv === 'json' || fromEnv === 'pretty') {
    return fromEnv
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function redactContext(context: LogContext): LogContext {
  const next: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    next[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : value
  }
  return next
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
    case 'fatal':
      console.error(line)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext, error?: unknown): void
  info(message: string, meta?: LogContext, error?: unknown): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * A string extends the component path (`store` → `harvester:store`);
   * an object only adds default context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: LoggerOptions

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = options
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[resolveLevel(this.options)]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...redactContext({ ...this.defaultContext, ...meta }),
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    const line = resolveFormat(this.options) === 'json' ? formatJson(entry) : formatPretty(entry)
    const sink = this.options.sink ?? consoleSink
    sink(level, line)
  }

  debug(message: string, meta?: LogContext, error?: unknown): void {
    this.log('debug', message, meta, error)
  }

  info(message: string, meta?: LogContext, error?: unknown): void {
    this.log('info', message, meta, error)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        this.options
      )
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(
      this.service,
      newComponent,
      { ...this.defaultContext, ...defaultContext },
      this.options
    )
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@drawledger/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('Run started', { targetDate: '2025-08-19' })
 *
 * const storeLogger = logger.child('store')
 * storeLogger.warn('Store unreadable, starting empty', { path: 'data/draws.json' })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}
