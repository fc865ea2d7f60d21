/**
 * @farewatch/logger
 *
 * Structured logging for FareWatch services.
 *
 * - JSON output in production, coloured output in development
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 * - Run-scoped context via AsyncLocalStorage (runId correlation)
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

import { AsyncLocalStorage } from 'async_hooks'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

/**
 * Context attached to every entry logged inside withRunContext()
 */
export interface RunContext {
  runId?: string
  [key: string]: unknown
}

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

/**
 * Receives formatted lines. Defaults to the console method matching the level.
 */
export type LogSink = (level: LogLevel, line: string, entry: LogEntry) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const runContextStorage = new AsyncLocalStorage<RunContext>()

/**
 * Run a function with run context.
 * All log entries within the callback (sync or async) include the context fields.
 */
export function withRunContext<T>(context: RunContext, fn: () => T): T {
  const parent = runContextStorage.getStore()
  return runContextStorage.run({ ...parent, ...context }, fn)
}

export function getRunContext(): RunContext | undefined {
  return runContextStorage.getStore()
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function resolveLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (level && isLogLevel(level)) {
    return level
  }
  return 'info'
}

function resolveFormat(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] {
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

const ANSI_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = ANSI_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const componentPath = component ? `${service}:${component}` : service

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const consoleSink: LogSink = (level, line) => {
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

export interface LoggerOptions {
  /** Fixed minimum level; read from LOG_LEVEL on every call when omitted */
  level?: LogLevel
  /** Fixed format; read from LOG_FORMAT / NODE_ENV when omitted */
  format?: LogFormat
  sink?: LogSink
  /** Clock for timestamps */
  now?: () => Date
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. Component names nest as `parent:child`.
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component: string | undefined = undefined,
    private readonly defaultContext: LogContext = {},
    private readonly options: LoggerOptions = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minLevel = this.options.level ?? resolveLevel()
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return

    const entry: LogEntry = {
      timestamp: (this.options.now ?? (() => new Date()))().toISOString(),
      level,
      service: this.service,
      message,
      ...getRunContext(),
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined && error !== null) {
      entry.error = formatError(error)
    }

    const format = this.options.format ?? resolveFormat()
    const line = format === 'json' ? formatJson(entry) : formatPretty(entry)
    ;(this.options.sink ?? consoleSink)(level, line, entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
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

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const nested = this.component ? `${this.component}:${component}` : component
    return new Logger(
      this.service,
      nested,
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
 * const logger = createLogger('fare-checker')
 * const log = logger.child('refresher')
 * log.info('PRICE_REFRESH_START', { subjects: 12 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/**
 * Logger that drops everything. Handy as a default for library code.
 */
export const silentLogger: ILogger = createLogger('silent', { sink: () => {} })
