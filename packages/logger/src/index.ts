/**
 * @catalog-exporter/logger
 *
 * Structured logging for the catalog exporter.
 *
 * - JSON lines for production, colored lines for development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and default context
 * - Optional file destination (append-only JSON lines)
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: console format (json, pretty). Default: json in production, pretty otherwise
 * - LOG_FILE: when set, every entry is also appended to this file as JSON
 */

import { appendFileSync } from 'node:fs'

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

/** Receives every entry that passes the level filter. */
export type LogWriter = (entry: LogEntry) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  /** Replaces the console writer. */
  writer?: LogWriter
  /** Appends JSON lines to this path in addition to the writer. */
  filePath?: string
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value)
}

export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const level = raw?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(raw: string | undefined = process.env.LOG_FORMAT): LogFormat {
  const format = raw?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

/**
 * Console writer. Errors and fatals go to stderr, the rest follow
 * the console method of the same level.
 */
export function createConsoleWriter(format: LogFormat = resolveLogFormat()): LogWriter {
  return (entry) => {
    const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)

    switch (entry.level) {
      case 'debug':
        console.debug(formatted)
        break
      case 'info':
        console.info(formatted)
        break
      case 'warn':
        console.warn(formatted)
        break
      case 'error':
      case 'fatal':
        console.error(formatted)
        break
    }
  }
}

function reportFileError(filePath: string): (error: unknown) => void {
  return (error) => {
    const reason = error instanceof Error ? error.message : String(error)
    console.error(`Cannot write log file ${filePath}, file logging disabled: ${reason}`)
  }
}

/**
 * Append-only JSON lines. The first failed append is reported through
 * `onError` and turns the writer off, so log calls never throw.
 */
export function createFileWriter(
  filePath: string,
  onError: (error: unknown) => void = reportFileError(filePath)
): LogWriter {
  let disabled = false
  return (entry) => {
    if (disabled) return
    try {
      appendFileSync(filePath, `${formatJson(entry)}\n`, { encoding: 'utf-8' })
    } catch (error) {
      disabled = true
      onError(error)
    }
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. The component is appended to the parent's
   * component path (`fetch` under `exporter` becomes `exporter:fetch`).
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

interface LoggerSettings {
  level: LogLevel
  writers: LogWriter[]
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly settings: LoggerSettings

  constructor(
    service: string,
    settings: LoggerSettings,
    component?: string,
    defaultContext: LogContext = {}
  ) {
    this.service = service
    this.settings = settings
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.settings.level]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    for (const write of this.settings.writers) {
      write(entry)
    }
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
    const newComponent = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, this.settings, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * import { createLogger } from '@catalog-exporter/logger'
 *
 * const logger = createLogger('exporter')
 * logger.info('Run started', { url: 'https://api.example.com/products' })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Attempt failed', { attempt: 2 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  const filePath = options.filePath ?? process.env.LOG_FILE
  const writers: LogWriter[] = [options.writer ?? createConsoleWriter(options.format ?? resolveLogFormat())]
  if (filePath) {
    writers.push(createFileWriter(filePath))
  }

  return new Logger(service, {
    level: options.level ?? resolveLogLevel(),
    writers,
  })
}
