/**
 * @proxylist/logger
 *
 * Structured logging shared by the proxy-list packages.
 *
 * - JSON output for production, colored output for development
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with a component path and inherited context
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level. Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
}

export interface LoggerConfig {
  level: LogLevel
  format: LogFormat
}

interface LogEntry {
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
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * Resolve the effective level and format. Explicit options win over the environment.
 */
export function resolveLoggerConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoggerOptions = {}
): LoggerConfig {
  const envLevel = env.LOG_LEVEL?.toLowerCase()
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info')

  const envFormat = env.LOG_FORMAT?.toLowerCase()
  let format: LogFormat
  if (options.format) {
    format = options.format
  } else if (envFormat === 'json' || envFormat === 'pretty') {
    format = envFormat
  } else {
    format = env.NODE_ENV === 'production' ? 'json' : 'pretty'
  }

  return { level, format }
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

function formatPretty(entry: LogEntry): string {
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

function output(entry: LogEntry, format: LogFormat): void {
  const formatted = format === 'json' ? JSON.stringify(entry) : formatPretty(entry)

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

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger whose component path is `parent:component`
   */
  child(component: string, defaultContext?: LogContext): ILogger
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
    // Resolved per call so LOG_LEVEL changes apply to loggers created at import time
    const config = resolveLoggerConfig(process.env, this.options)
    if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) return

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

    output(entry, config.format)
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
 * import { createLogger } from '@proxylist/logger'
 *
 * const logger = createLogger('row-decoder')
 * logger.info('Decoded rows', { count: 25 })
 *
 * const batchLogger = logger.child('batch')
 * batchLogger.warn('Row skipped', { index: 3 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}
