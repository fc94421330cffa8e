/**
 * Logging to stderr
 *
 * Everything goes to stderr so stdout stays free for data. Debug lines only
 * show up when verbose is on (option or DECKHAND_VERBOSE).
 */

import type { LogLevel } from '../types.js'

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
}

export interface Logger {
  readonly level: LogLevel
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  /** Logger with the same sink and level under a nested scope */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  verbose?: boolean
  /** Where lines go (default: console.error) */
  sink?: (line: string) => void
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER
}

/**
 * Resolve the effective level from options and environment
 */
export function resolveLogLevel(options: LoggerOptions = {}): LogLevel {
  if (options.level) {
    return options.level
  }
  if (options.verbose || process.env.DECKHAND_VERBOSE) {
    return 'debug'
  }
  const fromEnv = process.env.DECKHAND_LOG_LEVEL
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = resolveLogLevel(options)
  const sink = options.sink ?? ((line: string) => console.error(line))
  const threshold = LEVEL_ORDER[level]

  const write = (at: LogLevel, message: string): void => {
    if (LEVEL_ORDER[at] > threshold) return
    const tag = at === 'error' ? 'Error: ' : at === 'warn' ? 'Warning: ' : ''
    sink(`[deckhand:${scope}] ${tag}${message}`)
  }

  return {
    level,
    error: (message) => write('error', message),
    warn: (message) => write('warn', message),
    info: (message) => write('info', message),
    debug: (message) => write('debug', message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink })
  }
}

/** Logger that drops everything; handy default for library callers and tests */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' })
