/**
 * Diagnostics logging
 *
 * Thin leveled wrapper over `console` that prefixes every message with a
 * bracketed scope, e.g. `[AttributedSpans] removing 2 markers`. Logging is
 * observational only; nothing in the engine reads it back.
 *
 * @module logging
 */

import type { LogLevel } from './config'

export type LogMethod = Exclude<LogLevel, 'silent'>

/**
 * Receives every message that passes the level check
 */
export type LogSink = (level: LogMethod, message: string, args: unknown[]) => void

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel
  /** Where messages go (default: console) */
  sink?: LogSink
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
}

export const consoleSink: LogSink = (level, message, args) => {
  console[level](message, ...args)
}

/**
 * Create a logger scoped to a component
 *
 * @example
 * ```typescript
 * const log = createLogger('AttributedSpans', { level: 'debug' })
 * log.debug('adding start marker at:', 3)
 * // console.debug('[AttributedSpans] adding start marker at:', 3)
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'info']
  const sink = options.sink ?? consoleSink

  const emit = (level: LogMethod, message: string, args: unknown[]): void => {
    if (SEVERITY[level] > threshold) {
      return
    }
    sink(level, `[${scope}] ${message}`, args)
  }

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args)
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' })
