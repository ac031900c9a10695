/**
 * Step logging for long-running commands
 *
 * Human mode prints coloured, prefixed lines to stdout. JSON mode writes one
 * object per line to stderr so stdout stays reserved for the command result.
 */

import type { OutputOptions } from '../types/output'
import { type ColorName, c } from './output'

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error'

export interface LogEntry {
  level: LogLevel
  message: string
  time: string
}

export type LogSink = (line: string, level: LogLevel) => void

export interface Logger {
  debug(message: string): void
  info(message: string): void
  success(message: string): void
  warning(message: string): void
  error(message: string): void
  /** Unprefixed line; dropped in JSON mode */
  plain(message?: string): void
  /** Title between two rules */
  banner(title: string, lines?: string[]): void
}

const PREFIX: Record<LogLevel, { icon: string; color: ColorName }> = {
  debug: { icon: '·', color: 'gray' },
  info: { icon: 'ℹ️ ', color: 'blue' },
  success: { icon: '✅', color: 'green' },
  warning: { icon: '⚠️ ', color: 'yellow' },
  error: { icon: '❌', color: 'red' },
}

const RULE = '='.repeat(40)

function defaultSink(options: OutputOptions): LogSink {
  return (line) => {
    if (options.format === 'json') {
      process.stderr.write(line + '\n')
    } else {
      process.stdout.write(line + '\n')
    }
  }
}

/**
 * Create a logger bound to the command's output options
 */
export function createLogger(options: OutputOptions, sink: LogSink = defaultSink(options)): Logger {
  const json = options.format === 'json'

  function emit(level: LogLevel, message: string): void {
    if (level === 'debug' && !options.verbose) return
    if (options.quiet && (level === 'info' || level === 'success' || level === 'debug')) return

    if (json) {
      const entry: LogEntry = { level, message, time: new Date().toISOString() }
      sink(JSON.stringify(entry), level)
      return
    }

    const { icon, color } = PREFIX[level]
    sink(c(color, `${icon} ${message}`, options.color), level)
  }

  function plain(message = ''): void {
    if (json || options.quiet) return
    sink(message, 'info')
  }

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    success: (message) => emit('success', message),
    warning: (message) => emit('warning', message),
    error: (message) => emit('error', message),
    plain,
    banner(title, lines = []) {
      plain(RULE)
      plain(title)
      plain(RULE)
      for (const line of lines) plain(line)
      if (lines.length > 0) plain(RULE)
    },
  }
}

/**
 * Logger that keeps every line in memory (for tests and captured runs)
 */
export function createMemoryLogger(options: Partial<OutputOptions> = {}): Logger & { lines: string[] } {
  const lines: string[] = []
  const logger = createLogger(
    { format: 'human', verbose: false, quiet: false, color: false, ...options },
    (line) => {
      lines.push(line)
    }
  )
  return Object.assign(logger, { lines })
}
