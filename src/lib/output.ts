/**
 * Output handling for the nbci CLI
 */

import type { CommandError, CommandOutput, OutputMeta, OutputOptions } from '../types/output'

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
}

export type ColorName = keyof typeof colors

export function c(color: ColorName, text: string, useColor: boolean): string {
  return useColor ? `${colors[color]}${text}${colors.reset}` : text
}

/**
 * Determine if output should be JSON based on environment
 */
export function detectOutputFormat(env: Record<string, string | undefined> = process.env): 'json' | 'human' {
  if (!process.stdout.isTTY) return 'json'
  if (env.NBCI_JSON === '1') return 'json'
  return 'human'
}

/**
 * Create default output options
 */
export function defaultOutputOptions(env: Record<string, string | undefined> = process.env): OutputOptions {
  return {
    format: detectOutputFormat(env),
    verbose: env.NBCI_VERBOSE === '1',
    quiet: env.NBCI_QUIET === '1',
    color: Boolean(process.stdout.isTTY) && !env.NO_COLOR,
  }
}

/**
 * Create a success result
 */
export function success<T>(data: T, meta?: OutputMeta): CommandOutput<T> {
  return meta ? { success: true, data, meta } : { success: true, data }
}

/**
 * Create an error result with a hint
 */
export function error(
  code: string,
  message: string,
  hint?: string,
  context?: Record<string, unknown>,
  meta?: OutputMeta
): CommandOutput<never> {
  const err: CommandError = {
    code,
    message,
  }
  if (hint) err.hint = hint
  if (context) err.context = context
  return meta ? { success: false, error: err, meta } : { success: false, error: err }
}

/**
 * Exit code for a finished command
 */
export function exitCodeFor(output: CommandOutput): number {
  if (output.meta?.exitCode !== undefined) return output.meta.exitCode
  return output.success ? 0 : 1
}

/**
 * Format output for display
 */
export function format<T>(output: CommandOutput<T>, options: OutputOptions): string {
  if (options.format === 'json' || (options.format === 'auto' && !process.stdout.isTTY)) {
    return JSON.stringify(output, null, 2)
  }
  return formatHuman(output, options)
}

/**
 * Format output as human-readable text
 */
function formatHuman<T>(output: CommandOutput<T>, options: OutputOptions): string {
  const lines: string[] = []
  const useColor = options.color

  if (output.success) {
    if (output.data !== undefined) {
      lines.push(formatData(output.data, useColor))
    }
    if (output.meta?.truncated) {
      lines.push('')
      lines.push(c('yellow', `... ${output.meta.remaining} more items`, useColor))
    }
  } else if (output.error) {
    lines.push(c('red', `Error: ${output.error.message}`, useColor))
    if (options.verbose && output.error.stack) {
      lines.push('')
      lines.push(c('gray', output.error.stack, useColor))
    }
    if (output.error.hint) {
      lines.push('')
      lines.push(c('cyan', `Hint: ${output.error.hint}`, useColor))
    }
  }

  if (output.meta?.duration_ms !== undefined && options.verbose) {
    lines.push('')
    lines.push(c('dim', `Completed in ${output.meta.duration_ms}ms`, useColor))
  }

  return lines.join('\n')
}

/**
 * Format data based on type
 */
export function formatData(data: unknown, useColor: boolean): string {
  if (data === null || data === undefined) return ''
  if (typeof data === 'string') return data
  if (typeof data === 'number' || typeof data === 'boolean') return String(data)
  if (Array.isArray(data)) return formatArray(data, useColor)
  if (isRecord(data)) return formatObject(data, useColor)
  return String(data)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function formatArray(arr: unknown[], useColor: boolean): string {
  if (arr.length === 0) return c('dim', '(empty)', useColor)

  if (arr.every((item) => typeof item !== 'object' || item === null)) {
    return arr.map((item) => `  • ${item}`).join('\n')
  }

  return arr.map((item, i) => `${c('dim', `[${i}]`, useColor)} ${formatData(item, useColor)}`).join('\n\n')
}

function formatObject(obj: Record<string, unknown>, useColor: boolean): string {
  const entries = Object.entries(obj).filter(([, value]) => value !== undefined)
  if (entries.length === 0) return c('dim', '(empty)', useColor)

  const maxKeyLen = Math.max(...entries.map(([k]) => k.length))
  return entries
    .map(([key, value]) => {
      const paddedKey = key.padEnd(maxKeyLen)
      const formattedValue =
        typeof value === 'object' && value !== null
          ? '\n' +
            formatData(value, useColor)
              .split('\n')
              .map((l) => '  ' + l)
              .join('\n')
          : String(value)
      return `${c('cyan', paddedKey, useColor)}  ${formattedValue}`
    })
    .join('\n')
}

/**
 * Write output to stdout
 */
export function write<T>(output: CommandOutput<T>, options: OutputOptions): void {
  if (options.quiet && output.success) return
  console.log(format(output, options))
}
