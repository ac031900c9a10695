/**
 * Output types shared by every command
 */

export type OutputFormat = 'json' | 'human' | 'auto'

export interface OutputOptions {
  format: OutputFormat
  verbose: boolean
  quiet: boolean
  color: boolean
}

export interface OutputMeta {
  /** Wall-clock duration of the command */
  duration_ms?: number
  truncated?: boolean
  remaining?: number
  /** Overrides the default 0/1 process exit code */
  exitCode?: number
}

export interface CommandError {
  code: string
  message: string
  /** Suggested next step for whoever reads the error */
  hint?: string
  context?: Record<string, unknown>
  stack?: string
}

export interface CommandOutput<T = unknown> {
  success: boolean
  data?: T
  error?: CommandError
  meta?: OutputMeta
}
