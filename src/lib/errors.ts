/**
 * Standardized error handling for the nbci CLI
 *
 * Provides a consistent error class that integrates with the CLI output
 * system. Pipeline stages throw `NbciError` with `fatal: true` for the
 * conditions that must stop a run.
 */

import type { CommandError, CommandOutput } from '../types/output'

/**
 * Standard error codes used throughout the CLI
 */
export const ErrorCode = {
  // Environment
  MISSING_TOOL: 'MISSING_TOOL',
  NOT_A_REPOSITORY: 'NOT_A_REPOSITORY',
  INSTALL_FAILED: 'INSTALL_FAILED',

  // Configuration and input
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_EXECUTION_MODE: 'INVALID_EXECUTION_MODE',
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  NOTEBOOK_NOT_FOUND: 'NOTEBOOK_NOT_FOUND',

  // Pipeline stages
  DOCS_BUILD_FAILED: 'DOCS_BUILD_FAILED',
  WORKFLOW_VALIDATION: 'WORKFLOW_VALIDATION',

  // Migration
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  GIT_FAILED: 'GIT_FAILED',
  ABORTED: 'ABORTED',

  // Command execution errors
  COMMAND_FAILED: 'COMMAND_FAILED',
  TIMEOUT: 'TIMEOUT',

  // Internal errors
  INTERNAL: 'INTERNAL',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

/**
 * Default hints for common error codes
 */
const DefaultHints: Record<string, string> = {
  [ErrorCode.MISSING_TOOL]: 'Install the tool and make sure it is on PATH',
  [ErrorCode.NOT_A_REPOSITORY]: 'Run from the root of a git repository',
  [ErrorCode.INSTALL_FAILED]: 'Check network access to PyPI, or rerun with SKIP_DEPS=true',
  [ErrorCode.INVALID_EXECUTION_MODE]: 'Use one of: validation-only, quick, full',
  [ErrorCode.INVALID_CONFIG]: 'Check nbci.toml against the documented sections',
  [ErrorCode.NOTEBOOK_NOT_FOUND]: 'Relative paths start at the repository root',
  [ErrorCode.DOCS_BUILD_FAILED]: 'Run `jupyter-book build .` directly to see the full log',
  [ErrorCode.DOWNLOAD_FAILED]: 'Check the organization and actions repository names',
  [ErrorCode.NOT_FOUND]: 'Check the path or name spelling',
  [ErrorCode.TIMEOUT]: 'Try again or increase the timeout in nbci.toml',
}

export interface NbciErrorOptions {
  /** Error code for categorization */
  code: ErrorCode | string
  /** Human-readable error message */
  message: string
  /** Suggested next step */
  hint?: string
  /** Additional context data */
  context?: Record<string, unknown>
  /** Original error that caused this */
  cause?: Error
  /** Stops a pipeline run when thrown from a stage */
  fatal?: boolean
}

/**
 * Custom error class for the nbci CLI
 *
 * @example
 * throw new NbciError({
 *   code: ErrorCode.NOTEBOOK_NOT_FOUND,
 *   message: 'Specified notebook not found: notebooks/x.ipynb',
 *   fatal: true,
 * })
 */
export class NbciError extends Error {
  readonly code: string
  readonly hint?: string
  readonly context?: Record<string, unknown>
  readonly fatal: boolean
  override readonly cause?: Error

  constructor(options: NbciErrorOptions) {
    super(options.message)
    this.name = 'NbciError'
    this.code = options.code
    this.hint = options.hint ?? DefaultHints[options.code]
    this.context = options.context
    this.cause = options.cause
    this.fatal = options.fatal ?? false

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NbciError)
    }
  }

  /**
   * Create from an unknown error (e.g., from catch block)
   */
  static from(err: unknown, code: ErrorCode | string = ErrorCode.INTERNAL): NbciError {
    if (err instanceof NbciError) {
      return err
    }

    if (err instanceof Error) {
      return new NbciError({
        code,
        message: err.message,
        cause: err,
      })
    }

    return new NbciError({
      code,
      message: String(err),
    })
  }

  /**
   * Create a fatal error (stops the pipeline)
   */
  static fatal(code: ErrorCode, message: string, context?: Record<string, unknown>): NbciError {
    return new NbciError({ code, message, context, fatal: true })
  }

  /**
   * Create an INVALID_INPUT error
   */
  static invalidInput(message: string, hint?: string): NbciError {
    return new NbciError({
      code: ErrorCode.INVALID_INPUT,
      message,
      hint,
    })
  }

  /**
   * Convert to CommandError format
   */
  toCommandError(): CommandError {
    const err: CommandError = {
      code: this.code,
      message: this.message,
    }
    if (this.hint) {
      err.hint = this.hint
    }
    if (this.context) {
      err.context = this.context
    }
    if (this.stack) {
      err.stack = this.stack
    }
    return err
  }

  /**
   * Convert to CommandOutput format
   */
  toOutput(): CommandOutput<never> {
    return {
      success: false,
      error: this.toCommandError(),
    }
  }
}

/**
 * Type guard to check if an error is an NbciError
 */
export function isNbciError(err: unknown): err is NbciError {
  return err instanceof NbciError
}
