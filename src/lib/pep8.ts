/**
 * PEP 8 checks for standalone Python scripts, via flake8
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { ErrorCode, NbciError } from './errors'
import { isFile } from './files'
import { type CommandRunner, NOT_FOUND_EXIT_CODE } from './process'

/** Codes tolerated in notebook helper scripts */
export const IGNORED_CODES = ['E261', 'E501', 'F821', 'W291', 'W293'] as const

/** Exit status when style issues remain */
export const STYLE_ISSUES_EXIT_CODE = 99

export interface StyleIssue {
  line: number
  column: number
  code: string
  message: string
  /** Offending source line, without its newline */
  source: string
  /** Spaces up to the column, then a marker */
  pointer: string
}

export interface StyleReport {
  file: string
  clean: boolean
  issues: StyleIssue[]
  ignored: number
}

interface Flake8Warning {
  line: number
  column: number
  code: string
  message: string
}

const WARNING_LINE = /^.*?:(\d+):(\d+): ([A-Z]+\d+) (.*)$/

/**
 * Parse `path:line:col: CODE message` lines; anything else is skipped
 */
export function parseFlake8Output(output: string): Flake8Warning[] {
  const warnings: Flake8Warning[] = []
  for (const text of output.split('\n')) {
    const match = WARNING_LINE.exec(text.trim())
    if (!match) continue
    const [, line, column, code, message] = match
    if (line === undefined || column === undefined || code === undefined || message === undefined) continue
    warnings.push({ line: Number(line), column: Number(column), code, message })
  }
  return warnings
}

export function pointerAt(column: number): string {
  return `${' '.repeat(Math.max(column - 1, 0))}▲`
}

/**
 * Run flake8 on one script and keep the issues that are not on the ignore list
 */
export async function checkScriptStyle(runner: CommandRunner, file: string, cwd?: string): Promise<StyleReport> {
  const path = resolve(cwd ?? process.cwd(), file)
  if (!isFile(path)) {
    throw new NbciError({ code: ErrorCode.NOT_FOUND, message: `File not found: ${file}`, context: { file } })
  }

  const result = await runner('flake8', [file], { cwd })
  if (result.exitCode === NOT_FOUND_EXIT_CODE) {
    throw new NbciError({ code: ErrorCode.MISSING_TOOL, message: 'flake8 is not installed', hint: 'pip install flake8' })
  }
  const ignore = new Set<string>(IGNORED_CODES)
  const warnings = parseFlake8Output(result.stdout)
  const kept = warnings.filter((warning) => !ignore.has(warning.code))

  const lines = kept.length > 0 ? readFileSync(path, 'utf-8').split('\n') : []
  const issues = kept.map(
    (warning): StyleIssue => ({
      ...warning,
      source: lines[warning.line - 1] ?? '',
      pointer: pointerAt(warning.column),
    })
  )

  return { file, clean: issues.length === 0, issues, ignored: warnings.length - kept.length }
}
