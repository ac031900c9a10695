/**
 * GitHub Actions workflow validation
 *
 * Per file: YAML syntax, required top-level keys, leftover template
 * placeholders, local action references, and an optional `act --dryrun`.
 */

import { readFileSync } from 'fs'
import { basename, join } from 'path'
import { parseDocument } from 'yaml'
import { ErrorCode, NbciError } from './errors'
import { findFiles, isDirectory } from './files'
import type { Logger } from './logger'
import { type CommandRunner, commandExists } from './process'

export const DEFAULT_WORKFLOWS_DIR = '.github/workflows'

export const PLACEHOLDER_TOKENS = ['your-org', 'dev-actions'] as const

const REQUIRED_KEYS = ['name', 'on', 'jobs'] as const

export type ActOutcome = 'passed' | 'failed' | 'unavailable' | 'skipped'

export interface WorkflowFileReport {
  file: string
  syntaxErrors: string[]
  structureErrors: string[]
  act: ActOutcome
  /** Failed check categories (syntax, structure) */
  errorCount: number
}

export interface WorkflowInsights {
  reusable: number
  secrets: number
  jobDependencies: number
}

export interface WorkflowValidationSummary {
  directory: string
  total: number
  passed: number
  warnings: number
  errors: number
  files: WorkflowFileReport[]
  insights: WorkflowInsights
  recommendations: string[]
  exitCode: number
}

export interface ValidateWorkflowsOptions {
  cwd: string
  runner: CommandRunner
  log: Logger
  directory?: string
  /** Run `act --dryrun` per file when act is installed */
  act?: boolean
  verbose?: boolean
  env?: Record<string, string | undefined>
}

export function isWorkflowFile(name: string): boolean {
  return name.endsWith('.yml') || name.endsWith('.yaml')
}

/**
 * YAML parse errors, one message per error
 */
export function checkSyntax(source: string): string[] {
  return parseDocument(source).errors.map((err) => err.message.split('\n')[0] ?? err.message)
}

/**
 * Line-level checks on the raw workflow text
 */
export function checkStructure(source: string): string[] {
  const errors: string[] = []

  for (const key of REQUIRED_KEYS) {
    if (!new RegExp(`^${key}:`, 'm').test(source)) {
      errors.push(`Missing '${key}' field`)
    }
  }

  if (PLACEHOLDER_TOKENS.some((token) => source.includes(token))) {
    errors.push(`Contains placeholder references (${PLACEHOLDER_TOKENS.join(', ')})`)
  }

  if (source.includes('uses: ./.')) {
    errors.push('Uses local action reference (./.) - may not work in CI')
  }

  return errors
}

/**
 * Dry-run a workflow with act
 */
export async function actDryRun(
  runner: CommandRunner,
  file: string,
  cwd: string,
  env?: Record<string, string | undefined>
): Promise<ActOutcome> {
  if (!(await commandExists(runner, 'act', env))) return 'unavailable'
  const result = await runner('act', ['--dryrun', '--workflow', file], { cwd, env })
  return result.success ? 'passed' : 'failed'
}

export function collectInsights(sources: string[]): WorkflowInsights {
  const count = (needle: string) => sources.filter((source) => source.includes(needle)).length
  return {
    reusable: count('workflow_call'),
    secrets: count('secrets.'),
    jobDependencies: count('needs:'),
  }
}

export function recommendationsFor(errors: number, warnings: number): string[] {
  const recommendations: string[] = []
  if (errors > 0) recommendations.push('Fix syntax and structure errors before proceeding')
  if (warnings > 0) recommendations.push('Address act validation warnings if using local testing')
  recommendations.push(
    'Test workflows with manual dispatch before enabling automatic triggers',
    'Verify all required secrets are configured in repository settings',
    'Consider using semantic versioning for workflow references'
  )
  return recommendations
}

/**
 * Validate every workflow file in the workflows directory
 */
export async function validateWorkflows(options: ValidateWorkflowsOptions): Promise<WorkflowValidationSummary> {
  const { cwd, runner, log, directory = DEFAULT_WORKFLOWS_DIR, act = true, verbose = false, env } = options

  if (!isDirectory(join(cwd, directory))) {
    throw new NbciError({
      code: ErrorCode.NOT_FOUND,
      message: `Workflows directory not found: ${directory}`,
    })
  }

  const files = findFiles(cwd, directory, isWorkflowFile)
  if (files.length === 0) {
    throw new NbciError({
      code: ErrorCode.WORKFLOW_VALIDATION,
      message: `No workflow files found in ${directory}`,
    })
  }

  log.info(`Found ${files.length} workflow file(s)`)

  const reports: WorkflowFileReport[] = []
  const sources: string[] = []
  let warnings = 0

  for (const file of files) {
    const name = basename(file)
    const source = readFileSync(join(cwd, file), 'utf-8')
    sources.push(source)
    log.info(`Validating: ${name}`)

    const syntaxErrors = checkSyntax(source)
    if (syntaxErrors.length === 0) {
      if (verbose) log.success('  YAML syntax: VALID')
    } else {
      log.error('  YAML syntax: INVALID')
      for (const message of syntaxErrors) log.plain(`    - ${message}`)
    }

    const structureErrors = checkStructure(source)
    if (structureErrors.length === 0) {
      if (verbose) log.success('  Structure: VALID')
    } else {
      log.error('  Structure issues:')
      for (const message of structureErrors) log.plain(`    - ${message}`)
    }

    let actOutcome: ActOutcome = 'skipped'
    if (act) {
      actOutcome = await actDryRun(runner, file, cwd, env)
      if (actOutcome === 'failed') {
        log.warning('  Act validation: FAILED')
        warnings++
      } else if (actOutcome === 'passed') {
        if (verbose) log.success('  Act validation: PASSED')
      } else if (verbose) {
        log.info('  Act validation: SKIPPED (act not installed)')
      }
    }

    const errorCount = (syntaxErrors.length > 0 ? 1 : 0) + (structureErrors.length > 0 ? 1 : 0)
    if (errorCount === 0) {
      log.success(`${name}: PASSED`)
    } else {
      log.error(`${name}: FAILED (${errorCount} error(s))`)
    }

    reports.push({ file, syntaxErrors, structureErrors, act: actOutcome, errorCount })
  }

  const errors = reports.filter((report) => report.errorCount > 0).length
  const summary: WorkflowValidationSummary = {
    directory,
    total: files.length,
    passed: files.length - errors,
    warnings,
    errors,
    files: reports,
    insights: collectInsights(sources),
    recommendations: recommendationsFor(errors, warnings),
    exitCode: errors > 0 ? 1 : 0,
  }

  return summary
}
