/**
 * Local CI pipeline
 *
 * Stages run strictly in order. A thrown error is recorded as fatal and
 * stops the run; everything else is collected in the run report.
 */

import { basename } from 'path'
import { NbciError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import type { CommandRunner, ProcessEnv } from '../lib/process'
import type { PipelineConfig, PipelineSummary, StageName } from '../types/pipeline'
import type { RepositoryProfile } from '../types/repository'
import type { PipelineContext, StageResult } from './context'
import { RunReport } from './report'
import { installDependencies } from './stages/dependencies'
import { buildDocumentation } from './stages/docs'
import { provisionEnvironment } from './stages/environment'
import { executeNotebooks, type ExecuteResult } from './stages/execute'
import { applyRepositoryExtras } from './stages/repository'
import { runSecurityScan } from './stages/security'
import { summarize, summarizeRun } from './stages/summary'
import { validateNotebooks } from './stages/validate'

export interface PipelineOptions {
  cwd: string
  config: PipelineConfig
  runner: CommandRunner
  log: Logger
  env: ProcessEnv
  profile?: RepositoryProfile
  /** Defaults to the basename of `cwd` */
  repository?: string
}

export interface PipelineResult {
  summary: PipelineSummary
  report: RunReport
  execution?: ExecuteResult
  docsIndex?: string
  fatal?: NbciError
}

export function configurationLines(config: PipelineConfig): string[] {
  const lines = [
    `Python Version: ${config.pythonVersion}`,
    `Execution Mode: ${config.executionMode}`,
    `Security Scan: ${config.runSecurityScan}`,
    `Build Documentation: ${config.buildDocumentation}`,
    `Skip Dependencies: ${config.skipDeps}`,
  ]
  if (config.singleNotebook) lines.push(`Single Notebook: ${config.singleNotebook}`)
  return lines
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const report = new RunReport()
  const ctx: PipelineContext = {
    cwd: options.cwd,
    repository: options.repository ?? basename(options.cwd),
    config: options.config,
    profile: options.profile,
    runner: options.runner,
    log: options.log,
    report,
    env: options.env,
  }

  ctx.log.banner('🚀 Starting Local CI Simulation', configurationLines(ctx.config))

  let current: StageName = 'environment'

  async function stage<T extends StageResult>(name: StageName, run: (ctx: PipelineContext) => Promise<T>): Promise<T> {
    current = name
    const started = Date.now()
    try {
      const result = await run(ctx)
      if (result.env) ctx.env = result.env
      report.setStatus(name, result.status, Date.now() - started)
      return result
    } catch (err) {
      report.setStatus(name, 'failed', Date.now() - started)
      throw err
    }
  }

  const result: Omit<PipelineResult, 'summary'> = { report }

  try {
    await stage('environment', provisionEnvironment)
    await stage('dependencies', installDependencies)
    await stage('repository', applyRepositoryExtras)
    await stage('validate', validateNotebooks)
    result.execution = await stage('execute', executeNotebooks)
    await stage('security', runSecurityScan)
    const docs = await stage('docs', buildDocumentation)
    result.docsIndex = docs.index
  } catch (err) {
    const fatal = NbciError.from(err)
    report.record(current, 'fatal', fatal.message)
    ctx.log.error(fatal.message)
    if (fatal.hint) ctx.log.info(fatal.hint)
    return { ...result, fatal, summary: summarizeRun(ctx) }
  }

  const summary = summarize(ctx)
  report.setStatus('summary', 'completed')
  return { ...result, summary }
}
