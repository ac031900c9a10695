/**
 * State shared by the pipeline stages
 */

import type { Logger } from '../lib/logger'
import type { CommandRunner, ProcessEnv } from '../lib/process'
import type { PipelineConfig, StageName, StageStatus } from '../types/pipeline'
import type { RepositoryProfile } from '../types/repository'
import type { RunReport } from './report'

export interface PipelineContext {
  /** Repository root */
  cwd: string
  /** Directory name of the repository root, used for profile lookup */
  repository: string
  config: PipelineConfig
  profile?: RepositoryProfile
  runner: CommandRunner
  log: Logger
  report: RunReport
  /** Environment handed to every child process; stages that change it return a new one */
  env: ProcessEnv
}

export interface StageResult {
  status: StageStatus
  /** Replaces the pipeline environment for the stages that follow */
  env?: ProcessEnv
}

/**
 * Logger for one stage. Warnings and errors are also recorded in the run report.
 */
export interface StageLog {
  info(message: string): void
  success(message: string): void
  warning(message: string): void
  error(message: string): void
}

export function stageLog(ctx: PipelineContext, stage: StageName): StageLog {
  return {
    info: (message) => ctx.log.info(message),
    success: (message) => ctx.log.success(message),
    warning(message) {
      ctx.report.record(stage, 'warning', message)
      ctx.log.warning(message)
    },
    error(message) {
      ctx.report.record(stage, 'error', message)
      ctx.log.error(message)
    },
  }
}

/** Seconds from nbci.toml to the runner's milliseconds */
export function seconds(value: number): number {
  return value * 1000
}
