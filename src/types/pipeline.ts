/**
 * Local CI pipeline types
 */

import type { ExecutionMode } from './repository'
import type { Timeouts } from './config'

export type { ExecutionMode }

/**
 * Resolved pipeline options. Frozen once built and handed to every stage.
 */
export interface PipelineConfig {
  readonly pythonVersion: string
  readonly executionMode: ExecutionMode
  readonly singleNotebook?: string
  readonly runSecurityScan: boolean
  readonly buildDocumentation: boolean
  readonly skipDeps: boolean
  readonly notebooksDir: string
  readonly venvDir: string
  readonly docsOutput: string
  readonly quickCount: number
  readonly strict: boolean
  readonly timeouts: Readonly<Timeouts>
}

export type StageName =
  | 'environment'
  | 'dependencies'
  | 'repository'
  | 'validate'
  | 'execute'
  | 'security'
  | 'docs'
  | 'summary'

export type Severity = 'info' | 'warning' | 'error' | 'fatal'

export type StageStatus = 'passed' | 'completed' | 'skipped' | 'warning' | 'failed'

export interface StageRecord {
  stage: StageName
  severity: Severity
  message: string
}

export interface StageOutcome {
  stage: StageName
  status: StageStatus
  duration_ms: number
}

export interface PipelineSummary {
  repository: string
  notebooksFound: number
  executed: boolean
  stages: StageOutcome[]
  warnings: number
  errors: number
  failedNotebooks: string[]
  exitCode: number
}
