/**
 * Run report: every (stage, severity, message) recorded during a pipeline run
 *
 * The exit code is a reduction over the records rather than a decision each
 * stage makes on its own.
 */

import type { Severity, StageName, StageOutcome, StageRecord, StageStatus } from '../types/pipeline'

export class RunReport {
  private readonly records: StageRecord[] = []
  private readonly outcomes = new Map<StageName, StageOutcome>()

  record(stage: StageName, severity: Severity, message: string): void {
    this.records.push({ stage, severity, message })
  }

  setStatus(stage: StageName, status: StageStatus, duration_ms = 0): void {
    this.outcomes.set(stage, { stage, status, duration_ms })
  }

  status(stage: StageName): StageStatus | undefined {
    return this.outcomes.get(stage)?.status
  }

  get entries(): readonly StageRecord[] {
    return this.records
  }

  get stages(): StageOutcome[] {
    return [...this.outcomes.values()]
  }

  count(severity: Severity, stage?: StageName): number {
    return this.records.filter((r) => r.severity === severity && (stage === undefined || r.stage === stage)).length
  }

  hasFatal(): boolean {
    return this.count('fatal') > 0
  }

  /**
   * 1 on any fatal record; with `strict`, also on any error record
   */
  exitCode(strict = false): number {
    if (this.hasFatal()) return 1
    if (strict && this.count('error') > 0) return 1
    return 0
  }
}
