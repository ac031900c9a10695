/**
 * Run summary
 *
 * Notebook presence and failure markers are read back from the filesystem
 * rather than carried over from earlier stages.
 */

import { join } from 'path'
import { isDirectory } from '../../lib/files'
import { discoverNotebooks, findFailedNotebooks } from '../../lib/notebooks'
import type { PipelineSummary, StageName, StageStatus } from '../../types/pipeline'
import type { PipelineContext } from '../context'

export const STAGE_TITLES: Record<StageName, string> = {
  environment: 'Environment validation',
  dependencies: 'Dependencies installation',
  repository: 'Repository setup',
  validate: 'Notebook validation',
  execute: 'Notebook execution',
  security: 'Security scanning',
  docs: 'Documentation building',
  summary: 'Summary',
}

const STATUS_ICONS: Record<StageStatus, string> = {
  passed: '✅',
  completed: '✅',
  skipped: '⏭️ ',
  warning: '⚠️ ',
  failed: '❌',
}

export const NEXT_STEPS = [
  '1. Review any warnings or errors above',
  '2. Test with GitHub Actions using workflow_dispatch',
  '3. Create a test PR to verify automated triggers',
  '4. Consider running with different parameters:',
  '   - EXECUTION_MODE=full (for full execution)',
  '   - SINGLE_NOTEBOOK=path/to/notebook.ipynb (for single notebook testing)',
  '   - RUN_SECURITY_SCAN=false (to skip security scanning)',
]

/**
 * Build the summary without printing anything
 */
export function summarizeRun(ctx: PipelineContext): PipelineSummary {
  const { cwd, config, report } = ctx
  const hasDir = isDirectory(join(cwd, config.notebooksDir))
  const notebooks = hasDir ? discoverNotebooks(cwd, config.notebooksDir) : []

  return {
    repository: ctx.repository,
    notebooksFound: notebooks.length,
    executed: notebooks.length > 0 && config.executionMode !== 'validation-only',
    stages: report.stages.filter((outcome) => outcome.stage !== 'summary'),
    warnings: report.count('warning'),
    errors: report.count('error'),
    failedNotebooks: hasDir ? findFailedNotebooks(cwd, config.notebooksDir) : [],
    exitCode: report.exitCode(config.strict),
  }
}

export function stageLine(stage: StageName, status: StageStatus): string {
  return `${STATUS_ICONS[status]} ${STAGE_TITLES[stage]}: ${status.toUpperCase()}`
}

export function printSummary(ctx: PipelineContext, summary: PipelineSummary): void {
  const { log } = ctx

  log.info('Step 8: Cleanup and summary...')
  log.plain()
  log.banner(
    '🎉 Local CI Simulation Complete!',
    [
      ...summary.stages.map((outcome) => stageLine(outcome.stage, outcome.status)),
      ...(summary.notebooksFound === 0 ? ['⚠️  No notebooks found'] : []),
      `Warnings: ${summary.warnings}  Errors: ${summary.errors}`,
    ]
  )

  if (summary.failedNotebooks.length > 0) {
    log.plain()
    log.warning(`Found ${summary.failedNotebooks.length} failed notebook(s):`)
    for (const notebook of summary.failedNotebooks) log.plain(`  - ${notebook}`)
    log.plain()
  }

  log.plain('💡 Next Steps:')
  for (const step of NEXT_STEPS) log.plain(step)
  log.plain()

  if (summary.exitCode === 0) {
    log.success('Local CI simulation completed successfully!')
  } else {
    log.error('Local CI simulation finished with errors')
  }
}

export function summarize(ctx: PipelineContext): PipelineSummary {
  const summary = summarizeRun(ctx)
  printSummary(ctx, summary)
  return summary
}
