/**
 * Repository-specific setup from the matching profile
 *
 * Nothing here is fatal: a failed directory or import probe is a warning.
 */

import { mkdirSync } from 'fs'
import { runCheck } from '../../lib/process'
import { type PipelineContext, type StageResult, stageLog } from '../context'

export interface RepositoryExtrasResult extends StageResult {
  probe?: { module: string; available: boolean }
}

export async function applyRepositoryExtras(ctx: PipelineContext): Promise<RepositoryExtrasResult> {
  const ci = ctx.profile?.ci
  if (!ci) {
    ctx.log.debug(`No repository-specific setup for ${ctx.repository}`)
    return { status: 'skipped' }
  }

  const log = stageLog(ctx, 'repository')
  let status: RepositoryExtrasResult['status'] = 'completed'
  if (ci.notice) log.info(`${ci.notice}...`)

  const env = { ...ctx.env, ...ci.env }

  for (const dir of ci.create_dirs) {
    try {
      mkdirSync(dir, { recursive: true })
    } catch (err) {
      log.warning(`Could not create ${dir}: ${err instanceof Error ? err.message : String(err)}`)
      status = 'warning'
    }
  }
  if (Object.keys(ci.env).length > 0) {
    log.success(`${ctx.profile?.label ?? ctx.repository} environment configured`)
  }

  let probe: RepositoryExtrasResult['probe']
  if (ci.probe) {
    const { module, description, hint } = ci.probe
    const available = await runCheck(ctx.runner, 'python', ['-c', `import ${module}`], { cwd: ctx.cwd, env })
    probe = { module, available }
    if (available) {
      log.success(`${description} available`)
    } else {
      log.warning(`${description} not available${hint ? ` (${hint})` : ''}`)
      status = 'warning'
    }
  }

  return { status, env, probe }
}
