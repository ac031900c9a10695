/**
 * Notebook execution in place with nbconvert
 *
 * A failing notebook is never fatal: it is recorded, copied to
 * `<stem>_failed.ipynb`, and the loop moves on.
 */

import { copyFileSync } from 'fs'
import { join, resolve } from 'path'
import { isDirectory, isFile } from '../../lib/files'
import { discoverNotebooks, failedNotebookPath, selectNotebooks } from '../../lib/notebooks'
import { tail } from '../../lib/process'
import { type PipelineContext, type StageResult, seconds, stageLog } from '../context'

export interface ExecuteResult extends StageResult {
  selected: string[]
  executed: string[]
  failed: string[]
  markers: string[]
}

export async function executeNotebooks(ctx: PipelineContext): Promise<ExecuteResult> {
  const { cwd, config } = ctx
  const log = stageLog(ctx, 'execute')
  const empty = { selected: [], executed: [], failed: [], markers: [] }

  log.info('Step 5: Executing notebooks...')

  if (config.executionMode === 'validation-only') {
    log.info('Execution mode is validation-only, skipping execution')
    return { status: 'skipped', ...empty }
  }

  const notebooks = isDirectory(join(cwd, config.notebooksDir)) ? discoverNotebooks(cwd, config.notebooksDir) : []
  if (notebooks.length === 0) {
    log.warning('No notebooks to execute')
    return { status: 'warning', ...empty }
  }

  if (config.executionMode === 'quick') {
    log.info(`Running quick execution (first ${config.quickCount} notebooks)...`)
  } else {
    log.info('Running full notebook execution...')
  }

  const selected = selectNotebooks(config.executionMode, notebooks, config.singleNotebook, config.quickCount)
  const executed: string[] = []
  const failed: string[] = []
  const markers: string[] = []

  for (const notebook of selected) {
    const path = resolve(cwd, notebook)
    if (!isFile(path)) continue

    log.info(`Executing: ${notebook}`)
    const result = await ctx.runner('jupyter', ['nbconvert', '--to', 'notebook', '--execute', '--inplace', notebook], {
      cwd,
      env: ctx.env,
      timeout: seconds(config.timeouts.notebook),
    })

    if (result.success) {
      executed.push(notebook)
      continue
    }

    failed.push(notebook)
    log.error(
      result.timedOut
        ? `Execution timed out after ${config.timeouts.notebook}s for: ${notebook}`
        : `Execution failed for: ${notebook}`
    )
    ctx.log.debug(tail(result))

    const marker = failedNotebookPath(notebook)
    try {
      copyFileSync(path, resolve(cwd, marker))
      markers.push(marker)
    } catch (err) {
      ctx.log.debug(`Could not write ${marker}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  log.success('Notebook execution completed')
  return { status: failed.length > 0 ? 'failed' : 'completed', selected, executed, failed, markers }
}
