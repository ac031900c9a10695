/**
 * Notebook validation: structure inspection, then pytest --nbval
 */

import { join, resolve } from 'path'
import { ErrorCode, NbciError } from '../../lib/errors'
import { isDirectory, isFile } from '../../lib/files'
import { inspectNotebookFile } from '../../lib/notebook-validator'
import { discoverNotebooks } from '../../lib/notebooks'
import { tail } from '../../lib/process'
import { type PipelineContext, type StageResult, stageLog } from '../context'

export interface ValidateResult extends StageResult {
  notebooks: string[]
  invalid: string[]
  nbvalPassed?: boolean
}

export async function validateNotebooks(ctx: PipelineContext): Promise<ValidateResult> {
  const { cwd, config } = ctx
  const log = stageLog(ctx, 'validate')

  log.info('Step 4: Validating notebooks...')

  if (!isDirectory(join(cwd, config.notebooksDir))) {
    log.warning('No notebooks directory found')
    return { status: 'warning', notebooks: [], invalid: [] }
  }

  const notebooks = discoverNotebooks(cwd, config.notebooksDir)
  log.info(`Found ${notebooks.length} notebook files`)
  if (notebooks.length === 0) {
    log.warning('No notebook files found in notebooks directory')
    return { status: 'warning', notebooks, invalid: [] }
  }

  const single = config.singleNotebook
  if (single && !isFile(resolve(cwd, single))) {
    throw NbciError.fatal(ErrorCode.NOTEBOOK_NOT_FOUND, `Specified notebook not found: ${single}`, { notebook: single })
  }

  const invalid: string[] = []
  for (const notebook of single ? [single] : notebooks) {
    const inspection = inspectNotebookFile(resolve(cwd, notebook))
    for (const issue of inspection.warnings) {
      ctx.log.debug(`${notebook}: ${issue.message}`)
    }
    if (!inspection.valid) {
      invalid.push(notebook)
      for (const issue of inspection.errors) {
        log.error(`${notebook}: ${issue.message}`)
      }
    }
  }

  log.info('Running notebook validation with nbval...')
  const target = single ?? config.notebooksDir
  if (single) log.info(`Validating single notebook: ${single}`)
  const result = await ctx.runner('pytest', ['--nbval', target], { cwd, env: ctx.env })
  if (result.success) {
    log.success('Notebook validation completed')
  } else {
    log.error(single ? `Notebook validation failed for ${single}` : 'Some notebooks failed validation')
    ctx.log.plain(tail(result, 10))
  }

  return {
    status: result.success && invalid.length === 0 ? 'completed' : 'failed',
    notebooks,
    invalid,
    nbvalPassed: result.success,
  }
}
