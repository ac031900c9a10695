/**
 * JupyterBook documentation build
 */

import { join, resolve } from 'path'
import { ErrorCode, NbciError } from '../../lib/errors'
import { isDirectory, isFile } from '../../lib/files'
import { tail } from '../../lib/process'
import { type PipelineContext, type StageResult, stageLog } from '../context'

export const BOOK_FILES = ['_config.yml', '_toc.yml'] as const

export interface DocsResult extends StageResult {
  built: boolean
  index?: string
}

export async function buildDocumentation(ctx: PipelineContext): Promise<DocsResult> {
  const { cwd, config } = ctx
  const log = stageLog(ctx, 'docs')

  if (!config.buildDocumentation) {
    log.info('Documentation building disabled')
    return { status: 'skipped', built: false }
  }

  log.info('Step 7: Building documentation...')
  if (!BOOK_FILES.every((file) => isFile(join(cwd, file)))) {
    log.warning('JupyterBook configuration files (_config.yml, _toc.yml) not found')
    log.info('Skipping documentation build')
    return { status: 'warning', built: false }
  }

  log.info('Building JupyterBook documentation...')
  const result = await ctx.runner('jupyter-book', ['build', '.', '--path-output', config.docsOutput], {
    cwd,
    env: ctx.env,
  })
  if (!result.success) {
    throw NbciError.fatal(ErrorCode.DOCS_BUILD_FAILED, `Documentation build failed: ${tail(result, 3)}`)
  }

  const htmlDir = join(resolve(cwd, config.docsOutput), '_build', 'html')
  if (!isDirectory(htmlDir)) {
    throw NbciError.fatal(ErrorCode.DOCS_BUILD_FAILED, `Documentation build directory not found: ${htmlDir}`)
  }

  const index = join(htmlDir, 'index.html')
  log.success('Documentation built successfully')
  log.info(`Documentation available at: ${index}`)
  return { status: 'completed', built: true, index }
}
