/**
 * Security scan: export notebooks to scripts and run bandit over them
 *
 * Scripts are exported into a private temporary directory that mirrors the
 * notebook layout, so nothing under the notebooks directory is written or
 * removed.
 */

import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import { findFiles, isDirectory } from '../../lib/files'
import { discoverNotebooks } from '../../lib/notebooks'
import { tail } from '../../lib/process'
import { type PipelineContext, type StageResult, stageLog } from '../context'

export interface SecurityResult extends StageResult {
  scanned: string[]
  issuesFound: boolean
}

const isPythonScript = (name: string) => name.endsWith('.py')

export async function runSecurityScan(ctx: PipelineContext): Promise<SecurityResult> {
  const { cwd, config } = ctx
  const log = stageLog(ctx, 'security')

  if (!config.runSecurityScan) {
    log.info('Security scan disabled')
    return { status: 'skipped', scanned: [], issuesFound: false }
  }

  log.info('Step 6: Running security scan...')
  const notebooks = isDirectory(join(cwd, config.notebooksDir)) ? discoverNotebooks(cwd, config.notebooksDir) : []
  if (notebooks.length === 0) {
    log.warning('No notebooks found for security scanning')
    return { status: 'warning', scanned: [], issuesFound: false }
  }

  const exportDir = mkdtempSync(join(tmpdir(), 'nbci-scan-'))
  let scanned: string[] = []
  let issuesFound = false
  let status: SecurityResult['status'] = 'completed'

  try {
    log.info('Converting notebooks to Python scripts...')
    for (const notebook of notebooks) {
      const outputDir = join(exportDir, dirname(notebook))
      const result = await ctx.runner('jupyter', ['nbconvert', '--to', 'script', '--output-dir', outputDir, notebook], {
        cwd,
        env: ctx.env,
      })
      if (!result.success) ctx.log.debug(`Could not convert ${notebook}: ${tail(result, 2)}`)
    }

    // relative to the export root, so they read like the notebook paths
    scanned = findFiles(exportDir, '.', isPythonScript)
    if (scanned.length === 0) {
      log.warning('No Python files generated for security scanning')
      status = 'warning'
    } else {
      log.info('Running bandit security scan...')
      const result = await ctx.runner('bandit', ['-r', exportDir], { cwd, env: ctx.env })
      if (result.stdout) ctx.log.plain(result.stdout)
      if (!result.success) {
        issuesFound = true
        status = 'warning'
        log.warning('Security scan found potential issues')
      }
      log.success('Security scan completed')
    }
  } finally {
    rmSync(exportDir, { recursive: true, force: true })
  }

  return { status, scanned, issuesFound }
}
