/**
 * Dependency installation: core notebook tools, then the repository's own requirements
 *
 * Each install tries uv first and falls back to pip.
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { ErrorCode, NbciError } from '../../lib/errors'
import { isFile } from '../../lib/files'
import { commandExists, runCheck } from '../../lib/process'
import { type PipelineContext, type StageResult, seconds, stageLog } from '../context'

export const CORE_PACKAGES = ['jupyter', 'nbval', 'nbconvert', 'bandit', 'jupyter-book'] as const

export type DependencySource = 'requirements.txt' | 'pyproject.toml' | 'none' | 'skipped'

export interface DependenciesResult extends StageResult {
  coreInstalled: boolean
  source: DependencySource
  sourceInstalled: boolean
}

/**
 * Install `args` with `uv pip install`, then `pip install`; true when either succeeds
 */
async function installWithFallback(
  ctx: PipelineContext,
  args: string[],
  timeoutSeconds: number,
  onFallback: () => void
): Promise<'uv' | 'pip' | false> {
  const options = { cwd: ctx.cwd, env: ctx.env, timeout: seconds(timeoutSeconds) }
  if ((await ctx.runner('uv', ['pip', 'install', ...args], options)).success) return 'uv'
  onFallback()
  if ((await ctx.runner('pip', ['install', ...args], options)).success) return 'pip'
  return false
}

export function countLines(path: string): number {
  const text = readFileSync(path, 'utf-8')
  if (text === '') return 0
  return text.split('\n').length - (text.endsWith('\n') ? 1 : 0)
}

async function coreToolsAvailable(ctx: PipelineContext): Promise<boolean> {
  return (
    (await commandExists(ctx.runner, 'jupyter', ctx.env)) &&
    (await runCheck(ctx.runner, 'python', ['-c', 'import nbval, nbconvert, bandit'], { cwd: ctx.cwd, env: ctx.env }))
  )
}

export async function installDependencies(ctx: PipelineContext): Promise<DependenciesResult> {
  const { cwd, config } = ctx
  const log = stageLog(ctx, 'dependencies')
  const { timeouts } = config

  if (config.skipDeps) {
    log.info('Step 3: Skipping dependencies installation (SKIP_DEPS=true)')
    log.warning('Assuming dependencies are already installed')
    return { status: 'skipped', coreInstalled: false, source: 'skipped', sourceInstalled: false }
  }

  log.info('Step 3: Installing dependencies...')

  let coreInstalled = false
  if (await coreToolsAvailable(ctx)) {
    log.info('Core notebook tools already available, skipping installation')
  } else {
    log.info(`Installing core notebook tools (${CORE_PACKAGES.join(', ')})...`)
    const installer = await installWithFallback(ctx, [...CORE_PACKAGES], timeouts.core_install, () => {
      ctx.log.warning('uv installation of core tools failed, trying pip as fallback...')
    })
    if (!installer) {
      throw NbciError.fatal(ErrorCode.INSTALL_FAILED, 'Failed to install core tools with both uv and pip')
    }
    coreInstalled = true
    log.success(installer === 'uv' ? 'Installed core notebook tools' : 'Installed core tools with pip fallback')
  }

  let source: DependencySource = 'none'
  let sourceInstalled = false
  let status: DependenciesResult['status'] = 'completed'
  const requirements = join(cwd, 'requirements.txt')

  if (isFile(requirements)) {
    source = 'requirements.txt'
    log.info('Installing from requirements.txt...')
    const lines = countLines(requirements)
    let timeout = timeouts.requirements_small
    if (lines > timeouts.large_requirements_lines) {
      log.warning(`Large requirements.txt detected (${lines} lines) - this may take 10-20 minutes`)
      timeout = timeouts.requirements_large
    }
    log.info(`Installing dependencies with ${timeout}s timeout...`)
    const installer = await installWithFallback(ctx, ['-r', 'requirements.txt'], timeout, () => {
      ctx.log.warning('uv installation failed or timed out, trying pip fallback...')
    })
    sourceInstalled = installer !== false
    if (sourceInstalled) {
      log.success('Installed requirements.txt dependencies')
    } else {
      log.error('Failed to install requirements.txt dependencies with both uv and pip')
      log.info('Continuing with available packages...')
      status = 'failed'
    }
  } else if (isFile(join(cwd, 'pyproject.toml'))) {
    source = 'pyproject.toml'
    log.info('Installing from pyproject.toml...')
    const installer = await installWithFallback(ctx, ['-e', '.'], timeouts.pyproject_install, () => {
      ctx.log.warning('uv installation failed, trying pip fallback...')
    })
    sourceInstalled = installer !== false
    if (sourceInstalled) {
      log.success('Installed pyproject.toml dependencies')
    } else {
      log.error('Failed to install pyproject.toml dependencies with both uv and pip')
      log.info('Continuing with available packages...')
      status = 'failed'
    }
  } else {
    log.warning('No requirements.txt or pyproject.toml found')
    status = 'warning'
  }

  return { status, coreInstalled, source, sourceInstalled }
}
