/**
 * Environment provisioning: required tools, repository root, isolated venv, uv
 */

import { delimiter, join, resolve } from 'path'
import { ErrorCode, NbciError } from '../../lib/errors'
import { isDirectory } from '../../lib/files'
import { commandExists, type ProcessEnv, tail } from '../../lib/process'
import { type PipelineContext, type StageResult, seconds, stageLog } from '../context'

const REQUIRED_TOOLS = [
  { command: 'python3', label: 'Python 3' },
  { command: 'git', label: 'Git' },
] as const

export interface EnvironmentResult extends StageResult {
  env: ProcessEnv
  venvPath: string
  venvCreated: boolean
  uvInstalled: boolean
}

/**
 * Environment as `source <venv>/bin/activate` leaves it
 */
export function activateVirtualEnv(env: ProcessEnv, venvPath: string): ProcessEnv {
  const rest: ProcessEnv = { ...env }
  delete rest.PYTHONHOME
  const bin = join(venvPath, 'bin')
  return {
    ...rest,
    VIRTUAL_ENV: venvPath,
    PATH: env.PATH ? `${bin}${delimiter}${env.PATH}` : bin,
  }
}

export async function provisionEnvironment(ctx: PipelineContext): Promise<EnvironmentResult> {
  const { cwd, config, runner } = ctx
  const log = stageLog(ctx, 'environment')

  log.info('Step 1: Validating environment...')
  for (const tool of REQUIRED_TOOLS) {
    if (!(await commandExists(runner, tool.command, ctx.env))) {
      throw NbciError.fatal(ErrorCode.MISSING_TOOL, `${tool.label} is not installed or not in PATH`, {
        tool: tool.command,
      })
    }
  }

  if (!isDirectory(join(cwd, '.git'))) {
    throw NbciError.fatal(ErrorCode.NOT_A_REPOSITORY, 'Not in a git repository', { cwd })
  }
  log.success('Environment validation passed')

  log.info('Step 2: Setting up Python environment...')
  const venvPath = resolve(cwd, config.venvDir)
  let venvCreated = false
  if (isDirectory(venvPath)) {
    log.info('Using existing virtual environment')
  } else {
    const result = await runner('python3', ['-m', 'venv', config.venvDir], { cwd, env: ctx.env })
    if (!result.success) {
      throw NbciError.fatal(ErrorCode.INSTALL_FAILED, `Failed to create virtual environment: ${tail(result, 3)}`)
    }
    venvCreated = true
    log.success('Created virtual environment')
  }

  const env = activateVirtualEnv(ctx.env, venvPath)

  let uvInstalled = false
  if (!(await commandExists(runner, 'uv', env))) {
    log.info('Installing uv package manager...')
    const timeout = config.timeouts.accelerant_install
    const result = await runner('pip', ['install', 'uv'], { cwd, env, timeout: seconds(timeout) })
    if (!result.success) {
      const reason = result.timedOut ? `timeout after ${timeout}s` : tail(result, 3)
      throw NbciError.fatal(ErrorCode.INSTALL_FAILED, `Failed to install uv (${reason})`)
    }
    uvInstalled = true
    log.success('Installed uv package manager')
  }

  log.success('Python environment ready')
  return { status: 'passed', env, venvPath, venvCreated, uvInstalled }
}
