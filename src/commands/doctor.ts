/**
 * Doctor command - Diagnose slow or hanging local CI runs
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import { isDirectory, isFile } from '../lib/files'
import { error, success } from '../lib/output'
import { type CommandRunner, commandExists, type ProcessEnv, runCheck } from '../lib/process'
import { countLines } from '../pipeline/stages/dependencies'
import { activateVirtualEnv } from '../pipeline/stages/environment'
import type { CommandDefinition } from '../types/commands'

const DoctorArgs = z.object({
  offline: z.boolean().default(false),
})

const PYPI_URL = 'https://pypi.org/simple/'
const PROBE_TIMEOUT_MS = 30_000
const REACHABILITY_TIMEOUT_MS = 5_000

const HEAVY_PACKAGES = /astropy|numpy|scipy|matplotlib/
const STSCI_PACKAGES = /jwst|crds|stsynphot/
const NOTEBOOK_TOOLS = ['jupyter', 'nbval', 'nbconvert', 'bandit'] as const

interface CheckResult {
  name: string
  status: 'ok' | 'warning' | 'error' | 'info'
  version?: string
  message?: string
}

async function checkCommand(runner: CommandRunner, name: string, env: ProcessEnv): Promise<CheckResult> {
  if (!(await commandExists(runner, name, env))) {
    return { name, status: 'warning', message: 'Not found in PATH' }
  }
  const result = await runner(name, ['--version'], { env })
  const text = `${result.stdout} ${result.stderr}`
  return {
    name,
    status: result.success ? 'ok' : 'warning',
    version: text.match(/(\d+\.\d+(?:\.\d+)?)/)?.[1] ?? 'installed',
  }
}

async function checkPyPI(): Promise<CheckResult> {
  try {
    const response = await fetch(PYPI_URL, { method: 'HEAD', signal: AbortSignal.timeout(REACHABILITY_TIMEOUT_MS) })
    return response.ok
      ? { name: 'PyPI', status: 'ok', message: 'reachable' }
      : { name: 'PyPI', status: 'warning', message: `HTTP ${response.status}` }
  } catch (err) {
    return { name: 'PyPI', status: 'warning', message: `may not be reachable (${err instanceof Error ? err.message : String(err)})` }
  }
}

export function doctorRecommendations(options: { hasVenv: boolean; requirementsLines?: number; venvDir: string }): string[] {
  const recommendations: string[] = []
  if (!options.hasVenv) {
    recommendations.push(`Create a virtual environment first: python3 -m venv ${options.venvDir}`)
  }
  if (options.requirementsLines !== undefined && options.requirementsLines > 50) {
    recommendations.push('Large requirements.txt: run SKIP_DEPS=true nbci ci run, then install dependencies in smaller chunks')
  }
  recommendations.push(
    'Skip dependency installation and test with existing packages: nbci ci run --skip-deps',
    'Test only workflow validation (fastest): nbci workflows validate',
    'Use validation-only mode: nbci ci run --execution-mode validation-only'
  )
  return recommendations
}

export const doctor: CommandDefinition<typeof DoctorArgs> = {
  name: 'doctor',
  description: 'Diagnose the local CI environment',
  help: `
Checks python3, the virtual environment, uv and pip, dependency files,
PyPI reachability, disk space, installed notebook tools, and whether a
trial install finishes within 30 seconds.

  --offline   skip the PyPI reachability check and trial installs
`,
  examples: ['nbci doctor', 'nbci doctor --offline --json'],
  args: DoctorArgs,

  async run(args, ctx) {
    const { cwd, runner, log } = ctx
    const checks: CheckResult[] = []
    const venvDir = ctx.config.pipeline.venv_dir

    log.banner('🔍 Local CI Diagnostic Tool')

    log.info('Checking Python environment...')
    const python = await checkCommand(runner, 'python3', ctx.env)
    checks.push(python.status === 'ok' ? python : { ...python, status: 'error' })

    const venvPath = join(cwd, venvDir)
    const hasVenv = isDirectory(venvPath)
    let env = ctx.env
    if (!hasVenv) {
      checks.push({ name: 'virtualenv', status: 'warning', message: 'No virtual environment found' })
    } else if (!isFile(join(venvPath, 'bin', 'activate'))) {
      checks.push({ name: 'virtualenv', status: 'warning', message: 'Activation script not found' })
    } else {
      env = activateVirtualEnv(ctx.env, venvPath)
      checks.push({ name: 'virtualenv', status: 'ok', message: venvPath })
    }

    log.info('Checking package managers...')
    const uv = await checkCommand(runner, 'uv', env)
    checks.push(uv)
    const pip = await checkCommand(runner, 'pip', env)
    checks.push(pip.status === 'ok' ? pip : { ...pip, status: 'error' })

    log.info('Checking dependency files...')
    const requirementsPath = join(cwd, 'requirements.txt')
    let requirementsLines: number | undefined
    if (isFile(requirementsPath)) {
      requirementsLines = countLines(requirementsPath)
      const text = readFileSync(requirementsPath, 'utf-8')
      checks.push({ name: 'requirements.txt', status: 'info', message: `${requirementsLines} lines` })
      log.plain('First 10 lines:')
      for (const line of text.split('\n').slice(0, 10)) log.plain(`  ${line}`)
      if (HEAVY_PACKAGES.test(text)) {
        checks.push({ name: 'scientific packages', status: 'warning', message: 'Large scientific packages - may take longer to install' })
      }
      if (STSCI_PACKAGES.test(text)) {
        checks.push({ name: 'STScI packages', status: 'warning', message: 'STScI-specific packages - may require special handling' })
      }
    } else {
      checks.push({ name: 'requirements.txt', status: 'info', message: 'Not found' })
    }
    checks.push({
      name: 'pyproject.toml',
      status: 'info',
      message: isFile(join(cwd, 'pyproject.toml')) ? 'found' : 'Not found',
    })

    if (!args.offline) {
      log.info('Checking network connectivity...')
      checks.push(await checkPyPI())
    }

    log.info('Checking disk space...')
    const df = await runner('df', ['-h', '.'], { cwd })
    if (df.success) {
      checks.push({ name: 'disk', status: 'info', message: df.stdout.split('\n').pop() ?? '' })
    }

    log.info('Checking existing package installations...')
    for (const pkg of NOTEBOOK_TOOLS) {
      const installed = await runCheck(runner, 'python', ['-c', `import ${pkg}`], { cwd, env })
      checks.push({ name: pkg, status: installed ? 'ok' : 'info', message: installed ? 'installed' : 'not installed' })
    }

    if (!args.offline) {
      log.info('Testing quick package installation...')
      const pipTrial = await runCheck(runner, 'pip', ['install', '--dry-run', 'requests'], { cwd, env, timeout: PROBE_TIMEOUT_MS })
      checks.push({ name: 'pip install test', status: pipTrial ? 'ok' : 'warning', message: pipTrial ? 'passed' : 'failed or timed out' })
      if (uv.status === 'ok') {
        const uvTrial = await runCheck(runner, 'uv', ['pip', 'install', '--dry-run', 'requests'], {
          cwd,
          env,
          timeout: PROBE_TIMEOUT_MS,
        })
        checks.push({ name: 'uv install test', status: uvTrial ? 'ok' : 'warning', message: uvTrial ? 'passed' : 'failed or timed out' })
      }
    }

    const results = checks.map((c) => {
      const icon = c.status === 'ok' ? '✓' : c.status === 'warning' ? '!' : c.status === 'error' ? '✗' : '-'
      const detail = c.version || c.message || ''
      return `${icon} ${c.name}: ${detail}`
    })
    const recommendations = doctorRecommendations({ hasVenv, requirementsLines, venvDir })

    if (python.status !== 'ok') {
      return error('MISSING_TOOL', 'python3 is not installed or not in PATH', 'Install Python 3.11 or newer', {
        checks,
        results,
      })
    }

    const warnings = checks.filter((c) => c.status === 'warning' || c.status === 'error').length
    return success({
      summary: `${checks.length - warnings}/${checks.length} checks without warnings`,
      warnings,
      results,
      recommendations,
    })
  },
}
