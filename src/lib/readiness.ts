/**
 * Migration readiness assessment
 *
 * Ten independent checks, one point each. The score is advisory: nothing
 * here mutates the repository and a low score never fails the command.
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import type { RepositoryProfile } from '../types/repository'
import { findFiles, isDirectory, isFile } from './files'
import { Git } from './git'
import type { Logger } from './logger'
import { isNotebookFile } from './notebooks'
import { type CommandRunner, commandExists, runCheck } from './process'
import { isWorkflowFile } from './workflow-validator'

export const MAX_SCORE = 10

export const DEPENDENCY_FILES = ['requirements.txt', 'pyproject.toml', 'setup.py'] as const

export type ReadinessBand = 'ready' | 'mostly-ready' | 'needs-work'

export type ReadinessCheckId =
  | 'git'
  | 'notebooks'
  | 'config'
  | 'toc'
  | 'workflows'
  | 'dependencies'
  | 'clean'
  | 'remote'
  | 'branch'
  | 'github'

export interface ReadinessCheck {
  id: ReadinessCheckId
  label: string
  passed: boolean
}

export interface ReadinessReport {
  repository: string
  org: string
  score: number
  maxScore: number
  percentage: number
  band: ReadinessBand
  checks: ReadinessCheck[]
  notebookCount: number
  workflows: string[]
  dependencyFiles: string[]
  branch: string | null
  remoteUrl: string | null
  remoteMatches: boolean
  actionsEnabled?: boolean
  /** Whether the profile's content pattern appears under notebooks/ */
  profileContent?: boolean
  missingProfileFiles: string[]
}

export interface AssessReadinessOptions {
  cwd: string
  repository: string
  org: string
  runner: CommandRunner
  log: Logger
  profile?: RepositoryProfile
}

export function readinessPercentage(score: number, maxScore = MAX_SCORE): number {
  return Math.floor((score * 100) / maxScore)
}

export function readinessBand(percentage: number): ReadinessBand {
  if (percentage >= 80) return 'ready'
  if (percentage >= 60) return 'mostly-ready'
  return 'needs-work'
}

/**
 * Does any file under `dir` contain a match for `pattern`
 */
export function searchContent(cwd: string, dir: string, pattern: string): boolean {
  const regex = new RegExp(pattern)
  return findFiles(cwd, dir, () => true).some((file) => regex.test(readFileSync(join(cwd, file), 'utf-8')))
}

/**
 * Run every readiness check and log findings as it goes
 */
export async function assessReadiness(options: AssessReadinessOptions): Promise<ReadinessReport> {
  const { cwd, repository, org, runner, log, profile } = options
  const git = new Git(runner, cwd)
  const at = (path: string) => join(cwd, path)

  log.banner(`Migration Readiness Check: ${repository}`)

  log.info('Checking repository structure...')
  const hasGit = isDirectory(at('.git'))
  if (hasGit) log.success('Git repository detected')
  else log.error('Not a git repository')

  const hasNotebooks = isDirectory(at('notebooks'))
  const notebookCount = hasNotebooks ? findFiles(cwd, 'notebooks', isNotebookFile).length : 0
  if (hasNotebooks) {
    log.success('notebooks/ directory found')
    log.info(`Found ${notebookCount} notebook files`)
  } else {
    log.warning('No notebooks/ directory found')
  }

  log.info('Analyzing current workflows...')
  const hasWorkflowsDir = isDirectory(at('.github/workflows'))
  const workflows = hasWorkflowsDir ? findFiles(cwd, '.github/workflows', isWorkflowFile) : []
  if (!hasWorkflowsDir) {
    log.warning('No .github/workflows/ directory found')
  } else if (workflows.length === 0) {
    log.warning('No workflow files found in .github/workflows/')
  } else {
    log.success(`Found ${workflows.length} existing workflow files`)
    for (const workflow of workflows) log.plain(`   - ${workflow}`)
  }

  log.info('Checking JupyterBook configuration...')
  const hasConfig = isFile(at('_config.yml'))
  const hasToc = isFile(at('_toc.yml'))
  for (const [present, name] of [
    [hasConfig, '_config.yml'],
    [hasToc, '_toc.yml'],
  ] as const) {
    if (present) log.success(`${name} found`)
    else log.warning(`${name} not found (needed for documentation building)`)
  }
  if (hasConfig !== hasToc) {
    log.warning('Partial Jupyter Book configuration found - both _config.yml and _toc.yml are recommended')
  }

  let profileContent: boolean | undefined
  const missingProfileFiles: string[] = []
  if (profile?.readiness) {
    const { pattern, description, required_files } = profile.readiness
    log.info(`Checking repository-specific requirements (${profile.label})...`)
    profileContent = hasNotebooks && searchContent(cwd, 'notebooks', pattern)
    if (profileContent) log.success(`Found ${description} in notebooks`)
    else log.warning(`No ${description} found in notebooks`)

    for (const file of required_files) {
      if (isFile(at(file))) {
        log.success(`${file} found`)
      } else {
        log.warning(`${file} not found`)
        missingProfileFiles.push(file)
      }
    }
  }

  log.info('Checking dependency files...')
  const dependencyFiles = DEPENDENCY_FILES.filter((file) => isFile(at(file)))
  for (const file of dependencyFiles) {
    log.success(`Found dependency file: ${file}`)
    if (file === 'setup.py') {
      log.info('setup.py detected - repository may need modernization to pyproject.toml')
    } else {
      log.info('Python package file detected - uv will be primary package manager')
    }
  }
  if (dependencyFiles.length === 0) {
    log.warning('No dependency files found (requirements.txt, pyproject.toml, setup.py)')
  }

  log.info('Checking git status...')
  const status = hasGit ? await git.status() : null
  const clean = status !== null && status.length === 0
  if (clean) {
    log.success('Repository is clean (no uncommitted changes)')
  } else {
    log.warning('Repository has uncommitted changes')
    log.info('Consider committing changes before migration')
  }

  log.info('Checking remote configuration...')
  const remoteUrl = hasGit ? await git.remoteUrl() : null
  const remoteMatches = remoteUrl !== null && remoteUrl.includes(`${org}/${repository}`)
  if (remoteUrl) {
    log.success(`Remote origin configured: ${remoteUrl}`)
    if (remoteMatches) log.success('Remote URL matches expected repository')
    else log.warning("Remote URL doesn't match expected pattern")
  } else {
    log.warning('No remote origin configured')
  }

  log.info('Checking branch information...')
  const branch = hasGit ? await git.currentBranch() : null
  const onMain = branch === 'main' || branch === 'master'
  log.info(`Current branch: ${branch ?? 'unknown'}`)
  if (onMain) log.success('On main/master branch')
  else log.warning('Not on main/master branch')

  let github = false
  let actionsEnabled: boolean | undefined
  if (await commandExists(runner, 'gh')) {
    log.info('Checking GitHub repository permissions...')
    github = await runCheck(runner, 'gh', ['repo', 'view', `${org}/${repository}`], { cwd })
    if (github) {
      log.success('Repository accessible via GitHub CLI')
      const api = await runner('gh', ['api', `repos/${org}/${repository}`, '--jq', '.has_actions'], { cwd })
      actionsEnabled = api.success && api.stdout.includes('true')
      if (actionsEnabled) log.success('GitHub Actions enabled')
      else log.warning('GitHub Actions may not be enabled')
    } else {
      log.warning('Cannot access repository via GitHub CLI')
    }
  } else {
    log.info('GitHub CLI not available - skipping permission checks')
  }

  const checks: ReadinessCheck[] = [
    { id: 'git', label: '.git directory', passed: hasGit },
    { id: 'notebooks', label: 'notebooks/ directory', passed: hasNotebooks },
    { id: 'config', label: '_config.yml', passed: hasConfig },
    { id: 'toc', label: '_toc.yml', passed: hasToc },
    { id: 'workflows', label: '.github/workflows/ directory', passed: hasWorkflowsDir },
    { id: 'dependencies', label: 'dependency file', passed: dependencyFiles.length > 0 },
    { id: 'clean', label: 'clean working tree', passed: clean },
    { id: 'remote', label: 'origin remote', passed: remoteUrl !== null },
    { id: 'branch', label: 'main/master branch', passed: onMain },
    { id: 'github', label: 'GitHub CLI access', passed: github },
  ]

  const score = checks.filter((check) => check.passed).length
  const percentage = readinessPercentage(score)

  return {
    repository,
    org,
    score,
    maxScore: MAX_SCORE,
    percentage,
    band: readinessBand(percentage),
    checks,
    notebookCount,
    workflows,
    dependencyFiles,
    branch,
    remoteUrl,
    remoteMatches,
    actionsEnabled,
    profileContent,
    missingProfileFiles,
  }
}
