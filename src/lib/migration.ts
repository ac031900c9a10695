/**
 * Repository migration to the centralized notebook CI workflows
 *
 * Downloads the template workflows, tailors them with structured YAML
 * edits, records what happened in migration-status.md and commits the
 * result on a dedicated branch.
 */

import { chmodSync, copyFileSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import type { Document } from 'yaml'
import type { MigrationSection } from '../types/config'
import type { RepositoryProfile } from '../types/repository'
import { ErrorCode, NbciError } from './errors'
import { isDirectory, isFile } from './files'
import { Git, repositoryNameFromUrl } from './git'
import type { Logger } from './logger'
import type { CommandRunner } from './process'
import { isWorkflowFile } from './workflow-validator'
import {
  addPostRunScript,
  parseWorkflow,
  setExecutionMode,
  setPythonVersion,
  setSecurityScan,
  substitutePlaceholders,
} from './workflow-yaml'

export const WORKFLOWS_DIR = '.github/workflows'
export const BACKUP_DIR = '.github/workflows-backup'
export const STATUS_FILE = 'migration-status.md'
export const MAIN_WORKFLOW = 'notebook-ci-main.yml'

const PLACEHOLDER_POST_RUN_SCRIPT = `#!/bin/bash
# Placeholder jdaviz image replacement script
# Replace jdaviz widgets with static images in HTML output

echo "Running jdaviz image replacement..."
find _build/html -name "*.html" -type f -exec echo "Processing {}" \;
echo "jdaviz image replacement completed"
`

export interface MigrateOptions {
  cwd: string
  repository: string
  org: string
  settings: MigrationSection
  runner: CommandRunner
  log: Logger
  profile?: RepositoryProfile
  /** Asked before continuing on a remote mismatch and before pushing */
  confirm: (question: string) => Promise<boolean>
  /** true pushes, false never pushes, 'ask' defers to `confirm` */
  push: boolean | 'ask'
  fetch?: typeof fetch
  now?: () => Date
}

export interface MigrationResult {
  repository: string
  org: string
  branch: string
  branchCreated: boolean
  backups: string[]
  workflows: string[]
  configuration: string
  committed: boolean
  pushed: boolean
  compareUrl?: string
}

/**
 * Template URL base with {org} and {actions_repo} filled in
 */
export function templateBaseUrl(settings: MigrationSection, org: string): string {
  return settings.base_url.replaceAll('{org}', org).replaceAll('{actions_repo}', settings.actions_repo)
}

/**
 * Profile migration settings as `key:value` items, e.g. python-version:3.11,execution-mode:full
 */
export function describeMigrationProfile(profile?: RepositoryProfile): string[] {
  const migration = profile?.migration
  if (!migration) return []
  const items: string[] = []
  if (migration.python_version) items.push(`python-version:${migration.python_version}`)
  if (migration.execution_mode) items.push(`execution-mode:${migration.execution_mode}`)
  if (migration.special) items.push(`special:${migration.special}`)
  if (migration.post_run_script) items.push(`post-script:${migration.post_run_script}`)
  if (migration.security_scan === false) items.push('security-scan:false')
  return items
}

function listWorkflowFiles(dir: string): string[] {
  if (!isDirectory(dir)) return []
  return readdirSync(dir)
    .filter((name) => isWorkflowFile(name) && isFile(join(dir, name)))
    .sort()
}

/**
 * Apply `edit` to each named workflow and write back the ones it changed.
 * Files that do not parse are left untouched and reported through `onInvalid`.
 */
export function editWorkflows(
  dir: string,
  files: string[],
  edit: (doc: Document) => number,
  onInvalid?: (file: string, reason: string) => void
): number {
  let total = 0
  for (const file of files) {
    const path = join(dir, file)
    if (!isFile(path)) continue
    const doc = parseWorkflow(readFileSync(path, 'utf-8'))
    const [parseError] = doc.errors
    if (parseError) {
      onInvalid?.(file, parseError.message)
      continue
    }
    const changes = edit(doc)
    if (changes > 0) {
      writeFileSync(path, doc.toString())
      total += changes
    }
  }
  return total
}

export interface StatusReportInput {
  repository: string
  org: string
  actionsRepo: string
  branch: string
  backups: string[]
  workflows: string[]
  configuration: string
  date: Date
}

export function renderStatusReport(input: StatusReportInput): string {
  const bullets = (items: string[], empty: string) => (items.length > 0 ? items.map((item) => `- ${item}`) : [`- ${empty}`])
  const date = input.date.toISOString()

  return [
    `# Migration Status for ${input.repository}`,
    '',
    '## Migration Details',
    `- **Repository**: ${input.org}/${input.repository}`,
    `- **Migration Date**: ${date}`,
    `- **Actions Repository**: ${input.org}/${input.actionsRepo}`,
    `- **Branch**: ${input.branch}`,
    '',
    '## Pre-Migration Workflows',
    ...bullets(input.backups.map((file) => `${BACKUP_DIR}/${file}`), 'No previous workflows found'),
    '',
    '## New Workflows',
    ...bullets(input.workflows.map((file) => `${WORKFLOWS_DIR}/${file}`), 'None'),
    '',
    '## Configuration Applied',
    `- ${input.configuration === 'default' ? 'Default configuration' : input.configuration}`,
    '',
    '## Testing Checklist',
    '- [ ] Manual workflow dispatch test',
    '- [ ] Pull request workflow test',
    '- [ ] Documentation build test',
    '- [ ] Repository-specific features test',
    '',
    '## Migration Notes',
    `- Created by nbci repo migrate on ${date}`,
    '- Review and customize workflows as needed',
    '- Test thoroughly before merging to main',
    '',
    '## Next Steps',
    '1. Review generated workflows',
    '2. Test with workflow_dispatch',
    '3. Create test PR to verify triggers',
    '4. Update repository secrets if needed',
    '5. Merge after successful testing',
    '',
  ].join('\n')
}

export function commitMessage(repository: string, org: string, actionsRepo: string, configuration: string, date: Date): string {
  return [
    'Migrate to centralized GitHub Actions workflows',
    '',
    `- Backup existing workflows to ${BACKUP_DIR}/`,
    `- Add centralized workflows from ${org}/${actionsRepo}`,
    '- Configure repository-specific parameters',
    '- Add migration tracking file',
    '',
    `Repository: ${repository}`,
    `Configuration: ${configuration}`,
    `Migration date: ${date.toISOString()}`,
  ].join('\n')
}

async function download(fetchImpl: typeof fetch, url: string): Promise<string> {
  let response: Response
  try {
    response = await fetchImpl(url)
  } catch (err) {
    throw new NbciError({
      code: ErrorCode.DOWNLOAD_FAILED,
      message: `Failed to download ${url}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
      fatal: true,
    })
  }
  if (!response.ok) {
    throw new NbciError({
      code: ErrorCode.DOWNLOAD_FAILED,
      message: `Failed to download ${url}: HTTP ${response.status}`,
      context: { status: response.status },
      fatal: true,
    })
  }
  return response.text()
}

/**
 * Run the whole migration in the repository at `cwd`
 */
export async function migrateRepository(options: MigrateOptions): Promise<MigrationResult> {
  const { cwd, repository, org, settings, runner, log, profile, confirm } = options
  const fetchImpl = options.fetch ?? fetch
  const now = options.now ?? (() => new Date())
  const git = new Git(runner, cwd)
  const branch = settings.branch
  const workflowsDir = join(cwd, WORKFLOWS_DIR)
  const backupDir = join(cwd, BACKUP_DIR)

  log.info(`Starting migration for ${org}/${repository}`)

  if (!isDirectory(join(cwd, '.git'))) {
    throw NbciError.fatal(ErrorCode.NOT_A_REPOSITORY, 'This command must be run from the root of a git repository')
  }

  const remoteUrl = await git.remoteUrl()
  const current = remoteUrl ? repositoryNameFromUrl(remoteUrl) : ''
  if (current !== repository) {
    log.warning(`Current directory appears to be '${current || 'unknown'}', expected '${repository}'`)
    if (!(await confirm('Continue anyway?'))) {
      throw new NbciError({ code: ErrorCode.ABORTED, message: 'Migration aborted', fatal: true })
    }
  }

  log.info('Step 1: Creating migration branch...')
  const branchCreated = !(await git.branchExists(branch))
  if (branchCreated) {
    await git.checkout(branch, true)
    log.success(`Created branch ${branch}`)
  } else {
    log.warning(`Branch ${branch} already exists`)
    await git.checkout(branch)
  }

  log.info('Step 2: Backing up existing workflows...')
  const backups = listWorkflowFiles(workflowsDir)
  if (isDirectory(workflowsDir)) {
    mkdirSync(backupDir, { recursive: true })
    for (const file of backups) {
      copyFileSync(join(workflowsDir, file), join(backupDir, file))
    }
    if (backups.length === 0) log.warning('No workflow files to back up')
    else log.success(`Workflows backed up to ${BACKUP_DIR}/`)
  } else {
    log.warning(`No ${WORKFLOWS_DIR} directory found`)
    mkdirSync(workflowsDir, { recursive: true })
  }

  log.info('Step 3: Downloading example workflows...')
  const baseUrl = templateBaseUrl(settings, org)
  for (const template of settings.templates) {
    log.info(`Downloading ${template}...`)
    const body = await download(fetchImpl, `${baseUrl}/${template}`)
    writeFileSync(join(workflowsDir, template), body)
    log.success(`Downloaded ${template}`)
  }

  log.info('Step 4: Updating workflow references...')
  const workflowFiles = listWorkflowFiles(workflowsDir)
  for (const file of workflowFiles) {
    const changes = editWorkflows(
      workflowsDir,
      [file],
      (doc) => substitutePlaceholders(doc, { 'your-org': org, 'dev-actions': settings.actions_repo }),
      (invalid, reason) => log.warning(`Skipping ${invalid}, not valid YAML: ${reason.split('\n')[0]}`)
    )
    if (changes > 0) log.success(`Updated references in ${file}`)
  }

  log.info('Step 5: Applying repository-specific configurations...')
  const items = describeMigrationProfile(profile)
  const configuration = items.length > 0 ? items.join(',') : 'default'
  const migration = profile?.migration
  if (migration) {
    log.info(`Applying configuration for ${repository}: ${configuration}`)
    if (migration.python_version) {
      const version = migration.python_version
      editWorkflows(workflowsDir, workflowFiles, (doc) => setPythonVersion(doc, version))
      log.success(`Set Python version to ${version}`)
    }
    if (migration.execution_mode) {
      const mode = migration.execution_mode
      editWorkflows(workflowsDir, [MAIN_WORKFLOW], (doc) => setExecutionMode(doc, mode))
      log.success(`Set execution mode to ${mode}`)
    }
    if (migration.post_run_script && isFile(join(workflowsDir, MAIN_WORKFLOW))) {
      const script = migration.post_run_script
      editWorkflows(workflowsDir, [MAIN_WORKFLOW], (doc) => addPostRunScript(doc, script))
      log.success(`Added post-processing script: ${script}`)
    }
    if (migration.special) {
      log.info(`Special configuration noted: ${migration.special}`)
    }
  } else {
    log.warning(`No specific configuration found for ${repository}, using defaults`)
  }

  log.info('Step 6: Creating migration status file...')
  const date = now()
  const workflows = listWorkflowFiles(workflowsDir)
  writeFileSync(
    join(cwd, STATUS_FILE),
    renderStatusReport({
      repository,
      org,
      actionsRepo: settings.actions_repo,
      branch,
      backups: listWorkflowFiles(backupDir),
      workflows,
      configuration,
      date,
    })
  )
  log.success(`Created ${STATUS_FILE}`)

  log.info('Step 7: Applying repository-specific adjustments...')
  if (migration?.security_scan === false) {
    const ciFiles = workflows.filter((file) => file.startsWith('notebook-ci-'))
    editWorkflows(workflowsDir, ciFiles, (doc) => setSecurityScan(doc, false))
    log.success(`Disabled security scanning for ${profile?.label ?? repository}`)
  }
  if (migration?.post_run_script && migration.scaffold_post_run_script) {
    const scriptPath = join(cwd, migration.post_run_script)
    if (!isFile(scriptPath)) {
      log.warning(`${migration.post_run_script} not found`)
      log.info('Creating placeholder script...')
      mkdirSync(join(scriptPath, '..'), { recursive: true })
      writeFileSync(scriptPath, PLACEHOLDER_POST_RUN_SCRIPT)
      chmodSync(scriptPath, 0o755)
      log.success(`Created placeholder ${migration.post_run_script}`)
    }
  }
  if (migration?.note) {
    log.info(migration.note)
  }

  log.info('Step 8: Committing migration changes...')
  const status = await git.status()
  let committed = false
  if (status !== null && status.length === 0) {
    log.info('Nothing to commit, working tree clean')
  } else {
    await git.addAll()
    await git.commit(commitMessage(repository, org, settings.actions_repo, configuration, date))
    committed = true
    log.success('Migration changes committed')
  }

  const result: MigrationResult = {
    repository,
    org,
    branch,
    branchCreated,
    backups,
    workflows,
    configuration,
    committed,
    pushed: false,
  }

  const push = options.push === 'ask' ? await confirm('Push migration branch to origin?') : options.push
  if (push) {
    await git.push(branch)
    result.pushed = true
    result.compareUrl = `https://github.com/${org}/${repository}/compare/${branch}`
    log.success('Migration branch pushed to origin')
  } else {
    log.info(`Branch not pushed. Push manually when ready: git push origin ${branch}`)
  }

  return result
}
