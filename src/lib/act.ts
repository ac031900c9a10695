/**
 * Helpers for running workflows locally with act
 */

import { copyFileSync, mkdirSync, readFileSync } from 'fs'
import { dirname, join } from 'path'
import { isFile } from './files'
import type { Logger } from './logger'

/** Scaffold sources shipped with the package */
export const ACT_TEMPLATES_DIR = join(__dirname, '..', '..', 'templates', 'act')

export const EVENTS_DIR = '.github/events'

export const EVENT_PAYLOADS: Record<string, string> = {
  pull_request: 'pr.json',
  push: 'push.json',
  workflow_dispatch: 'dispatch.json',
}

const ENV_PLACEHOLDERS = /your_token_here|your_userid|your_password/

interface ScaffoldFile {
  template: string
  target: string
  label: string
}

const SCAFFOLD: ScaffoldFile[] = [
  { template: 'actrc', target: '.actrc', label: '.actrc configuration' },
  { template: 'env.template', target: '.env', label: '.env template file' },
  { template: 'events/pr.json', target: `${EVENTS_DIR}/pr.json`, label: 'pull request event payload' },
  { template: 'events/push.json', target: `${EVENTS_DIR}/push.json`, label: 'push event payload' },
  { template: 'events/dispatch.json', target: `${EVENTS_DIR}/dispatch.json`, label: 'workflow dispatch event payload' },
]

/**
 * Write any missing act configuration; existing files are never touched
 */
export function scaffoldActFiles(cwd: string, log: Logger, templatesDir = ACT_TEMPLATES_DIR): string[] {
  const created: string[] = []
  for (const file of SCAFFOLD) {
    const target = join(cwd, file.target)
    if (isFile(target)) continue
    mkdirSync(dirname(target), { recursive: true })
    copyFileSync(join(templatesDir, file.template), target)
    created.push(file.target)
    log.success(`Created ${file.label}`)
  }
  if (created.includes('.env')) {
    log.warning('Please update .env with your actual values')
  }
  return created
}

export interface ActInvocation {
  event: string
  workflow?: string
  job?: string
  dryRun?: boolean
  verbose?: boolean
}

export function buildActArgs(invocation: ActInvocation): string[] {
  const args = [invocation.event]
  if (invocation.workflow) args.push('--workflow', invocation.workflow)
  if (invocation.job) args.push('--job', invocation.job)
  const payload = EVENT_PAYLOADS[invocation.event]
  if (payload) args.push('--eventpath', `${EVENTS_DIR}/${payload}`)
  if (invocation.dryRun) args.push('--dryrun')
  if (invocation.verbose) args.push('--verbose')
  args.push('--env-file', '.env')
  return args
}

export function envFileHasPlaceholders(cwd: string): boolean {
  const path = join(cwd, '.env')
  return isFile(path) && ENV_PLACEHOLDERS.test(readFileSync(path, 'utf-8'))
}

/**
 * Workflow and job lines from `act --list`
 */
export function parseActList(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('Stage'))
}
