/**
 * Dependabot configuration for notebook-level requirements files
 */

import { readdirSync } from 'fs'
import { join } from 'path'
import { stringify } from 'yaml'
import { isDirectory, isFile } from './files'

export const DEFAULT_TARGET_BRANCH = 'dependabot_sandbox'

export interface DependabotSchedule {
  interval: 'daily' | 'weekly' | 'monthly'
  day?: string
  time: string
}

export interface DependabotUpdate {
  'package-ecosystem': string
  directory: string
  schedule: DependabotSchedule
  'target-branch': string
}

export interface DependabotConfig {
  version: 2
  updates: DependabotUpdate[]
}

function subdirectories(dir: string): string[] {
  if (!isDirectory(dir)) return []
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
}

/**
 * Directories matching notebooks/<group>/<notebook>/ that hold a requirements.txt, sorted
 */
export function findRequirementDirectories(cwd: string, notebooksDir = 'notebooks'): string[] {
  const found: string[] = []
  for (const group of subdirectories(join(cwd, notebooksDir))) {
    for (const notebook of subdirectories(join(cwd, notebooksDir, group))) {
      const dir = `${notebooksDir}/${group}/${notebook}/`
      if (isFile(join(cwd, dir, 'requirements.txt'))) found.push(dir)
    }
  }
  return found.sort()
}

export function buildDependabotConfig(directories: string[], targetBranch = DEFAULT_TARGET_BRANCH): DependabotConfig {
  return {
    version: 2,
    updates: [
      {
        'package-ecosystem': 'github-actions',
        directory: '/',
        schedule: { interval: 'weekly', time: '12:00' },
        'target-branch': targetBranch,
      },
      ...directories.map(
        (directory): DependabotUpdate => ({
          'package-ecosystem': 'pip',
          directory,
          schedule: { interval: 'weekly', day: 'sunday', time: '12:00' },
          'target-branch': targetBranch,
        })
      ),
    ],
  }
}

export function renderDependabotConfig(config: DependabotConfig): string {
  return stringify(config, { defaultStringType: 'QUOTE_DOUBLE', defaultKeyType: 'PLAIN' })
}
