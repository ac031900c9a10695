/**
 * Notebook discovery and selection
 */

import type { ExecutionMode } from '../types/repository'
import { findFiles } from './files'

export const NOTEBOOK_EXTENSION = '.ipynb'
export const FAILED_SUFFIX = '_failed'

export function isNotebookFile(name: string): boolean {
  return name.endsWith(NOTEBOOK_EXTENSION)
}

export function isFailedMarker(name: string): boolean {
  return name.endsWith(`${FAILED_SUFFIX}${NOTEBOOK_EXTENSION}`)
}

/**
 * All notebooks under `notebooksDir`, excluding `*_failed.ipynb` markers left by earlier runs
 */
export function discoverNotebooks(cwd: string, notebooksDir: string): string[] {
  return findFiles(cwd, notebooksDir, (name) => isNotebookFile(name) && !isFailedMarker(name))
}

/**
 * Notebooks marked as failed by the executor
 */
export function findFailedNotebooks(cwd: string, notebooksDir: string): string[] {
  return findFiles(cwd, notebooksDir, isFailedMarker)
}

/**
 * notebooks/a/b.ipynb -> notebooks/a/b_failed.ipynb
 */
export function failedNotebookPath(notebookPath: string): string {
  const stem = notebookPath.endsWith(NOTEBOOK_EXTENSION)
    ? notebookPath.slice(0, -NOTEBOOK_EXTENSION.length)
    : notebookPath
  return `${stem}${FAILED_SUFFIX}${NOTEBOOK_EXTENSION}`
}

/**
 * Pick the notebooks an execution run should touch.
 * A single-notebook override replaces the mode's list, except in validation-only mode.
 */
export function selectNotebooks(
  mode: ExecutionMode,
  notebooks: readonly string[],
  singleNotebook?: string,
  quickCount = 3
): string[] {
  switch (mode) {
    case 'validation-only':
      return []
    case 'full':
      return singleNotebook ? [singleNotebook] : [...notebooks]
    case 'quick':
      return singleNotebook ? [singleNotebook] : notebooks.slice(0, quickCount)
    default: {
      const unreachable: never = mode
      throw new Error(`Unknown execution mode: ${String(unreachable)}`)
    }
  }
}
