/**
 * Notebook Validator
 *
 * Static, read-only structure checks run before a notebook is handed to
 * pytest --nbval. Input is whatever JSON.parse produced, so every field is
 * checked before it is trusted.
 */

import { readFileSync } from 'fs'
import type { ValidationIssue, ValidationResult } from '../types/notebook'
import { isRecord } from './output'

const CELL_TYPES = ['code', 'markdown', 'raw']

/**
 * Parse a notebook file. The shape is unchecked until passed to `inspectNotebook`.
 */
export function readNotebook(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'))
}

function cellSource(source: unknown): string | undefined {
  if (typeof source === 'string') return source
  if (Array.isArray(source) && source.every((line) => typeof line === 'string')) return source.join('')
  return undefined
}

/**
 * Validate notebook structure
 */
export function inspectNotebook(notebook: unknown): ValidationResult {
  const errors: ValidationIssue[] = []
  const warnings: ValidationIssue[] = []
  const result = (): ValidationResult => ({ valid: errors.length === 0, errors, warnings })

  if (!isRecord(notebook)) {
    errors.push({
      type: 'error',
      code: 'NOT_A_NOTEBOOK',
      message: 'Notebook JSON is not an object',
    })
    return result()
  }

  if (notebook.nbformat !== 4) {
    errors.push({
      type: 'error',
      code: 'INVALID_NBFORMAT',
      message: `Expected nbformat 4, got ${String(notebook.nbformat)}`,
      suggestion: 'Upgrade with `jupyter nbconvert --to notebook --nbformat 4`',
    })
  }

  const cells = notebook.cells
  if (!Array.isArray(cells)) {
    errors.push({
      type: 'error',
      code: 'MISSING_CELLS',
      message: 'Notebook has no cells array',
    })
    return result()
  }

  if (cells.length === 0) {
    errors.push({
      type: 'error',
      code: 'EMPTY_NOTEBOOK',
      message: 'Notebook has no cells',
      suggestion: 'Add code or markdown cells to the notebook',
    })
  }

  cells.forEach((cell: unknown, index) => {
    if (!isRecord(cell)) {
      errors.push({ type: 'error', code: 'INVALID_CELL', message: `Cell ${index} is not an object`, cell: index })
      return
    }

    if (typeof cell.cell_type !== 'string' || !CELL_TYPES.includes(cell.cell_type)) {
      errors.push({
        type: 'error',
        code: 'INVALID_CELL_TYPE',
        message: `Cell ${index} has invalid cell_type: ${String(cell.cell_type)}`,
        cell: index,
        suggestion: 'Cell type must be "code", "markdown", or "raw"',
      })
    }

    const source = cellSource(cell.source)
    if (source === undefined) {
      errors.push({
        type: 'error',
        code: 'INVALID_CELL_SOURCE',
        message: `Cell ${index} has invalid source format`,
        cell: index,
        suggestion: 'Cell source must be an array of strings or a string',
      })
    }

    if (cell.cell_type !== 'code') return

    if (source !== undefined && !source.trim()) {
      warnings.push({
        type: 'warning',
        code: 'EMPTY_CODE_CELL',
        message: `Cell ${index} is an empty code cell`,
        cell: index,
      })
    }

    if (!Array.isArray(cell.outputs)) {
      warnings.push({
        type: 'warning',
        code: 'MISSING_OUTPUTS',
        message: `Code cell ${index} missing outputs array`,
        cell: index,
        suggestion: 'Code cells should have an outputs array (can be empty)',
      })
    }
  })

  if (!isRecord(notebook.metadata) || !isRecord(notebook.metadata.kernelspec)) {
    warnings.push({
      type: 'warning',
      code: 'MISSING_KERNELSPEC',
      message: 'Notebook missing kernelspec metadata',
      suggestion: 'Save the notebook from Jupyter with a Python 3 kernel selected',
    })
  }

  return result()
}

/**
 * Read and inspect a notebook file; unparseable JSON is a single error
 */
export function inspectNotebookFile(path: string): ValidationResult {
  let parsed: unknown
  try {
    parsed = readNotebook(path)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return {
      valid: false,
      errors: [{ type: 'error', code: 'INVALID_JSON', message: `Cannot parse notebook: ${reason}` }],
      warnings: [],
    }
  }
  return inspectNotebook(parsed)
}
