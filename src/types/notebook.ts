/**
 * Notebook inspection types
 */

export interface ValidationIssue {
  type: 'error' | 'warning'
  code: string
  message: string
  /** Cell index the issue points at */
  cell?: number
  suggestion?: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}
