/**
 * Structured workflow edits
 */

import { describe, expect, it } from 'vitest'
import {
  addPostRunScript,
  parseWorkflow,
  setExecutionMode,
  setPythonVersion,
  setSecurityScan,
  substitutePlaceholders,
} from '../../src/lib/workflow-yaml'

const WORKFLOW = `# CI entry point
name: Notebook CI - Main
on:
  push:
    branches: [main]
jobs:
  notebook-ci:
    uses: your-org/dev-actions/.github/workflows/ci_pipeline.yml@main
    with:
      python-version: "3.10"
      execution-mode: quick
      security-scan: true
    secrets: inherit
  docs:
    uses: your-org/dev-actions/.github/workflows/ci_html_builder.yml@main
    with:
      python-version: "3.10"
`

describe('substitutePlaceholders', () => {
  it('replaces tokens inside scalars and counts changed scalars', () => {
    const doc = parseWorkflow(WORKFLOW)
    const changes = substitutePlaceholders(doc, { 'your-org': 'spacetelescope', 'dev-actions': 'notebook-ci-actions' })
    expect(changes).toBe(2)
    expect(doc.getIn(['jobs', 'notebook-ci', 'uses'])).toBe(
      'spacetelescope/notebook-ci-actions/.github/workflows/ci_pipeline.yml@main'
    )
  })

  it('is a no-op on a document without tokens', () => {
    const doc = parseWorkflow('name: x\non: push\njobs: {}\n')
    expect(substitutePlaceholders(doc, { 'your-org': 'spacetelescope' })).toBe(0)
  })
})

describe('setPythonVersion', () => {
  it('updates every python-version entry', () => {
    const doc = parseWorkflow(WORKFLOW)
    expect(setPythonVersion(doc, '3.11')).toBe(2)
    expect(doc.getIn(['jobs', 'notebook-ci', 'with', 'python-version'])).toBe('3.11')
    expect(doc.getIn(['jobs', 'docs', 'with', 'python-version'])).toBe('3.11')
    expect(setPythonVersion(doc, '3.11')).toBe(0)
  })

  it('keeps comments and quoting', () => {
    const doc = parseWorkflow(WORKFLOW)
    setPythonVersion(doc, '3.11')
    const text = doc.toString()
    expect(text.startsWith('# CI entry point\n')).toBe(true)
    expect(text).toContain('python-version: "3.11"')
  })
})

describe('setExecutionMode and setSecurityScan', () => {
  it('rewrites values in place', () => {
    const doc = parseWorkflow(WORKFLOW)
    expect(setExecutionMode(doc, 'full')).toBe(1)
    expect(setSecurityScan(doc, false)).toBe(1)
    expect(doc.getIn(['jobs', 'notebook-ci', 'with', 'execution-mode'])).toBe('full')
    expect(doc.getIn(['jobs', 'notebook-ci', 'with', 'security-scan'])).toBe(false)
    expect(doc.toString()).toContain('security-scan: false')
  })
})

describe('addPostRunScript', () => {
  it('inserts the script right after python-version', () => {
    const doc = parseWorkflow(WORKFLOW)
    expect(addPostRunScript(doc, 'scripts/post.sh')).toBe(2)
    const keys = Object.keys(doc.toJS().jobs['notebook-ci'].with)
    expect(keys).toEqual(['python-version', 'post-run-script', 'execution-mode', 'security-scan'])
    expect(doc.getIn(['jobs', 'docs', 'with', 'post-run-script'])).toBe('scripts/post.sh')
  })

  it('does not add the script twice', () => {
    const doc = parseWorkflow(WORKFLOW)
    addPostRunScript(doc, 'scripts/post.sh')
    expect(addPostRunScript(doc, 'scripts/post.sh')).toBe(0)
  })

  it('replaces a different script path', () => {
    const doc = parseWorkflow('with:\n  python-version: "3.11"\n  post-run-script: old.sh\n')
    expect(addPostRunScript(doc, 'new.sh')).toBe(1)
    expect(doc.toJS()).toEqual({ with: { 'python-version': '3.11', 'post-run-script': 'new.sh' } })
  })
})
