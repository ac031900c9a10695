/**
 * Workflow validation tests
 */

import { afterEach, describe, expect, it } from 'vitest'
import { NbciError } from '../../src/lib/errors'
import { createMemoryLogger } from '../../src/lib/logger'
import {
  checkStructure,
  checkSyntax,
  collectInsights,
  recommendationsFor,
  validateWorkflows,
} from '../../src/lib/workflow-validator'
import { createFakeRunner, fail } from '../fixtures/fake-runner'
import { createScratchRepo, type ScratchRepo } from '../fixtures/scratch'

const GOOD = `name: Notebook CI - PR
on:
  pull_request:
jobs:
  ci:
    uses: spacetelescope/notebook-ci-actions/.github/workflows/ci_pipeline.yml@main
    secrets: inherit
`

describe('checkSyntax', () => {
  it('accepts valid YAML', () => {
    expect(checkSyntax(GOOD)).toEqual([])
  })

  it('reports parse errors', () => {
    expect(checkSyntax('name: [unclosed\non: push\n').length).toBeGreaterThan(0)
  })
})

describe('checkStructure', () => {
  it('passes a complete workflow', () => {
    expect(checkStructure(GOOD)).toEqual([])
  })

  it('reports each missing top-level key', () => {
    expect(checkStructure('jobs:\n  x: {}\n')).toEqual(["Missing 'name' field", "Missing 'on' field"])
  })

  it('flags placeholders and local action references', () => {
    const source = `${GOOD}  local:\n    uses: ./.github/actions/setup\n  other:\n    uses: your-org/dev-actions/x.yml@main\n`
    expect(checkStructure(source)).toEqual([
      'Contains placeholder references (your-org, dev-actions)',
      'Uses local action reference (./.) - may not work in CI',
    ])
  })
})

describe('collectInsights', () => {
  it('counts files mentioning each feature', () => {
    const reusable = 'on:\n  workflow_call:\njobs:\n  a:\n    needs: b\n'
    expect(collectInsights([GOOD, reusable])).toEqual({ reusable: 1, secrets: 0, jobDependencies: 1 })
  })
})

describe('recommendationsFor', () => {
  it('leads with fixes when something failed', () => {
    expect(recommendationsFor(1, 1).slice(0, 2)).toEqual([
      'Fix syntax and structure errors before proceeding',
      'Address act validation warnings if using local testing',
    ])
    expect(recommendationsFor(0, 0)).toHaveLength(3)
  })
})

describe('validateWorkflows', () => {
  let repo: ScratchRepo

  afterEach(() => repo.remove())

  it('summarizes passing and failing files', async () => {
    repo = createScratchRepo({
      '.github/workflows/a-good.yml': GOOD,
      '.github/workflows/b-template.yaml': GOOD.replace('spacetelescope/notebook-ci-actions', 'your-org/dev-actions'),
      '.github/workflows/README.md': '# not a workflow',
    })
    const runner = createFakeRunner((call) => (call.line === 'which act' ? fail() : undefined))

    const summary = await validateWorkflows({ cwd: repo.root, runner, log: createMemoryLogger() })

    expect(summary.total).toBe(2)
    expect(summary.passed).toBe(1)
    expect(summary.errors).toBe(1)
    expect(summary.warnings).toBe(0)
    expect(summary.exitCode).toBe(1)
    expect(summary.files.map((f) => [f.file, f.errorCount, f.act])).toEqual([
      ['.github/workflows/a-good.yml', 0, 'unavailable'],
      ['.github/workflows/b-template.yaml', 1, 'unavailable'],
    ])
  })

  it('counts a failed act dry run as a warning', async () => {
    repo = createScratchRepo({ '.github/workflows/ci.yml': GOOD })
    const runner = createFakeRunner((call) => (call.command === 'act' ? fail() : undefined))

    const summary = await validateWorkflows({ cwd: repo.root, runner, log: createMemoryLogger() })

    expect(summary.warnings).toBe(1)
    expect(summary.exitCode).toBe(0)
    expect(runner.lines()).toContain('act --dryrun --workflow .github/workflows/ci.yml')
  })

  it('prints per-check results only when verbose', async () => {
    repo = createScratchRepo({ '.github/workflows/ci.yml': GOOD })
    const quiet = createMemoryLogger()
    const loud = createMemoryLogger()

    await validateWorkflows({ cwd: repo.root, runner: createFakeRunner(), log: quiet })
    await validateWorkflows({ cwd: repo.root, runner: createFakeRunner(), log: loud, verbose: true })

    expect(quiet.lines).not.toContain('✅   YAML syntax: VALID')
    expect(loud.lines).toContain('✅   YAML syntax: VALID')
    expect(loud.lines).toContain('✅   Structure: VALID')
    expect(loud.lines).toContain('✅   Act validation: PASSED')
  })

  it('never calls act when disabled', async () => {
    repo = createScratchRepo({ '.github/workflows/ci.yml': GOOD })
    const runner = createFakeRunner()

    const summary = await validateWorkflows({ cwd: repo.root, runner, log: createMemoryLogger(), act: false })

    expect(summary.files[0]?.act).toBe('skipped')
    expect(runner.calls).toHaveLength(0)
  })

  it('fails when the directory is missing or empty', async () => {
    repo = createScratchRepo({ '.github/workflows/notes.txt': '' })
    const log = createMemoryLogger()
    await expect(validateWorkflows({ cwd: repo.root, runner: createFakeRunner(), log, directory: 'nope' })).rejects.toThrow(
      'Workflows directory not found: nope'
    )
    await expect(validateWorkflows({ cwd: repo.root, runner: createFakeRunner(), log })).rejects.toBeInstanceOf(NbciError)
  })
})
