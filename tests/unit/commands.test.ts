/**
 * Command handlers with an in-memory context
 */

import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { afterEach, describe, expect, it } from 'vitest'
import { depsDependabot } from '../../src/commands/deps/dependabot'
import { doctor } from '../../src/commands/doctor'
import { repoValidate } from '../../src/commands/repo/validate'
import { stylePep8 } from '../../src/commands/style/pep8'
import { workflowsAct } from '../../src/commands/workflows/act'
import { workflowsValidate } from '../../src/commands/workflows/validate'
import { exitCodeFor } from '../../src/lib/output'
import { createFakeRunner, fail, ok } from '../fixtures/fake-runner'
import { createTestContext } from '../fixtures/context'
import { createScratchRepo, type ScratchRepo } from '../fixtures/scratch'

describe('commands', () => {
  let repo: ScratchRepo

  afterEach(() => repo.remove())

  describe('style pep8', () => {
    it('rejects files that are not Python', async () => {
      repo = createScratchRepo()
      await expect(stylePep8.run({ file: 'notes.txt' }, createTestContext(repo.root))).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'file extension must be .py: notes.txt',
      })
    })

    it('prints each issue with context and exits 99', async () => {
      repo = createScratchRepo({ 'helpers.py': 'x=1\n' })
      const runner = createFakeRunner(() => ({ exitCode: 1, stdout: 'helpers.py:1:2: E225 missing whitespace around operator' }))
      const ctx = createTestContext(repo.root, { runner })

      const output = await stylePep8.run({ file: 'helpers.py' }, ctx)

      expect(exitCodeFor(output)).toBe(99)
      expect(ctx.log.lines).toEqual([
        'PEP8 error 1 of 1',
        'PEP8 error found at line 1, column 2',
        'x=1',
        ' ▲',
        'E225 missing whitespace around operator',
        '',
      ])
    })

    it('reports a clean file', async () => {
      repo = createScratchRepo({ 'helpers.py': 'x = 1\n' })
      const ctx = createTestContext(repo.root)
      const output = await stylePep8.run({ file: 'helpers.py' }, ctx)
      expect(output.success).toBe(true)
      expect(ctx.log.lines).toEqual(['✅ helpers.py is clean!'])
    })
  })

  describe('deps dependabot', () => {
    it('writes the config file when --output is given', async () => {
      repo = createScratchRepo({ 'notebooks/group/nb/requirements.txt': 'numpy\n' })
      const output = await depsDependabot.run(
        { targetBranch: 'main', output: '.github/dependabot.yml' },
        createTestContext(repo.root)
      )
      expect(output.data).toEqual({ directories: ['notebooks/group/nb/'], output: join(repo.root, '.github/dependabot.yml') })
      expect(readFileSync(join(repo.root, '.github/dependabot.yml'), 'utf-8')).toContain('target-branch: "main"')
    })
  })

  describe('workflows validate', () => {
    it('fails with exit 1 when a workflow has errors', async () => {
      repo = createScratchRepo({ '.github/workflows/ci.yml': 'jobs:\n  a: {}\n' })
      const output = await workflowsValidate.run({ dir: '.github/workflows', act: false }, createTestContext(repo.root))
      expect(output.error?.code).toBe('WORKFLOW_VALIDATION')
      expect(exitCodeFor(output)).toBe(1)
    })

    it('reads VALIDATE_ACT from the environment', async () => {
      repo = createScratchRepo({ '.github/workflows/ci.yml': 'name: CI\non: push\njobs:\n  a: {}\n' })
      const runner = createFakeRunner()
      const output = await workflowsValidate.run(
        { dir: '.github/workflows' },
        createTestContext(repo.root, { runner, env: { VALIDATE_ACT: 'false' } })
      )
      expect(output.success).toBe(true)
      expect(runner.calls).toHaveLength(0)
    })
  })

  describe('repo validate', () => {
    it('always succeeds and returns the report', async () => {
      repo = createScratchRepo()
      const ctx = createTestContext(repo.root, { runner: createFakeRunner(() => fail()) })
      const output = await repoValidate.run({ repository: 'demo' }, ctx)
      expect(output.success).toBe(true)
      expect(output.data).toMatchObject({ repository: 'demo', org: 'spacetelescope', score: 0, band: 'needs-work' })
      expect(ctx.log.lines).toContain('❌ Repository needs significant preparation before migration')
    })
  })

  describe('workflows act', () => {
    it('explains how to install act when it is missing', async () => {
      repo = createScratchRepo()
      const ctx = createTestContext(repo.root, { runner: createFakeRunner(() => fail()) })
      const output = await workflowsAct.run({ event: 'pull_request', yes: false }, ctx)
      expect(output.error?.code).toBe('MISSING_TOOL')
      expect(existsSync(join(repo.root, '.actrc'))).toBe(false)
    })

    it('runs a dry run without asking', async () => {
      repo = createScratchRepo()
      const runner = createFakeRunner()
      const ctx = createTestContext(repo.root, { runner, confirm: async () => expect.unreachable() })
      const output = await workflowsAct.run({ event: 'push', dryRun: true, yes: false }, ctx)
      expect(output.success).toBe(true)
      expect(runner.lines()).toEqual([
        'which act',
        'act --list',
        'act push --eventpath .github/events/push.json --dryrun --env-file .env',
      ])
      expect(runner.calls[2]?.options.passthrough).toBe(true)
    })

    it('stops when the user declines', async () => {
      repo = createScratchRepo()
      const runner = createFakeRunner()
      const output = await workflowsAct.run({ event: 'pull_request', yes: false }, createTestContext(repo.root, { runner }))
      expect(output.data).toMatchObject({ executed: false })
      expect(runner.lines()).toEqual(['which act', 'act --list'])
    })

    it('still asks when CI holds a CI system name', async () => {
      repo = createScratchRepo()
      const runner = createFakeRunner()
      const questions: string[] = []
      const ctx = createTestContext(repo.root, {
        runner,
        env: { CI: 'woodpecker', VERBOSE: 'woodpecker' },
        confirm: async (question) => {
          questions.push(question)
          return false
        },
      })
      const output = await workflowsAct.run({ event: 'pull_request', yes: false }, ctx)
      expect(output.data).toMatchObject({ executed: false })
      expect(questions).toEqual(['Do you want to proceed?'])
    })

    it('returns act exit code on failure', async () => {
      repo = createScratchRepo()
      const runner = createFakeRunner((call) => (call.args[0] === 'pull_request' ? fail(2) : undefined))
      const output = await workflowsAct.run(
        { event: 'pull_request', yes: true },
        createTestContext(repo.root, { runner })
      )
      expect(output.error?.code).toBe('COMMAND_FAILED')
      expect(exitCodeFor(output)).toBe(2)
    })
  })

  describe('doctor', () => {
    it('fails only when python3 is missing', async () => {
      repo = createScratchRepo()
      const runner = createFakeRunner((call) => (call.line === 'which python3' ? fail() : ok('Python 3.11.9')))
      const output = await doctor.run({ offline: true }, createTestContext(repo.root, { runner }))
      expect(output.error?.code).toBe('MISSING_TOOL')
    })

    it('summarizes checks offline', async () => {
      repo = createScratchRepo({ 'requirements.txt': 'numpy\njwst\n' })
      const runner = createFakeRunner((call) => (call.args[0] === '--version' ? ok(`${call.command} 1.2.3`) : undefined))
      const output = await doctor.run({ offline: true }, createTestContext(repo.root, { runner }))
      expect(output.success).toBe(true)
      expect(runner.ran('pip install --dry-run')).toBe(false)
      expect(output.data).toMatchObject({
        warnings: 3,
        recommendations: expect.arrayContaining(['Create a virtual environment first: python3 -m venv venv']),
      })
    })
  })
})
