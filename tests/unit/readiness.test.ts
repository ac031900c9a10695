/**
 * Migration readiness scoring
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createMemoryLogger } from '../../src/lib/logger'
import { assessReadiness, readinessBand, readinessPercentage, searchContent } from '../../src/lib/readiness'
import { getRepositoryProfile } from '../../src/lib/repository-profiles'
import { createFakeRunner, fail, ok, type Responder } from '../fixtures/fake-runner'
import { createScratchRepo, notebookJson, type ScratchRepo } from '../fixtures/scratch'

describe('readinessPercentage and readinessBand', () => {
  it('maps scores to bands', () => {
    expect(readinessPercentage(8)).toBe(80)
    expect(readinessBand(80)).toBe('ready')
    expect(readinessPercentage(7)).toBe(70)
    expect(readinessBand(70)).toBe('mostly-ready')
    expect(readinessBand(60)).toBe('mostly-ready')
    expect(readinessBand(59)).toBe('needs-work')
    expect(readinessPercentage(3, 7)).toBe(42)
  })
})

describe('assessReadiness', () => {
  let repo: ScratchRepo

  beforeEach(() => {
    repo = createScratchRepo({
      '.git/HEAD': 'ref: refs/heads/main\n',
      'notebooks/intro/intro.ipynb': notebookJson('from astroquery.mast import Observations'),
      '_config.yml': 'title: Demo\n',
      '_toc.yml': 'format: jb-book\nroot: intro\n',
      '.github/workflows/ci.yml': 'name: CI\non: push\njobs: {}\n',
      'requirements.txt': 'astroquery\n',
    })
  })

  afterEach(() => repo.remove())

  function git(overrides: Record<string, ReturnType<Responder>> = {}): Responder {
    const answers: Record<string, ReturnType<Responder>> = {
      'git status --porcelain': ok(''),
      'git remote get-url origin': ok('https://github.com/spacetelescope/mast_notebooks.git'),
      'git branch --show-current': ok('main'),
      'which gh': fail(),
      ...overrides,
    }
    return (call) => answers[call.line]
  }

  async function assess(respond: Responder) {
    return assessReadiness({
      cwd: repo.root,
      repository: 'mast_notebooks',
      org: 'spacetelescope',
      runner: createFakeRunner(respond),
      log: createMemoryLogger(),
      profile: getRepositoryProfile('mast_notebooks'),
    })
  }

  it('scores nine of ten without the GitHub CLI', async () => {
    const report = await assess(git())
    expect(report.score).toBe(9)
    expect(report.percentage).toBe(90)
    expect(report.band).toBe('ready')
    expect(report.remoteMatches).toBe(true)
    expect(report.notebookCount).toBe(1)
    expect(report.workflows).toEqual(['.github/workflows/ci.yml'])
    expect(report.dependencyFiles).toEqual(['requirements.txt'])
    expect(report.profileContent).toBe(true)
    expect(report.checks.filter((c) => !c.passed).map((c) => c.id)).toEqual(['github'])
  })

  it('is still ready at eight of ten', async () => {
    const report = await assess(git({ 'git branch --show-current': ok('feature') }))
    expect(report.score).toBe(8)
    expect(report.band).toBe('ready')
  })

  it('is mostly ready at seven of ten', async () => {
    const report = await assess(
      git({ 'git branch --show-current': ok('feature'), 'git status --porcelain': ok(' M notebooks/intro/intro.ipynb') })
    )
    expect(report.score).toBe(7)
    expect(report.percentage).toBe(70)
    expect(report.band).toBe('mostly-ready')
  })

  it('uses the GitHub CLI when present', async () => {
    const report = await assess(
      git({ 'which gh': ok('/usr/bin/gh'), 'gh api repos/spacetelescope/mast_notebooks --jq .has_actions': ok('true') })
    )
    expect(report.score).toBe(10)
    expect(report.actionsEnabled).toBe(true)
  })

  it('notes a remote that points elsewhere without losing the point', async () => {
    const report = await assess(git({ 'git remote get-url origin': ok('git@github.com:someone/fork.git') }))
    expect(report.remoteMatches).toBe(false)
    expect(report.checks.find((c) => c.id === 'remote')?.passed).toBe(true)
  })

  it('scores an empty directory at zero', async () => {
    repo.remove()
    repo = createScratchRepo()
    const runner = createFakeRunner(() => fail())
    const report = await assessReadiness({
      cwd: repo.root,
      repository: 'empty',
      org: 'spacetelescope',
      runner,
      log: createMemoryLogger(),
    })
    expect(report.score).toBe(0)
    expect(report.band).toBe('needs-work')
    expect(runner.lines()).toEqual(['which gh'])
  })
})

describe('searchContent', () => {
  it('matches a pattern anywhere under a directory', () => {
    const repo = createScratchRepo({ 'notebooks/a/a.ipynb': notebookJson('import jdaviz') })
    expect(searchContent(repo.root, 'notebooks', 'jwst|jdaviz')).toBe(true)
    expect(searchContent(repo.root, 'notebooks', 'hstcal')).toBe(false)
    repo.remove()
  })
})
