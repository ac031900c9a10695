/**
 * Configuration loading and pipeline option resolution
 */

import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, describe, expect, it } from 'vitest'
import {
  buildPipelineEnvironment,
  defaultConfig,
  findConfigPath,
  isEnvEnabled,
  parseBooleanEnv,
  parseConfig,
  resolvePipelineConfig,
} from '../../src/lib/config'
import { NbciError } from '../../src/lib/errors'
import { createScratchRepo, type ScratchRepo } from '../fixtures/scratch'

describe('parseConfig', () => {
  it('fills defaults for an empty file', () => {
    const config = parseConfig('')
    expect(config.pipeline.python_version).toBe('3.11')
    expect(config.pipeline.execution_mode).toBe('validation-only')
    expect(config.pipeline.run_security_scan).toBe(true)
    expect(config.timeouts.notebook).toBe(300)
    expect(config.migration.org).toBe('spacetelescope')
    expect(config.repositories).toEqual({})
  })

  it('reads sections and repository profiles', () => {
    const config = parseConfig(`
[pipeline]
python_version = "3.10"
execution_mode = "quick"

[timeouts]
notebook = 120

[repositories.my_notebooks]
label = "My notebooks"

[repositories.my_notebooks.ci]
env = { MY_CACHE = "/tmp/cache" }
`)
    expect(config.pipeline.python_version).toBe('3.10')
    expect(config.pipeline.execution_mode).toBe('quick')
    expect(config.timeouts.notebook).toBe(120)
    expect(config.repositories.my_notebooks?.ci?.env).toEqual({ MY_CACHE: '/tmp/cache' })
  })

  it('rejects malformed TOML', () => {
    expect(() => parseConfig('[pipeline', 'nbci.toml')).toThrow(/Failed to parse nbci.toml/)
  })

  it('rejects values outside the schema', () => {
    try {
      parseConfig('[pipeline]\nexecution_mode = "slow"\n')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(NbciError)
      expect(err instanceof NbciError && err.code).toBe('INVALID_CONFIG')
    }
  })
})

describe('findConfigPath', () => {
  let repo: ScratchRepo

  afterEach(() => repo.remove())

  it('walks up from a nested directory', () => {
    repo = createScratchRepo({ 'nbci.toml': '', 'notebooks/a/x.txt': '' })
    expect(findConfigPath(join(repo.root, 'notebooks', 'a'))).toBe(join(repo.root, 'nbci.toml'))
  })
})

describe('parseBooleanEnv', () => {
  it('reads the usual spellings', () => {
    expect(parseBooleanEnv('true', 'X')).toBe(true)
    expect(parseBooleanEnv('1', 'X')).toBe(true)
    expect(parseBooleanEnv('No', 'X')).toBe(false)
    expect(parseBooleanEnv('', 'X')).toBeUndefined()
    expect(parseBooleanEnv(undefined, 'X')).toBeUndefined()
  })

  it('rejects anything else', () => {
    expect(() => parseBooleanEnv('maybe', 'SKIP_DEPS')).toThrow('SKIP_DEPS must be true or false, got "maybe"')
  })
})

describe('isEnvEnabled', () => {
  it('treats unknown values of ambient switches as off', () => {
    expect(isEnvEnabled('true')).toBe(true)
    expect(isEnvEnabled(' YES ')).toBe(true)
    expect(isEnvEnabled('woodpecker')).toBe(false)
    expect(isEnvEnabled('')).toBe(false)
    expect(isEnvEnabled(undefined)).toBe(false)
  })
})

describe('resolvePipelineConfig', () => {
  it('uses defaults when nothing is set', () => {
    const resolved = resolvePipelineConfig({ config: defaultConfig() })
    expect(resolved).toMatchObject({
      pythonVersion: '3.11',
      executionMode: 'validation-only',
      runSecurityScan: true,
      buildDocumentation: true,
      skipDeps: false,
      notebooksDir: 'notebooks',
      venvDir: 'venv',
      quickCount: 3,
      strict: false,
    })
    expect(resolved.singleNotebook).toBeUndefined()
    expect(resolved.docsOutput).toBe(join(tmpdir(), 'local-ci-build'))
  })

  it('layers file < environment < flags', () => {
    const config = parseConfig('[pipeline]\npython_version = "3.9"\nexecution_mode = "full"\nrun_security_scan = false\n')
    const env = { PYTHON_VERSION: '3.12', EXECUTION_MODE: 'quick', RUN_SECURITY_SCAN: 'true' }

    expect(resolvePipelineConfig({ config }).pythonVersion).toBe('3.9')
    expect(resolvePipelineConfig({ config, env })).toMatchObject({
      pythonVersion: '3.12',
      executionMode: 'quick',
      runSecurityScan: true,
    })
    expect(
      resolvePipelineConfig({ config, env, overrides: { pythonVersion: '3.10', runSecurityScan: false } })
    ).toMatchObject({ pythonVersion: '3.10', executionMode: 'quick', runSecurityScan: false })
  })

  it('ignores empty environment values', () => {
    const resolved = resolvePipelineConfig({ config: defaultConfig(), env: { SINGLE_NOTEBOOK: '', PYTHON_VERSION: ' ' } })
    expect(resolved.singleNotebook).toBeUndefined()
    expect(resolved.pythonVersion).toBe('3.11')
  })

  it('rejects an unknown execution mode as fatal', () => {
    try {
      resolvePipelineConfig({ config: defaultConfig(), env: { EXECUTION_MODE: 'fast' } })
      expect.unreachable()
    } catch (err) {
      expect(err instanceof NbciError && [err.code, err.fatal, err.message]).toEqual([
        'INVALID_EXECUTION_MODE',
        true,
        'Unknown execution mode: fast',
      ])
    }
  })

  it('returns a frozen object', () => {
    const resolved = resolvePipelineConfig({ config: defaultConfig() })
    expect(Object.isFrozen(resolved)).toBe(true)
    expect(Object.isFrozen(resolved.timeouts)).toBe(true)
  })
})

describe('buildPipelineEnvironment', () => {
  it('marks the environment as CI', () => {
    expect(buildPipelineEnvironment({ HOME: '/home/test' })).toEqual({
      HOME: '/home/test',
      CI: 'true',
      GITHUB_ACTIONS: 'true',
      PYTHONUNBUFFERED: '1',
    })
  })
})
