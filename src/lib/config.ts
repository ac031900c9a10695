/**
 * Configuration handling for the nbci CLI
 */

import TOML from '@iarna/toml'
import { existsSync, readFileSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join, parse } from 'path'
import { type NbciConfig, NbciConfigSchema } from '../types/config'
import type { PipelineConfig } from '../types/pipeline'
import { ExecutionModeSchema } from '../types/repository'
import { ErrorCode, NbciError } from './errors'

export const CONFIG_FILE = 'nbci.toml'

/**
 * Find nbci.toml by walking up the directory tree
 */
export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir
  const { root } = parse(dir)

  while (true) {
    const configPath = join(dir, CONFIG_FILE)
    if (existsSync(configPath)) {
      return configPath
    }
    if (dir === root) return null
    dir = dirname(dir)
  }
}

/**
 * Parse nbci.toml content and validate it
 */
export function parseConfig(content: string, source = CONFIG_FILE): NbciConfig {
  let raw: unknown
  try {
    raw = TOML.parse(content)
  } catch (err) {
    throw new NbciError({
      code: ErrorCode.INVALID_CONFIG,
      message: `Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    })
  }

  const result = NbciConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new NbciError({
      code: ErrorCode.INVALID_CONFIG,
      message: `Invalid ${source}: ${issues.join('; ')}`,
      context: { issues },
    })
  }
  return result.data
}

/**
 * Load and validate nbci.toml
 */
export function loadConfig(configPath: string): NbciConfig {
  return parseConfig(readFileSync(configPath, 'utf-8'), configPath)
}

/**
 * Default configuration (no nbci.toml present)
 */
export function defaultConfig(): NbciConfig {
  return NbciConfigSchema.parse({})
}

/**
 * Parse a boolean-ish environment value; undefined when unset or empty
 */
export function parseBooleanEnv(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const normalized = value.trim().toLowerCase()
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true
  if (['false', '0', 'no', 'off'].includes(normalized)) return false
  throw new NbciError({
    code: ErrorCode.INVALID_CONFIG,
    message: `${name} must be true or false, got "${value}"`,
    fatal: true,
  })
}

/**
 * Read a switch owned by the surrounding environment (CI, VERBOSE); unrecognised values are false
 */
export function isEnvEnabled(value: string | undefined): boolean {
  return value !== undefined && ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase())
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined
}

export interface PipelineOverrides {
  pythonVersion?: string
  executionMode?: string
  singleNotebook?: string
  runSecurityScan?: boolean
  buildDocumentation?: boolean
  skipDeps?: boolean
  strict?: boolean
}

export interface ResolvePipelineOptions {
  config: NbciConfig
  env?: Record<string, string | undefined>
  overrides?: PipelineOverrides
}

/**
 * Resolve pipeline options: defaults < nbci.toml < environment < CLI flags
 */
export function resolvePipelineConfig({ config, env = {}, overrides = {} }: ResolvePipelineOptions): PipelineConfig {
  const file = config.pipeline

  const rawMode = overrides.executionMode ?? nonEmpty(env.EXECUTION_MODE) ?? file.execution_mode
  const mode = ExecutionModeSchema.safeParse(rawMode)
  if (!mode.success) {
    throw new NbciError({
      code: ErrorCode.INVALID_EXECUTION_MODE,
      message: `Unknown execution mode: ${rawMode}`,
      context: { executionMode: rawMode },
      fatal: true,
    })
  }

  const resolved: PipelineConfig = {
    pythonVersion: overrides.pythonVersion ?? nonEmpty(env.PYTHON_VERSION) ?? file.python_version,
    executionMode: mode.data,
    singleNotebook: overrides.singleNotebook ?? nonEmpty(env.SINGLE_NOTEBOOK) ?? file.single_notebook,
    runSecurityScan:
      overrides.runSecurityScan ?? parseBooleanEnv(env.RUN_SECURITY_SCAN, 'RUN_SECURITY_SCAN') ?? file.run_security_scan,
    buildDocumentation:
      overrides.buildDocumentation ??
      parseBooleanEnv(env.BUILD_DOCUMENTATION, 'BUILD_DOCUMENTATION') ??
      file.build_documentation,
    skipDeps: overrides.skipDeps ?? parseBooleanEnv(env.SKIP_DEPS, 'SKIP_DEPS') ?? file.skip_deps,
    notebooksDir: file.notebooks_dir,
    venvDir: file.venv_dir,
    docsOutput: file.docs_output ?? join(tmpdir(), 'local-ci-build'),
    quickCount: file.quick_count,
    strict: overrides.strict ?? file.strict,
    timeouts: Object.freeze({ ...config.timeouts }),
  }

  return Object.freeze(resolved)
}

/**
 * Environment handed to every tool the pipeline spawns
 */
export function buildPipelineEnvironment(base: Record<string, string | undefined>): Record<string, string | undefined> {
  return {
    ...base,
    CI: 'true',
    GITHUB_ACTIONS: 'true',
    PYTHONUNBUFFERED: '1',
  }
}
