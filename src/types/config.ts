/**
 * nbci.toml schema
 */

import { z } from 'zod'
import { ExecutionModeSchema, RepositoryProfileSchema } from './repository'

export const DEFAULT_WORKFLOW_TEMPLATES = [
  'notebook-ci-pr.yml',
  'notebook-ci-main.yml',
  'notebook-ci-on-demand.yml',
  'docs-only.yml',
] as const

export const PipelineSectionSchema = z.object({
  python_version: z.string().default('3.11'),
  execution_mode: ExecutionModeSchema.default('validation-only'),
  single_notebook: z.string().optional(),
  run_security_scan: z.boolean().default(true),
  build_documentation: z.boolean().default(true),
  skip_deps: z.boolean().default(false),
  notebooks_dir: z.string().default('notebooks'),
  venv_dir: z.string().default('venv'),
  /** Defaults to <tmpdir>/local-ci-build */
  docs_output: z.string().optional(),
  quick_count: z.number().int().positive().default(3),
  /** Fail the run on any recorded error, not only fatal ones */
  strict: z.boolean().default(false),
})

/** All values in seconds */
export const TimeoutsSchema = z.object({
  accelerant_install: z.number().positive().default(300),
  core_install: z.number().positive().default(600),
  requirements_small: z.number().positive().default(600),
  requirements_large: z.number().positive().default(1800),
  large_requirements_lines: z.number().int().nonnegative().default(50),
  pyproject_install: z.number().positive().default(600),
  notebook: z.number().positive().default(300),
})

export const MigrationSectionSchema = z.object({
  org: z.string().min(1).default('spacetelescope'),
  actions_repo: z.string().min(1).default('notebook-ci-actions'),
  branch: z.string().min(1).default('migrate-to-centralized-actions'),
  templates: z.array(z.string().min(1)).min(1).default([...DEFAULT_WORKFLOW_TEMPLATES]),
  /** {org} and {actions_repo} are filled in before downloading */
  base_url: z
    .string()
    .default('https://raw.githubusercontent.com/{org}/{actions_repo}/main/examples/workflows'),
})

export const NbciConfigSchema = z.object({
  pipeline: PipelineSectionSchema.default({}),
  timeouts: TimeoutsSchema.default({}),
  migration: MigrationSectionSchema.default({}),
  repositories: z.record(RepositoryProfileSchema).default({}),
})

export type NbciConfig = z.infer<typeof NbciConfigSchema>

export type PipelineSection = z.infer<typeof PipelineSectionSchema>

export type Timeouts = z.infer<typeof TimeoutsSchema>

export type MigrationSection = z.infer<typeof MigrationSectionSchema>
