/**
 * Repository profile types
 *
 * A profile describes what is special about one known notebook repository:
 * environment it needs during local CI, how its workflows are tailored on
 * migration, and what the readiness check looks for in its notebooks.
 */

import { z } from 'zod'

export const ExecutionModeSchema = z.enum(['validation-only', 'quick', 'full'])

export type ExecutionMode = z.infer<typeof ExecutionModeSchema>

export const ImportProbeSchema = z.object({
  /** Python module passed to `import` */
  module: z.string().min(1),
  /** Label used in log lines, e.g. "MAST API" */
  description: z.string().min(1),
  /** Appended to the warning when the import fails */
  hint: z.string().optional(),
})

export const RepositoryProfileSchema = z.object({
  label: z.string().min(1),
  ci: z
    .object({
      notice: z.string().optional(),
      env: z.record(z.string()).default({}),
      /** Directories created before notebooks run (cache paths and the like) */
      create_dirs: z.array(z.string()).default([]),
      probe: ImportProbeSchema.optional(),
    })
    .optional(),
  migration: z
    .object({
      python_version: z.string().optional(),
      execution_mode: ExecutionModeSchema.optional(),
      post_run_script: z.string().optional(),
      special: z.string().optional(),
      /** false disables `security-scan` in notebook-ci-*.yml */
      security_scan: z.boolean().optional(),
      /** Write a placeholder post-run script when the repository has none */
      scaffold_post_run_script: z.boolean().default(false),
      note: z.string().optional(),
    })
    .optional(),
  readiness: z
    .object({
      pattern: z.string().min(1),
      description: z.string().min(1),
      required_files: z.array(z.string()).default([]),
    })
    .optional(),
})

export type RepositoryProfile = z.infer<typeof RepositoryProfileSchema>

export type RepositoryProfileInput = z.input<typeof RepositoryProfileSchema>
