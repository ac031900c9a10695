/**
 * ci run - Simulate the notebook CI pipeline locally
 */

import { basename } from 'path'
import { z } from 'zod'
import { buildPipelineEnvironment, resolvePipelineConfig } from '../../lib/config'
import type { Logger } from '../../lib/logger'
import { error, success } from '../../lib/output'
import { terminateActiveProcesses } from '../../lib/process'
import { getRepositoryProfile } from '../../lib/repository-profiles'
import { runPipeline } from '../../pipeline/runner'
import type { CommandDefinition } from '../../types/commands'

/** Conventional exit status after SIGINT */
export const INTERRUPTED_EXIT_CODE = 130

const RunArgs = z.object({
  pythonVersion: z.string().optional(),
  executionMode: z.string().optional(),
  singleNotebook: z.string().optional(),
  securityScan: z.boolean().optional(),
  docs: z.boolean().optional(),
  skipDeps: z.boolean().optional(),
  strict: z.boolean().optional(),
})

/**
 * Kill running tools and exit 130 on SIGINT/SIGTERM; returns the uninstaller
 */
function trapInterrupts(log: Logger): () => void {
  const handler = () => {
    log.warning('Received interrupt signal, cleaning up...')
    terminateActiveProcesses()
    process.exit(INTERRUPTED_EXIT_CODE)
  }
  process.once('SIGINT', handler)
  process.once('SIGTERM', handler)
  return () => {
    process.off('SIGINT', handler)
    process.off('SIGTERM', handler)
  }
}

export const ciRun: CommandDefinition<typeof RunArgs> = {
  name: 'ci run',
  description: 'Run the local CI pipeline (validate, execute, scan, build docs)',
  help: `
Runs the same stages as the notebook CI workflows, in order:
environment, dependencies, repository setup, validation, execution,
security scan, documentation build, summary.

Options (each also read from the environment, flags win):
  --python-version <v>      PYTHON_VERSION       (default 3.11)
  --execution-mode <mode>   EXECUTION_MODE       validation-only | quick | full
  --single-notebook <path>  SINGLE_NOTEBOOK      run one notebook only
  --[no-]security-scan      RUN_SECURITY_SCAN    (default true)
  --[no-]docs               BUILD_DOCUMENTATION  (default true)
  --skip-deps               SKIP_DEPS            assume tools are installed
  --strict                  exit 1 when any notebook fails

Individual notebook failures are reported and marked with *_failed.ipynb,
but only fatal problems change the exit code unless --strict is given.
`,
  examples: [
    'nbci ci run',
    'nbci ci run --execution-mode quick --no-docs',
    'nbci ci run --single-notebook notebooks/intro/intro.ipynb --execution-mode full',
    'SKIP_DEPS=true nbci ci run --no-security-scan',
  ],
  args: RunArgs,

  async run(args, ctx) {
    const config = resolvePipelineConfig({
      config: ctx.config,
      env: ctx.env,
      overrides: {
        pythonVersion: args.pythonVersion,
        executionMode: args.executionMode,
        singleNotebook: args.singleNotebook,
        runSecurityScan: args.securityScan,
        buildDocumentation: args.docs,
        skipDeps: args.skipDeps,
        strict: args.strict,
      },
    })

    const repository = basename(ctx.cwd)
    const release = trapInterrupts(ctx.log)
    const result = await runPipeline({
      cwd: ctx.cwd,
      config,
      runner: ctx.runner,
      log: ctx.log,
      env: buildPipelineEnvironment(ctx.env),
      profile: getRepositoryProfile(repository, ctx.config),
      repository,
    }).finally(release)

    const { summary, fatal, execution, docsIndex } = result
    const data = { ...summary, executedNotebooks: execution?.executed ?? [], docsIndex }

    if (fatal) {
      return error(fatal.code, fatal.message, fatal.hint, { ...fatal.context, summary: data }, { exitCode: 1 })
    }
    if (summary.exitCode !== 0) {
      return error(
        'PIPELINE_ERRORS',
        `${summary.errors} error(s) recorded during the run`,
        'Review the notebook failures above, or drop --strict',
        { summary: data },
        { exitCode: summary.exitCode }
      )
    }
    return success(data, { exitCode: 0 })
  },
}
