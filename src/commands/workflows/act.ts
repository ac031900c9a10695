/**
 * workflows act - Run GitHub Actions workflows locally with act
 */

import { z } from 'zod'
import { buildActArgs, envFileHasPlaceholders, parseActList, scaffoldActFiles } from '../../lib/act'
import { isEnvEnabled, parseBooleanEnv } from '../../lib/config'
import { error, success } from '../../lib/output'
import { commandExists, tail } from '../../lib/process'
import type { CommandDefinition } from '../../types/commands'

const ActArgs = z.object({
  event: z.string().default('pull_request'),
  workflow: z.string().optional(),
  job: z.string().optional(),
  dryRun: z.boolean().optional(),
  yes: z.boolean().default(false),
})

const INSTALL_HINT = [
  'macOS:   brew install act',
  'Linux:   see https://github.com/nektos/act#installation',
  'Windows: choco install act-cli',
].join('\n')

export const workflowsAct: CommandDefinition<typeof ActArgs> = {
  name: 'workflows act',
  description: 'Run workflows locally in containers with act',
  help: `
Usage: nbci workflows act [event] [workflow] [job]

  event      pull_request (default), push, workflow_dispatch, ...
  workflow   path to one workflow file
  job        one job id

Creates .actrc, a .env template and sample event payloads under
.github/events/ when they are missing. Asks before running unless
--dry-run, --yes or CI=true.

  --dry-run   DRY_RUN    validate only (act --dryrun)
  --verbose   VERBOSE    pass --verbose to act
`,
  examples: [
    'nbci workflows act',
    'nbci workflows act push .github/workflows/notebook-ci-main.yml',
    "nbci workflows act workflow_dispatch '' test-notebooks",
    'DRY_RUN=true nbci workflows act pull_request',
  ],
  positionals: ['event', 'workflow', 'job'],
  args: ActArgs,

  async run(args, ctx) {
    const { log } = ctx

    if (!(await commandExists(ctx.runner, 'act', ctx.env))) {
      return error('MISSING_TOOL', 'act is not installed', INSTALL_HINT)
    }

    const dryRun = args.dryRun ?? parseBooleanEnv(ctx.env.DRY_RUN, 'DRY_RUN') ?? false
    const verbose = ctx.output.verbose || isEnvEnabled(ctx.env.VERBOSE)
    const workflow = args.workflow || undefined
    const job = args.job || undefined

    log.banner('🎭 Act-based Local Testing', [
      `Event Type: ${args.event}`,
      ...(workflow ? [`Workflow File: ${workflow}`] : []),
      ...(job ? [`Job Name: ${job}`] : []),
      `Dry Run: ${dryRun}`,
    ])

    const created = scaffoldActFiles(ctx.cwd, log)
    const actArgs = buildActArgs({ event: args.event, workflow, job, dryRun, verbose })

    log.info('Running pre-flight checks...')
    if (envFileHasPlaceholders(ctx.cwd)) {
      log.warning('.env file contains placeholder values')
      log.info('Consider updating with actual values for full testing')
    }

    const list = await ctx.runner('act', ['--list'], { cwd: ctx.cwd, env: ctx.env })
    if (list.success) {
      log.info('Available workflows:')
      for (const line of parseActList(list.stdout)) log.plain(`  ${line}`)
    }

    const command = `act ${actArgs.join(' ')}`
    if (!dryRun) {
      log.info('The following command will be executed:')
      log.plain(`  ${command}`)
      const ci = isEnvEnabled(ctx.env.CI)
      if (!args.yes && !ci && !(await ctx.confirm('Do you want to proceed?'))) {
        log.info('Cancelled by user')
        return success({ command, created, executed: false })
      }
    }

    log.info('Executing Act command...')
    const result = await ctx.runner('act', actArgs, { cwd: ctx.cwd, env: ctx.env, passthrough: true })

    if (!result.success) {
      log.error(`Act execution failed with exit code ${result.exitCode}`)
      return error(
        'COMMAND_FAILED',
        `act exited with code ${result.exitCode}`,
        'Rerun with --verbose or --dry-run; check that Docker is running and .env holds valid values',
        { command, output: tail(result) },
        { exitCode: result.exitCode }
      )
    }

    log.success('Act execution completed successfully!')
    return success({ command, created, executed: true })
  },
}
