/**
 * workflows validate - Check GitHub Actions workflows before pushing
 */

import { z } from 'zod'
import { isEnvEnabled, parseBooleanEnv } from '../../lib/config'
import { error, success } from '../../lib/output'
import { DEFAULT_WORKFLOWS_DIR, validateWorkflows } from '../../lib/workflow-validator'
import type { CommandDefinition } from '../../types/commands'

const ValidateArgs = z.object({
  dir: z.string().default(DEFAULT_WORKFLOWS_DIR),
  act: z.boolean().optional(),
})

export const workflowsValidate: CommandDefinition<typeof ValidateArgs> = {
  name: 'workflows validate',
  description: 'Validate workflow YAML, structure and placeholders',
  help: `
Checks every *.yml / *.yaml file under the workflows directory:
  - YAML syntax
  - top-level name:, on: and jobs: keys
  - leftover template placeholders (your-org, dev-actions)
  - local action references (uses: ./.)
  - act --dryrun, when act is installed (VALIDATE_ACT, --[no-]act)

Exits 1 when any file has errors. act failures are warnings only.
`,
  examples: ['nbci workflows validate', 'nbci workflows validate --no-act', 'VALIDATE_ACT=false nbci workflows validate'],
  args: ValidateArgs,

  async run(args, ctx) {
    const act = args.act ?? parseBooleanEnv(ctx.env.VALIDATE_ACT, 'VALIDATE_ACT') ?? true
    const verbose = ctx.output.verbose || isEnvEnabled(ctx.env.VERBOSE)

    ctx.log.banner('🔍 GitHub Actions Workflow Validation', [
      `Workflows Directory: ${args.dir}`,
      `Validate with Act: ${act}`,
    ])

    const summary = await validateWorkflows({
      cwd: ctx.cwd,
      runner: ctx.runner,
      log: ctx.log,
      directory: args.dir,
      act,
      verbose,
      env: ctx.env,
    })

    ctx.log.banner('📊 Validation Summary', [
      `Total workflows: ${summary.total}`,
      `✅ Passed: ${summary.passed}`,
      `⚠️  Warnings: ${summary.warnings}`,
      `❌ Errors: ${summary.errors}`,
    ])

    const { reusable, secrets, jobDependencies } = summary.insights
    ctx.log.info('Additional Checks and Recommendations:')
    ctx.log.info(reusable > 0 ? `  Found ${reusable} reusable workflow(s)` : '  No reusable workflows detected')
    ctx.log.info(secrets > 0 ? `  Found secrets usage in ${secrets} workflow(s)` : '  No secrets usage detected')
    ctx.log.info(
      jobDependencies > 0 ? `  Found job dependencies in ${jobDependencies} workflow(s)` : '  No job dependencies detected'
    )
    ctx.log.info('💡 Recommendations:')
    summary.recommendations.forEach((text, i) => ctx.log.plain(`  ${i + 1}. ${text}`))

    if (summary.errors > 0) {
      return error(
        'WORKFLOW_VALIDATION',
        `Validation failed with ${summary.errors} error(s)`,
        'Fix the structure issues listed above and run again',
        { summary },
        { exitCode: 1 }
      )
    }

    if (summary.warnings > 0) {
      ctx.log.warning(`Validation passed with ${summary.warnings} warning(s)`)
    } else {
      ctx.log.success('All workflows validated successfully!')
    }
    return success(summary)
  },
}
