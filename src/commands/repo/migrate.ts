/**
 * repo migrate - Move a repository onto the centralized CI workflows
 */

import { z } from 'zod'
import { migrateRepository } from '../../lib/migration'
import { success } from '../../lib/output'
import { getRepositoryProfile } from '../../lib/repository-profiles'
import type { CommandDefinition } from '../../types/commands'

const MigrateArgs = z.object({
  repository: z.string({ required_error: 'repository name is required' }).min(1),
  org: z.string().optional(),
  yes: z.boolean().default(false),
  push: z.boolean().optional(),
})

export const repoMigrate: CommandDefinition<typeof MigrateArgs> = {
  name: 'repo migrate',
  description: 'Install the centralized notebook CI workflows on a branch',
  help: `
Usage: nbci repo migrate <repository> [org]

Steps: create the migration branch, back up .github/workflows, download
the template workflows, fill in placeholders and repository settings,
write migration-status.md, commit, and optionally push.

  --yes       continue without asking when the origin remote does not match
  --push      push the branch when done (--no-push to never ask)
`,
  examples: [
    'nbci repo migrate jdat_notebooks',
    'nbci repo migrate hello_universe spacetelescope --yes --no-push',
  ],
  positionals: ['repository', 'org'],
  args: MigrateArgs,

  async run(args, ctx) {
    const org = args.org ?? ctx.config.migration.org
    const confirm = (question: string) => (args.yes ? Promise.resolve(true) : ctx.confirm(question))

    const result = await migrateRepository({
      cwd: ctx.cwd,
      repository: args.repository,
      org,
      settings: ctx.config.migration,
      runner: ctx.runner,
      log: ctx.log,
      profile: getRepositoryProfile(args.repository, ctx.config),
      confirm,
      push: args.push ?? (ctx.interactive ? 'ask' : false),
    })

    const actionsRepo = ctx.config.migration.actions_repo
    ctx.log.plain()
    ctx.log.banner(`Migration Summary for ${args.repository}`, [
      `✅ Migration branch: ${result.branch}`,
      `✅ Workflows backed up: ${result.backups.length}`,
      `✅ Workflows installed: ${result.workflows.join(', ')}`,
      `✅ Configuration applied: ${result.configuration}`,
      '✅ Migration status file created: migration-status.md',
    ])
    ctx.log.plain('Next Steps:')
    ctx.log.plain('1. Review the generated workflows in .github/workflows/')
    ctx.log.plain("2. Run the 'Notebook CI - On Demand' workflow from the Actions tab")
    ctx.log.plain('3. Create a test PR to verify automatic triggers')
    ctx.log.plain('4. Check repository secrets (GITHUB_TOKEN, CASJOBS_USERID, CASJOBS_PW if needed)')
    ctx.log.plain('5. Merge the branch after successful testing')
    ctx.log.plain(`Workflows documentation: https://github.com/${org}/${actionsRepo}`)
    if (result.compareUrl) ctx.log.plain(`Create pull request at: ${result.compareUrl}`)

    return success(result)
  },
}
