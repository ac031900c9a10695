/**
 * repo validate - Score a repository's readiness for migration
 */

import { z } from 'zod'
import { success } from '../../lib/output'
import { assessReadiness, MAX_SCORE } from '../../lib/readiness'
import { getRepositoryProfile } from '../../lib/repository-profiles'
import type { CommandDefinition } from '../../types/commands'

const ValidateArgs = z.object({
  repository: z.string({ required_error: 'repository name is required' }).min(1),
  org: z.string().optional(),
})

export const repoValidate: CommandDefinition<typeof ValidateArgs> = {
  name: 'repo validate',
  description: 'Check migration readiness (advisory 0-10 score)',
  help: `
Usage: nbci repo validate <repository> [org]

Runs ten checks (git repository, notebooks/, _config.yml, _toc.yml,
.github/workflows/, a dependency file, clean tree, origin remote,
main/master branch, GitHub CLI access) and reports the score.
Read-only; always exits 0 once the repository name is given.
`,
  examples: ['nbci repo validate hst_notebooks', 'nbci repo validate jdat_notebooks spacetelescope'],
  positionals: ['repository', 'org'],
  args: ValidateArgs,

  async run(args, ctx) {
    const org = args.org ?? ctx.config.migration.org
    const report = await assessReadiness({
      cwd: ctx.cwd,
      repository: args.repository,
      org,
      runner: ctx.runner,
      log: ctx.log,
      profile: getRepositoryProfile(args.repository, ctx.config),
    })

    const { log } = ctx
    log.plain()
    log.banner('Migration Readiness Summary', [`Readiness Score: ${report.score}/${MAX_SCORE} (${report.percentage}%)`])

    switch (report.band) {
      case 'ready':
        log.success('Repository is ready for migration!')
        log.plain(`   nbci repo migrate ${args.repository} ${org}`)
        break
      case 'mostly-ready':
        log.warning('Repository is mostly ready, but has some issues')
        log.plain('   Address warnings above before migration')
        break
      case 'needs-work':
        log.error('Repository needs significant preparation before migration')
        log.plain('   Address errors above before proceeding')
        break
    }

    return success(report)
  },
}
