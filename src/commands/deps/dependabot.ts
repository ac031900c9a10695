/**
 * deps dependabot - Generate .github/dependabot.yml for notebook requirements
 */

import { mkdirSync, writeFileSync } from 'fs'
import { dirname, resolve } from 'path'
import { z } from 'zod'
import {
  buildDependabotConfig,
  DEFAULT_TARGET_BRANCH,
  findRequirementDirectories,
  renderDependabotConfig,
} from '../../lib/dependabot'
import { success } from '../../lib/output'
import type { CommandDefinition } from '../../types/commands'

const DependabotArgs = z.object({
  targetBranch: z.string().default(DEFAULT_TARGET_BRANCH),
  output: z.string().optional(),
})

export const depsDependabot: CommandDefinition<typeof DependabotArgs> = {
  name: 'deps dependabot',
  description: 'Generate a Dependabot config for notebooks/*/*/requirements.txt',
  help: `
One weekly github-actions entry for the repository root, plus one weekly
(Sunday 12:00) pip entry per notebook directory with a requirements.txt.
Printed to stdout unless --output is given.
`,
  examples: ['nbci deps dependabot', 'nbci deps dependabot --output .github/dependabot.yml --target-branch main'],
  args: DependabotArgs,

  async run(args, ctx) {
    const directories = findRequirementDirectories(ctx.cwd, ctx.config.pipeline.notebooks_dir)
    const content = renderDependabotConfig(buildDependabotConfig(directories, args.targetBranch))

    if (!args.output) {
      if (ctx.output.format !== 'json') process.stdout.write(content)
      return success({ directories, content })
    }

    const path = resolve(ctx.cwd, args.output)
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, content)
    ctx.log.success(`Wrote ${args.output} (${directories.length} pip entries)`)
    return success({ directories, output: path })
  },
}
