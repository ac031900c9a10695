/**
 * style pep8 - flake8 check for a Python script with source context
 */

import { z } from 'zod'
import { NbciError } from '../../lib/errors'
import { error, success } from '../../lib/output'
import { checkScriptStyle, STYLE_ISSUES_EXIT_CODE } from '../../lib/pep8'
import type { CommandDefinition } from '../../types/commands'

const Pep8Args = z.object({
  file: z.string({ required_error: 'a .py file is required' }).min(1),
})

export const stylePep8: CommandDefinition<typeof Pep8Args> = {
  name: 'style pep8',
  description: 'PEP 8 check of a Python script (flake8)',
  help: `
Usage: nbci style pep8 <file.py>

Ignores E261, E501, F821, W291 and W293. Exits 99 when issues remain.
`,
  examples: ['nbci style pep8 notebooks/COS/helpers/cos_functions.py'],
  positionals: ['file'],
  args: Pep8Args,

  async run(args, ctx) {
    if (!args.file.endsWith('.py')) {
      throw NbciError.invalidInput(`file extension must be .py: ${args.file}`)
    }

    const report = await checkScriptStyle(ctx.runner, args.file, ctx.cwd)
    if (report.clean) {
      ctx.log.success(`${args.file} is clean!`)
      return success(report)
    }

    report.issues.forEach((issue, i) => {
      ctx.log.plain(`PEP8 error ${i + 1} of ${report.issues.length}`)
      ctx.log.plain(`PEP8 error found at line ${issue.line}, column ${issue.column}`)
      ctx.log.plain(issue.source)
      ctx.log.plain(issue.pointer)
      ctx.log.plain(`${issue.code} ${issue.message}`)
      ctx.log.plain()
    })

    return error(
      'STYLE_ISSUES',
      `${report.issues.length} PEP 8 issue(s) in ${args.file}`,
      'Fix the lines shown above and rerun',
      { report },
      { exitCode: STYLE_ISSUES_EXIT_CODE }
    )
  },
}
