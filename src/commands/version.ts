/**
 * Version command
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import { success } from '../lib/output'
import type { CommandDefinition } from '../types/commands'

const VersionArgs = z.object({})

const PackageJson = z.object({ name: z.string(), version: z.string() })

/** package.json sits two levels above both src/commands and dist/commands */
export function readPackageInfo(): z.infer<typeof PackageJson> {
  return PackageJson.parse(JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8')))
}

export const version: CommandDefinition<typeof VersionArgs> = {
  name: 'version',
  description: 'Show version information',
  examples: ['nbci version'],
  args: VersionArgs,

  async run(_args, _ctx) {
    const pkg = readPackageInfo()

    return success({
      name: pkg.name,
      version: pkg.version,
      node: process.version,
      platform: process.platform,
      arch: process.arch,
    })
  },
}
