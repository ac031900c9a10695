/**
 * Command types for the nbci CLI
 */

import type { z } from 'zod'
import type { Logger } from '../lib/logger'
import type { CommandRunner, ProcessEnv } from '../lib/process'
import type { NbciConfig } from './config'
import type { CommandOutput, OutputOptions } from './output'

export interface CommandContext {
  /** Current working directory */
  cwd: string
  /** Output options */
  output: OutputOptions
  /** Path to nbci.toml if found */
  configPath?: string
  /** Parsed and validated nbci.toml */
  config: NbciConfig
  /** Process environment the command was started with */
  env: ProcessEnv
  /** Spawns external tools */
  runner: CommandRunner
  /** Step logging bound to `output` */
  log: Logger
  /** Whether a person can answer prompts (stdin is a TTY) */
  interactive: boolean
  /** Yes/no question; resolves false when not interactive */
  confirm: (question: string) => Promise<boolean>
}

export interface CommandDefinition<TArgs extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string
  description: string
  /** Long description shown in help */
  help?: string
  /** Example usages */
  examples?: string[]
  /** Names given to positional arguments, in order */
  positionals?: string[]
  /** Zod schema for arguments */
  args: TArgs
  /** Command handler */
  run: (args: z.infer<TArgs>, ctx: CommandContext) => Promise<CommandOutput>
}

// Registry entries keep their own argument types; the router only needs the erased shape
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Command = CommandDefinition<any>
