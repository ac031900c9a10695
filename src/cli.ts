/**
 * nbci CLI Router
 */

import { createInterface } from 'readline'
import { z } from 'zod'
import {
  ciRun,
  depsDependabot,
  doctor,
  repoMigrate,
  repoValidate,
  stylePep8,
  version,
  workflowsAct,
  workflowsValidate,
} from './commands'
import { defaultConfig, findConfigPath, loadConfig } from './lib/config'
import { isNbciError } from './lib/errors'
import { createLogger } from './lib/logger'
import { defaultOutputOptions, error, exitCodeFor, write } from './lib/output'
import { runCommand } from './lib/process'
import type { Command, CommandContext, CommandOutput } from './types'

// Command registry
export const commands: Record<string, Command> = {
  version,
  doctor,
  'ci run': ciRun,
  'workflows validate': workflowsValidate,
  'workflows act': workflowsAct,
  'repo validate': repoValidate,
  'repo migrate': repoMigrate,
  'deps dependabot': depsDependabot,
  'style pep8': stylePep8,
}

const COMMAND_GROUPS = ['ci', 'workflows', 'repo', 'deps', 'style']

// Global options schema
const GlobalOptions = z.object({
  help: z.boolean().default(false),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
})

export type GlobalOptions = z.infer<typeof GlobalOptions>

export interface ParsedArgs {
  command: string | null
  subcommand: string | null
  args: Record<string, unknown>
  positionals: string[]
  globalOpts: GlobalOptions
}

function camelCase(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, ch: string) => ch.toUpperCase())
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrap(schema.unwrap())
  if (schema instanceof z.ZodDefault) return unwrap(schema.removeDefault())
  return schema
}

/**
 * Argument names a command declares as booleans; these never take the next token as a value
 */
function booleanKeys(cmd: Command | undefined): Set<string> {
  const keys = new Set<string>()
  if (!cmd || !(cmd.args instanceof z.ZodObject)) return keys
  const shape: Record<string, z.ZodTypeAny> = cmd.args.shape
  for (const [key, schema] of Object.entries(shape)) {
    if (unwrap(schema) instanceof z.ZodBoolean) keys.add(key)
  }
  return keys
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[], registry: Record<string, Command> = commands): ParsedArgs {
  const args: Record<string, unknown> = {}
  const positionals: string[] = []
  const globalOpts = { help: false, json: false, verbose: false, quiet: false }

  let command: string | null = null
  let subcommand: string | null = null
  let i = 0

  const current = (): Command | undefined =>
    (command && subcommand ? registry[`${command} ${subcommand}`] : undefined) ?? (command ? registry[command] : undefined)

  while (i < argv.length) {
    const arg = argv[i] ?? ''

    // Global flags
    if (arg === '--help' || arg === '-h') {
      globalOpts.help = true
      i++
      continue
    }
    if (arg === '--json') {
      globalOpts.json = true
      i++
      continue
    }
    if (arg === '--verbose' || arg === '-v') {
      globalOpts.verbose = true
      i++
      continue
    }
    if (arg === '--quiet' || arg === '-q') {
      globalOpts.quiet = true
      i++
      continue
    }

    if (arg.startsWith('--')) {
      const body = arg.slice(2)
      const eq = body.indexOf('=')
      if (eq >= 0) {
        args[camelCase(body.slice(0, eq))] = body.slice(eq + 1)
        i++
        continue
      }
      if (body.startsWith('no-')) {
        args[camelCase(body.slice(3))] = false
        i++
        continue
      }

      const key = camelCase(body)
      const nextArg = argv[i + 1]
      if (nextArg === 'true' || nextArg === 'false') {
        args[key] = nextArg === 'true'
        i += 2
      } else if (nextArg === undefined || nextArg.startsWith('-') || booleanKeys(current()).has(key)) {
        args[key] = true
        i++
      } else {
        args[key] = nextArg
        i += 2
      }
      continue
    }

    if (arg.startsWith('-') && arg.length > 1) {
      i++
      continue
    }

    // Command and subcommand
    if (!command) {
      command = arg
    } else if (!subcommand && (registry[`${command} ${arg}`] || COMMAND_GROUPS.includes(command))) {
      subcommand = arg
    } else {
      positionals.push(arg)
    }
    i++
  }

  return {
    command,
    subcommand,
    args,
    positionals,
    globalOpts: GlobalOptions.parse(globalOpts),
  }
}

/**
 * Name positional arguments after the command's declared positionals; flags win
 */
export function applyPositionals(cmd: Command, args: Record<string, unknown>, positionals: string[]): Record<string, unknown> {
  const named: Record<string, unknown> = { ...args }
  ;(cmd.positionals ?? []).forEach((name, index) => {
    const value = positionals[index]
    if (value !== undefined && named[name] === undefined) named[name] = value
  })
  return named
}

/**
 * Show help message
 */
function showHelp(commandName?: string): void {
  const cmd = commandName ? commands[commandName] : undefined
  if (cmd) {
    console.log(`
${cmd.name} - ${cmd.description}
${cmd.help || ''}

Examples:
${(cmd.examples || []).map((e) => `  ${e}`).join('\n')}
`)
    return
  }

  console.log(`
nbci - Local CI for Jupyter notebook repositories

Usage: nbci <command> [options]

Commands:
  version                      Show version info
  doctor                       Diagnose the local CI environment

  ci run                       Run the notebook CI pipeline locally

  workflows validate           Check GitHub Actions workflow files
  workflows act                Run workflows locally with act

  repo validate                Score a repository's migration readiness
  repo migrate                 Migrate a repository to the centralized workflows

  deps dependabot              Generate .github/dependabot.yml for notebook requirements
  style pep8                   PEP 8 check of a Python script

Global Options:
  --help, -h     Show help
  --json         Output as JSON
  --verbose, -v  Verbose output
  --quiet, -q    Suppress output

Examples:
  nbci doctor
  nbci ci run --execution-mode quick
  SINGLE_NOTEBOOK=notebooks/example/example.ipynb nbci ci run
  nbci workflows validate --no-act
  nbci repo validate jdat_notebooks spacetelescope
  nbci repo migrate hst_notebooks --yes --no-push

Run 'nbci <command> --help' for command-specific help.
`)
}

function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  return new Promise((resolve) => {
    rl.question(`${question} (y/N) `, (answer) => {
      rl.close()
      resolve(/^y(es)?$/i.test(answer.trim()))
    })
  })
}

/**
 * Create command context
 */
export function createContext(globalOpts: GlobalOptions, env: Record<string, string | undefined> = process.env): CommandContext {
  const outputOpts = defaultOutputOptions(env)

  if (globalOpts.json) outputOpts.format = 'json'
  if (globalOpts.verbose) outputOpts.verbose = true
  if (globalOpts.quiet) outputOpts.quiet = true

  const cwd = process.cwd()
  const configPath = findConfigPath(cwd)
  const config = configPath ? loadConfig(configPath) : defaultConfig()
  const interactive = Boolean(process.stdin.isTTY)

  return {
    cwd,
    output: outputOpts,
    configPath: configPath ?? undefined,
    config,
    env,
    runner: runCommand,
    log: createLogger(outputOpts),
    interactive,
    confirm: (question) => (interactive ? askYesNo(question) : Promise.resolve(false)),
  }
}

/**
 * Validate arguments and run one command, turning thrown errors into outputs
 */
export async function execute(cmd: Command, rawArgs: Record<string, unknown>, ctx: CommandContext): Promise<CommandOutput> {
  const parsedArgs = cmd.args.safeParse(rawArgs)
  if (!parsedArgs.success) {
    const issues = parsedArgs.error.issues
    return error(
      'INVALID_ARGS',
      `Invalid arguments: ${issues.map((i: { message: string }) => i.message).join(', ')}`,
      `Run 'nbci ${cmd.name} --help' for usage`,
      { issues }
    )
  }

  const started = Date.now()
  try {
    const result = await cmd.run(parsedArgs.data, ctx)
    return { ...result, meta: { ...result.meta, duration_ms: Date.now() - started } }
  } catch (err) {
    if (isNbciError(err)) return err.toOutput()
    return error(
      'INTERNAL_ERROR',
      err instanceof Error ? err.message : String(err),
      'This is a bug in the CLI. Please report it.',
      { stack: err instanceof Error ? err.stack : undefined }
    )
  }
}

/**
 * Run the CLI
 */
export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { command, subcommand, args, positionals, globalOpts } = parseArgs(argv)

  // Show help if requested or no command
  if (!command) {
    showHelp()
    process.exit(1)
  }

  const fullCommand = subcommand ? `${command} ${subcommand}` : command
  if (globalOpts.help) {
    showHelp(fullCommand)
    process.exit(0)
  }

  let ctx: CommandContext
  try {
    ctx = createContext(globalOpts)
  } catch (err) {
    // nbci.toml failed to load
    const output = isNbciError(err) ? err.toOutput() : error('INTERNAL_ERROR', String(err))
    write(output, defaultOutputOptions())
    process.exit(1)
  }

  const cmd = commands[fullCommand] ?? commands[command]
  if (!cmd) {
    const output = error(
      'UNKNOWN_COMMAND',
      `Unknown command: ${fullCommand}`,
      `Available commands: ${Object.keys(commands).join(', ')}`,
      { command: fullCommand }
    )
    write(output, ctx.output)
    process.exit(1)
  }

  const result = await execute(cmd, applyPositionals(cmd, args, positionals), ctx)
  write(result, ctx.output)
  process.exit(exitCodeFor(result))
}
