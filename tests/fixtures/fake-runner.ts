/**
 * In-process stand-in for the child process runner
 */

import type { CommandOptions, CommandResult, CommandRunner } from '../../src/lib/process'

export interface RecordedCall {
  command: string
  args: string[]
  options: CommandOptions
  /** `command arg1 arg2 ...` */
  line: string
}

export type Responder = (call: RecordedCall) => Partial<CommandResult> | undefined

export type FakeRunner = CommandRunner & {
  calls: RecordedCall[]
  lines(): string[]
  ran(prefix: string): boolean
}

export function ok(stdout = ''): Partial<CommandResult> {
  return { stdout, exitCode: 0 }
}

export function fail(exitCode = 1, stderr = 'failed'): Partial<CommandResult> {
  return { stderr, exitCode }
}

/**
 * Every call succeeds with empty output unless `respond` returns something else
 */
export function createFakeRunner(respond: Responder = () => undefined): FakeRunner {
  const calls: RecordedCall[] = []

  const runner: CommandRunner = async (command, args = [], options = {}) => {
    const call: RecordedCall = { command, args, options, line: [command, ...args].join(' ') }
    calls.push(call)
    const partial = respond(call) ?? {}
    const exitCode = partial.exitCode ?? 0
    return {
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
      exitCode,
      success: exitCode === 0,
      timedOut: partial.timedOut ?? false,
    }
  }

  return Object.assign(runner, {
    calls,
    lines: () => calls.map((call) => call.line),
    ran: (prefix: string) => calls.some((call) => call.line.startsWith(prefix)),
  })
}
