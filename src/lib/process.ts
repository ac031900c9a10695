/**
 * Process execution utilities
 *
 * Centralizes child process spawning with consistent timeout handling and
 * output capture. Every pipeline stage receives a `CommandRunner` so tests
 * can substitute an in-process fake.
 */

import { type ChildProcess, spawn } from 'child_process'

export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
  success: boolean
  /** Killed after exceeding `timeout` */
  timedOut: boolean
}

export type ProcessEnv = Record<string, string | undefined>

export interface CommandOptions {
  /** Working directory for the command */
  cwd?: string
  /** Full environment for the child; defaults to process.env */
  env?: ProcessEnv
  /** Timeout in milliseconds (0 = no timeout) */
  timeout?: number
  /** Whether to throw on non-zero exit code */
  throwOnError?: boolean
  /** Stream output to the terminal instead of capturing it */
  passthrough?: boolean
}

export type CommandRunner = (command: string, args?: string[], options?: CommandOptions) => Promise<CommandResult>

/** Exit code reported for a timed-out command, as coreutils `timeout` does */
export const TIMEOUT_EXIT_CODE = 124

/** Exit code reported when the executable cannot be spawned */
export const NOT_FOUND_EXIT_CODE = 127

const KILL_GRACE_MS = 5000

const activeProcesses = new Set<ChildProcess>()

/**
 * Run a command and capture output
 *
 * @example
 * const result = await runCommand('jupyter', ['nbconvert', '--to', 'script', nb], {
 *   timeout: 300_000,
 * })
 */
export const runCommand: CommandRunner = (command, args = [], options = {}) => {
  const { cwd, env, timeout = 0, throwOnError = false, passthrough = false } = options

  return new Promise<CommandResult>((resolve, reject) => {
    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false
    let timer: NodeJS.Timeout | undefined
    let killTimer: NodeJS.Timeout | undefined

    const proc = spawn(command, args, {
      cwd,
      env: env ?? process.env,
      stdio: passthrough ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
    })
    activeProcesses.add(proc)

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true
        proc.kill('SIGTERM')
        killTimer = setTimeout(() => proc.kill('SIGKILL'), KILL_GRACE_MS)
      }, timeout)
    }

    const finish = (exitCode: number, extraStderr = ''): void => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      if (killTimer) clearTimeout(killTimer)
      activeProcesses.delete(proc)

      const result: CommandResult = {
        stdout: stdout.trim(),
        stderr: (stderr + extraStderr).trim(),
        exitCode: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
        success: !timedOut && exitCode === 0,
        timedOut,
      }

      if (throwOnError && !result.success) {
        const reason = timedOut
          ? `Command timed out after ${timeout}ms`
          : `Command failed with exit code ${result.exitCode}`
        reject(new CommandError(`${reason}: ${command} ${args.join(' ')}`, result))
        return
      }
      resolve(result)
    }

    proc.on('error', (err: NodeJS.ErrnoException) => {
      finish(err.code === 'ENOENT' ? NOT_FOUND_EXIT_CODE : 1, err.message)
    })
    proc.on('close', (code) => {
      finish(code ?? 1)
    })
  })
}

/**
 * Kill every child process still running (used by the interrupt handler)
 */
export function terminateActiveProcesses(signal: NodeJS.Signals = 'SIGTERM'): number {
  let count = 0
  for (const proc of activeProcesses) {
    if (proc.kill(signal)) count++
  }
  return count
}

/**
 * Run a command and return success/failure only (for simple checks)
 */
export async function runCheck(
  runner: CommandRunner,
  command: string,
  args: string[] = [],
  options: CommandOptions = {}
): Promise<boolean> {
  const result = await runner(command, args, options)
  return result.success
}

/**
 * Check if a command/binary exists on the PATH of `env`
 */
export async function commandExists(
  runner: CommandRunner,
  command: string,
  env?: ProcessEnv
): Promise<boolean> {
  return runCheck(runner, 'which', [command], { env })
}

/**
 * Custom error class with command result details
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly result: CommandResult
  ) {
    super(message)
    this.name = 'CommandError'
  }

  get stdout(): string {
    return this.result.stdout
  }

  get stderr(): string {
    return this.result.stderr
  }

  get exitCode(): number {
    return this.result.exitCode
  }
}

/**
 * Last few lines of a command's output, for log messages
 */
export function tail(result: CommandResult, lines = 5): string {
  const text = result.stderr || result.stdout
  return text.split('\n').slice(-lines).join('\n')
}
