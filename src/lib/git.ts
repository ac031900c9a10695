/**
 * Git operations used by migration and readiness checks
 */

import { ErrorCode, NbciError } from './errors'
import { type CommandResult, type CommandRunner, runCheck, tail } from './process'

export class Git {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string
  ) {}

  private run(args: string[]): Promise<CommandResult> {
    return this.runner('git', args, { cwd: this.cwd })
  }

  /**
   * Run and raise GIT_FAILED on a non-zero exit
   */
  private async must(args: string[]): Promise<CommandResult> {
    const result = await this.run(args)
    if (!result.success) {
      throw new NbciError({
        code: ErrorCode.GIT_FAILED,
        message: `git ${args.join(' ')} failed: ${tail(result, 3)}`,
        context: { exitCode: result.exitCode },
      })
    }
    return result
  }

  async currentBranch(): Promise<string | null> {
    const result = await this.run(['branch', '--show-current'])
    return result.success ? result.stdout : null
  }

  /**
   * Porcelain status lines; an empty list means a clean tree
   */
  async status(): Promise<string[] | null> {
    const result = await this.run(['status', '--porcelain'])
    if (!result.success) return null
    return result.stdout.split('\n').filter((line) => line.trim() !== '')
  }

  async remoteUrl(remote = 'origin'): Promise<string | null> {
    const result = await this.run(['remote', 'get-url', remote])
    return result.success && result.stdout ? result.stdout : null
  }

  branchExists(branch: string): Promise<boolean> {
    return runCheck(this.runner, 'git', ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], { cwd: this.cwd })
  }

  async checkout(branch: string, create = false): Promise<void> {
    await this.must(create ? ['checkout', '-b', branch] : ['checkout', branch])
  }

  async addAll(): Promise<void> {
    await this.must(['add', '.'])
  }

  async commit(message: string): Promise<void> {
    await this.must(['commit', '-m', message])
  }

  async push(branch: string, remote = 'origin'): Promise<void> {
    await this.must(['push', remote, branch])
  }
}

/**
 * Repository name from a remote URL: git@github.com:org/repo.git -> repo
 */
export function repositoryNameFromUrl(url: string): string {
  const last = url.replace(/\/+$/, '').split(/[/:]/).pop() ?? ''
  return last.endsWith('.git') ? last.slice(0, -'.git'.length) : last
}
