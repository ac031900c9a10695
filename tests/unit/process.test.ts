/**
 * Child process runner
 */

import { describe, expect, it } from 'vitest'
import { CommandError, NOT_FOUND_EXIT_CODE, runCommand, tail, TIMEOUT_EXIT_CODE } from '../../src/lib/process'

const node = process.execPath

describe('runCommand', () => {
  it('captures trimmed output', async () => {
    const result = await runCommand(node, ['-e', 'console.log("out"); console.error("err")'])
    expect(result).toEqual({ stdout: 'out', stderr: 'err', exitCode: 0, success: true, timedOut: false })
  })

  it('reports the exit code', async () => {
    const result = await runCommand(node, ['-e', 'process.exit(3)'])
    expect(result.exitCode).toBe(3)
    expect(result.success).toBe(false)
  })

  it('resolves 127 for a missing executable', async () => {
    const result = await runCommand('nbci-no-such-tool', [])
    expect(result.exitCode).toBe(NOT_FOUND_EXIT_CODE)
    expect(result.success).toBe(false)
  })

  it('kills on timeout and resolves 124', async () => {
    const result = await runCommand(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeout: 200 })
    expect(result.timedOut).toBe(true)
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE)
  })

  it('throws CommandError when asked to', async () => {
    await expect(runCommand(node, ['-e', 'process.exit(2)'], { throwOnError: true })).rejects.toBeInstanceOf(CommandError)
  })

  it('passes the given environment', async () => {
    const result = await runCommand(node, ['-e', 'console.log(process.env.NBCI_TEST_VALUE)'], {
      env: { NBCI_TEST_VALUE: 'test-value' },
    })
    expect(result.stdout).toBe('test-value')
  })
})

describe('tail', () => {
  it('prefers stderr', () => {
    expect(tail({ stdout: 'a', stderr: '1\n2\n3', exitCode: 1, success: false, timedOut: false }, 2)).toBe('2\n3')
    expect(tail({ stdout: 'a\nb', stderr: '', exitCode: 1, success: false, timedOut: false }, 1)).toBe('b')
  })
})
