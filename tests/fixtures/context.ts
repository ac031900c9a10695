/**
 * Command context wired to in-memory stand-ins
 */

import { defaultConfig } from '../../src/lib/config'
import { createMemoryLogger } from '../../src/lib/logger'
import type { CommandContext } from '../../src/types'
import { createFakeRunner } from './fake-runner'

export type TestContext = CommandContext & { log: ReturnType<typeof createMemoryLogger> }

export function createTestContext(cwd: string, overrides: Partial<CommandContext> = {}): TestContext {
  return {
    cwd,
    output: { format: 'human', verbose: false, quiet: false, color: false },
    config: defaultConfig(),
    env: {},
    runner: createFakeRunner(),
    interactive: false,
    confirm: async () => false,
    ...overrides,
    log: createMemoryLogger(),
  }
}
