/**
 * Output formatting and step logging
 */

import { describe, expect, it } from 'vitest'
import { NbciError } from '../../src/lib/errors'
import { createLogger, createMemoryLogger } from '../../src/lib/logger'
import { error, exitCodeFor, format, success } from '../../src/lib/output'

const HUMAN = { format: 'human', verbose: false, quiet: false, color: false } as const

describe('exitCodeFor', () => {
  it('uses meta.exitCode when present', () => {
    expect(exitCodeFor(success({}))).toBe(0)
    expect(exitCodeFor(error('X', 'x'))).toBe(1)
    expect(exitCodeFor(error('STYLE_ISSUES', 'x', undefined, undefined, { exitCode: 99 }))).toBe(99)
  })
})

describe('format', () => {
  it('renders errors with their hint', () => {
    const output = new NbciError({ code: 'MISSING_TOOL', message: 'act is not installed' }).toOutput()
    expect(format(output, HUMAN)).toBe(
      'Error: act is not installed\n\nHint: Install the tool and make sure it is on PATH'
    )
  })

  it('aligns object keys', () => {
    expect(format(success({ score: 8, band: 'ready' }), HUMAN)).toBe('score  8\nband   ready')
  })

  it('renders JSON on request', () => {
    expect(JSON.parse(format(success({ a: 1 }), { ...HUMAN, format: 'json' }))).toEqual({ success: true, data: { a: 1 } })
  })
})

describe('createLogger', () => {
  it('prefixes levels and hides debug unless verbose', () => {
    const log = createMemoryLogger()
    log.info('one')
    log.debug('hidden')
    log.error('two')
    expect(log.lines).toEqual(['ℹ️  one', '❌ two'])
  })

  it('keeps warnings when quiet', () => {
    const log = createMemoryLogger({ quiet: true })
    log.success('done')
    log.plain('text')
    log.warning('careful')
    expect(log.lines).toEqual(['⚠️  careful'])
  })

  it('writes one JSON object per line in JSON mode', () => {
    const lines: string[] = []
    const log = createLogger({ ...HUMAN, format: 'json' }, (line) => {
      lines.push(line)
    })
    log.warning('No notebooks found')
    log.plain('dropped')
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'warning', message: 'No notebooks found' })
  })

  it('frames banners with rules', () => {
    const log = createMemoryLogger()
    log.banner('Title', ['line'])
    const rule = '='.repeat(40)
    expect(log.lines).toEqual([rule, 'Title', rule, 'line', rule])
  })
})
