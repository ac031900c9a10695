/**
 * Notebook discovery and selection tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  discoverNotebooks,
  failedNotebookPath,
  findFailedNotebooks,
  isFailedMarker,
  selectNotebooks,
} from '../../src/lib/notebooks'
import { createScratchRepo, notebookJson, type ScratchRepo } from '../fixtures/scratch'

describe('discoverNotebooks', () => {
  let repo: ScratchRepo

  beforeEach(() => {
    repo = createScratchRepo({
      'notebooks/b/second.ipynb': notebookJson(),
      'notebooks/a/first.ipynb': notebookJson(),
      'notebooks/a/first_failed.ipynb': notebookJson(),
      'notebooks/a/.ipynb_checkpoints/first-checkpoint.ipynb': notebookJson(),
      'notebooks/a/helpers.py': 'x = 1\n',
      'other/outside.ipynb': notebookJson(),
    })
  })

  afterEach(() => repo.remove())

  it('lists notebooks sorted, skipping checkpoints and failure markers', () => {
    expect(discoverNotebooks(repo.root, 'notebooks')).toEqual(['notebooks/a/first.ipynb', 'notebooks/b/second.ipynb'])
  })

  it('finds failure markers', () => {
    expect(findFailedNotebooks(repo.root, 'notebooks')).toEqual(['notebooks/a/first_failed.ipynb'])
  })

  it('returns nothing for a missing directory', () => {
    expect(discoverNotebooks(repo.root, 'missing')).toEqual([])
  })
})

describe('failedNotebookPath', () => {
  it('inserts the suffix before the extension', () => {
    expect(failedNotebookPath('notebooks/a/b.ipynb')).toBe('notebooks/a/b_failed.ipynb')
    expect(isFailedMarker('b_failed.ipynb')).toBe(true)
    expect(isFailedMarker('b.ipynb')).toBe(false)
  })
})

describe('selectNotebooks', () => {
  const all = ['n/1.ipynb', 'n/2.ipynb', 'n/3.ipynb', 'n/4.ipynb', 'n/5.ipynb']

  it('takes the first three in quick mode', () => {
    expect(selectNotebooks('quick', all)).toEqual(['n/1.ipynb', 'n/2.ipynb', 'n/3.ipynb'])
  })

  it('takes everything in full mode', () => {
    expect(selectNotebooks('full', all)).toEqual(all)
  })

  it('executes nothing in validation-only mode, even with a single notebook', () => {
    expect(selectNotebooks('validation-only', all, 'n/2.ipynb')).toEqual([])
  })

  it('lets a single notebook replace the list', () => {
    expect(selectNotebooks('quick', all, 'n/5.ipynb')).toEqual(['n/5.ipynb'])
    expect(selectNotebooks('full', all, 'n/5.ipynb')).toEqual(['n/5.ipynb'])
  })

  it('honours a custom quick count', () => {
    expect(selectNotebooks('quick', all, undefined, 1)).toEqual(['n/1.ipynb'])
  })
})
