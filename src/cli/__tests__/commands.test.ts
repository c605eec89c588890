import { describe, it, expect, vi } from 'vitest'
import { summarizeReport } from '../commands/maintenance.js'
import { toMemoryRow } from '../commands/memory.js'
import { resolveMemoryId } from '../context.js'
import { isAppError } from '../../shared/error.js'
import { makeMemory } from '../../../tests/helpers/memories.js'

describe('toMemoryRow', () => {
  it('shortens the id and formats confidence', () => {
    const row = toMemoryRow(makeMemory({ id: 'abcdef1234567890', confidenceScore: 0.8456, applicationCount: 4 }))
    expect(row).toEqual({ id: 'abcdef12', state: 'NEW', confidence: '0.85', applied: 4, task: 'Build REST API' })
  })
})

describe('summarizeReport', () => {
  it('lists the daily counters and totals errors', () => {
    const items = summarizeReport({
      job: 'daily',
      startedAt: '2025-06-01T02:00:00.000Z',
      durationMs: 12,
      decay: { examined: 4, updated: 3, errors: 1 },
      transitions: { examined: 4, updated: 1, errors: 0, transitions: { DECLINING: 1 } },
    })

    expect(items).toEqual([
      { label: 'Decayed', value: '3/4' },
      { label: 'Transitions', value: 'DECLINING 1' },
      { label: 'Errors', value: 1 },
    ])
  })

  it('reports pruning counts for the monthly job', () => {
    const items = summarizeReport({
      job: 'monthly',
      startedAt: '2025-06-01T04:00:00.000Z',
      durationMs: 5,
      pruning: { deleted: 2, merged: 1, archivedLowValue: 0, errors: 0 },
    })

    expect(items.map(i => `${i.label}=${String(i.value)}`)).toEqual([
      'Deleted=2',
      'Merged=1',
      'Low-value archived=0',
      'Errors=0',
    ])
  })
})

describe('resolveMemoryId', () => {
  function codeOf(action: () => unknown): string | null {
    try {
      action()
    } catch (error: unknown) {
      return isAppError(error) ? error.code : 'not an AppError'
    }
    return null
  }

  it('returns the full id the store resolves', () => {
    expect(resolveMemoryId({ resolveId: () => 'abcdef12-full' }, 'abcdef12')).toBe('abcdef12-full')
  })

  it('rejects an empty prefix before asking the store', () => {
    const resolveId = vi.fn(() => 'anything')
    expect(codeOf(() => resolveMemoryId({ resolveId }, ' '))).toBe('ERR_VALIDATION')
    expect(resolveId).not.toHaveBeenCalled()
  })

  it('reports an unknown or ambiguous prefix as not found', () => {
    expect(codeOf(() => resolveMemoryId({ resolveId: () => null }, 'abc'))).toBe('STORE_NOT_FOUND')
  })
})
