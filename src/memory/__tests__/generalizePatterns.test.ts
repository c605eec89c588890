import { describe, it, expect, afterEach } from 'vitest'
import { buildPatternDraft, generalizePatterns } from '../generalizePatterns.js'
import { lifecycleConfigSchema } from '../../config/schema.js'
import { createMemoryStore, type MemoryStore } from '../../store/MemoryStore.js'
import { DEFAULT_VOCABULARY, createFakeEmbedder, mixedVector } from '../../../tests/helpers/fakeEmbedder.js'
import { NOW, daysAgo, makeMemory, steppingClock } from '../../../tests/helpers/memories.js'
import type { Memory, StoredMemory } from '../types.js'

const config = lifecycleConfigSchema.parse({})
const DIMS = DEFAULT_VOCABULARY.length

// Pairwise cosine 0.9 among the first three, 0 against the outlier
const overrides: Record<string, number[]> = {
  'Cache user sessions': mixedVector(DIMS, 0, 1, 0.9),
  'Cache product pages': mixedVector(DIMS, 0, 2, 0.9),
  'Cache search results': mixedVector(DIMS, 0, 3, 0.9),
  'Rotate log files': mixedVector(DIMS, 5, 6, 0.9),
}

let store: MemoryStore | null = null

afterEach(() => {
  store?.close()
  store = null
})

async function seed(task: string, confidenceScore: number, applicationCount: number): Promise<string> {
  if (!store) throw new Error('store not open')
  const memories = store
  const id = await memories.store({
    task,
    context: '',
    narrative: '',
    tacticalLearning: null,
    strategicLearning: null,
    metaLearning: null,
    antiPatterns: { description: '', redundancies: [`Re-fetch in ${task}`], inefficiencies: [] },
    executionMetadata: null,
    confidenceScore,
    outcome: 'success',
  })
  memories.updateMemory(id, memory => ({ ...memory, applicationCount, lifecycleState: 'VALIDATED' }))
  return id
}

function stored(overrides: Partial<Memory>): StoredMemory {
  return { ...makeMemory(overrides), taskEmbedding: null, contentEmbedding: null }
}

describe('buildPatternDraft', () => {
  it('states the approach shared by the whole group', () => {
    const group = [
      stored({
        id: 'mem-c',
        task: 'Cache search results',
        confidenceScore: 0.8,
        tacticalLearning: 'Invalidate on write',
        strategicLearning: 'Keep cache keys deterministic',
        timestamp: daysAgo(1),
      }),
      stored({
        id: 'mem-a',
        task: 'Cache user sessions',
        confidenceScore: 0.9,
        tacticalLearning: 'Set a TTL on every entry',
        strategicLearning: 'Cache reads that are expensive to recompute',
        timestamp: daysAgo(3),
      }),
      stored({
        id: 'mem-b',
        task: 'Cache product pages',
        confidenceScore: 0.85,
        tacticalLearning: 'Invalidate on write',
        strategicLearning: 'Cache reads that are expensive to recompute',
        metaLearning: 'Measure hit rates before tuning',
        timestamp: daysAgo(2),
      }),
    ]

    const draft = buildPatternDraft(group, config)

    expect(draft.task).toBe('Cache user sessions')
    expect(draft.tacticalLearning).toBe('Invalidate on write')
    expect(draft.strategicLearning).toBe(
      'Shared approach across 3 tasks (Cache user sessions; Cache product pages; Cache search results): ' +
        'Cache reads that are expensive to recompute / Keep cache keys deterministic'
    )
    expect(draft.metaLearning).toBe('Measure hit rates before tuning')
    expect(draft.confidenceScore).toBeCloseTo(0.72, 10)
    expect(draft.sourceLearnings).toEqual(['mem-c', 'mem-a', 'mem-b'])
  })

  it('falls back to the tasks when no source has a strategy', () => {
    const group = [
      stored({ id: 'mem-a', task: 'Rotate log files', confidenceScore: 0.9, tacticalLearning: 'Compress old logs' }),
      stored({ id: 'mem-b', task: 'Rotate audit logs', confidenceScore: 0.85, tacticalLearning: 'Keep seven days' }),
    ]

    const draft = buildPatternDraft(group, config)

    expect(draft.strategicLearning).toBe('Shared approach across 2 tasks (Rotate log files; Rotate audit logs)')
    expect(draft.tacticalLearning).toBe('Compress old logs')
    expect(draft.metaLearning).toBeNull()
  })
})

describe('generalizePatterns', () => {
  it('collapses three similar proven memories into one pattern', async () => {
    store = createMemoryStore({
      dbPath: ':memory:',
      embedder: createFakeEmbedder({ overrides }),
      clock: steppingClock(),
    })
    const sessions = await seed('Cache user sessions', 0.85, 6)
    const pages = await seed('Cache product pages', 0.85, 6)
    const results = await seed('Cache search results', 0.85, 6)
    const outlier = await seed('Rotate log files', 0.85, 6)

    const report = await generalizePatterns(store, config, NOW)

    expect(report).toMatchObject({ candidates: 4, groups: 1, archived: 3, errors: 0 })
    expect(report.patternIds).toHaveLength(1)
    const patternId = report.patternIds[0] ?? ''

    const pattern = store.getMemory(patternId)
    expect(pattern).toMatchObject({
      isGeneralization: true,
      lifecycleState: 'NEW',
      applicationCount: 0,
      // Sources tie on confidence, so the newest leads
      task: 'Cache search results',
      sourceLearnings: [results, pages, sessions],
      strategicLearning:
        'Shared approach across 3 tasks (Cache search results; Cache product pages; Cache user sessions)',
    })
    expect(pattern?.confidenceScore).toBeCloseTo(0.765, 10)
    expect(pattern?.antiPatterns?.redundancies).toEqual([
      'Re-fetch in Cache product pages',
      'Re-fetch in Cache search results',
      'Re-fetch in Cache user sessions',
    ])

    for (const id of [sessions, pages, results]) {
      expect(store.getMemory(id)).toMatchObject({
        lifecycleState: 'ARCHIVED',
        replacedBy: patternId,
        archivedAt: NOW.toISOString(),
      })
    }
    expect(store.getMemory(outlier)?.lifecycleState).toBe('VALIDATED')
  })

  it('ignores memories that are not yet proven', async () => {
    store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder({ overrides }), clock: steppingClock() })
    await seed('Cache user sessions', 0.85, 6)
    await seed('Cache product pages', 0.85, 4)
    await seed('Cache search results', 0.79, 6)

    const report = await generalizePatterns(store, config, NOW)

    expect(report).toMatchObject({ candidates: 1, groups: 0, patternIds: [] })
  })

  it('does nothing on a second run', async () => {
    store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder({ overrides }), clock: steppingClock() })
    await seed('Cache user sessions', 0.85, 6)
    await seed('Cache product pages', 0.85, 6)
    await seed('Cache search results', 0.85, 6)

    await generalizePatterns(store, config, NOW)
    const second = await generalizePatterns(store, config, NOW)

    expect(second.patternIds).toEqual([])
  })
})
