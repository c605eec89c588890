import { describe, it, expect, afterEach } from 'vitest'
import { pruneMemories } from '../pruneMemories.js'
import { lifecycleConfigSchema } from '../../config/schema.js'
import { createMemoryStore, type MemoryStore } from '../../store/MemoryStore.js'
import type { Memory } from '../types.js'
import { DEFAULT_VOCABULARY, createFakeEmbedder, mixedVector } from '../../../tests/helpers/fakeEmbedder.js'
import { NOW, daysAgo, steppingClock } from '../../../tests/helpers/memories.js'

const config = lifecycleConfigSchema.parse({})
const DIMS = DEFAULT_VOCABULARY.length

const overrides: Record<string, number[]> = {
  'Paginate list endpoints': mixedVector(DIMS, 0, 1, 0.5),
  'Paginate list endpoints again': mixedVector(DIMS, 0, 1, 0.5),
  'Rename variables': mixedVector(DIMS, 2, 3, 0.5),
  'Old archived tip': mixedVector(DIMS, 4, 5, 0.5),
  'Recently archived tip': mixedVector(DIMS, 6, 7, 0.5),
}

let store: MemoryStore | null = null

afterEach(() => {
  store?.close()
  store = null
})

async function seed(memories: MemoryStore, task: string, patch: Partial<Memory>): Promise<string> {
  const id = await memories.store({
    task,
    context: '',
    narrative: '',
    tacticalLearning: null,
    strategicLearning: null,
    metaLearning: null,
    antiPatterns: null,
    executionMetadata: null,
    confidenceScore: 0.8,
    outcome: 'success',
  })
  memories.updateMemory(id, memory => ({ ...memory, timestamp: daysAgo(20), ...patch }))
  return id
}

describe('pruneMemories', () => {
  it('deletes only archived memories past the retention period', async () => {
    store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder({ overrides }), clock: steppingClock() })
    const old = await seed(store, 'Old archived tip', {
      lifecycleState: 'ARCHIVED',
      timestamp: daysAgo(400),
      lastApplied: daysAgo(300),
      archivedAt: daysAgo(200),
    })
    const recent = await seed(store, 'Recently archived tip', {
      lifecycleState: 'ARCHIVED',
      timestamp: daysAgo(400),
      archivedAt: daysAgo(100),
    })

    const report = pruneMemories(store, config, NOW)

    expect(report.deleted).toBe(1)
    expect(store.getMemory(old)).toBeNull()
    expect(store.getMemory(recent)).not.toBeNull()
  })

  it('merges near-duplicates into the most proven copy', async () => {
    store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder({ overrides }), clock: steppingClock() })
    const weaker = await seed(store, 'Paginate list endpoints again', { confidenceScore: 0.8, applicationCount: 2 })
    const keeper = await seed(store, 'Paginate list endpoints', { confidenceScore: 0.9, applicationCount: 4 })

    const report = pruneMemories(store, config, NOW)

    expect(report.merged).toBe(1)
    expect(store.getMemory(keeper)).toMatchObject({ lifecycleState: 'NEW', applicationCount: 6 })
    expect(store.getMemory(weaker)).toMatchObject({
      lifecycleState: 'ARCHIVED',
      replacedBy: keeper,
      archivedAt: NOW.toISOString(),
    })
  })

  it('archives old memories with low confidence and little use', async () => {
    store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder({ overrides }), clock: steppingClock() })
    const stale = await seed(store, 'Rename variables', {
      confidenceScore: 0.4,
      applicationCount: 1,
      timestamp: daysAgo(61),
    })
    const young = await seed(store, 'Paginate list endpoints', {
      confidenceScore: 0.4,
      applicationCount: 0,
      timestamp: daysAgo(30),
    })

    const report = pruneMemories(store, config, NOW)

    expect(report).toEqual({ deleted: 0, merged: 0, archivedLowValue: 1, errors: 0 })
    expect(store.getMemory(stale)?.lifecycleState).toBe('ARCHIVED')
    expect(store.getMemory(young)?.lifecycleState).toBe('NEW')
  })
})
