import { describe, it, expect, afterEach } from 'vitest'
import { runConfidenceDecay, runTimeTransitions, updateEach } from '../lifecycleManager.js'
import { lifecycleConfigSchema } from '../../config/schema.js'
import { createMemoryStore, type MemoryStore } from '../../store/MemoryStore.js'
import type { Memory } from '../types.js'
import { createFakeEmbedder } from '../../../tests/helpers/fakeEmbedder.js'
import { NOW, daysAgo, makeMemory, steppingClock } from '../../../tests/helpers/memories.js'

const config = lifecycleConfigSchema.parse({})
let store: MemoryStore | null = null

function openStore(): MemoryStore {
  store = createMemoryStore({ dbPath: ':memory:', embedder: createFakeEmbedder(), clock: steppingClock() })
  return store
}

async function addMemory(memories: MemoryStore, confidenceScore = 0.8): Promise<string> {
  return memories.store({
    task: 'Build REST API',
    context: '',
    narrative: '',
    tacticalLearning: 'Validate input at the edge',
    strategicLearning: null,
    metaLearning: null,
    antiPatterns: null,
    executionMetadata: null,
    confidenceScore,
    outcome: 'success',
  })
}

afterEach(() => {
  store?.close()
  store = null
})

describe('runTimeTransitions', () => {
  it('moves a STABLE memory unused for 31 days to DECLINING', async () => {
    const memories = openStore()
    const id = await addMemory(memories)
    memories.updateMemory(id, memory => ({ ...memory, lifecycleState: 'STABLE', lastApplied: daysAgo(31) }))

    const report = runTimeTransitions(memories, config, NOW)

    expect(report).toEqual({ examined: 1, updated: 1, errors: 0, transitions: { DECLINING: 1 } })
    expect(memories.getMemory(id)?.lifecycleState).toBe('DECLINING')
  })

  it('archives stale FAILED memories and stamps them', async () => {
    const memories = openStore()
    const id = await addMemory(memories)
    memories.updateMemory(id, memory => ({ ...memory, lifecycleState: 'FAILED', lastApplied: daysAgo(10) }))

    runTimeTransitions(memories, config, NOW)

    expect(memories.getMemory(id)).toMatchObject({ lifecycleState: 'ARCHIVED', archivedAt: NOW.toISOString() })
  })
})

describe('runConfidenceDecay', () => {
  it('decays every live memory once per day', async () => {
    const memories = openStore()
    const id = await addMemory(memories, 0.8)
    // Stored at 2025-03-01T10:00Z; sixty days later
    const at = new Date('2025-04-30T10:00:00.000Z')

    expect(runConfidenceDecay(memories, config, at)).toEqual({ examined: 1, updated: 1, errors: 0 })
    expect(memories.getMemory(id)?.confidenceScore).toBe(0.4)
    expect(runConfidenceDecay(memories, config, at).updated).toBe(0)
  })
})

describe('updateEach', () => {
  it('logs a failing row and carries on with the batch', () => {
    const rows = [makeMemory({ id: 'broken' }), makeMemory({ id: 'fine' })]
    const fakeStore = {
      listMemories: () => rows,
      updateMemory(id: string, mutate: (memory: Memory) => Memory | null): Memory | null {
        if (id === 'broken') throw new Error('disk I/O error')
        const current = rows.find(row => row.id === id)
        return current ? mutate(current) : null
      },
    }

    const report = updateEach(fakeStore, 'test', memory => ({ ...memory, confidenceScore: 0.5 }))

    expect(report).toEqual({ examined: 2, updated: 1, errors: 1 })
  })
})
