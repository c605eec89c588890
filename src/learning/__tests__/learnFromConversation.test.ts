import { describe, it, expect, vi, afterEach } from 'vitest'
import { learnFromConversation, mergeAntiPatterns } from '../learnFromConversation.js'
import { analyzeExecution } from '../../analysis/analyzeExecution.js'
import { getDefaultConfig } from '../../config/loadConfig.js'
import { createMemoryStore, type MemoryStore } from '../../store/MemoryStore.js'
import { LearningEventBus } from '../../shared/events/index.js'
import { call, metadata, sampleTrace, traceOf } from '../../../tests/helpers/traces.js'
import { createFakeEmbedder } from '../../../tests/helpers/fakeEmbedder.js'
import {
  SAMPLE_LEARNING,
  createFakeExtractor,
  failWith,
  replyWith,
} from '../../../tests/helpers/fakeExtractor.js'

const config = getDefaultConfig()
let store: MemoryStore | null = null

function openStore(embedder = createFakeEmbedder()): MemoryStore {
  store = createMemoryStore({ dbPath: ':memory:', embedder })
  return store
}

afterEach(() => {
  store?.close()
  store = null
})

describe('learnFromConversation', () => {
  it('skips a conversation with no relevance signals without calling the extractor', async () => {
    const memories = openStore()
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))
    const trace = traceOf([], [
      { role: 'human', content: 'hello' },
      { role: 'assistant', content: 'hi' },
    ])

    const outcome = await learnFromConversation(trace, metadata(), { store: memories, extractor, config })

    expect(outcome).toEqual({ status: 'skipped', reason: 'no_signals' })
    expect(extractor.requests).toHaveLength(0)
    expect(memories.listMemories()).toEqual([])
  })

  it('never stores a learning the extractor declines to save', async () => {
    const memories = openStore()
    const storeSpy = vi.spyOn(memories, 'store')
    const extractor = createFakeExtractor(replyWith({ should_save: false, save_reason: 'Trivial change' }))

    const outcome = await learnFromConversation(sampleTrace(), metadata(), { store: memories, extractor, config })

    expect(outcome).toEqual({
      status: 'discarded',
      reason: 'Trivial change',
      signals: ['tool_usage', 'tool_messages', 'analysis_findings'],
    })
    expect(storeSpy).not.toHaveBeenCalled()
    expect(memories.listMemories()).toEqual([])
  })

  it('stores an extracted learning and announces it', async () => {
    const memories = openStore()
    const events = new LearningEventBus()
    const created = vi.fn()
    events.on('memory:created', created)
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))

    const outcome = await learnFromConversation(sampleTrace(), metadata({ threadId: 'thread-1' }), {
      store: memories,
      extractor,
      config,
      events,
    })

    expect(outcome.status).toBe('stored')
    const [memory] = memories.listMemories()
    expect(memory).toMatchObject({
      task: 'Add a health endpoint',
      tacticalLearning: 'Read the router before editing it',
      strategicLearning: 'Locate the entry point first, then change it in one edit',
      metaLearning: null,
      confidenceScore: 0.8,
      outcome: 'success',
      lifecycleState: 'NEW',
      threadId: 'thread-1',
      antiPatterns: {
        description: 'Editing without reading',
        redundancies: ['Re-reading the same file'],
        inefficiencies: ['List or search before reading files'],
      },
    })
    expect(memory?.executionMetadata?.efficiencyScore).toBe(0.85)
    expect(memory?.executionMetadata?.toolCounts).toEqual({ read_file: 1, edit_file: 1 })
    expect(created).toHaveBeenCalledTimes(1)
    expect(created).toHaveBeenCalledWith(expect.objectContaining({ threadId: 'thread-1' }))
  })

  it('prefers the task given in metadata', async () => {
    const memories = openStore()
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))

    await learnFromConversation(sampleTrace(), metadata({ task: 'Add health checks' }), {
      store: memories,
      extractor,
      config,
    })

    expect(memories.listMemories()[0]?.task).toBe('Add health checks')
  })

  it('reports an extraction failure and writes nothing', async () => {
    const memories = openStore()
    const extractor = createFakeExtractor(failWith({ type: 'timeout', message: 'too slow' }))

    const outcome = await learnFromConversation(sampleTrace(), metadata(), { store: memories, extractor, config })

    expect(outcome).toEqual({ status: 'failed', stage: 'extraction', message: 'too slow' })
    expect(memories.listMemories()).toEqual([])
  })

  it('contains an embedding failure', async () => {
    const memories = openStore(createFakeEmbedder({ failWhen: () => true }))
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))

    const outcome = await learnFromConversation(sampleTrace(), metadata(), { store: memories, extractor, config })

    expect(outcome).toMatchObject({ status: 'failed', stage: 'storage' })
    expect(outcome.status === 'failed' && outcome.message).toMatch(/embedding failed: embedding unavailable$/)
    expect(memories.listMemories()).toEqual([])
  })

  it('learns from a failed run with no tool calls', async () => {
    const memories = openStore()
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))
    const trace = traceOf([], [{ role: 'human', content: 'Deploy the service' }])

    const outcome = await learnFromConversation(trace, metadata({ outcome: 'failure' }), {
      store: memories,
      extractor,
      config,
    })

    expect(outcome).toMatchObject({ status: 'stored', signals: ['failure_outcome'] })
    expect(memories.listMemories()[0]?.outcome).toBe('failure')
  })
})

describe('mergeAntiPatterns', () => {
  it('merges analyzer findings with extracted lists, deduplicated and sorted', () => {
    const analysis = analyzeExecution(traceOf([call('read_file'), call('read_file')]))

    expect(
      mergeAntiPatterns(
        { description: ' Repeats ', redundancies: ['Batch read_file operations', 'Avoid polling'], inefficiencies: [] },
        analysis
      )
    ).toEqual({
      description: 'Repeats',
      redundancies: ['Avoid polling', 'Batch read_file operations'],
      inefficiencies: [],
    })
  })

  it('is null when there is nothing to report', () => {
    expect(mergeAntiPatterns(null, analyzeExecution(traceOf([])))).toBeNull()
  })
})
