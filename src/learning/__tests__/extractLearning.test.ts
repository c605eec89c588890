import { describe, it, expect } from 'vitest'
import { extractLearning } from '../extractLearning.js'
import { buildNarrative } from '../buildNarrative.js'
import { analyzeExecution } from '../../analysis/analyzeExecution.js'
import { sampleTrace } from '../../../tests/helpers/traces.js'
import {
  SAMPLE_LEARNING,
  createFakeExtractor,
  failWith,
  neverReply,
  replyWith,
} from '../../../tests/helpers/fakeExtractor.js'

const options = { timeoutMs: 1000, maxNarrativeChars: 12_000 }

describe('buildNarrative', () => {
  it('renders one role-tagged line per message', () => {
    expect(buildNarrative(sampleTrace())).toBe(
      [
        'Human: Add a health endpoint',
        'Assistant: Reading the router first.',
        'Tool(read_file): export const router = {}',
        'Assistant: Added GET /health.',
      ].join('\n')
    )
  })
})

describe('extractLearning', () => {
  it('sends the narrative and the analysis summary in one request', async () => {
    const trace = sampleTrace()
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))

    const result = await extractLearning(trace, analyzeExecution(trace), extractor, options)

    expect(extractor.requests).toHaveLength(1)
    const [request] = extractor.requests
    expect(request?.timeoutMs).toBe(1000)
    expect(request?.prompt).toContain('Human: Add a health endpoint')
    expect(request?.prompt).toContain('- Efficiency score: 0.85')
    expect(request?.prompt).toContain('- read_without_context: List or search before reading files')
    expect(request?.system).toContain('"tactical_learning"')
    expect(result.status).toBe('extracted')
    if (result.status === 'extracted') {
      expect(result.extraction.tacticalLearning).toBe('Read the router before editing it')
      expect(result.extraction.confidenceScore).toBe(0.8)
    }
  })

  it('reports a failed call without retrying', async () => {
    const trace = sampleTrace()
    const extractor = createFakeExtractor(failWith({ type: 'api', message: 'rate limited', status: 429 }))

    const result = await extractLearning(trace, analyzeExecution(trace), extractor, options)

    expect(extractor.requests).toHaveLength(1)
    expect(result).toMatchObject({ status: 'failed', error: { type: 'api', status: 429 } })
  })

  it('abandons a call that outlives its timeout', async () => {
    const trace = sampleTrace()
    const extractor = createFakeExtractor(neverReply)

    const result = await extractLearning(trace, analyzeExecution(trace), extractor, { ...options, timeoutMs: 20 })

    expect(result).toMatchObject({
      status: 'failed',
      error: { type: 'timeout', message: 'Learning extraction timed out after 20ms' },
    })
  })

  it('declines to save a reply with no learning content', async () => {
    const trace = sampleTrace()
    const extractor = createFakeExtractor(replyWith({ confidence_score: 0.9 }))

    const result = await extractLearning(trace, analyzeExecution(trace), extractor, options)

    expect(result).toMatchObject({
      status: 'extracted',
      extraction: { shouldSave: false, saveReason: 'No learning content' },
    })
  })

  it('caps the narrative sent to the model', async () => {
    const trace = sampleTrace()
    const extractor = createFakeExtractor(replyWith(SAMPLE_LEARNING))

    await extractLearning(trace, analyzeExecution(trace), extractor, { ...options, maxNarrativeChars: 20 })

    expect(extractor.requests[0]?.prompt).toContain('Human: Add a heal...')
    expect(extractor.requests[0]?.prompt).not.toContain('Added GET /health.')
  })
})
