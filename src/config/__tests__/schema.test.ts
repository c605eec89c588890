/**
 * Config schema validation tests
 */

import { describe, it, expect } from 'vitest'
import { configSchema, lifecycleConfigSchema } from '../schema.js'

describe('configSchema', () => {
  it('fills every section from an empty object', () => {
    const config = configSchema.parse({})
    expect(config.retrieval).toEqual({ limit: 3, minSimilarity: 0.5, historyWindow: 10 })
    expect(config.extraction.timeoutMs).toBe(30_000)
    expect(config.embedding.timeoutMs).toBe(10_000)
    expect(config.embedding.dimensions).toBe(1536)
    expect(config.scheduler.debounceMs).toBe(30_000)
    expect(config.analysis.maxRepeatedChecks).toBe(3)
    expect(config.maintenance.daily).toBe('0 2 * * *')
  })

  it('keeps lifecycle defaults for nested groups', () => {
    const lifecycle = lifecycleConfigSchema.parse({ halfLifeDays: 30 })
    expect(lifecycle.halfLifeDays).toBe(30)
    expect(lifecycle.confidenceFloor).toBe(0.3)
    expect(lifecycle.failurePenalty).toEqual({ minor: 0.9, major: 0.7, critical: 0.4 })
    expect(lifecycle.generalization.similarity).toBe(0.85)
    expect(lifecycle.pruning.duplicateSimilarity).toBe(0.95)
  })

  it('rejects wrong value types', () => {
    const result = configSchema.safeParse({ retrieval: { limit: 'three' } })
    expect(result.success).toBe(false)
  })

  it('rejects a fractional retrieval limit', () => {
    const result = configSchema.safeParse({ retrieval: { limit: 2.5 } })
    expect(result.success).toBe(false)
  })
})
