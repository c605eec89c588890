import { describe, it, expect } from 'vitest'
import { getLearningMetrics } from '../learningMetrics.js'
import { NOW, daysAgo, makeMemory } from '../../../tests/helpers/memories.js'
import type { Memory } from '../types.js'

function storeOf(memories: Memory[]) {
  return { listMemories: () => memories }
}

describe('getLearningMetrics', () => {
  it('reports a healthy empty store', () => {
    expect(getLearningMetrics(storeOf([]), NOW)).toEqual({
      stateCounts: { NEW: 0, VALIDATED: 0, STABLE: 0, DECLINING: 0, ARCHIVED: 0, FAILED: 0 },
      total: 0,
      healthScore: 1,
      atRisk: 0,
      newThisWeek: 0,
      averageConfidence: 0,
    })
  })

  it('summarizes states, risk and recency', () => {
    const metrics = getLearningMetrics(
      storeOf([
        makeMemory({ lifecycleState: 'VALIDATED', confidenceScore: 0.8, timestamp: daysAgo(2) }),
        makeMemory({ lifecycleState: 'STABLE', confidenceScore: 1, timestamp: daysAgo(30) }),
        makeMemory({ lifecycleState: 'NEW', consecutiveFailures: 2, confidenceScore: 0.4, timestamp: daysAgo(1) }),
        makeMemory({ lifecycleState: 'FAILED', consecutiveFailures: 3, confidenceScore: 0.2, timestamp: daysAgo(40) }),
      ]),
      NOW
    )

    expect(metrics.stateCounts).toEqual({ NEW: 1, VALIDATED: 1, STABLE: 1, DECLINING: 0, ARCHIVED: 0, FAILED: 1 })
    expect(metrics.total).toBe(4)
    expect(metrics.healthScore).toBe(0.5)
    expect(metrics.atRisk).toBe(1)
    expect(metrics.newThisWeek).toBe(2)
    expect(metrics.averageConfidence).toBeCloseTo(0.6, 10)
  })
})
