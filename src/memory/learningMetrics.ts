import type { MemoryStore } from '../store/MemoryStore.js'
import { daysSince } from '../shared/formatTime.js'
import { emptyStateCounts, type LifecycleState } from './types.js'

export interface LearningMetrics {
  stateCounts: Record<LifecycleState, number>
  total: number
  /** Share of memories that are VALIDATED or STABLE; 1 for an empty store */
  healthScore: number
  /** Live memories two failures away from FAILED or closer */
  atRisk: number
  newThisWeek: number
  averageConfidence: number
}

const AT_RISK_FAILURES = 2

export function getLearningMetrics(store: Pick<MemoryStore, 'listMemories'>, at: Date = new Date()): LearningMetrics {
  const memories = store.listMemories()
  const stateCounts = emptyStateCounts()
  let confidenceSum = 0
  let atRisk = 0
  let newThisWeek = 0

  for (const memory of memories) {
    stateCounts[memory.lifecycleState]++
    confidenceSum += memory.confidenceScore
    const live = memory.lifecycleState !== 'FAILED' && memory.lifecycleState !== 'ARCHIVED'
    if (live && memory.consecutiveFailures >= AT_RISK_FAILURES) atRisk++
    if (daysSince(memory.timestamp, at) < 7) newThisWeek++
  }

  const total = memories.length
  return {
    stateCounts,
    total,
    healthScore: total === 0 ? 1 : (stateCounts.VALIDATED + stateCounts.STABLE) / total,
    atRisk,
    newThisWeek,
    averageConfidence: total === 0 ? 0 : confidenceSum / total,
  }
}
