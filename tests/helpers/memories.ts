/**
 * Memory fixtures for tests
 */

import type { Memory } from '../../src/memory/types.js'

export const DAY_MS = 86_400_000

export const NOW = new Date('2025-06-01T12:00:00.000Z')

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * DAY_MS).toISOString()
}

/** One minute later on every call */
export function steppingClock(start = '2025-03-01T10:00:00.000Z'): () => Date {
  let tick = 0
  return () => new Date(Date.parse(start) + tick++ * 60_000)
}

export function makeMemory(overrides: Partial<Memory> = {}): Memory {
  return {
    id: 'mem-1',
    task: 'Build REST API',
    context: '',
    narrative: '',
    tacticalLearning: 'Validate input at the edge',
    strategicLearning: null,
    metaLearning: null,
    antiPatterns: null,
    executionMetadata: null,
    confidenceScore: 0.8,
    baseConfidence: 0.8,
    outcome: 'success',
    timestamp: daysAgo(10),
    lifecycleState: 'NEW',
    lastValidated: null,
    lastApplied: null,
    applicationCount: 0,
    successCount: 0,
    failureCount: 0,
    consecutiveFailures: 0,
    lastFailureReason: null,
    recentOutcomes: [],
    replacedBy: null,
    isGeneralization: false,
    sourceLearnings: [],
    archivedAt: null,
    threadId: null,
    ...overrides,
  }
}
