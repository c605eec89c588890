/**
 * Memory model
 *
 * A Memory is one extracted learning with its lifecycle bookkeeping.
 * A Pattern is a Memory distilled from several similar ones.
 */

import type { ExecutionPatterns, ParallelBatch } from '../analysis/types.js'
import type { AntiPatterns } from '../learning/learningSchema.js'

export type { AntiPatterns }

export const LIFECYCLE_STATES = ['NEW', 'VALIDATED', 'STABLE', 'DECLINING', 'ARCHIVED', 'FAILED'] as const

export type LifecycleState = (typeof LIFECYCLE_STATES)[number]

export function isLifecycleState(value: string): value is LifecycleState {
  return LIFECYCLE_STATES.some(state => state === value)
}

export function emptyStateCounts(): Record<LifecycleState, number> {
  return { NEW: 0, VALIDATED: 0, STABLE: 0, DECLINING: 0, ARCHIVED: 0, FAILED: 0 }
}

export const FAILURE_SEVERITIES = ['minor', 'major', 'critical'] as const

export type FailureSeverity = (typeof FAILURE_SEVERITIES)[number]

export function isFailureSeverity(value: string): value is FailureSeverity {
  return FAILURE_SEVERITIES.some(severity => severity === value)
}

export type MemoryOutcome = 'success' | 'failure'

export interface ExecutionMetadata {
  toolCounts: Record<string, number>
  efficiencyScore: number
  patterns: ExecutionPatterns | null
  parallelizationOpportunities: ParallelBatch[]
}

export interface Memory {
  id: string
  task: string
  /** Leading slice of the narrative */
  context: string
  narrative: string
  tacticalLearning: string | null
  strategicLearning: string | null
  metaLearning: string | null
  antiPatterns: AntiPatterns | null
  executionMetadata: ExecutionMetadata | null
  confidenceScore: number
  /** Confidence at the last success (or creation); decay starts from here */
  baseConfidence: number
  outcome: MemoryOutcome
  timestamp: string
  lifecycleState: LifecycleState
  lastValidated: string | null
  /** Time of the last outcome report of either kind */
  lastApplied: string | null
  applicationCount: number
  successCount: number
  failureCount: number
  consecutiveFailures: number
  lastFailureReason: string | null
  /** Most recent outcomes, oldest first, true for success */
  recentOutcomes: boolean[]
  replacedBy: string | null
  isGeneralization: boolean
  sourceLearnings: string[]
  archivedAt: string | null
  threadId: string | null
}

/** A Memory together with its two vectors */
export interface StoredMemory extends Memory {
  taskEmbedding: number[] | null
  contentEmbedding: number[] | null
}

export interface ScoredMemory extends Memory {
  similarity: number
}

/** What callers hand to the store; everything else starts at its initial value */
export interface MemoryDraft {
  task: string
  context: string
  narrative: string
  tacticalLearning: string | null
  strategicLearning: string | null
  metaLearning: string | null
  antiPatterns: AntiPatterns | null
  executionMetadata: ExecutionMetadata | null
  confidenceScore: number
  outcome: MemoryOutcome
  threadId?: string | null
  isGeneralization?: boolean
  sourceLearnings?: string[]
}

/** Text behind the content embedding: the task plus every learning dimension present */
export function buildContentText(memory: Pick<Memory, 'task' | 'tacticalLearning' | 'strategicLearning' | 'metaLearning'>): string {
  return [memory.task, memory.tacticalLearning, memory.strategicLearning, memory.metaLearning]
    .filter((part): part is string => Boolean(part))
    .join(' ')
}

/** Last time anyone relied on the memory */
export function lastUsedAt(memory: Pick<Memory, 'lastApplied' | 'lastValidated' | 'timestamp'>): string {
  return memory.lastApplied ?? memory.lastValidated ?? memory.timestamp
}
