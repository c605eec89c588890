/**
 * Lifecycle rules as pure functions of a memory and a point in time.
 *
 * NEW → VALIDATED → STABLE → DECLINING → ARCHIVED, and FAILED from anywhere.
 * Every call moves a memory at most one state. FAILED only leaves through
 * the cleanup step of the daily job.
 */

import type { LifecycleConfig } from '../config/schema.js'
import { daysSince, isOnDay } from '../shared/formatTime.js'
import { lastUsedAt, type FailureSeverity, type LifecycleState, type Memory } from './types.js'

export interface OutcomeReport {
  success: boolean
  severity?: FailureSeverity
  reason?: string
}

function penalize(value: number, factor: number, floor: number): number {
  // A failure never lifts a value that is already under the floor
  return Math.max(Math.min(floor, value), value * factor)
}

function pushRecent(recent: boolean[], success: boolean, window: number): boolean[] {
  return [...recent, success].slice(-window)
}

function stateAfterOutcome(memory: Memory, success: boolean, config: LifecycleConfig): LifecycleState {
  const state = memory.lifecycleState
  if (state === 'FAILED') return state
  if (memory.consecutiveFailures >= config.failedConsecutiveFailures) return 'FAILED'

  if (success) {
    if (
      state === 'NEW' &&
      memory.successCount >= config.validateMinSuccesses &&
      memory.confidenceScore > config.validateMinConfidence
    ) {
      return 'VALIDATED'
    }
    if (
      state === 'VALIDATED' &&
      memory.successCount >= config.stableMinSuccesses &&
      memory.confidenceScore > config.stableMinConfidence
    ) {
      return 'STABLE'
    }
    return state
  }

  const recentFailures = memory.recentOutcomes.filter(outcome => !outcome).length
  if (state === 'STABLE' && recentFailures >= config.decliningRecentFailures) return 'DECLINING'
  return state
}

/** Apply one success or failure report and the transition it triggers */
export function applyOutcome(memory: Memory, report: OutcomeReport, at: Date, config: LifecycleConfig): Memory {
  const stamp = at.toISOString()
  const counted: Memory = {
    ...memory,
    applicationCount: memory.applicationCount + 1,
    lastApplied: stamp,
    recentOutcomes: pushRecent(memory.recentOutcomes, report.success, config.recentOutcomeWindow),
  }

  let updated: Memory
  if (report.success) {
    const confidence = Math.min(1, memory.confidenceScore * config.successMultiplier)
    updated = {
      ...counted,
      confidenceScore: confidence,
      baseConfidence: confidence,
      successCount: memory.successCount + 1,
      consecutiveFailures: 0,
      lastValidated: stamp,
    }
  } else {
    const factor = config.failurePenalty[report.severity ?? 'major']
    updated = {
      ...counted,
      confidenceScore: penalize(memory.confidenceScore, factor, config.confidenceFloor),
      baseConfidence: penalize(memory.baseConfidence, factor, config.confidenceFloor),
      failureCount: memory.failureCount + 1,
      consecutiveFailures: memory.consecutiveFailures + 1,
      lastFailureReason: report.reason ?? memory.lastFailureReason,
    }
  }

  return { ...updated, lifecycleState: stateAfterOutcome(updated, report.success, config) }
}

/**
 * Exponential decay from the base confidence, halving every `halfLifeDays`,
 * never below the floor. Returns null when the memory is left as it is.
 */
export function applyDecay(memory: Memory, at: Date, config: LifecycleConfig): Memory | null {
  if (memory.lifecycleState === 'ARCHIVED' || memory.lifecycleState === 'FAILED') return null
  if (memory.lastValidated && isOnDay(memory.lastValidated, at)) return null

  const days = daysSince(memory.lastValidated ?? memory.timestamp, at)
  const decayed = Math.max(config.confidenceFloor, memory.baseConfidence * Math.pow(0.5, days / config.halfLifeDays))
  if (decayed === memory.confidenceScore) return null
  return { ...memory, confidenceScore: decayed }
}

/**
 * Transitions driven by time alone: idle STABLE and DECLINING memories move
 * down, and FAILED memories are archived once their last failure is old enough.
 */
export function applyTimeTransition(memory: Memory, at: Date, config: LifecycleConfig): Memory | null {
  const unusedDays = daysSince(lastUsedAt(memory), at)
  const archive = (): Memory => ({ ...memory, lifecycleState: 'ARCHIVED', archivedAt: at.toISOString() })

  switch (memory.lifecycleState) {
    case 'STABLE':
      return unusedDays >= config.stableUnusedDays ? { ...memory, lifecycleState: 'DECLINING' } : null
    case 'DECLINING':
      return unusedDays >= config.decliningUnusedDays ? archive() : null
    case 'FAILED':
      return unusedDays >= config.failedCleanupDays ? archive() : null
    case 'NEW':
    case 'VALIDATED':
    case 'ARCHIVED':
      return null
  }
}

/** Days since an archived memory was last touched, for retention pruning */
export function inactiveDays(memory: Memory, at: Date): number {
  const touched = [lastUsedAt(memory), memory.archivedAt].filter((t): t is string => t !== null)
  return Math.min(...touched.map(t => daysSince(t, at)))
}
