/**
 * Lifecycle jobs over the whole store.
 *
 * Each memory is updated in its own transaction. A row that fails is
 * logged and skipped; the rest of the batch still runs. Running a job
 * twice on the same day changes nothing the second time.
 */

import type { LifecycleConfig } from '../config/schema.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import { applyDecay, applyTimeTransition } from './lifecycleRules.js'
import type { LifecycleState, Memory } from './types.js'

const logger = createLogger('lifecycle')

export interface BatchReport {
  examined: number
  updated: number
  errors: number
}

export interface TransitionReport extends BatchReport {
  /** Count of memories moved into each state */
  transitions: Partial<Record<LifecycleState, number>>
}

type LifecycleStore = Pick<MemoryStore, 'listMemories' | 'updateMemory'>

/**
 * Run `step` over every memory, one transaction per row.
 * `onUpdate` sees the before and after of each changed row.
 */
export function updateEach(
  store: LifecycleStore,
  job: string,
  step: (memory: Memory) => Memory | null,
  onUpdate?: (before: Memory, after: Memory) => void
): BatchReport {
  const report: BatchReport = { examined: 0, updated: 0, errors: 0 }

  for (const memory of store.listMemories()) {
    report.examined++
    try {
      const updated = store.updateMemory(memory.id, current => step(current))
      if (updated) {
        report.updated++
        onUpdate?.(memory, updated)
      }
    } catch (error: unknown) {
      report.errors++
      logError(logger, `${job} failed for one memory`, ensureError(error), { memoryId: memory.id, job })
    }
  }
  return report
}

export function runConfidenceDecay(store: LifecycleStore, config: LifecycleConfig, at: Date = new Date()): BatchReport {
  const report = updateEach(store, 'decay', memory => applyDecay(memory, at, config))
  logger.info(`Decay: ${report.updated}/${report.examined} memories adjusted`)
  return report
}

/** Idle demotion, idle archiving and cleanup of old FAILED memories */
export function runTimeTransitions(
  store: LifecycleStore,
  config: LifecycleConfig,
  at: Date = new Date()
): TransitionReport {
  const transitions: Partial<Record<LifecycleState, number>> = {}
  const report = updateEach(
    store,
    'transitions',
    memory => applyTimeTransition(memory, at, config),
    (before, after) => {
      if (before.lifecycleState !== after.lifecycleState) {
        transitions[after.lifecycleState] = (transitions[after.lifecycleState] ?? 0) + 1
      }
    }
  )
  logger.info(`Transitions: ${report.updated} memories moved`)
  return { ...report, transitions }
}
