/**
 * Monthly pruning:
 * 1. delete ARCHIVED memories past the retention period
 * 2. merge near-duplicates, keeping the most proven one
 * 3. archive old memories that never earned their keep
 */

import type { LifecycleConfig } from '../config/schema.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import { cosineSimilarity } from '../store/vectorMath.js'
import { ensureError } from '../shared/assertError.js'
import { daysSince } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'
import { inactiveDays } from './lifecycleRules.js'
import type { StoredMemory } from './types.js'

const logger = createLogger('prune')

export interface PruneReport {
  deleted: number
  merged: number
  archivedLowValue: number
  errors: number
}

type PruneStore = Pick<MemoryStore, 'listStoredMemories' | 'updateMemory' | 'deleteMemory'>

function value(memory: StoredMemory): number {
  return memory.confidenceScore * memory.applicationCount
}

/** Keeper first: highest confidence × applications, then confidence, then newest */
function byValue(a: StoredMemory, b: StoredMemory): number {
  return (
    value(b) - value(a) ||
    b.confidenceScore - a.confidenceScore ||
    b.timestamp.localeCompare(a.timestamp)
  )
}

/** Groups of memories whose content is near-identical to the group's keeper */
export function findDuplicateGroups(memories: StoredMemory[], threshold: number): StoredMemory[][] {
  const ordered = memories.filter(m => m.contentEmbedding !== null).sort(byValue)
  const taken = new Set<string>()
  const groups: StoredMemory[][] = []

  for (const keeper of ordered) {
    const keeperVector = keeper.contentEmbedding
    if (taken.has(keeper.id) || !keeperVector) continue
    taken.add(keeper.id)
    const group = [keeper]
    for (const other of ordered) {
      if (taken.has(other.id) || !other.contentEmbedding) continue
      if (cosineSimilarity(keeperVector, other.contentEmbedding) >= threshold) {
        group.push(other)
        taken.add(other.id)
      }
    }
    if (group.length > 1) groups.push(group)
  }
  return groups
}

export function pruneMemories(store: PruneStore, config: LifecycleConfig, at: Date = new Date()): PruneReport {
  const report: PruneReport = { deleted: 0, merged: 0, archivedLowValue: 0, errors: 0 }
  const stamp = at.toISOString()

  const guard = (memoryId: string, action: () => void) => {
    try {
      action()
    } catch (error: unknown) {
      report.errors++
      logError(logger, 'Pruning failed for one memory', ensureError(error), { memoryId, job: 'monthly' })
    }
  }

  for (const memory of store.listStoredMemories({ states: ['ARCHIVED'] })) {
    if (inactiveDays(memory, at) < config.archiveRetentionDays) continue
    guard(memory.id, () => {
      if (store.deleteMemory(memory.id)) report.deleted++
    })
  }

  const live = store.listStoredMemories({ states: ['NEW', 'VALIDATED', 'STABLE', 'DECLINING'] })
  for (const [keeper, ...duplicates] of findDuplicateGroups(live, config.pruning.duplicateSimilarity)) {
    if (!keeper) continue
    const absorbed = duplicates.reduce((sum, d) => sum + d.applicationCount, 0)
    guard(keeper.id, () => {
      store.updateMemory(keeper.id, memory => ({ ...memory, applicationCount: memory.applicationCount + absorbed }))
    })
    for (const duplicate of duplicates) {
      guard(duplicate.id, () => {
        const archived = store.updateMemory(duplicate.id, memory => ({
          ...memory,
          lifecycleState: 'ARCHIVED',
          replacedBy: keeper.id,
          archivedAt: stamp,
        }))
        if (archived) report.merged++
      })
    }
  }

  const rules = config.pruning
  for (const memory of store.listStoredMemories({ states: ['NEW', 'VALIDATED', 'STABLE', 'DECLINING'] })) {
    const lowValue =
      memory.confidenceScore < rules.lowConfidence &&
      memory.applicationCount < rules.lowApplications &&
      daysSince(memory.timestamp, at) >= rules.lowValueAgeDays
    if (!lowValue) continue
    guard(memory.id, () => {
      const archived = store.updateMemory(memory.id, current => ({
        ...current,
        lifecycleState: 'ARCHIVED',
        archivedAt: stamp,
      }))
      if (archived) report.archivedLowValue++
    })
  }

  logger.info(
    `Pruning: ${report.deleted} deleted, ${report.merged} merged, ${report.archivedLowValue} archived as low value`
  )
  return report
}
