/**
 * Weekly generalization: collapse groups of similar, proven memories
 * into one Pattern and archive the sources.
 */

import type { LifecycleConfig } from '../config/schema.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import { cosineSimilarity } from '../store/vectorMath.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import type { AntiPatterns, MemoryDraft, StoredMemory } from './types.js'

const logger = createLogger('generalize')

const LIVE_STATES = ['NEW', 'VALIDATED', 'STABLE', 'DECLINING'] as const

export interface GeneralizationReport {
  candidates: number
  groups: number
  patternIds: string[]
  archived: number
  errors: number
}

type GeneralizeStore = Pick<MemoryStore, 'listStoredMemories' | 'store' | 'updateMemory'>

function byConfidence(a: StoredMemory, b: StoredMemory): number {
  return b.confidenceScore - a.confidenceScore || b.timestamp.localeCompare(a.timestamp)
}

/**
 * Greedy complete-linkage grouping: a memory joins a group only when it is
 * similar enough to every member already in it.
 */
export function groupSimilar(memories: StoredMemory[], threshold: number): StoredMemory[][] {
  const ordered = [...memories].sort(byConfidence)
  const assigned = new Set<string>()
  const groups: StoredMemory[][] = []

  for (const seed of ordered) {
    if (assigned.has(seed.id) || !seed.contentEmbedding) continue
    const group = [seed]
    assigned.add(seed.id)

    for (const candidate of ordered) {
      const vector = candidate.contentEmbedding
      if (assigned.has(candidate.id) || !vector) continue
      const linked = group.every(member =>
        member.contentEmbedding ? cosineSimilarity(member.contentEmbedding, vector) >= threshold : false
      )
      if (linked) {
        group.push(candidate)
        assigned.add(candidate.id)
      }
    }
    groups.push(group)
  }
  return groups
}

function mergeAntiPatternLists(group: StoredMemory[]): AntiPatterns | null {
  const withAntiPatterns = group.flatMap(m => (m.antiPatterns ? [m.antiPatterns] : []))
  if (withAntiPatterns.length === 0) return null
  const union = (pick: (a: AntiPatterns) => string[]) => [...new Set(withAntiPatterns.flatMap(pick))].sort()
  return {
    description: withAntiPatterns.find(a => a.description)?.description ?? '',
    redundancies: union(a => a.redundancies),
    inefficiencies: union(a => a.inefficiencies),
  }
}

/** Distinct non-empty values in the order given */
function distinctTexts(values: Array<string | null>): string[] {
  const seen = new Set<string>()
  for (const value of values) {
    const text = value?.trim()
    if (text) seen.add(text)
  }
  return [...seen]
}

/** Tactical text shared by the most sources; ties go to the more confident source */
function commonTactic(ordered: StoredMemory[]): string | null {
  const counts = new Map<string, number>()
  for (const text of ordered.flatMap(m => distinctTexts([m.tacticalLearning]))) {
    counts.set(text, (counts.get(text) ?? 0) + 1)
  }
  let best: string | null = null
  let bestCount = 0
  for (const [text, count] of counts) {
    if (count > bestCount) {
      best = text
      bestCount = count
    }
  }
  return best
}

/** One statement of the approach the whole group shares */
function sharedStrategy(ordered: StoredMemory[]): string {
  const tasks = distinctTexts(ordered.map(m => m.task))
  const strategies = distinctTexts(ordered.map(m => m.strategicLearning))
  const head = `Shared approach across ${ordered.length} tasks (${tasks.join('; ')})`
  return strategies.length > 0 ? `${head}: ${strategies.join(' / ')}` : head
}

export function buildPatternDraft(group: StoredMemory[], config: LifecycleConfig): MemoryDraft {
  const ordered = [...group].sort(byConfidence)
  const minConfidence = Math.min(...group.map(m => m.confidenceScore))
  const summary = `Generalized from ${group.length} similar learnings: ${ordered.map(m => m.task).join('; ')}`
  const metaLearnings = distinctTexts(ordered.map(m => m.metaLearning))

  return {
    task: ordered[0]?.task ?? 'Generalized pattern',
    context: summary.slice(0, 500),
    narrative: summary,
    tacticalLearning: commonTactic(ordered),
    strategicLearning: sharedStrategy(ordered),
    metaLearning: metaLearnings[0] ?? null,
    antiPatterns: mergeAntiPatternLists(group),
    executionMetadata: null,
    confidenceScore: minConfidence * config.generalization.confidenceFactor,
    outcome: 'success',
    isGeneralization: true,
    sourceLearnings: group.map(m => m.id),
  }
}

export async function generalizePatterns(
  store: GeneralizeStore,
  config: LifecycleConfig,
  at: Date = new Date()
): Promise<GeneralizationReport> {
  const rules = config.generalization
  const candidates = store
    .listStoredMemories({ states: [...LIVE_STATES] })
    .filter(
      m =>
        !m.isGeneralization &&
        m.contentEmbedding !== null &&
        m.confidenceScore >= rules.minConfidence &&
        m.applicationCount >= rules.minApplications
    )

  const groups = groupSimilar(candidates, rules.similarity).filter(g => g.length >= rules.minGroupSize)
  const report: GeneralizationReport = {
    candidates: candidates.length,
    groups: groups.length,
    patternIds: [],
    archived: 0,
    errors: 0,
  }

  for (const group of groups) {
    let patternId: string
    try {
      patternId = await store.store(buildPatternDraft(group, config))
    } catch (error: unknown) {
      report.errors++
      logError(logger, 'Pattern not stored', ensureError(error), { job: 'weekly' })
      continue
    }
    report.patternIds.push(patternId)

    for (const source of group) {
      try {
        const archived = store.updateMemory(source.id, memory => ({
          ...memory,
          lifecycleState: 'ARCHIVED',
          replacedBy: patternId,
          archivedAt: at.toISOString(),
        }))
        if (archived) report.archived++
      } catch (error: unknown) {
        report.errors++
        logError(logger, 'Source not archived', ensureError(error), { memoryId: source.id, job: 'weekly' })
      }
    }
  }

  logger.info(`Generalization: ${report.patternIds.length} patterns from ${report.candidates} candidates`)
  return report
}
