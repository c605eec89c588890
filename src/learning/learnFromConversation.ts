/**
 * One learning cycle for a finished conversation:
 * analyze → gate on relevance signals → extract → embed and store → notify.
 *
 * Never throws. Every miss is logged and reported as an outcome so the
 * agent loop that submitted the conversation is never affected.
 */

import { analyzeExecution, summarizeAnalysis } from '../analysis/analyzeExecution.js'
import type { ExecutionAnalysis } from '../analysis/types.js'
import type { StructuredExtractor } from '../backend/types.js'
import type { Config } from '../config/schema.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import type { AntiPatterns, ExecutionMetadata, MemoryDraft } from '../memory/types.js'
import { learningEventBus, type LearningEventBus } from '../shared/events/index.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import { isAppError } from '../shared/error.js'
import { createLogger, logError } from '../shared/logger.js'
import type { ConversationTrace, TraceMetadata } from '../types/conversation.js'
import { computeRelevanceSignals, type RelevanceSignal } from './computeRelevanceSignals.js'
import { extractLearning } from './extractLearning.js'
import type { LearningExtraction } from './learningSchema.js'

const logger = createLogger('learning')

const CONTEXT_CHARS = 500

export interface LearningDeps {
  store: Pick<MemoryStore, 'store' | 'getMemory'>
  extractor: StructuredExtractor
  config: Config
  events?: LearningEventBus
  signal?: AbortSignal
}

export type LearningOutcome =
  | { status: 'skipped'; reason: 'no_signals' }
  | { status: 'discarded'; reason: string; signals: RelevanceSignal[] }
  | { status: 'stored'; memoryId: string; signals: RelevanceSignal[] }
  | { status: 'failed'; stage: 'extraction' | 'storage'; message: string }

function describeTask(trace: ConversationTrace, metadata: TraceMetadata): string {
  const task = metadata.task?.trim() || trace.messages.find(m => m.role === 'human')?.content.trim()
  return task || 'Untitled task'
}

function mergeLists(...lists: string[][]): string[] {
  return [...new Set(lists.flat().map(item => item.trim()).filter(Boolean))].sort()
}

/** Analyzer findings plus whatever the extractor listed, deduplicated and sorted */
export function mergeAntiPatterns(extracted: AntiPatterns | null, analysis: ExecutionAnalysis): AntiPatterns | null {
  const redundancies = mergeLists(
    analysis.redundancies.map(r => r.suggestion),
    extracted?.redundancies ?? []
  )
  const inefficiencies = mergeLists(
    analysis.inefficiencies.map(i => i.suggestion),
    extracted?.inefficiencies ?? []
  )
  const description = extracted?.description.trim() ?? ''

  if (!description && redundancies.length === 0 && inefficiencies.length === 0) return null
  return { description, redundancies, inefficiencies }
}

function toExecutionMetadata(analysis: ExecutionAnalysis): ExecutionMetadata {
  return {
    toolCounts: analysis.toolCounts,
    efficiencyScore: analysis.efficiencyScore,
    patterns: analysis.executionPatterns,
    parallelizationOpportunities: analysis.parallelizationOpportunities,
  }
}

export function buildMemoryDraft(
  trace: ConversationTrace,
  metadata: TraceMetadata,
  analysis: ExecutionAnalysis,
  narrative: string,
  extraction: LearningExtraction
): MemoryDraft {
  return {
    task: describeTask(trace, metadata),
    context: narrative.slice(0, CONTEXT_CHARS),
    narrative,
    tacticalLearning: extraction.tacticalLearning,
    strategicLearning: extraction.strategicLearning,
    metaLearning: extraction.metaLearning,
    antiPatterns: mergeAntiPatterns(extraction.antiPatterns, analysis),
    executionMetadata: toExecutionMetadata(analysis),
    confidenceScore: extraction.confidenceScore,
    outcome: metadata.outcome,
    threadId: metadata.threadId ?? null,
  }
}

async function runCycle(
  trace: ConversationTrace,
  metadata: TraceMetadata,
  deps: LearningDeps
): Promise<LearningOutcome> {
  const { config } = deps
  const analysis = analyzeExecution(trace, config.analysis)
  const signals = computeRelevanceSignals(trace, metadata, analysis)

  if (signals.length === 0) {
    logger.debug('No relevance signals, conversation skipped')
    return { status: 'skipped', reason: 'no_signals' }
  }
  logger.debug(`Signals: ${signals.join(', ')} | ${summarizeAnalysis(analysis)}`)

  const extracted = await extractLearning(trace, analysis, deps.extractor, {
    timeoutMs: config.extraction.timeoutMs,
    maxNarrativeChars: config.extraction.maxNarrativeChars,
    signal: deps.signal,
  })
  if (extracted.status === 'failed') {
    return { status: 'failed', stage: 'extraction', message: extracted.error.message }
  }

  const { extraction, narrative } = extracted
  if (!extraction.shouldSave) {
    const reason = extraction.saveReason ?? 'Nothing worth saving'
    logger.info(`Learning discarded: ${reason}`)
    return { status: 'discarded', reason, signals }
  }

  const draft = buildMemoryDraft(trace, metadata, analysis, narrative, extraction)
  let memoryId: string
  try {
    memoryId = await deps.store.store(draft)
  } catch (error: unknown) {
    if (!isAppError(error)) throw error
    logError(logger, 'Learning not stored', error, { threadId: metadata.threadId })
    return { status: 'failed', stage: 'storage', message: error.message }
  }

  const memory = deps.store.getMemory(memoryId)
  const events = deps.events ?? learningEventBus
  if (memory) {
    events.emit('memory:created', { memory, threadId: metadata.threadId })
  }
  return { status: 'stored', memoryId, signals }
}

export async function learnFromConversation(
  trace: ConversationTrace,
  metadata: TraceMetadata,
  deps: LearningDeps
): Promise<LearningOutcome> {
  try {
    return await runCycle(trace, metadata, deps)
  } catch (error: unknown) {
    logError(logger, 'Learning cycle failed', ensureError(error), { threadId: metadata.threadId })
    return { status: 'failed', stage: 'storage', message: getErrorMessage(error) }
  }
}
