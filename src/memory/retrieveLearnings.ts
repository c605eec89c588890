/**
 * Retrieval for a new task: rank prior learnings by task similarity and
 * render the ones that clear the threshold as one injectable block.
 */

import type { RetrievalConfig } from '../config/schema.js'
import { formatMessageLine } from '../learning/buildNarrative.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import { isAppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import type { ConversationMessage } from '../types/conversation.js'
import { formatLearningsBlock } from './formatLearnings.js'
import type { ScoredMemory } from './types.js'

const logger = createLogger('retrieval')

export interface FetchForTaskOptions {
  /** Messages so far in the current thread, oldest first */
  history?: ConversationMessage[]
  historyWindow?: number
}

export interface RetrievedLearnings {
  /** Formatted block, empty when nothing qualifies */
  block: string
  learnings: ScoredMemory[]
}

/** The task alone, or the recent history followed by the task */
export function buildRetrievalQuery(taskText: string, history: ConversationMessage[], window: number): string {
  if (history.length === 0 || window <= 0) return taskText
  const recent = history.slice(-window).map(formatMessageLine)
  return [...recent, taskText].join('\n')
}

export async function fetchForTask(
  store: Pick<MemoryStore, 'searchByTask'>,
  taskText: string,
  config: RetrievalConfig,
  options: FetchForTaskOptions = {}
): Promise<RetrievedLearnings> {
  const query = buildRetrievalQuery(taskText, options.history ?? [], options.historyWindow ?? config.historyWindow)

  let ranked: ScoredMemory[]
  try {
    ranked = await store.searchByTask(query, config.limit, { excludeStates: ['FAILED', 'ARCHIVED'] })
  } catch (error: unknown) {
    if (!isAppError(error)) throw error
    logger.warn(`Retrieval skipped: ${error.message}`)
    return { block: '', learnings: [] }
  }

  const learnings = ranked.filter(memory => memory.similarity >= config.minSimilarity)
  logger.debug(`Retrieved ${learnings.length}/${ranked.length} learnings above ${config.minSimilarity}`)
  return { block: formatLearningsBlock(learnings), learnings }
}
