/**
 * Composition root for embedding hindsight in an agent.
 *
 * Wires the store, the extraction backend and the per-thread scheduler
 * from one config. The agent loop only calls `submit` after a task and
 * `fetchForTask` before one; both are safe to call from the hot path.
 */

import { createEmbedderFromConfig, createExtractorFromConfig } from '../backend/index.js'
import type { Embedder, StructuredExtractor } from '../backend/types.js'
import type { Config } from '../config/schema.js'
import { learnFromConversation, type LearningOutcome } from '../learning/learnFromConversation.js'
import { getLearningMetrics, type LearningMetrics } from '../memory/learningMetrics.js'
import { fetchForTask, type FetchForTaskOptions, type RetrievedLearnings } from '../memory/retrieveLearnings.js'
import type { Memory } from '../memory/types.js'
import { runMaintenanceJob, type MaintenanceJob, type MaintenanceReport } from '../scheduler/maintenanceJobs.js'
import { LearningScheduler } from '../scheduler/learningScheduler.js'
import { createMemoryStore, type MemoryStore, type OutcomeOptions } from '../store/MemoryStore.js'
import { learningEventBus, type LearningEventBus } from '../shared/events/learningEvents.js'
import type { ConversationTrace, TraceMetadata } from '../types/conversation.js'

export interface HindsightOptions {
  config: Config
  /** Defaults to <dataDir>/memories.db */
  dbPath?: string
  extractor?: StructuredExtractor
  embedder?: Embedder
  events?: LearningEventBus
  clock?: () => Date
}

export interface Hindsight {
  readonly store: MemoryStore
  /** Queue a finished conversation for background learning */
  submit(trace: ConversationTrace, metadata: TraceMetadata): void
  /** Run one learning cycle now, bypassing the debounce */
  learnNow(trace: ConversationTrace, metadata: TraceMetadata): Promise<LearningOutcome>
  fetchForTask(taskText: string, options?: FetchForTaskOptions): Promise<RetrievedLearnings>
  reportOutcome(memoryId: string, success: boolean, options?: OutcomeOptions): Memory | null
  metrics(): LearningMetrics
  runMaintenance(job: MaintenanceJob): Promise<MaintenanceReport>
  /** Wait for queued and in-flight learning */
  drain(): Promise<void>
  /** Finish in-flight learning, drop queued work and close the store */
  close(): Promise<void>
}

export function createHindsight(options: HindsightOptions): Hindsight {
  const { config } = options
  const events = options.events ?? learningEventBus
  const clock = options.clock ?? (() => new Date())
  const extractor = options.extractor ?? createExtractorFromConfig(config)

  const store = createMemoryStore({
    dbPath: options.dbPath,
    embedder: options.embedder ?? createEmbedderFromConfig(config),
    embeddingTimeoutMs: config.embedding.timeoutMs,
    lifecycle: config.lifecycle,
    events,
    clock,
  })

  const learn = (trace: ConversationTrace, metadata: TraceMetadata): Promise<LearningOutcome> =>
    learnFromConversation(trace, metadata, { store, extractor, config, events })

  const scheduler = new LearningScheduler({ debounceMs: config.scheduler.debounceMs, run: learn })

  return {
    store,
    submit: (trace, metadata) => scheduler.submit(trace, metadata),
    learnNow: learn,
    fetchForTask: (taskText, fetchOptions) => fetchForTask(store, taskText, config.retrieval, fetchOptions),
    reportOutcome: (memoryId, success, outcomeOptions) => store.updateOutcome(memoryId, success, outcomeOptions),
    metrics: () => getLearningMetrics(store, clock()),
    runMaintenance: job => runMaintenanceJob(job, { store, config, events, clock }),
    drain: () => scheduler.drain(),
    async close() {
      await scheduler.stop()
      store.close()
    },
  }
}
