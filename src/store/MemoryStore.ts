/**
 * Vector memory store on SQLite
 *
 * Each memory carries two vectors: one for the task text, one for the task
 * plus its learnings. Search is an exact cosine scan over one of them.
 * Both embeddings are computed before the row is written, so a failed
 * embedding leaves no row behind.
 */

import Database from 'better-sqlite3'
import { lifecycleConfigSchema, type LifecycleConfig } from '../config/schema.js'
import type { Embedder } from '../backend/types.js'
import { toInvokeError } from '../backend/toInvokeError.js'
import { applyOutcome } from '../memory/lifecycleRules.js'
import {
  buildContentText,
  emptyStateCounts,
  isLifecycleState,
  type FailureSeverity,
  type LifecycleState,
  type Memory,
  type MemoryDraft,
  type ScoredMemory,
  type StoredMemory,
} from '../memory/types.js'
import { StorageError } from '../shared/error.js'
import { learningEventBus, type LearningEventBus } from '../shared/events/index.js'
import { generateId } from '../shared/generateId.js'
import { createLogger, logError } from '../shared/logger.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import { withTimeout } from '../shared/withTimeout.js'
import {
  CREATE_MEMORIES_TABLE,
  embeddingParams,
  memoryRowSchema,
  memoryToParams,
  rowToStoredMemory,
  withoutEmbeddings,
  type MemoryParams,
} from './memoryRow.js'
import { getMemoryDbPath } from './paths.js'
import { cosineSimilarity } from './vectorMath.js'

const logger = createLogger('memory-store')

export interface MemoryStoreOptions {
  /** SQLite file, or ':memory:'. Defaults to <dataDir>/memories.db */
  dbPath?: string
  embedder: Embedder
  embeddingTimeoutMs?: number
  lifecycle?: LifecycleConfig
  /** Where `memory:outcome` is announced. Defaults to learningEventBus */
  events?: LearningEventBus
  /** Injected for tests */
  clock?: () => Date
}

export interface ListOptions {
  states?: LifecycleState[]
  limit?: number
}

export interface SearchOptions {
  excludeStates?: LifecycleState[]
}

export interface OutcomeOptions {
  severity?: FailureSeverity
  reason?: string
}

export interface MemoryStore {
  /** Embed and insert a new memory, returning its id. Throws StorageError. */
  store(draft: MemoryDraft): Promise<string>
  /** Exact id lookup */
  getMemory(id: string): Memory | null
  /** Full id for a unique, non-empty id prefix; null when missing or ambiguous */
  resolveId(prefix: string): string | null
  /** Newest first */
  listMemories(options?: ListOptions): Memory[]
  listStoredMemories(options?: ListOptions): StoredMemory[]
  countByState(): Record<LifecycleState, number>
  searchByTask(query: string, limit: number, options?: SearchOptions): Promise<ScoredMemory[]>
  searchByContent(query: string, limit: number, options?: SearchOptions): Promise<ScoredMemory[]>
  /** Record a success or failure report. Unknown ids are a logged no-op. */
  updateOutcome(id: string, success: boolean, options?: OutcomeOptions): Memory | null
  /**
   * Atomic read-modify-write of one memory. `mutate` returns the new value,
   * or null to leave the row unchanged.
   */
  updateMemory(id: string, mutate: (memory: Memory) => Memory | null): Memory | null
  deleteMemory(id: string): boolean
  close(): void
}

type EmbeddingAxis = 'task' | 'content'

function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath)
    db.pragma('journal_mode = WAL')
    db.exec(CREATE_MEMORIES_TABLE)
    return db
  } catch (error: unknown) {
    throw new StorageError('STORE_INIT_FAILED', `Cannot open memory store at ${dbPath}: ${getErrorMessage(error)}`, error)
  }
}

export function createMemoryStore(options: MemoryStoreOptions): MemoryStore {
  const dbPath = options.dbPath ?? getMemoryDbPath()
  const db = openDatabase(dbPath)
  const embedder = options.embedder
  const embeddingTimeoutMs = options.embeddingTimeoutMs ?? 10_000
  const lifecycle = options.lifecycle ?? lifecycleConfigSchema.parse({})
  const clock = options.clock ?? (() => new Date())
  const events = options.events ?? learningEventBus

  logger.debug(`Memory store opened: ${dbPath}`)

  const selectAll = db.prepare<[], unknown>('SELECT * FROM memories ORDER BY timestamp DESC, rowid DESC')
  const selectById = db.prepare<[string], unknown>('SELECT * FROM memories WHERE id = ?')
  const selectIdsByPrefix = db.prepare<[string], { id: string }>(
    "SELECT id FROM memories WHERE id LIKE ? ESCAPE '\\' LIMIT 2"
  )
  const countStates = db.prepare<[], { lifecycle_state: string; count: number }>(
    'SELECT lifecycle_state, COUNT(*) AS count FROM memories GROUP BY lifecycle_state'
  )
  const deleteById = db.prepare<[string]>('DELETE FROM memories WHERE id = ?')

  const columns = Object.keys(memoryToParams(placeholderMemory()))
  const insertRow = db.prepare<[MemoryParams & ReturnType<typeof embeddingParams>]>(
    `INSERT INTO memories (${columns.join(', ')}, task_embedding, content_embedding)
     VALUES (${columns.map(c => `@${c}`).join(', ')}, @task_embedding, @content_embedding)`
  )
  const updateRow = db.prepare<[MemoryParams]>(
    `UPDATE memories SET ${columns
      .filter(c => c !== 'id')
      .map(c => `${c} = @${c}`)
      .join(', ')} WHERE id = @id`
  )

  function parseRow(row: unknown): StoredMemory | null {
    const parsed = memoryRowSchema.safeParse(row)
    if (!parsed.success) {
      logger.warn(`Skipping unreadable memory row: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
      return null
    }
    return rowToStoredMemory(parsed.data)
  }

  function readAll(): StoredMemory[] {
    return selectAll
      .all()
      .map(parseRow)
      .filter((memory): memory is StoredMemory => memory !== null)
  }

  function findStored(id: string): StoredMemory | null {
    const row = selectById.get(id)
    return row === undefined ? null : parseRow(row)
  }

  async function embed(text: string, label: string): Promise<number[]> {
    let result: Awaited<ReturnType<Embedder['embed']>>
    try {
      result = await withTimeout(embedder.embed(text, { timeoutMs: embeddingTimeoutMs }), embeddingTimeoutMs, label)
    } catch (error: unknown) {
      throw new StorageError('EMBEDDING_FAILED', `${label} failed: ${toInvokeError(error, label).message}`, error)
    }
    if (!result.ok) {
      throw new StorageError('EMBEDDING_FAILED', `${label} failed: ${result.error.message}`, result.error)
    }
    return result.value
  }

  async function search(
    axis: EmbeddingAxis,
    query: string,
    limit: number,
    searchOptions: SearchOptions = {}
  ): Promise<ScoredMemory[]> {
    const queryVector = await embed(query, 'Query embedding')
    const excluded = new Set(searchOptions.excludeStates ?? [])

    const scored: Array<{ memory: StoredMemory; similarity: number }> = []
    for (const memory of readAll()) {
      const vector = axis === 'task' ? memory.taskEmbedding : memory.contentEmbedding
      if (!vector || excluded.has(memory.lifecycleState)) continue
      scored.push({ memory, similarity: cosineSimilarity(queryVector, vector) })
    }

    scored.sort((a, b) => b.similarity - a.similarity || b.memory.timestamp.localeCompare(a.memory.timestamp))

    return scored.slice(0, Math.max(0, limit)).map(({ memory, similarity }) => ({
      ...withoutEmbeddings(memory),
      similarity,
    }))
  }

  const writeUpdate = db.transaction((id: string, mutate: (memory: Memory) => Memory | null): Memory | null => {
    const current = findStored(id)
    if (!current) return null
    const next = mutate(withoutEmbeddings(current))
    if (!next) return null
    updateRow.run(memoryToParams({ ...next, id: current.id }))
    return next
  })

  function filterList(memories: StoredMemory[], listOptions: ListOptions): StoredMemory[] {
    const states = listOptions.states ? new Set(listOptions.states) : null
    const filtered = states ? memories.filter(m => states.has(m.lifecycleState)) : memories
    return listOptions.limit !== undefined ? filtered.slice(0, listOptions.limit) : filtered
  }

  return {
    async store(draft: MemoryDraft): Promise<string> {
      const memory: Memory = {
        ...placeholderMemory(),
        id: generateId(),
        task: draft.task,
        context: draft.context,
        narrative: draft.narrative,
        tacticalLearning: draft.tacticalLearning,
        strategicLearning: draft.strategicLearning,
        metaLearning: draft.metaLearning,
        antiPatterns: draft.antiPatterns,
        executionMetadata: draft.executionMetadata,
        confidenceScore: draft.confidenceScore,
        baseConfidence: draft.confidenceScore,
        outcome: draft.outcome,
        timestamp: clock().toISOString(),
        isGeneralization: draft.isGeneralization ?? false,
        sourceLearnings: draft.sourceLearnings ?? [],
        threadId: draft.threadId ?? null,
      }

      // Independent calls; neither waits for the other
      const [taskEmbedding, contentEmbedding] = await Promise.all([
        embed(memory.task, 'Task embedding'),
        embed(buildContentText(memory), 'Content embedding'),
      ])

      try {
        insertRow.run({ ...memoryToParams(memory), ...embeddingParams(taskEmbedding, contentEmbedding) })
      } catch (error: unknown) {
        throw new StorageError('STORE_WRITE_FAILED', `Insert failed: ${getErrorMessage(error)}`, error)
      }

      logger.info(`Stored memory ${memory.id.slice(0, 8)} (confidence ${memory.confidenceScore.toFixed(2)})`)
      return memory.id
    },

    getMemory(id: string): Memory | null {
      const stored = findStored(id)
      return stored ? withoutEmbeddings(stored) : null
    },

    resolveId(prefix: string): string | null {
      const trimmed = prefix.trim()
      if (!trimmed) return null
      if (selectById.get(trimmed) !== undefined) return trimmed
      const matches = selectIdsByPrefix.all(`${escapeLike(trimmed)}%`)
      return matches.length === 1 ? (matches[0]?.id ?? null) : null
    },

    listMemories(listOptions: ListOptions = {}): Memory[] {
      return filterList(readAll(), listOptions).map(withoutEmbeddings)
    },

    listStoredMemories(listOptions: ListOptions = {}): StoredMemory[] {
      return filterList(readAll(), listOptions)
    },

    countByState(): Record<LifecycleState, number> {
      const counts = emptyStateCounts()
      for (const row of countStates.all()) {
        if (isLifecycleState(row.lifecycle_state)) counts[row.lifecycle_state] = row.count
      }
      return counts
    },

    searchByTask(query, limit, searchOptions) {
      return search('task', query, limit, searchOptions)
    },

    searchByContent(query, limit, searchOptions) {
      return search('content', query, limit, searchOptions)
    },

    updateOutcome(id: string, success: boolean, outcomeOptions: OutcomeOptions = {}): Memory | null {
      let updated: Memory | null
      try {
        updated = writeUpdate(id, memory =>
          applyOutcome(memory, { success, ...outcomeOptions }, clock(), lifecycle)
        )
      } catch (error: unknown) {
        logError(logger, 'Outcome update failed', ensureError(error), { memoryId: id })
        return null
      }

      if (!updated) {
        logger.warn(`Outcome for unknown memory ignored: ${id}`)
        return null
      }

      events.emit('memory:outcome', {
        memoryId: updated.id,
        success,
        state: updated.lifecycleState,
      })
      return updated
    },

    updateMemory(id: string, mutate: (memory: Memory) => Memory | null): Memory | null {
      return writeUpdate(id, mutate)
    },

    deleteMemory(id: string): boolean {
      return deleteById.run(id).changes > 0
    },

    close(): void {
      db.close()
    },
  }
}

/** Escape LIKE wildcards so user input only ever matches literally */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`)
}

/** Initial values for every column; the caller fills in the content */
function placeholderMemory(): Memory {
  return {
    id: '',
    task: '',
    context: '',
    narrative: '',
    tacticalLearning: null,
    strategicLearning: null,
    metaLearning: null,
    antiPatterns: null,
    executionMetadata: null,
    confidenceScore: 0,
    baseConfidence: 0,
    outcome: 'success',
    timestamp: '',
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
  }
}
