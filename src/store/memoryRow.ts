/**
 * Row ↔ Memory mapping for the `memories` table.
 *
 * Rows are validated on the way out; JSON columns fall back to an empty
 * value when they do not parse.
 */

import { z } from 'zod'
import { antiPatternsSchema } from '../learning/learningSchema.js'
import { LIFECYCLE_STATES, type Memory, type StoredMemory } from '../memory/types.js'
import { blobToVector, vectorToBlob } from './vectorMath.js'

export const CREATE_MEMORIES_TABLE = `
  CREATE TABLE IF NOT EXISTS memories (
    id TEXT PRIMARY KEY,
    task TEXT NOT NULL,
    context TEXT NOT NULL DEFAULT '',
    narrative TEXT NOT NULL DEFAULT '',
    tactical_learning TEXT,
    strategic_learning TEXT,
    meta_learning TEXT,
    anti_patterns TEXT,
    execution_metadata TEXT,
    confidence_score REAL NOT NULL,
    base_confidence REAL NOT NULL,
    outcome TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    task_embedding BLOB,
    content_embedding BLOB,
    lifecycle_state TEXT NOT NULL DEFAULT 'NEW',
    last_validated TEXT,
    last_applied TEXT,
    application_count INTEGER NOT NULL DEFAULT 0,
    success_count INTEGER NOT NULL DEFAULT 0,
    failure_count INTEGER NOT NULL DEFAULT 0,
    consecutive_failures INTEGER NOT NULL DEFAULT 0,
    last_failure_reason TEXT,
    recent_outcomes TEXT NOT NULL DEFAULT '[]',
    replaced_by TEXT,
    is_generalization INTEGER NOT NULL DEFAULT 0,
    source_learnings TEXT NOT NULL DEFAULT '[]',
    archived_at TEXT,
    thread_id TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_memories_state ON memories(lifecycle_state);
  CREATE INDEX IF NOT EXISTS idx_memories_timestamp ON memories(timestamp);
`

const executionPatternsSchema = z.object({
  startsWithPlan: z.boolean(),
  usesTodos: z.boolean(),
  delegatesToSubagent: z.boolean(),
  usesSandbox: z.boolean(),
  dominantTool: z.string().nullable(),
  toolDiversity: z.number(),
  workflowPattern: z.enum([
    'plan_delegate',
    'delegate_heavy',
    'plan_sandbox',
    'plan_execute',
    'sandbox_driven',
    'exploratory',
    'ad_hoc',
  ]),
})

const executionMetadataSchema = z.object({
  toolCounts: z.record(z.number()),
  efficiencyScore: z.number(),
  patterns: executionPatternsSchema.nullable(),
  parallelizationOpportunities: z.array(
    z.object({ positions: z.array(z.number()), tools: z.array(z.string()), suggestion: z.string() })
  ),
})

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function jsonColumn<T extends z.ZodTypeAny>(schema: T, fallback: z.infer<T>) {
  return z
    .string()
    .nullable()
    .transform((text): z.infer<T> => {
      if (!text) return fallback
      const parsed = schema.safeParse(parseJson(text))
      return parsed.success ? parsed.data : fallback
    })
}

const blobColumn = z
  .instanceof(Buffer)
  .nullable()
  .transform(blob => (blob ? blobToVector(blob) : null))

export const memoryRowSchema = z.object({
  id: z.string(),
  task: z.string(),
  context: z.string(),
  narrative: z.string(),
  tactical_learning: z.string().nullable(),
  strategic_learning: z.string().nullable(),
  meta_learning: z.string().nullable(),
  anti_patterns: jsonColumn(antiPatternsSchema.nullable(), null),
  execution_metadata: jsonColumn(executionMetadataSchema.nullable(), null),
  confidence_score: z.number(),
  base_confidence: z.number(),
  outcome: z.enum(['success', 'failure']),
  timestamp: z.string(),
  task_embedding: blobColumn,
  content_embedding: blobColumn,
  lifecycle_state: z.enum(LIFECYCLE_STATES),
  last_validated: z.string().nullable(),
  last_applied: z.string().nullable(),
  application_count: z.number().int(),
  success_count: z.number().int(),
  failure_count: z.number().int(),
  consecutive_failures: z.number().int(),
  last_failure_reason: z.string().nullable(),
  recent_outcomes: jsonColumn(z.array(z.boolean()), []),
  replaced_by: z.string().nullable(),
  is_generalization: z.number().transform(value => value === 1),
  source_learnings: jsonColumn(z.array(z.string()), []),
  archived_at: z.string().nullable(),
  thread_id: z.string().nullable(),
})

export type MemoryRow = z.infer<typeof memoryRowSchema>

export function rowToStoredMemory(row: MemoryRow): StoredMemory {
  return {
    id: row.id,
    task: row.task,
    context: row.context,
    narrative: row.narrative,
    tacticalLearning: row.tactical_learning,
    strategicLearning: row.strategic_learning,
    metaLearning: row.meta_learning,
    antiPatterns: row.anti_patterns,
    executionMetadata: row.execution_metadata,
    confidenceScore: row.confidence_score,
    baseConfidence: row.base_confidence,
    outcome: row.outcome,
    timestamp: row.timestamp,
    lifecycleState: row.lifecycle_state,
    lastValidated: row.last_validated,
    lastApplied: row.last_applied,
    applicationCount: row.application_count,
    successCount: row.success_count,
    failureCount: row.failure_count,
    consecutiveFailures: row.consecutive_failures,
    lastFailureReason: row.last_failure_reason,
    recentOutcomes: row.recent_outcomes,
    replacedBy: row.replaced_by,
    isGeneralization: row.is_generalization,
    sourceLearnings: row.source_learnings,
    archivedAt: row.archived_at,
    threadId: row.thread_id,
    taskEmbedding: row.task_embedding,
    contentEmbedding: row.content_embedding,
  }
}

export function withoutEmbeddings(stored: StoredMemory): Memory {
  const { taskEmbedding: _task, contentEmbedding: _content, ...memory } = stored
  return memory
}

/** Named parameters for every column that changes after insert */
export function memoryToParams(memory: Memory) {
  return {
    id: memory.id,
    task: memory.task,
    context: memory.context,
    narrative: memory.narrative,
    tactical_learning: memory.tacticalLearning,
    strategic_learning: memory.strategicLearning,
    meta_learning: memory.metaLearning,
    anti_patterns: memory.antiPatterns ? JSON.stringify(memory.antiPatterns) : null,
    execution_metadata: memory.executionMetadata ? JSON.stringify(memory.executionMetadata) : null,
    confidence_score: memory.confidenceScore,
    base_confidence: memory.baseConfidence,
    outcome: memory.outcome,
    timestamp: memory.timestamp,
    lifecycle_state: memory.lifecycleState,
    last_validated: memory.lastValidated,
    last_applied: memory.lastApplied,
    application_count: memory.applicationCount,
    success_count: memory.successCount,
    failure_count: memory.failureCount,
    consecutive_failures: memory.consecutiveFailures,
    last_failure_reason: memory.lastFailureReason,
    recent_outcomes: JSON.stringify(memory.recentOutcomes),
    replaced_by: memory.replacedBy,
    is_generalization: memory.isGeneralization ? 1 : 0,
    source_learnings: JSON.stringify(memory.sourceLearnings),
    archived_at: memory.archivedAt,
    thread_id: memory.threadId,
  }
}

export type MemoryParams = ReturnType<typeof memoryToParams>

export function embeddingParams(taskEmbedding: number[], contentEmbedding: number[]) {
  return {
    task_embedding: vectorToBlob(taskEmbedding),
    content_embedding: vectorToBlob(contentEmbedding),
  }
}
