import { z } from 'zod'

export const analysisConfigSchema = z.object({
  /** Tools that count as an up-front planning step */
  planningTools: z.array(z.string()).default(['write_todos', 'plan', 'search_memory']),
  /** Todo-list tools, for uses_todos and excessive_updates */
  todoTools: z.array(z.string()).default(['write_todos']),
  /** Listing / status-check tools */
  statusTools: z.array(z.string()).default(['ls', 'list_files', 'glob', 'git_status', 'status']),
  /** Search tools, these give a later read its context */
  searchTools: z.array(z.string()).default(['grep', 'search', 'search_memory', 'find']),
  readTools: z.array(z.string()).default(['read_file', 'cat']),
  /** Tools that change state */
  mutatingTools: z.array(z.string()).default(['write_file', 'edit_file', 'delete_file', 'move_file', 'execute']),
  delegationTools: z.array(z.string()).default(['task', 'delegate']),
  sandboxTools: z.array(z.string()).default(['execute', 'sandbox', 'run_python']),
  /** More than this many status checks (or todo updates) in a row is redundant */
  maxRepeatedChecks: z.number().int().default(3),
})

export const extractionConfigSchema = z.object({
  model: z.string().default('gpt-4o-mini'),
  timeoutMs: z.number().default(30_000),
  /** Max narrative characters sent to the model */
  maxNarrativeChars: z.number().default(12_000),
})

export const embeddingConfigSchema = z.object({
  model: z.string().default('text-embedding-3-small'),
  /** Every vector in one store shares this length */
  dimensions: z.number().int().default(1536),
  timeoutMs: z.number().default(10_000),
})

export const openaiConfigSchema = z.object({
  baseURL: z.string().optional(),
  apiKey: z.string().optional(),
})

export const retrievalConfigSchema = z.object({
  limit: z.number().int().default(3),
  minSimilarity: z.number().default(0.5),
  historyWindow: z.number().int().default(10),
})

export const schedulerConfigSchema = z.object({
  /** Quiet period before a thread's latest submission is processed */
  debounceMs: z.number().default(30_000),
})

export const lifecycleConfigSchema = z.object({
  confidenceFloor: z.number().default(0.3),
  halfLifeDays: z.number().default(60),
  successMultiplier: z.number().default(1.05),
  failurePenalty: z
    .object({
      minor: z.number().default(0.9),
      major: z.number().default(0.7),
      critical: z.number().default(0.4),
    })
    .default({}),
  validateMinSuccesses: z.number().int().default(3),
  validateMinConfidence: z.number().default(0.7),
  stableMinSuccesses: z.number().int().default(10),
  stableMinConfidence: z.number().default(0.9),
  failedConsecutiveFailures: z.number().int().default(3),
  /** Failures within the recent window that demote a STABLE memory */
  decliningRecentFailures: z.number().int().default(2),
  recentOutcomeWindow: z.number().int().default(5),
  stableUnusedDays: z.number().default(30),
  decliningUnusedDays: z.number().default(90),
  archiveRetentionDays: z.number().default(180),
  failedCleanupDays: z.number().default(7),
  generalization: z
    .object({
      similarity: z.number().default(0.85),
      minConfidence: z.number().default(0.8),
      minApplications: z.number().int().default(5),
      minGroupSize: z.number().int().default(3),
      confidenceFactor: z.number().default(0.9),
    })
    .default({}),
  pruning: z
    .object({
      duplicateSimilarity: z.number().default(0.95),
      lowConfidence: z.number().default(0.5),
      lowApplications: z.number().int().default(2),
      lowValueAgeDays: z.number().default(60),
    })
    .default({}),
})

export const maintenanceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  daily: z.string().default('0 2 * * *'),
  weekly: z.string().default('0 3 * * 0'),
  monthly: z.string().default('0 4 1 * *'),
})

export const configSchema = z.object({
  analysis: analysisConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  openai: openaiConfigSchema.default({}),
  retrieval: retrievalConfigSchema.default({}),
  scheduler: schedulerConfigSchema.default({}),
  lifecycle: lifecycleConfigSchema.default({}),
  maintenance: maintenanceConfigSchema.default({}),
})

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>
export type ExtractionConfig = z.infer<typeof extractionConfigSchema>
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>
export type OpenAIConfig = z.infer<typeof openaiConfigSchema>
export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>
export type LifecycleConfig = z.infer<typeof lifecycleConfigSchema>
export type MaintenanceConfig = z.infer<typeof maintenanceConfigSchema>
export type Config = z.infer<typeof configSchema>
