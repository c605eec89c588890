/**
 * Execution analysis types
 */

export type RedundancyType = 'consecutive_duplicate' | 'excessive_status_checks' | 'excessive_updates'

export interface Redundancy {
  type: RedundancyType
  tool: string
  /** 1-based position in the tool sequence */
  position: number
  suggestion: string
}

export type InefficiencyType = 'no_initial_plan' | 'read_without_context' | 'repeated_reads'

export interface Inefficiency {
  type: InefficiencyType
  detail: string
  impact: string
  suggestion: string
  position: number
}

/** Consecutive calls with no data dependency that ran one after another */
export interface ParallelBatch {
  positions: number[]
  tools: string[]
  suggestion: string
}

export type WorkflowPattern =
  | 'plan_delegate'
  | 'delegate_heavy'
  | 'plan_sandbox'
  | 'plan_execute'
  | 'sandbox_driven'
  | 'exploratory'
  | 'ad_hoc'

export interface ExecutionPatterns {
  startsWithPlan: boolean
  usesTodos: boolean
  delegatesToSubagent: boolean
  usesSandbox: boolean
  dominantTool: string | null
  /** distinct tools / total calls, 0 for an empty trace */
  toolDiversity: number
  workflowPattern: WorkflowPattern
}

export interface ExecutionAnalysis {
  readonly toolSequence: string[]
  readonly toolCounts: Record<string, number>
  readonly totalToolCalls: number
  readonly redundancies: Redundancy[]
  readonly inefficiencies: Inefficiency[]
  readonly parallelizationOpportunities: ParallelBatch[]
  readonly executionPatterns: ExecutionPatterns
  readonly efficiencyScore: number
}

/** One tool call, classified against the analysis config */
export interface ToolStep {
  position: number
  name: string
  args: Record<string, unknown>
  /** Target path from the call arguments, when there is one */
  path: string | null
  isRead: boolean
  isMutating: boolean
  isStatus: boolean
  isSearch: boolean
  isPlanning: boolean
  isTodo: boolean
  isDelegation: boolean
  isSandbox: boolean
}
