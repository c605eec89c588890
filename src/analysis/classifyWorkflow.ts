import type { ExecutionPatterns, ToolStep, WorkflowPattern } from './types.js'

type PatternFlags = Omit<ExecutionPatterns, 'workflowPattern'>

interface WorkflowRow {
  pattern: WorkflowPattern
  when: (flags: PatternFlags) => boolean
}

/** Mostly distinct tools, little repetition */
const EXPLORATORY_DIVERSITY = 0.75

// First matching row wins
const WORKFLOW_TABLE: WorkflowRow[] = [
  { pattern: 'plan_delegate', when: f => f.startsWithPlan && f.delegatesToSubagent },
  { pattern: 'delegate_heavy', when: f => f.delegatesToSubagent },
  { pattern: 'plan_sandbox', when: f => f.startsWithPlan && f.usesSandbox },
  { pattern: 'plan_execute', when: f => f.startsWithPlan },
  { pattern: 'sandbox_driven', when: f => f.usesSandbox },
  { pattern: 'exploratory', when: f => f.toolDiversity >= EXPLORATORY_DIVERSITY },
]

export function classifyWorkflow(flags: PatternFlags): WorkflowPattern {
  return WORKFLOW_TABLE.find(row => row.when(flags))?.pattern ?? 'ad_hoc'
}

/** Most frequent tool; the earliest one wins a tie */
function dominantTool(toolCounts: Record<string, number>): string | null {
  let best: string | null = null
  let bestCount = 0
  for (const [tool, count] of Object.entries(toolCounts)) {
    if (count > bestCount) {
      best = tool
      bestCount = count
    }
  }
  return best
}

export function extractPatterns(steps: ToolStep[], toolCounts: Record<string, number>): ExecutionPatterns {
  const total = steps.length
  const distinct = Object.keys(toolCounts).length

  const flags: PatternFlags = {
    startsWithPlan: steps[0]?.isPlanning ?? false,
    usesTodos: steps.some(s => s.isTodo),
    delegatesToSubagent: steps.some(s => s.isDelegation),
    usesSandbox: steps.some(s => s.isSandbox),
    dominantTool: dominantTool(toolCounts),
    toolDiversity: total === 0 ? 0 : distinct / total,
  }

  return { ...flags, workflowPattern: classifyWorkflow(flags) }
}
