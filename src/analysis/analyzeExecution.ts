/**
 * Execution analyzer
 *
 * Pure function of the trace: same trace in, same analysis out.
 * An empty trace is uninformative, not an error.
 */

import { analysisConfigSchema, type AnalysisConfig } from '../config/schema.js'
import type { ConversationTrace } from '../types/conversation.js'
import { extractPatterns } from './classifyWorkflow.js'
import { computeEfficiencyScore } from './computeEfficiencyScore.js'
import { findParallelBatches } from './findParallelBatches.js'
import { INEFFICIENCY_RULES, REDUNDANCY_RULES, runRules } from './heuristicRules.js'
import { toToolSteps } from './toolSteps.js'
import type { ExecutionAnalysis } from './types.js'

export function analyzeExecution(
  trace: ConversationTrace,
  config: AnalysisConfig = analysisConfigSchema.parse({})
): ExecutionAnalysis {
  const steps = toToolSteps(trace.toolCalls, config)

  const toolSequence = steps.map(s => s.name)
  const toolCounts: Record<string, number> = {}
  for (const name of toolSequence) {
    toolCounts[name] = (toolCounts[name] ?? 0) + 1
  }

  const redundancies = runRules(REDUNDANCY_RULES, steps, config)
  const inefficiencies = runRules(INEFFICIENCY_RULES, steps, config)
  const parallelizationOpportunities = findParallelBatches(steps)
  const executionPatterns = extractPatterns(steps, toolCounts)

  const efficiencyScore = computeEfficiencyScore({
    redundancyCount: redundancies.length,
    inefficiencyCount: inefficiencies.length,
    parallelMissed: parallelizationOpportunities.length,
    startsWithPlan: executionPatterns.startsWithPlan,
    usesSandbox: executionPatterns.usesSandbox,
  })

  return {
    toolSequence,
    toolCounts,
    totalToolCalls: steps.length,
    redundancies,
    inefficiencies,
    parallelizationOpportunities,
    executionPatterns,
    efficiencyScore,
  }
}

/** One-line summary for logs and prompts */
export function summarizeAnalysis(analysis: ExecutionAnalysis): string {
  return [
    `pattern=${analysis.executionPatterns.workflowPattern}`,
    `efficiency=${analysis.efficiencyScore.toFixed(2)}`,
    `redundancies=${analysis.redundancies.length}`,
    `inefficiencies=${analysis.inefficiencies.length}`,
    `parallel=${analysis.parallelizationOpportunities.length}`,
  ].join(' ')
}
