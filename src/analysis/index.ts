/**
 * @entry Analysis
 *
 * Tool-trace analysis: redundancies, inefficiencies, parallelization misses,
 * workflow pattern and efficiency score.
 */

export { analyzeExecution, summarizeAnalysis } from './analyzeExecution.js'
export { computeEfficiencyScore, type EfficiencyInputs } from './computeEfficiencyScore.js'
export { findParallelBatches, dependsOn } from './findParallelBatches.js'
export { classifyWorkflow, extractPatterns } from './classifyWorkflow.js'
export { REDUNDANCY_RULES, INEFFICIENCY_RULES, runRules, type HeuristicRule } from './heuristicRules.js'
export { toToolSteps, stableStringify } from './toolSteps.js'
export type {
  ExecutionAnalysis,
  ExecutionPatterns,
  Redundancy,
  RedundancyType,
  Inefficiency,
  InefficiencyType,
  ParallelBatch,
  WorkflowPattern,
  ToolStep,
} from './types.js'
