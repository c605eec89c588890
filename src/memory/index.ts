/**
 * @entry Memory
 *
 * Memory model and lifecycle:
 * - lifecycleRules: outcome, decay and time transitions (pure)
 * - lifecycleManager: daily decay and transition jobs
 * - generalizePatterns / pruneMemories: weekly and monthly jobs
 * - fetchForTask: retrieval and injection block
 * - getLearningMetrics: health overview
 */

export * from './types.js'
export { applyOutcome, applyDecay, applyTimeTransition, inactiveDays, type OutcomeReport } from './lifecycleRules.js'
export {
  runConfidenceDecay,
  runTimeTransitions,
  updateEach,
  type BatchReport,
  type TransitionReport,
} from './lifecycleManager.js'
export { generalizePatterns, groupSimilar, buildPatternDraft, type GeneralizationReport } from './generalizePatterns.js'
export { pruneMemories, findDuplicateGroups, type PruneReport } from './pruneMemories.js'
export {
  fetchForTask,
  buildRetrievalQuery,
  type FetchForTaskOptions,
  type RetrievedLearnings,
} from './retrieveLearnings.js'
export { formatLearningsBlock, LEARNINGS_HEADER } from './formatLearnings.js'
export { getLearningMetrics, type LearningMetrics } from './learningMetrics.js'
