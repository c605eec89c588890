/**
 * @entry Learning
 *
 * Turn a finished conversation into a stored memory:
 * - computeRelevanceSignals: cheap gate before any model call
 * - extractLearning: one structured extraction, validated at ingress
 * - learnFromConversation: the full cycle, never throws
 */

export { computeRelevanceSignals, type RelevanceSignal } from './computeRelevanceSignals.js'
export { buildNarrative, formatMessageLine } from './buildNarrative.js'
export {
  parseLearningReply,
  splitUnifiedLearnings,
  hasLearningContent,
  type LearningExtraction,
} from './learningSchema.js'
export { extractLearning, type ExtractLearningOptions, type ExtractionResult } from './extractLearning.js'
export {
  learnFromConversation,
  buildMemoryDraft,
  mergeAntiPatterns,
  type LearningDeps,
  type LearningOutcome,
} from './learnFromConversation.js'
