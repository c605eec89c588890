/**
 * Learning extractor: one structured call per conversation.
 *
 * A failed or slow call abandons the cycle. It is logged as a recoverable
 * miss and never retried; the next conversation gets its own chance.
 */

import type { ExecutionAnalysis } from '../analysis/types.js'
import type { InvokeError, StructuredExtractor } from '../backend/types.js'
import { toInvokeError } from '../backend/toInvokeError.js'
import { buildExtractionSystemPrompt, buildLearningExtractionPrompt } from '../prompts/learningPrompts.js'
import { createLogger } from '../shared/logger.js'
import { truncateText } from '../shared/truncateText.js'
import { withTimeout } from '../shared/withTimeout.js'
import { err, type Result } from '../shared/result.js'
import type { ConversationTrace } from '../types/conversation.js'
import { buildNarrative } from './buildNarrative.js'
import { hasLearningContent, parseLearningReply, type LearningExtraction } from './learningSchema.js'

const logger = createLogger('extractor')

export interface ExtractLearningOptions {
  timeoutMs: number
  maxNarrativeChars: number
  signal?: AbortSignal
}

export type ExtractionResult =
  | { status: 'extracted'; narrative: string; extraction: LearningExtraction }
  | { status: 'failed'; narrative: string; error: InvokeError }

export async function extractLearning(
  trace: ConversationTrace,
  analysis: ExecutionAnalysis,
  extractor: StructuredExtractor,
  options: ExtractLearningOptions
): Promise<ExtractionResult> {
  const narrative = buildNarrative(trace)
  const prompt = buildLearningExtractionPrompt(truncateText(narrative, options.maxNarrativeChars), analysis)

  let reply: Result<unknown, InvokeError>
  try {
    // Outer guard for extractors that ignore timeoutMs
    reply = await withTimeout(
      extractor.extractStructured({
        system: buildExtractionSystemPrompt(),
        prompt,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      }),
      options.timeoutMs,
      'Learning extraction'
    )
  } catch (error: unknown) {
    reply = err(toInvokeError(error, 'Learning extraction', options.signal))
  }

  if (!reply.ok) {
    logger.warn(`Extraction skipped (${reply.error.type}): ${reply.error.message}`)
    return { status: 'failed', narrative, error: reply.error }
  }

  const extraction = parseLearningReply(reply.value)
  if (extraction.shouldSave && !hasLearningContent(extraction)) {
    return {
      status: 'extracted',
      narrative,
      extraction: { ...extraction, shouldSave: false, saveReason: extraction.saveReason ?? 'No learning content' },
    }
  }
  return { status: 'extracted', narrative, extraction }
}
