/**
 * @entry Backend
 *
 * External capabilities behind two small interfaces:
 * - StructuredExtractor: one JSON reply per prompt
 * - Embedder: text → fixed-length vector
 *
 * OpenAI-compatible implementations are built from config.
 */

export type { InvokeError, StructuredExtractor, StructuredRequest, Embedder } from './types.js'
export { createOpenAIExtractor, createOpenAIClient, type OpenAIClientOptions } from './openaiExtractor.js'
export { createOpenAIEmbedder } from './openaiEmbedder.js'
export { toInvokeError } from './toInvokeError.js'

import type { Config } from '../config/schema.js'
import { createOpenAIExtractor } from './openaiExtractor.js'
import { createOpenAIEmbedder } from './openaiEmbedder.js'
import type { Embedder, StructuredExtractor } from './types.js'

export function createExtractorFromConfig(config: Config): StructuredExtractor {
  return createOpenAIExtractor({ ...config.openai, model: config.extraction.model })
}

export function createEmbedderFromConfig(config: Config): Embedder {
  return createOpenAIEmbedder({
    ...config.openai,
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
  })
}
