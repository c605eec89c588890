/**
 * Embeddings over an OpenAI-compatible API
 */

import { ok, err } from '../shared/result.js'
import { createOpenAIClient, type OpenAIClientOptions } from './openaiExtractor.js'
import { toInvokeError } from './toInvokeError.js'
import type { Result } from '../shared/result.js'
import type { Embedder, InvokeError } from './types.js'

// Inputs beyond this are cut before sending
const MAX_INPUT_CHARS = 8000

export function createOpenAIEmbedder(
  options: OpenAIClientOptions & { model: string; dimensions: number }
): Embedder {
  const client = createOpenAIClient(options)
  // Only the text-embedding-3 family accepts a target dimension
  const sendDimensions = options.model.startsWith('text-embedding-3')

  return {
    name: `openai:${options.model}`,
    dimensions: options.dimensions,

    async embed(text, { timeoutMs, signal }): Promise<Result<number[], InvokeError>> {
      try {
        const response = await client.embeddings.create(
          {
            model: options.model,
            input: text.replace(/\n/g, ' ').slice(0, MAX_INPUT_CHARS),
            ...(sendDimensions ? { dimensions: options.dimensions } : {}),
          },
          { timeout: timeoutMs, signal }
        )
        const vector = response.data[0]?.embedding
        if (!vector) {
          return err({ type: 'invalid_response', message: 'Embedding response has no data' })
        }
        if (vector.length !== options.dimensions) {
          return err({
            type: 'invalid_response',
            message: `Embedding has ${vector.length} dimensions, store expects ${options.dimensions}`,
          })
        }
        return ok(vector)
      } catch (error: unknown) {
        return err(toInvokeError(error, 'Embedding', signal))
      }
    },
  }
}
