/**
 * External capability contracts
 *
 * The learning core talks to the language model and the embedding provider
 * only through these two interfaces.
 */

import type { Result } from '../shared/result.js'

export type InvokeError =
  | { type: 'timeout'; message: string }
  | { type: 'api'; message: string; status?: number }
  | { type: 'invalid_response'; message: string }
  | { type: 'cancelled'; message: string }

export interface StructuredRequest {
  /** Instructions, including the expected JSON shape */
  system: string
  prompt: string
  timeoutMs: number
  signal?: AbortSignal
}

/** Returns the parsed JSON object; callers validate its shape */
export interface StructuredExtractor {
  readonly name: string
  extractStructured(request: StructuredRequest): Promise<Result<unknown, InvokeError>>
}

export interface Embedder {
  readonly name: string
  /** Length of every vector this embedder returns */
  readonly dimensions: number
  embed(text: string, options: { timeoutMs: number; signal?: AbortSignal }): Promise<Result<number[], InvokeError>>
}
