/**
 * Structured extraction over any OpenAI-compatible chat API
 * (OpenAI, LM Studio, Ollama, vLLM...). Requests a JSON object reply.
 */

import OpenAI from 'openai'
import { ok, err } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { formatDuration } from '../shared/formatTime.js'
import { toInvokeError } from './toInvokeError.js'
import type { Result } from '../shared/result.js'
import type { InvokeError, StructuredExtractor, StructuredRequest } from './types.js'

const logger = createLogger('openai-extractor')

export interface OpenAIClientOptions {
  baseURL?: string
  apiKey?: string
}

export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    baseURL: options.baseURL,
    apiKey: options.apiKey || 'no-key',
    // Retries would stretch a call past its timeout
    maxRetries: 0,
  })
}

function parseJsonObject(content: string): unknown {
  // Some compatible servers wrap JSON in a markdown fence
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/)
  return JSON.parse(fenced?.[1] ?? content)
}

export function createOpenAIExtractor(options: OpenAIClientOptions & { model: string }): StructuredExtractor {
  const client = createOpenAIClient(options)

  return {
    name: `openai:${options.model}`,

    async extractStructured(request: StructuredRequest): Promise<Result<unknown, InvokeError>> {
      const startTime = Date.now()
      let content: string

      try {
        const completion = await client.chat.completions.create(
          {
            model: options.model,
            messages: [
              { role: 'system', content: request.system },
              { role: 'user', content: request.prompt },
            ],
            response_format: { type: 'json_object' },
            temperature: 0,
          },
          { timeout: request.timeoutMs, signal: request.signal }
        )
        content = completion.choices[0]?.message?.content ?? ''
      } catch (error: unknown) {
        return err(toInvokeError(error, 'Extraction', request.signal))
      }

      logger.debug(`Extraction done (${formatDuration(Date.now() - startTime)}, model: ${options.model})`)

      if (!content.trim()) {
        return err({ type: 'invalid_response', message: 'Extraction returned an empty reply' })
      }
      try {
        return ok(parseJsonObject(content))
      } catch {
        return err({ type: 'invalid_response', message: 'Extraction reply is not valid JSON' })
      }
    },
  }
}
