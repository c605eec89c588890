/**
 * Convert an unknown thrown value from a provider call into a typed InvokeError
 */

import OpenAI from 'openai'
import { isAppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { InvokeError } from './types.js'

export function toInvokeError(error: unknown, label: string, signal?: AbortSignal): InvokeError {
  if (signal?.aborted) {
    return { type: 'cancelled', message: `${label} cancelled` }
  }
  if (isAppError(error) && error.code === 'ERR_TIMEOUT') {
    return { type: 'timeout', message: error.message }
  }
  // Timeout is a connection error subclass, check it first
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { type: 'timeout', message: `${label} timed out: ${error.message}` }
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return { type: 'api', message: `${label} connection failed: ${error.message}` }
  }
  if (error instanceof OpenAI.APIError) {
    return { type: 'api', message: `${label} API error (${error.status ?? '?'}): ${error.message}`, status: error.status }
  }

  const message = getErrorMessage(error)
  if (/timeout|timed out|ETIMEDOUT/i.test(message)) {
    return { type: 'timeout', message: `${label} timed out: ${message}` }
  }
  return { type: 'api', message: `${label} failed: ${message}` }
}
