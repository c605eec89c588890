import { describe, it, expect } from 'vitest'
import OpenAI from 'openai'
import { toInvokeError } from '../toInvokeError.js'
import { AppError } from '../../shared/error.js'

describe('toInvokeError', () => {
  it('maps the timeout AppError to a timeout', () => {
    const error = AppError.timeout('Embedding timed out after 10ms')
    expect(toInvokeError(error, 'Embedding')).toEqual({
      type: 'timeout',
      message: 'Embedding timed out after 10ms',
    })
  })

  it('maps the SDK timeout before the generic connection error', () => {
    const result = toInvokeError(new OpenAI.APIConnectionTimeoutError(), 'Extraction')
    expect(result.type).toBe('timeout')
  })

  it('reports cancellation when the signal was aborted', () => {
    const controller = new AbortController()
    controller.abort()
    expect(toInvokeError(new Error('aborted'), 'Extraction', controller.signal)).toEqual({
      type: 'cancelled',
      message: 'Extraction cancelled',
    })
  })

  it('recognizes timeouts in plain error messages', () => {
    expect(toInvokeError(new Error('socket ETIMEDOUT'), 'Embedding').type).toBe('timeout')
  })

  it('falls back to an api error', () => {
    expect(toInvokeError('boom', 'Embedding')).toEqual({ type: 'api', message: 'Embedding failed: boom' })
  })
})
