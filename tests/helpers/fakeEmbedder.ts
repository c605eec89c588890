/**
 * Deterministic embedder for tests: one dimension per vocabulary word,
 * valued by how often that word occurs in the text.
 */

import type { Embedder, InvokeError } from '../../src/backend/types.js'
import { err, ok } from '../../src/shared/result.js'

export const DEFAULT_VOCABULARY = [
  'api',
  'rest',
  'build',
  'endpoint',
  'fastapi',
  'authentication',
  'token',
  'pydantic',
  'design',
  'database',
  'cache',
  'file',
  'read',
  'parallel',
  'batch',
  'search',
  'test',
  'deploy',
]

export interface FakeEmbedderOptions {
  vocabulary?: string[]
  /** Exact text → vector, bypassing the vocabulary */
  overrides?: Record<string, number[]>
  /** Texts for which embed() fails */
  failWhen?: (text: string) => boolean
  failure?: InvokeError
}

export interface FakeEmbedder extends Embedder {
  readonly calls: string[]
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)
}

export function createFakeEmbedder(options: FakeEmbedderOptions = {}): FakeEmbedder {
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY
  const calls: string[] = []

  return {
    name: 'fake',
    dimensions: vocabulary.length,
    calls,
    async embed(text) {
      calls.push(text)
      if (options.failWhen?.(text)) {
        return err(options.failure ?? { type: 'api', message: 'embedding unavailable' })
      }
      const override = options.overrides?.[text]
      if (override) return ok(override)

      const tokens = tokenize(text)
      return ok(vocabulary.map(word => tokens.filter(token => token === word).length))
    },
  }
}

/** Unit vector along `axis` mixed with a shared direction, for similarity fixtures */
export function mixedVector(dimensions: number, shared: number, axis: number, sharedWeight: number): number[] {
  const vector = new Array<number>(dimensions).fill(0)
  vector[shared] = Math.sqrt(sharedWeight)
  vector[axis] = Math.sqrt(1 - sharedWeight)
  return vector
}
