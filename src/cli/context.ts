/**
 * Shared plumbing for commands: config, an open store, error exit codes
 */

import { InvalidArgumentError } from 'commander'
import { createEmbedderFromConfig } from '../backend/index.js'
import { loadConfig } from '../config/loadConfig.js'
import type { Config } from '../config/schema.js'
import { AppError } from '../shared/error.js'
import { createMemoryStore, type MemoryStore } from '../store/MemoryStore.js'
import { printError } from './errors.js'

export interface CommandContext {
  config: Config
  store: MemoryStore
}

/** Open the store for one command and close it afterwards */
export async function withStore<T>(fn: (ctx: CommandContext) => Promise<T> | T): Promise<T> {
  const config = await loadConfig()
  const store = createMemoryStore({
    embedder: createEmbedderFromConfig(config),
    embeddingTimeoutMs: config.embedding.timeoutMs,
    lifecycle: config.lifecycle,
  })
  try {
    return await fn({ config, store })
  } finally {
    store.close()
  }
}

/** Wrap an action so failures print once and set a non-zero exit code */
export function handleErrors<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args)
    } catch (error: unknown) {
      printError(error)
      process.exitCode = 1
    }
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

/** Full id for a command-line id or unique prefix */
export function resolveMemoryId(store: Pick<MemoryStore, 'resolveId'>, prefix: string): string {
  if (!prefix.trim()) {
    throw new AppError('ERR_VALIDATION', 'Memory id must not be empty', 'VALIDATION')
  }
  const id = store.resolveId(prefix)
  if (!id) throw AppError.storeNotFound('Memory', prefix)
  return id
}
