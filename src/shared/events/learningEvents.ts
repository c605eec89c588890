/**
 * Learning lifecycle events, the outbound notification port.
 *
 * The pipeline emits, adapters (UI push, session state, metrics) listen.
 * Listener errors are caught and logged, never propagated to the emitter.
 */

import { EventEmitter } from 'events'
import type { LifecycleState, Memory } from '../../memory/types.js'
import type { MaintenanceReport } from '../../scheduler/maintenanceJobs.js'
import { createLogger } from '../logger.js'
import { getErrorMessage } from '../assertError.js'

const logger = createLogger('learning-events')

export interface MemoryCreatedPayload {
  memory: Memory
  threadId?: string
}

export interface MemoryOutcomePayload {
  memoryId: string
  success: boolean
  state: LifecycleState
}

export interface MaintenanceCompletedPayload {
  job: MaintenanceReport['job']
  report: MaintenanceReport
}

export interface LearningEventMap {
  'memory:created': [payload: MemoryCreatedPayload]
  'memory:outcome': [payload: MemoryOutcomePayload]
  'maintenance:completed': [payload: MaintenanceCompletedPayload]
}

function isPromiseLike(value: unknown): value is Promise<unknown> {
  return value instanceof Promise
}

/**
 * Event bus with error-isolated listeners.
 * A failing listener will not crash the emitter or block other listeners.
 */
export class LearningEventBus extends EventEmitter<LearningEventMap> {
  emit<K extends keyof LearningEventMap>(event: K, ...args: LearningEventMap[K]): boolean {
    const listeners = this.listeners(event)
    for (const listener of listeners) {
      try {
        const result: unknown = Reflect.apply(listener, this, args)
        if (isPromiseLike(result)) {
          result.catch((e: unknown) => {
            logger.error(`Async listener error for ${String(event)}: ${getErrorMessage(e)}`)
          })
        }
      } catch (e) {
        logger.error(`Listener error for ${String(event)}: ${getErrorMessage(e)}`)
      }
    }
    return listeners.length > 0
  }

  /**
   * Emit and wait for async listeners. Use before the process exits,
   * e.g. at the end of a one-shot CLI maintenance run.
   */
  async emitAsync<K extends keyof LearningEventMap>(event: K, ...args: LearningEventMap[K]): Promise<void> {
    const pending: Promise<unknown>[] = []
    for (const listener of this.listeners(event)) {
      try {
        const result: unknown = Reflect.apply(listener, this, args)
        if (isPromiseLike(result)) {
          pending.push(
            result.catch((e: unknown) => {
              logger.error(`Async listener error for ${String(event)}: ${getErrorMessage(e)}`)
            })
          )
        }
      } catch (e) {
        logger.error(`Listener error for ${String(event)}: ${getErrorMessage(e)}`)
      }
    }
    if (pending.length > 0) {
      await Promise.all(pending)
    }
  }
}

export const learningEventBus = new LearningEventBus()
