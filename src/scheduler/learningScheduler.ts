/**
 * Background learning scheduler
 *
 * Submissions return immediately. Each thread has one slot:
 * - a newer submission replaces one that is still waiting out its debounce
 * - runs for one thread happen one after another, in submission order
 * - threads never wait on each other
 */

import type { LearningOutcome } from '../learning/learnFromConversation.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import type { ConversationTrace, TraceMetadata } from '../types/conversation.js'

const logger = createLogger('learning-scheduler')

const DEFAULT_THREAD = 'default'

export type LearningRunner = (trace: ConversationTrace, metadata: TraceMetadata) => Promise<LearningOutcome>

export interface LearningSchedulerOptions {
  debounceMs: number
  run: LearningRunner
  /** Called after each run, for metrics or tests */
  onOutcome?: (threadId: string, outcome: LearningOutcome) => void
}

interface LearningJob {
  trace: ConversationTrace
  metadata: TraceMetadata
}

interface ThreadSlot {
  pending: LearningJob | null
  timer: NodeJS.Timeout | null
  /** Tail of this thread's run chain */
  chain: Promise<void>
  /** Jobs on the chain that have not finished */
  queued: number
  running: boolean
}

export class LearningScheduler {
  private readonly slots = new Map<string, ThreadSlot>()
  private stopped = false

  constructor(private readonly options: LearningSchedulerOptions) {}

  /** Queue a finished conversation. Never blocks and never throws. */
  submit(trace: ConversationTrace, metadata: TraceMetadata): void {
    if (this.stopped) {
      logger.warn('Scheduler stopped, submission ignored')
      return
    }

    const threadId = metadata.threadId ?? DEFAULT_THREAD
    const slot = this.slotFor(threadId)
    if (slot.pending) {
      logger.debug(`Superseding queued run for thread ${threadId}`)
    }
    slot.pending = { trace, metadata }

    if (slot.timer) clearTimeout(slot.timer)
    slot.timer = setTimeout(() => this.release(threadId), this.options.debounceMs)
  }

  /** Threads the scheduler is still tracking */
  trackedThreadCount(): number {
    return this.slots.size
  }

  /** Threads with a queued or running cycle */
  activeThreads(): string[] {
    return [...this.slots.entries()]
      .filter(([, slot]) => slot.pending !== null || slot.running)
      .map(([threadId]) => threadId)
  }

  /** Start every queued run now and wait until all runs have finished */
  async drain(): Promise<void> {
    while (this.slots.size > 0) {
      for (const [threadId, slot] of this.slots) {
        if (slot.timer) this.release(threadId)
      }
      await Promise.all([...this.slots.values()].map(slot => slot.chain))
      this.removeIdleSlots()
    }
  }

  /** Drop queued runs, refuse new ones, and wait for in-flight runs */
  async stop(): Promise<void> {
    this.stopped = true
    for (const slot of this.slots.values()) {
      if (slot.timer) clearTimeout(slot.timer)
      slot.timer = null
      slot.pending = null
    }
    await Promise.all([...this.slots.values()].map(slot => slot.chain))
    this.slots.clear()
  }

  private slotFor(threadId: string): ThreadSlot {
    let slot = this.slots.get(threadId)
    if (!slot) {
      slot = { pending: null, timer: null, chain: Promise.resolve(), queued: 0, running: false }
      this.slots.set(threadId, slot)
    }
    return slot
  }

  /** Move the queued job onto the thread's run chain */
  private release(threadId: string): void {
    const slot = this.slots.get(threadId)
    if (!slot) return
    if (slot.timer) clearTimeout(slot.timer)
    slot.timer = null

    const job = slot.pending
    slot.pending = null
    if (!job) return

    slot.queued++
    slot.chain = slot.chain.then(() => this.runJob(threadId, slot, job))
  }

  private async runJob(threadId: string, slot: ThreadSlot, job: LearningJob): Promise<void> {
    slot.running = true
    try {
      const outcome = await this.options.run(job.trace, job.metadata)
      logger.debug(`Thread ${threadId}: ${outcome.status}`)
      this.options.onOutcome?.(threadId, outcome)
    } catch (error: unknown) {
      logError(logger, 'Background learning failed', ensureError(error), { threadId })
    } finally {
      slot.running = false
      slot.queued--
      this.releaseSlotIfIdle(threadId, slot)
    }
  }

  /** Forget a thread once nothing is waiting or running for it */
  private releaseSlotIfIdle(threadId: string, slot: ThreadSlot): void {
    if (slot.pending || slot.timer || slot.queued > 0) return
    if (this.slots.get(threadId) === slot) this.slots.delete(threadId)
  }

  private removeIdleSlots(): void {
    for (const [threadId, slot] of this.slots) {
      if (!slot.pending && !slot.timer && slot.queued === 0) this.slots.delete(threadId)
    }
  }
}
