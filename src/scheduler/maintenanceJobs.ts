/**
 * Scheduled store maintenance
 *
 * - daily: confidence decay, then time-based state transitions
 * - weekly: pattern generalization
 * - monthly: pruning (expired archives, duplicates, low-value memories)
 */

import cron, { type ScheduledTask } from 'node-cron'
import type { Config } from '../config/schema.js'
import { runConfidenceDecay, runTimeTransitions, type BatchReport, type TransitionReport } from '../memory/lifecycleManager.js'
import { generalizePatterns, type GeneralizationReport } from '../memory/generalizePatterns.js'
import { pruneMemories, type PruneReport } from '../memory/pruneMemories.js'
import type { MemoryStore } from '../store/MemoryStore.js'
import { ensureError } from '../shared/assertError.js'
import { AppError } from '../shared/error.js'
import { learningEventBus, type LearningEventBus } from '../shared/events/learningEvents.js'
import { formatDuration } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'

const logger = createLogger('maintenance')

export const MAINTENANCE_JOBS = ['daily', 'weekly', 'monthly'] as const
export type MaintenanceJob = (typeof MAINTENANCE_JOBS)[number]

export function isMaintenanceJob(value: string): value is MaintenanceJob {
  return MAINTENANCE_JOBS.some(job => job === value)
}

export interface MaintenanceReport {
  job: MaintenanceJob
  startedAt: string
  durationMs: number
  decay?: BatchReport
  transitions?: TransitionReport
  generalization?: GeneralizationReport
  pruning?: PruneReport
}

export interface MaintenanceDeps {
  store: Pick<MemoryStore, 'listMemories' | 'listStoredMemories' | 'store' | 'updateMemory' | 'deleteMemory'>
  config: Config
  events?: LearningEventBus
  clock?: () => Date
}

export async function runMaintenanceJob(job: MaintenanceJob, deps: MaintenanceDeps): Promise<MaintenanceReport> {
  const { store, config } = deps
  const clock = deps.clock ?? (() => new Date())
  const events = deps.events ?? learningEventBus
  const at = clock()
  const started = Date.now()

  logger.info(`Running ${job} maintenance`)
  const report: MaintenanceReport = { job, startedAt: at.toISOString(), durationMs: 0 }

  switch (job) {
    case 'daily':
      report.decay = runConfidenceDecay(store, config.lifecycle, at)
      report.transitions = runTimeTransitions(store, config.lifecycle, at)
      break
    case 'weekly':
      report.generalization = await generalizePatterns(store, config.lifecycle, at)
      break
    case 'monthly':
      report.pruning = pruneMemories(store, config.lifecycle, at)
      break
  }

  report.durationMs = Date.now() - started
  logger.info(`${job} maintenance done in ${formatDuration(report.durationMs)}`)
  await events.emitAsync('maintenance:completed', { job, report })
  return report
}

let scheduledJobs: ScheduledTask[] = []

/** Register daily, weekly and monthly jobs on their cron expressions */
export function registerMaintenanceJobs(deps: MaintenanceDeps): void {
  const schedule = deps.config.maintenance
  if (!schedule.enabled) {
    logger.info('Maintenance disabled in config')
    return
  }

  for (const job of MAINTENANCE_JOBS) {
    const expression = schedule[job]
    if (!cron.validate(expression)) {
      throw AppError.configInvalid(`maintenance.${job} is not a cron expression: ${expression}`)
    }
  }

  stopMaintenanceJobs()

  for (const job of MAINTENANCE_JOBS) {
    const task = cron.schedule(schedule[job], async () => {
      try {
        await runMaintenanceJob(job, deps)
      } catch (error: unknown) {
        logError(logger, `${job} maintenance failed`, ensureError(error), { job })
      }
    })
    scheduledJobs.push(task)
    logger.debug(`Scheduled ${job} maintenance: ${schedule[job]}`)
  }
}

export function stopMaintenanceJobs(): void {
  for (const task of scheduledJobs) {
    task.stop()
  }
  scheduledJobs = []
}

export function scheduledJobCount(): number {
  return scheduledJobs.length
}
