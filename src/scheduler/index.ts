/**
 * @entry Scheduler module
 *
 * Background learning (per-thread debounce) and cron maintenance jobs
 */

export { LearningScheduler, type LearningRunner, type LearningSchedulerOptions } from './learningScheduler.js'
export {
  runMaintenanceJob,
  registerMaintenanceJobs,
  stopMaintenanceJobs,
  scheduledJobCount,
  isMaintenanceJob,
  MAINTENANCE_JOBS,
  type MaintenanceJob,
  type MaintenanceReport,
  type MaintenanceDeps,
} from './maintenanceJobs.js'
