import { Command, Argument } from 'commander'
import {
  MAINTENANCE_JOBS,
  registerMaintenanceJobs,
  runMaintenanceJob,
  stopMaintenanceJobs,
  type MaintenanceJob,
  type MaintenanceReport,
} from '../../scheduler/maintenanceJobs.js'
import { createEmbedderFromConfig } from '../../backend/index.js'
import { loadConfig } from '../../config/loadConfig.js'
import { createMemoryStore } from '../../store/MemoryStore.js'
import { formatDuration } from '../../shared/formatTime.js'
import { createLogger, setLogMode } from '../../shared/logger.js'
import { handleErrors, withStore } from '../context.js'
import { header, info, list, success, type ListItem } from '../output.js'

const logger = createLogger('maintenance-daemon')

/** Report lines for the terminal */
export function summarizeReport(report: MaintenanceReport): ListItem[] {
  const items: ListItem[] = []
  if (report.decay) {
    items.push({ label: 'Decayed', value: `${report.decay.updated}/${report.decay.examined}` })
  }
  if (report.transitions) {
    const moved = Object.entries(report.transitions.transitions).map(([state, count]) => `${state} ${count}`)
    items.push({ label: 'Transitions', value: moved.length > 0 ? moved.join(', ') : 'none' })
  }
  if (report.generalization) {
    items.push({ label: 'Candidates', value: report.generalization.candidates })
    items.push({ label: 'Patterns', value: report.generalization.patternIds.length })
    items.push({ label: 'Sources archived', value: report.generalization.archived })
  }
  if (report.pruning) {
    items.push({ label: 'Deleted', value: report.pruning.deleted })
    items.push({ label: 'Merged', value: report.pruning.merged })
    items.push({ label: 'Low-value archived', value: report.pruning.archivedLowValue })
  }

  const errors =
    (report.decay?.errors ?? 0) +
    (report.transitions?.errors ?? 0) +
    (report.generalization?.errors ?? 0) +
    (report.pruning?.errors ?? 0)
  items.push({ label: 'Errors', value: errors })
  return items
}

export function registerMaintenanceCommands(program: Command): void {
  const maintenance = program.command('maintenance').description('Lifecycle maintenance jobs')

  maintenance
    .command('run')
    .description('Run one maintenance job now')
    .addArgument(new Argument('<job>', 'Job to run').choices(MAINTENANCE_JOBS))
    .action(
      handleErrors(async (job: MaintenanceJob) => {
        const report = await withStore(({ store, config }) => runMaintenanceJob(job, { store, config }))
        success(`${job} maintenance finished in ${formatDuration(report.durationMs)}`)
        list(summarizeReport(report))
      })
    )

  maintenance
    .command('start')
    .description('Run the cron schedule in the foreground until interrupted')
    .action(
      handleErrors(async () => {
        setLogMode('background')
        const config = await loadConfig()
        const store = createMemoryStore({
          embedder: createEmbedderFromConfig(config),
          embeddingTimeoutMs: config.embedding.timeoutMs,
          lifecycle: config.lifecycle,
        })

        try {
          registerMaintenanceJobs({ store, config })
        } catch (error: unknown) {
          store.close()
          throw error
        }

        header('Maintenance schedule')
        list([
          { label: 'daily', value: config.maintenance.daily },
          { label: 'weekly', value: config.maintenance.weekly },
          { label: 'monthly', value: config.maintenance.monthly },
        ])
        if (!config.maintenance.enabled) {
          info('Maintenance is disabled in .hindsight.yaml, nothing will run')
        }

        const shutdown = (signal: string) => {
          logger.info(`Received ${signal}, stopping`)
          stopMaintenanceJobs()
          store.close()
          process.exit(0)
        }
        process.once('SIGINT', () => shutdown('SIGINT'))
        process.once('SIGTERM', () => shutdown('SIGTERM'))
      })
    )
}
