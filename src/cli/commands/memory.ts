import { Command, Option } from 'commander'
import chalk from 'chalk'
import {
  FAILURE_SEVERITIES,
  LIFECYCLE_STATES,
  isFailureSeverity,
  isLifecycleState,
  type LifecycleState,
  type Memory,
  type ScoredMemory,
} from '../../memory/types.js'
import { getLearningMetrics } from '../../memory/learningMetrics.js'
import { AppError } from '../../shared/error.js'
import { formatRelative } from '../../shared/formatTime.js'
import { shortenId } from '../../shared/generateId.js'
import { truncateText } from '../../shared/truncateText.js'
import { handleErrors, parsePositiveInt, resolveMemoryId, withStore } from '../context.js'
import { bulletList, header, info, list, success, table, warn, type ListItem } from '../output.js'

const stateColors: Record<LifecycleState, (s: string) => string> = {
  NEW: chalk.cyan,
  VALIDATED: chalk.green,
  STABLE: chalk.greenBright,
  DECLINING: chalk.yellow,
  ARCHIVED: chalk.gray,
  FAILED: chalk.red,
}

function formatConfidence(value: number): string {
  return value.toFixed(2)
}

export function toMemoryRow(memory: Memory) {
  return {
    id: shortenId(memory.id),
    state: memory.lifecycleState,
    confidence: formatConfidence(memory.confidenceScore),
    applied: memory.applicationCount,
    task: truncateText(memory.task, 50),
  }
}

/** Key facts of one memory, for `memory show` */
export function describeMemory(memory: Memory): ListItem[] {
  return [
    { label: 'ID', value: memory.id },
    { label: 'Task', value: memory.task },
    { label: 'State', value: stateColors[memory.lifecycleState](memory.lifecycleState) },
    { label: 'Confidence', value: `${formatConfidence(memory.confidenceScore)} (base ${formatConfidence(memory.baseConfidence)})` },
    { label: 'Outcome', value: memory.outcome },
    { label: 'Applied', value: `${memory.applicationCount} (${memory.successCount} ok, ${memory.failureCount} failed)` },
    { label: 'Created', value: formatRelative(memory.timestamp) },
    { label: 'Last applied', value: memory.lastApplied ? formatRelative(memory.lastApplied) : null, dim: true },
    { label: 'Last failure', value: memory.lastFailureReason, dim: true },
    { label: 'Replaced by', value: memory.replacedBy, dim: true },
    { label: 'Thread', value: memory.threadId, dim: true },
  ]
}

function learningLines(memory: Memory): string[] {
  const lines: string[] = []
  if (memory.tacticalLearning) lines.push(`Tactical: ${memory.tacticalLearning}`)
  if (memory.strategicLearning) lines.push(`Strategic: ${memory.strategicLearning}`)
  if (memory.metaLearning) lines.push(`Meta: ${memory.metaLearning}`)
  if (memory.antiPatterns?.description) lines.push(`Avoid: ${memory.antiPatterns.description}`)
  for (const item of memory.antiPatterns?.redundancies ?? []) lines.push(`Redundancy: ${item}`)
  for (const item of memory.antiPatterns?.inefficiencies ?? []) lines.push(`Inefficiency: ${item}`)
  return lines
}

interface ListCommandOptions {
  state?: string
  limit?: number
}

interface SearchCommandOptions {
  by: 'task' | 'content'
  limit: number
}

interface FeedbackCommandOptions {
  success?: boolean
  failure?: boolean
  severity?: string
  reason?: string
}

export function registerMemoryCommands(program: Command): void {
  const memory = program.command('memory').description('Inspect stored learnings')

  memory
    .command('list')
    .description('List memories, newest first')
    .option('-s, --state <state>', `Filter by state (${LIFECYCLE_STATES.join('/')})`)
    .option('-n, --limit <n>', 'Maximum rows', parsePositiveInt)
    .action(
      handleErrors(async (options: ListCommandOptions) => {
        const { state } = options
        if (state !== undefined && !isLifecycleState(state)) {
          throw new AppError('ERR_VALIDATION', `Unknown state: ${state}`, 'VALIDATION', undefined, `One of ${LIFECYCLE_STATES.join(', ')}`)
        }

        await withStore(({ store }) => {
          const memories = store.listMemories({ states: state ? [state] : undefined, limit: options.limit })
          if (memories.length === 0) {
            info('No memories yet')
            return
          }
          header(`Memories (${memories.length})`)
          table(memories.map(toMemoryRow), [
            { key: 'id', header: 'ID', width: 8 },
            { key: 'state', header: 'State', width: 9 },
            { key: 'confidence', header: 'Conf', align: 'right' },
            { key: 'applied', header: 'Applied', align: 'right' },
            { key: 'task', header: 'Task' },
          ])
        })
      })
    )

  memory
    .command('show')
    .description('Show one memory')
    .argument('<id>', 'Memory id or unique prefix')
    .action(
      handleErrors(async (id: string) => {
        await withStore(({ store }) => {
          const found = store.getMemory(resolveMemoryId(store, id))
          if (!found) throw AppError.storeNotFound('Memory', id)

          header(found.isGeneralization ? 'Pattern' : 'Memory')
          list(describeMemory(found))
          const lines = learningLines(found)
          if (lines.length > 0) {
            header('Learnings')
            bulletList(lines)
          }
          if (found.sourceLearnings.length > 0) {
            header('Generalized from')
            bulletList(found.sourceLearnings)
          }
        })
      })
    )

  memory
    .command('search')
    .description('Rank memories by similarity to a query')
    .argument('<query>', 'Text to search for')
    .addOption(new Option('--by <axis>', 'Embedding to compare against').choices(['task', 'content']).default('task'))
    .option('-n, --limit <n>', 'Maximum results', parsePositiveInt, 5)
    .action(
      handleErrors(async (query: string, options: SearchCommandOptions) => {
        await withStore(async ({ store }) => {
          const results: ScoredMemory[] =
            options.by === 'content'
              ? await store.searchByContent(query, options.limit)
              : await store.searchByTask(query, options.limit)

          if (results.length === 0) {
            info(`Nothing matches "${query}"`)
            return
          }
          header(`Results (${results.length})`)
          table(
            results.map(m => ({ ...toMemoryRow(m), similarity: m.similarity.toFixed(3) })),
            [
              { key: 'id', header: 'ID', width: 8 },
              { key: 'similarity', header: 'Sim', align: 'right' },
              { key: 'state', header: 'State', width: 9 },
              { key: 'task', header: 'Task' },
            ]
          )
        })
      })
    )

  memory
    .command('stats')
    .description('Lifecycle health overview')
    .action(
      handleErrors(async () => {
        await withStore(({ store }) => {
          const metrics = getLearningMetrics(store)
          header('Learning health')
          list([
            { label: 'Total', value: metrics.total },
            { label: 'Health', value: `${(metrics.healthScore * 100).toFixed(0)}%` },
            { label: 'Avg confidence', value: formatConfidence(metrics.averageConfidence) },
            { label: 'New this week', value: metrics.newThisWeek },
            { label: 'At risk', value: metrics.atRisk },
          ])
          header('By state')
          list(LIFECYCLE_STATES.map(state => ({ label: state, value: metrics.stateCounts[state] })))
          if (metrics.atRisk > 0) {
            warn(`${metrics.atRisk} memories are close to FAILED`)
          }
        })
      })
    )

  memory
    .command('feedback')
    .description('Record whether an applied memory helped')
    .argument('<id>', 'Memory id or unique prefix')
    .option('--success', 'The memory helped')
    .option('--failure', 'The memory misled')
    .option('--severity <severity>', `Failure severity (${FAILURE_SEVERITIES.join('/')})`)
    .option('--reason <reason>', 'Why it failed')
    .action(
      handleErrors(async (id: string, options: FeedbackCommandOptions) => {
        if (Boolean(options.success) === Boolean(options.failure)) {
          throw new AppError('ERR_VALIDATION', 'Pass exactly one of --success or --failure', 'VALIDATION')
        }
        const { severity } = options
        if (severity !== undefined && !isFailureSeverity(severity)) {
          throw new AppError('ERR_VALIDATION', `Unknown severity: ${severity}`, 'VALIDATION', undefined, `One of ${FAILURE_SEVERITIES.join(', ')}`)
        }

        await withStore(({ store }) => {
          const fullId = resolveMemoryId(store, id)
          const updated = store.updateOutcome(fullId, Boolean(options.success), { severity, reason: options.reason })
          if (!updated) throw AppError.storeNotFound('Memory', id)
          success(
            `${shortenId(updated.id)}: ${updated.lifecycleState}, confidence ${formatConfidence(updated.confidenceScore)}`
          )
        })
      })
    )
}
