import { stableStringify } from './toolSteps.js'
import type { ParallelBatch, ToolStep } from './types.js'

function argumentValues(step: ToolStep): Set<string> {
  const values = new Set<string>()
  for (const value of Object.values(step.args)) {
    values.add(typeof value === 'string' ? value : stableStringify(value))
  }
  return values
}

/**
 * Whether `next` has to wait for `earlier`.
 *
 * Identical calls, a mutating call with no known path, a write sharing a path
 * with the other call, or any shared argument value count as a dependency.
 */
export function dependsOn(next: ToolStep, earlier: ToolStep): boolean {
  if (next.name === earlier.name && stableStringify(next.args) === stableStringify(earlier.args)) {
    return true
  }
  if ((next.isMutating && !next.path) || (earlier.isMutating && !earlier.path)) return true
  if (next.path && next.path === earlier.path && (next.isMutating || earlier.isMutating)) return true

  const earlierValues = argumentValues(earlier)
  for (const value of argumentValues(next)) {
    if (earlierValues.has(value)) return true
  }
  return false
}

/**
 * Group consecutive independent calls. Every group of two or more calls is a
 * missed parallelization opportunity.
 */
export function findParallelBatches(steps: ToolStep[]): ParallelBatch[] {
  const groups: ToolStep[][] = []
  let current: ToolStep[] = []

  for (const step of steps) {
    if (current.some(member => dependsOn(step, member))) {
      groups.push(current)
      current = []
    }
    current.push(step)
  }
  if (current.length > 0) groups.push(current)

  return groups
    .filter(group => group.length > 1)
    .map(group => ({
      positions: group.map(s => s.position),
      tools: group.map(s => s.name),
      suggestion: `Run ${group.map(s => s.name).join(', ')} in parallel`,
    }))
}
