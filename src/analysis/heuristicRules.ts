/**
 * Named heuristic rules over a classified tool sequence.
 *
 * Each rule is independent and pure; the analyzer runs every rule in table
 * order and concatenates the findings. Add a rule by appending to a table.
 */

import type { AnalysisConfig } from '../config/schema.js'
import type { Inefficiency, Redundancy, ToolStep } from './types.js'

export interface HeuristicRule<T> {
  name: string
  description: string
  detect(steps: ToolStep[], config: AnalysisConfig): T[]
}

// ============ Redundancy rules ============

const consecutiveDuplicate: HeuristicRule<Redundancy> = {
  name: 'consecutive_duplicate',
  description: 'Same tool called twice in a row',
  detect(steps) {
    const found: Redundancy[] = []
    for (let i = 1; i < steps.length; i++) {
      const step = steps[i]
      const prev = steps[i - 1]
      if (step && prev && step.name === prev.name) {
        found.push({
          type: 'consecutive_duplicate',
          tool: step.name,
          position: step.position,
          suggestion: `Batch ${step.name} operations`,
        })
      }
    }
    return found
  },
}

const excessiveStatusChecks: HeuristicRule<Redundancy> = {
  name: 'excessive_status_checks',
  description: 'Too many list/status calls without a change in between',
  detect(steps, config) {
    const found: Redundancy[] = []
    let run = 0
    for (const step of steps) {
      if (step.isMutating) {
        run = 0
        continue
      }
      if (!step.isStatus) continue
      run++
      // One finding per run of checks
      if (run === config.maxRepeatedChecks + 1) {
        found.push({
          type: 'excessive_status_checks',
          tool: step.name,
          position: step.position,
          suggestion: 'Check status once after a change instead of polling',
        })
      }
    }
    return found
  },
}

const excessiveUpdates: HeuristicRule<Redundancy> = {
  name: 'excessive_updates',
  description: 'Todo list rewritten more often than needed',
  detect(steps, config) {
    const todoSteps = steps.filter(s => s.isTodo)
    const over = todoSteps[config.maxRepeatedChecks]
    if (!over) return []
    return [
      {
        type: 'excessive_updates',
        tool: over.name,
        position: over.position,
        suggestion: 'Batch todo updates instead of individual calls',
      },
    ]
  },
}

export const REDUNDANCY_RULES: HeuristicRule<Redundancy>[] = [
  consecutiveDuplicate,
  excessiveStatusChecks,
  excessiveUpdates,
]

// ============ Inefficiency rules ============

const noInitialPlan: HeuristicRule<Inefficiency> = {
  name: 'no_initial_plan',
  description: 'Several tools used without planning first',
  detect(steps) {
    const first = steps[0]
    if (!first || first.isPlanning) return []
    const distinct = new Set(steps.map(s => s.name))
    if (distinct.size < 3) return []
    return [
      {
        type: 'no_initial_plan',
        detail: `First tool was ${first.name}`,
        impact: 'Work started without a plan across several tools',
        suggestion: 'Start with a planning step when a task spans several tools',
        position: first.position,
      },
    ]
  },
}

const readWithoutContext: HeuristicRule<Inefficiency> = {
  name: 'read_without_context',
  description: 'File read before any listing, search or write of that path',
  detect(steps) {
    const found: Inefficiency[] = []
    const written = new Set<string>()
    const flagged = new Set<string>()
    let hasContext = false

    for (const step of steps) {
      if (step.isStatus || step.isSearch) hasContext = true
      if (step.isMutating && step.path) written.add(step.path)
      if (!step.isRead || !step.path) continue
      if (hasContext || written.has(step.path) || flagged.has(step.path)) continue

      flagged.add(step.path)
      found.push({
        type: 'read_without_context',
        detail: `Read ${step.path} before listing or searching`,
        impact: 'Reading blind risks opening the wrong file',
        suggestion: 'List or search before reading files',
        position: step.position,
      })
    }
    return found
  },
}

const repeatedReads: HeuristicRule<Inefficiency> = {
  name: 'repeated_reads',
  description: 'Same path read again with no write in between',
  detect(steps) {
    const found: Inefficiency[] = []
    const readSinceWrite = new Set<string>()
    const flagged = new Set<string>()

    for (const step of steps) {
      if (step.isMutating) {
        // A write to an unknown path may have touched anything
        if (step.path) readSinceWrite.delete(step.path)
        else readSinceWrite.clear()
        continue
      }
      if (!step.isRead || !step.path) continue

      if (readSinceWrite.has(step.path) && !flagged.has(step.path)) {
        flagged.add(step.path)
        found.push({
          type: 'repeated_reads',
          detail: `${step.path} read again without changes in between`,
          impact: 'Duplicate I/O and context usage',
          suggestion: 'Reuse the content from the first read',
          position: step.position,
        })
      }
      readSinceWrite.add(step.path)
    }
    return found
  },
}

export const INEFFICIENCY_RULES: HeuristicRule<Inefficiency>[] = [
  noInitialPlan,
  readWithoutContext,
  repeatedReads,
]

export function runRules<T>(rules: HeuristicRule<T>[], steps: ToolStep[], config: AnalysisConfig): T[] {
  return rules.flatMap(rule => rule.detect(steps, config))
}
