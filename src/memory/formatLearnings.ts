/**
 * Format retrieved learnings for injection into a task prompt
 */

import { truncateText } from '../shared/truncateText.js'
import type { Memory } from './types.js'

export const LEARNINGS_HEADER = '## Relevant past learnings'

// Per-field character limit
const MAX_FIELD_LENGTH = 400

function formatOne(memory: Memory, index: number): string {
  const lines = [
    `### ${index + 1}. ${memory.task}`,
    `Outcome: ${memory.outcome} | Confidence: ${memory.confidenceScore.toFixed(2)}${memory.isGeneralization ? ' | Pattern' : ''}`,
  ]

  const dimensions: Array<[string, string | null]> = [
    ['Tactical', memory.tacticalLearning],
    ['Strategic', memory.strategicLearning],
    ['Meta', memory.metaLearning],
  ]
  for (const [label, text] of dimensions) {
    if (text) lines.push(`- ${label}: ${truncateText(text, MAX_FIELD_LENGTH)}`)
  }

  const anti = memory.antiPatterns
  if (anti?.description) lines.push(`- Avoid: ${truncateText(anti.description, MAX_FIELD_LENGTH)}`)
  if (anti && anti.redundancies.length > 0) lines.push(`- Redundancies: ${anti.redundancies.join('; ')}`)
  if (anti && anti.inefficiencies.length > 0) lines.push(`- Inefficiencies: ${anti.inefficiencies.join('; ')}`)

  return lines.join('\n')
}

/** Empty string when there is nothing to inject */
export function formatLearningsBlock(memories: Memory[]): string {
  if (memories.length === 0) return ''
  return [LEARNINGS_HEADER, ...memories.map(formatOne)].join('\n\n')
}
