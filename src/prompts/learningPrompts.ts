/**
 * Learning extraction prompt templates
 *
 * Used to reflect on a finished task execution and pull out reusable learnings.
 */

import type { ExecutionAnalysis } from '../analysis/types.js'

/** Field guide sent with the prompt; the reply is validated separately */
export const LEARNING_OUTPUT_SCHEMA = {
  type: 'object',
  properties: {
    tactical_learning: {
      type: ['string', 'null'],
      description: 'Specific implementation insight: which approach, tool or technique worked or failed',
    },
    strategic_learning: {
      type: ['string', 'null'],
      description: 'Higher-level approach for similar problems in the future',
    },
    meta_learning: {
      type: ['string', 'null'],
      description: 'About the learning process itself: were past learnings found and applied',
    },
    anti_patterns: {
      type: ['object', 'null'],
      properties: {
        description: { type: 'string' },
        redundancies: { type: 'array', items: { type: 'string' } },
        inefficiencies: { type: 'array', items: { type: 'string' } },
      },
    },
    confidence_score: { type: 'number', minimum: 0, maximum: 1, default: 0.5 },
    should_save: { type: 'boolean', default: true },
    save_reason: { type: ['string', 'null'] },
  },
} as const

function formatFindings(items: Array<{ type: string; suggestion: string }>): string {
  if (items.length === 0) return '- none'
  return items.map(item => `- ${item.type}: ${item.suggestion}`).join('\n')
}

export function buildLearningExtractionPrompt(narrative: string, analysis: ExecutionAnalysis): string {
  const patterns = analysis.executionPatterns

  return `Reflect deeply on this task execution and extract learnings that will help with similar tasks.

## Conversation
${narrative}

## Execution analysis
- Workflow pattern: ${patterns.workflowPattern}
- Efficiency score: ${analysis.efficiencyScore.toFixed(2)}
- Tool calls: ${analysis.totalToolCalls} (dominant: ${patterns.dominantTool ?? 'none'})
- Parallelization opportunities: ${analysis.parallelizationOpportunities.length}

Redundancies:
${formatFindings(analysis.redundancies)}

Inefficiencies:
${formatFindings(analysis.inefficiencies)}

## Requirements
1. tactical_learning: concrete, actionable implementation insight
2. strategic_learning: the general approach that should be reused
3. meta_learning: how well past experience was searched for and applied
4. anti_patterns: what NOT to do, including the redundancies above when they matter
5. Leave a field null when the execution taught nothing on that dimension
6. Set should_save to false when the conversation holds nothing reusable, and say why in save_reason
7. confidence_score: how reliable these learnings are, 0 to 1

Reply with a single JSON object only.`
}

export function buildExtractionSystemPrompt(): string {
  return `You extract structured learnings from agent task executions.
Reply with JSON matching this schema:
${JSON.stringify(LEARNING_OUTPUT_SCHEMA, null, 2)}`
}
