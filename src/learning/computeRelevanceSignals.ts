/**
 * Relevance filter: cheap structural checks that run before the
 * extraction call. No signal, no learning.
 */

import type { ExecutionAnalysis } from '../analysis/types.js'
import type { ConversationTrace, TodoItem, TraceMetadata } from '../types/conversation.js'

export type RelevanceSignal =
  | 'tool_usage'
  | 'tool_messages'
  | 'analysis_findings'
  | 'completed_tasks'
  | 'todo_progress'
  | 'failure_outcome'
  | 'execution_error'

interface SignalCheck {
  signal: RelevanceSignal
  holds: (trace: ConversationTrace, metadata: TraceMetadata, analysis: ExecutionAnalysis) => boolean
}

const NOT_STARTED = new Set(['', 'pending', 'todo', 'not_started'])

function hasTodoProgress(todoCount: number, todos: TodoItem[] | undefined): boolean {
  if (todoCount <= 0) return false
  // Without the list itself, a non-empty todo count is taken as progress
  if (!todos) return true
  return todos.some(todo => !NOT_STARTED.has(todo.status.trim().toLowerCase()))
}

const SIGNAL_CHECKS: SignalCheck[] = [
  { signal: 'tool_usage', holds: (_t, _m, analysis) => analysis.totalToolCalls > 0 },
  { signal: 'tool_messages', holds: trace => trace.messages.some(m => m.role === 'tool') },
  {
    signal: 'analysis_findings',
    holds: (_t, _m, analysis) =>
      analysis.redundancies.length > 0 ||
      analysis.inefficiencies.length > 0 ||
      analysis.parallelizationOpportunities.length > 0,
  },
  { signal: 'completed_tasks', holds: (_t, metadata) => metadata.completedTaskCount > 0 },
  { signal: 'todo_progress', holds: (_t, metadata) => hasTodoProgress(metadata.todoCount, metadata.todos) },
  { signal: 'failure_outcome', holds: (_t, metadata) => metadata.outcome === 'failure' },
  {
    signal: 'execution_error',
    holds: (trace, metadata) => metadata.hasError === true || trace.toolCalls.some(c => c.status === 'error'),
  },
]

/**
 * Evaluate every check independently and return all that hold, in table order.
 */
export function computeRelevanceSignals(
  trace: ConversationTrace,
  metadata: TraceMetadata,
  analysis: ExecutionAnalysis
): RelevanceSignal[] {
  return SIGNAL_CHECKS.filter(check => check.holds(trace, metadata, analysis)).map(check => check.signal)
}
