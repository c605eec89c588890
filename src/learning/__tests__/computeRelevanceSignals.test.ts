import { describe, it, expect } from 'vitest'
import { computeRelevanceSignals } from '../computeRelevanceSignals.js'
import { analyzeExecution } from '../../analysis/analyzeExecution.js'
import { call, metadata, traceOf } from '../../../tests/helpers/traces.js'
import type { ConversationTrace } from '../../types/conversation.js'

function signalsFor(trace: ConversationTrace, meta = metadata()) {
  return computeRelevanceSignals(trace, meta, analyzeExecution(trace))
}

describe('computeRelevanceSignals', () => {
  it('returns nothing for a plain successful chat', () => {
    const trace = traceOf([], [
      { role: 'human', content: 'hello' },
      { role: 'assistant', content: 'hi there' },
    ])
    expect(signalsFor(trace)).toEqual([])
  })

  it('reports tool usage and tool messages', () => {
    const trace = traceOf([call('grep', { pattern: 'x' })], [{ role: 'tool', name: 'grep', content: 'no match' }])
    expect(signalsFor(trace)).toEqual(['tool_usage', 'tool_messages'])
  })

  it('reports analysis findings', () => {
    const trace = traceOf([call('read_file'), call('read_file')])
    expect(signalsFor(trace)).toEqual(['tool_usage', 'analysis_findings'])
  })

  it('evaluates metadata signals independently', () => {
    const trace = traceOf([])
    const meta = metadata({ completedTaskCount: 2, todoCount: 3, outcome: 'failure', hasError: true })
    expect(signalsFor(trace, meta)).toEqual([
      'completed_tasks',
      'todo_progress',
      'failure_outcome',
      'execution_error',
    ])
  })

  it('needs at least one started todo when the list is given', () => {
    const pending = metadata({
      todoCount: 2,
      todos: [
        { content: 'a', status: 'pending' },
        { content: 'b', status: 'Not_Started' },
      ],
    })
    const started = metadata({
      todoCount: 2,
      todos: [
        { content: 'a', status: 'pending' },
        { content: 'b', status: 'in_progress' },
      ],
    })

    expect(signalsFor(traceOf([]), pending)).toEqual([])
    expect(signalsFor(traceOf([]), started)).toEqual(['todo_progress'])
  })

  it('treats a failed tool call as an execution error', () => {
    const trace = traceOf([call('execute', { command: 'make' }, 'error')])
    expect(signalsFor(trace)).toContain('execution_error')
  })
})
