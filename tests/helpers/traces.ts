/**
 * Trace builders for tests
 */

import type {
  ConversationMessage,
  ConversationTrace,
  ToolCallRecord,
  ToolCallStatus,
  TraceMetadata,
} from '../../src/types/conversation.js'

let callCounter = 0

export function call(
  name: string,
  args: Record<string, unknown> = {},
  status: ToolCallStatus = 'completed'
): ToolCallRecord {
  callCounter++
  return { id: `call-${callCounter}`, name, args, result: status === 'completed' ? 'ok' : null, status }
}

export function traceOf(toolCalls: ToolCallRecord[], messages: ConversationMessage[] = []): ConversationTrace {
  return { messages, toolCalls }
}

export function metadata(overrides: Partial<TraceMetadata> = {}): TraceMetadata {
  return {
    completedTaskCount: 0,
    todoCount: 0,
    outcome: 'success',
    ...overrides,
  }
}

/** A small but learnable conversation: a read, an edit, a tool reply */
export function sampleTrace(): ConversationTrace {
  return traceOf(
    [
      call('read_file', { path: 'src/api.ts' }),
      call('edit_file', { path: 'src/api.ts', old: 'a', new: 'b' }),
    ],
    [
      { role: 'human', content: 'Add a health endpoint' },
      { role: 'assistant', content: 'Reading the router first.' },
      { role: 'tool', name: 'read_file', content: 'export const router = {}' },
      { role: 'assistant', content: 'Added GET /health.' },
    ]
  )
}
