/**
 * Conversation trace consumed by the learning pipeline.
 *
 * Produced by the orchestrator after a task finishes; read-only here.
 */

export type MessageRole = 'human' | 'assistant' | 'tool' | 'system'

export interface ConversationMessage {
  role: MessageRole
  content: string
  /** Tool name for role=tool messages */
  name?: string
}

export type ToolCallStatus = 'pending' | 'completed' | 'error'

export interface ToolCallRecord {
  id: string
  name: string
  args: Record<string, unknown>
  result: string | null
  status: ToolCallStatus
}

export interface ConversationTrace {
  messages: ConversationMessage[]
  toolCalls: ToolCallRecord[]
}

export type TaskOutcome = 'success' | 'failure'

export interface TodoItem {
  content: string
  status: string
}

export interface TraceMetadata {
  completedTaskCount: number
  todoCount: number
  outcome: TaskOutcome
  threadId?: string
  /** Short description of what was attempted */
  task?: string
  hasError?: boolean
  todos?: TodoItem[]
}
