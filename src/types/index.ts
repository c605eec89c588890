export type {
  MessageRole,
  ConversationMessage,
  ToolCallStatus,
  ToolCallRecord,
  ConversationTrace,
  TaskOutcome,
  TodoItem,
  TraceMetadata,
} from './conversation.js'
