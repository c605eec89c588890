import type { ConversationMessage, ConversationTrace, MessageRole } from '../types/conversation.js'

const ROLE_LABELS: Record<MessageRole, string> = {
  human: 'Human',
  assistant: 'Assistant',
  tool: 'Tool',
  system: 'System',
}

export function formatMessageLine(message: ConversationMessage): string {
  const label = message.role === 'tool' && message.name ? `Tool(${message.name})` : ROLE_LABELS[message.role]
  return `${label}: ${message.content}`
}

/** Role-tagged transcript, one message per line */
export function buildNarrative(trace: ConversationTrace): string {
  return trace.messages.map(formatMessageLine).join('\n')
}
