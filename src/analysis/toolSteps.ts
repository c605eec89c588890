import type { AnalysisConfig } from '../config/schema.js'
import type { ToolCallRecord } from '../types/conversation.js'
import type { ToolStep } from './types.js'

const PATH_KEYS = ['path', 'file_path', 'filePath', 'filename', 'file'] as const

function extractPath(args: Record<string, unknown>): string | null {
  for (const key of PATH_KEYS) {
    const value = args[key]
    if (typeof value === 'string' && value.trim()) return value.trim()
  }
  return null
}

/**
 * Classify tool calls in order. Positions are 1-based.
 */
export function toToolSteps(toolCalls: ToolCallRecord[], config: AnalysisConfig): ToolStep[] {
  const has = (list: string[], name: string) => list.includes(name)

  return toolCalls.map((call, index) => ({
    position: index + 1,
    name: call.name,
    args: call.args,
    path: extractPath(call.args),
    isRead: has(config.readTools, call.name),
    isMutating: has(config.mutatingTools, call.name),
    isStatus: has(config.statusTools, call.name),
    isSearch: has(config.searchTools, call.name),
    isPlanning: has(config.planningTools, call.name),
    isTodo: has(config.todoTools, call.name),
    isDelegation: has(config.delegationTools, call.name),
    isSandbox: has(config.sandboxTools, call.name),
  }))
}

/** JSON with sorted object keys, so equal arguments give equal strings */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, v]) => `${JSON.stringify(key)}:${stableStringify(v)}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value) ?? 'undefined'
}
