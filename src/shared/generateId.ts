/**
 * ID helpers built on crypto.randomUUID
 */

import { randomUUID } from 'crypto'

export function generateId(): string {
  return randomUUID()
}

// Shorten an id for display
export function shortenId(id: string, length: number = 8): string {
  return id.slice(0, length)
}
