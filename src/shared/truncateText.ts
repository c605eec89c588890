/**
 * Truncate text with ellipsis
 *
 * Common display lengths:
 * - Table cell (CLI): 50
 * - Injected learning field: 400
 * - Log preview: 60
 */
export function truncateText(text: string, maxLength: number = 40, suffix: string = '...'): string {
  if (text.length <= maxLength) return text
  return text.slice(0, maxLength - suffix.length) + suffix
}
