/**
 * Time helpers on top of date-fns
 */

import { differenceInDays, formatDistanceToNow, isSameDay, parseISO } from 'date-fns'

/** Whole days elapsed from an ISO timestamp to `at` (never negative) */
export function daysSince(isoString: string, at: Date): number {
  return Math.max(0, differenceInDays(at, parseISO(isoString)))
}

/** True when the ISO timestamp falls on the same calendar day as `at` */
export function isOnDay(isoString: string, at: Date): boolean {
  return isSameDay(parseISO(isoString), at)
}

// Relative time, e.g. "3 days ago"
export function formatRelative(isoString: string): string {
  return formatDistanceToNow(parseISO(isoString), { addSuffix: true })
}

// Duration for log lines
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
}
