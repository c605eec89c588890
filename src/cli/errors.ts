/**
 * Map whatever reached the top of a command to an AppError with a
 * suggestion, then print it.
 */

import { AppError, isAppError, type ErrorCategory, type ErrorCode } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'

interface ErrorPattern {
  pattern: RegExp
  code: ErrorCode
  category: ErrorCategory
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /SQLITE_BUSY|database is locked/i,
    code: 'ERR_DB_LOCKED',
    category: 'STORAGE',
    suggestion: 'Another hindsight process holds the store; stop it or retry shortly',
  },
  {
    pattern: /unauthorized|\b401\b|api.?key/i,
    code: 'ERR_AUTH',
    category: 'API',
    suggestion: 'Set HINDSIGHT_OPENAI_API_KEY (or OPENAI_API_KEY)',
  },
  {
    pattern: /timeout|timed out|ETIMEDOUT/i,
    code: 'ERR_TIMEOUT',
    category: 'TIMEOUT',
    suggestion: 'Raise the timeout in .hindsight.yaml or check the provider status',
  },
  {
    pattern: /ECONNREFUSED|ENOTFOUND|ECONNRESET|network/i,
    code: 'ERR_NETWORK',
    category: 'API',
    suggestion: 'Check the network and HINDSIGHT_OPENAI_BASE_URL',
  },
  {
    pattern: /EACCES|EPERM|permission denied/i,
    code: 'ERR_PERMISSION',
    category: 'RESOURCE',
    suggestion: 'Check write access to HINDSIGHT_DATA_DIR',
  },
]

export function toAppError(error: unknown): AppError {
  if (isAppError(error)) return error

  const message = getErrorMessage(error)
  const match = errorPatterns.find(p => p.pattern.test(message))
  if (!match) return AppError.unknown(error)
  return new AppError(match.code, message, match.category, error, match.suggestion)
}

export function printError(error: unknown): void {
  console.error(toAppError(error).format())
}
