/**
 * Application errors with category, code and a fix suggestion
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'CONFIG'
  | 'STORAGE'
  | 'API'
  | 'TIMEOUT'
  | 'VALIDATION'
  | 'RESOURCE'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'STORE_INIT_FAILED'
  | 'STORE_WRITE_FAILED'
  | 'STORE_NOT_FOUND'
  | 'EMBEDDING_FAILED'
  | 'EXTRACTION_FAILED'
  | 'ERR_TIMEOUT'
  | 'ERR_VALIDATION'
  | 'ERR_AUTH'
  | 'ERR_NETWORK'
  | 'ERR_DB_LOCKED'
  | 'ERR_PERMISSION'
  | 'UNKNOWN'

const categoryColors: Record<ErrorCategory, (s: string) => string> = {
  CONFIG: chalk.yellow,
  STORAGE: chalk.magenta,
  API: chalk.red,
  TIMEOUT: chalk.yellow,
  VALIDATION: chalk.cyan,
  RESOURCE: chalk.blue,
  UNKNOWN: chalk.gray,
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** Terminal rendering used by the CLI */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .hindsight.yaml against the documented options'
    )
  }

  static storeNotFound(entity: string, id: string): AppError {
    return new AppError(
      'STORE_NOT_FOUND',
      `${entity} not found: ${id}`,
      'RESOURCE',
      undefined,
      'List memories with: hindsight memory list'
    )
  }

  static timeout(message?: string): AppError {
    return new AppError(
      'ERR_TIMEOUT',
      message || 'Operation timed out',
      'TIMEOUT',
      undefined,
      'Raise the timeout in .hindsight.yaml or check the provider status'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

/**
 * Raised by the memory store when a write cannot complete.
 * No row is written when this is thrown.
 */
export class StorageError extends AppError {
  constructor(
    code: Extract<ErrorCode, 'STORE_INIT_FAILED' | 'STORE_WRITE_FAILED' | 'EMBEDDING_FAILED'>,
    message: string,
    cause?: unknown
  ) {
    super(code, message, 'STORAGE', cause, 'The learning cycle is skipped; check the store and the embedding provider')
    this.name = 'StorageError'
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError
}

/** Exhaustiveness check for discriminated unions */
export function assertNever(value: never, message?: string): never {
  throw new AppError('UNKNOWN', message ?? `Unexpected value: ${JSON.stringify(value)}`)
}
