/**
 * @entry Shared infrastructure
 *
 * No domain logic:
 * - Result<T,E>: ok/err
 * - AppError, StorageError, assertNever
 * - Logger: createLogger/setLogLevel/setLogMode/logError
 * - Error guards: getErrorMessage/ensureError
 * - Text, time and id helpers, withTimeout
 * - learningEventBus
 */

export { type Result, ok, err } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  StorageError,
  isAppError,
  assertNever,
} from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  setLogLevel,
  getLogLevel,
  setLogMode,
  createLogger,
  logError,
} from './logger.js'

export { generateId, shortenId } from './generateId.js'

export { getErrorMessage, ensureError } from './assertError.js'

export { truncateText } from './truncateText.js'

export { withTimeout } from './withTimeout.js'

export { learningEventBus, LearningEventBus, type LearningEventMap } from './events/index.js'

export { daysSince, isOnDay, formatRelative, formatDuration } from './formatTime.js'
