import { AppError } from './error.js'

/**
 * Reject with an ERR_TIMEOUT AppError when `promise` does not settle within `ms`.
 * The timer is cleared either way so it never keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(AppError.timeout(`${label} timed out after ${ms}ms`)), ms)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
