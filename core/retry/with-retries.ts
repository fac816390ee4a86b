import { setTimeout as sleep } from 'node:timers/promises'
import pc from 'picocolors'

import type { RetryOptions } from '../../types/retry-options'

import { AbortError, isAbortError } from '../errors/abort-error'

/** Retries allowed after the first attempt. */
export const DEFAULT_RETRIES = 3

/** Delay between attempts, in milliseconds. */
export const DEFAULT_RETRY_INTERVAL = 10_000

/**
 * Run an operation, re-running it while it aborts.
 *
 * Only `AbortError` rejections are retried; anything else propagates at once.
 * Once the retry budget is spent the run aborts for good.
 *
 * @param operation - Operation to run.
 * @param options - Retry bounds.
 * @returns Value of the first successful attempt.
 */
export async function withRetries<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  let {
    interval = DEFAULT_RETRY_INTERVAL,
    retries = DEFAULT_RETRIES,
  } = options
  let attempt = 0

  for (;;) {
    try {
      return await operation()
    } catch (error) {
      if (!isAbortError(error)) {
        throw error
      }

      attempt++
      console.warn(pc.yellow(`ERROR: ${error.message} Retry ${attempt}.`))

      if (attempt > retries) {
        throw new AbortError(
          `Number of retries exceeded (${retries}). Aborting.`,
          { cause: error },
        )
      }

      await sleep(interval)
    }
  }
}
