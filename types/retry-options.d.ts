/** Bounds for re-running an aborted operation. */
export interface RetryOptions {
  /** Milliseconds to wait between attempts. */
  interval?: number

  /** Retries allowed after the first attempt. */
  retries?: number
}
