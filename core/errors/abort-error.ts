/**
 * Fatal condition of a packaging run.
 *
 * Thrown by every step that cannot continue. `withRetries` re-runs operations
 * that abort; the CLI reports the message and exits with a non-zero status.
 */
export class AbortError extends Error {
  /**
   * Creates a new AbortError.
   *
   * @param message - Human-readable reason.
   * @param options - Standard error options (e.g., cause).
   */
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AbortError'
  }
}

/**
 * Check whether a value is an AbortError.
 *
 * @param error - Value caught from a rejected operation.
 * @returns True for aborts.
 */
export function isAbortError(error: unknown): error is AbortError {
  return error instanceof AbortError
}
