import { AbortError } from '../core/errors/abort-error'

/**
 * Normalizes the release candidate option.
 *
 * @param value - Raw option value (cac turns numeric strings into numbers).
 * @returns Release candidate ordinal or undefined for a final release.
 */
export function normalizeReleaseCandidate(value: unknown): undefined | number {
  if (value === undefined) {
    return undefined
  }

  let parsed =
    typeof value === 'number' ? value
    : typeof value === 'string' && /^\d+$/u.test(value.trim()) ?
      Number.parseInt(value, 10)
    : Number.NaN

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new AbortError(
      `Invalid release candidate "${String(value)}". Expected a positive integer.`,
    )
  }
  return parsed
}
