import type { ReleaseAssetPayload } from '../../../types/release-payload'

/**
 * Type guard for a release asset returned by the API.
 *
 * @param value - The value to check.
 * @returns True if the value carries an asset name and numeric id.
 */
export function isReleaseAssetPayload(
  value: unknown,
): value is ReleaseAssetPayload {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  let object = value as Record<string, unknown>
  return typeof object['name'] === 'string' && typeof object['id'] === 'number'
}
