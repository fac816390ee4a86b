import type { ReleasePayload } from '../../../types/release-payload'

import { isReleaseAssetPayload } from './is-release-asset-payload'

/**
 * Type guard for a release returned by the API.
 *
 * @param value - The value to check.
 * @returns True if the value is a usable release.
 */
export function isReleasePayload(value: unknown): value is ReleasePayload {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  let object = value as Record<string, unknown>
  return (
    typeof object['tag_name'] === 'string' &&
    typeof object['upload_url'] === 'string' &&
    Array.isArray(object['assets']) &&
    object['assets'].every(isReleaseAssetPayload)
  )
}
