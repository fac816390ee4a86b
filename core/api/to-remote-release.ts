import type { RemoteRelease } from '../../types/remote-release'

import { isReleasePayload } from '../schema/release/is-release-payload'
import { AbortError } from '../errors/abort-error'

/**
 * Convert an API release into the publisher's release shape.
 *
 * @param value - Parsed release JSON.
 * @returns Normalized release.
 */
export function toRemoteRelease(value: unknown): RemoteRelease {
  if (!isReleasePayload(value)) {
    throw new AbortError('GitHub API returned an unexpected release payload.')
  }

  return {
    assets: value.assets.map(asset => ({ name: asset.name, id: asset.id })),
    uploadUrl: value.upload_url,
    tagName: value.tag_name,
  }
}
