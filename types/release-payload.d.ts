import type { components } from '@octokit/openapi-types'

/** Fields of a release asset the publisher relies on. */
export type ReleaseAssetPayload = Pick<
  components['schemas']['release-asset'],
  'name' | 'id'
>

/** Fields of a release the publisher relies on. */
export interface ReleasePayload
  extends Pick<components['schemas']['release'], 'upload_url' | 'tag_name'> {
  /** Assets attached to the release. */
  assets: ReleaseAssetPayload[]
}
