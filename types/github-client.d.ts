import type { RemoteRelease } from './remote-release'

/**
 * Release operations bound to a single repository.
 *
 * Every method performs exactly one request and rejects with an `AbortError`
 * when the API answers with an unexpected status.
 */
export interface GitHubClient {
  /** Upload a file as an asset using the release upload URL. */
  uploadReleaseAsset(uploadUrl: string, filePath: string): Promise<void>

  /** Create a release for a tag. */
  createRelease(tagName: string): Promise<RemoteRelease>

  /** Delete a release asset by identifier. */
  deleteReleaseAsset(assetId: number): Promise<void>

  /** List releases of the repository. */
  getAllReleases(): Promise<RemoteRelease[]>
}
