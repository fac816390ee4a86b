/** Release asset as seen by the publisher. */
export interface RemoteAsset {
  /** File name of the asset. */
  name: string

  /** Numeric asset identifier used for deletion. */
  id: number
}

/** GitHub release owned by the hosting service. */
export interface RemoteRelease {
  /** Upload URL template returned by the API. */
  uploadUrl: string

  /** Assets already attached to the release. */
  assets: RemoteAsset[]

  /** Tag the release is attached to. */
  tagName: string
}
