/** Mutations performed by a publish run. */
export interface PublishResult {
  /** Whether a stale asset with the same name was deleted. */
  deleted: boolean

  /** Whether the release had to be created. */
  created: boolean

  /** Final upload URL the asset was sent to. */
  uploadUrl: string
}
