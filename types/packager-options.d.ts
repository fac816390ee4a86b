import type { RetryOptions } from './retry-options'
import type { ReleaseSpec } from './release-spec'
import type { Credentials } from './credentials'

/** Input of a full packaging run. */
export interface PackagerOptions {
  /** Credentials for publishing, not needed for a dry run. */
  credentials?: Credentials

  /** Directory holding sources, build tree, install tree and bundle. */
  workDirectory: string

  /** Retry bounds for network operations. */
  retry?: RetryOptions

  /** Release to package. */
  release: ReleaseSpec

  /** Skip publishing. */
  dryRun?: boolean

  /** Owner of the release repository. */
  owner?: string

  /** Name of the release repository. */
  repo?: string
}
