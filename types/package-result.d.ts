import type { PublishResult } from './publish-result'
import type { Bundle } from './bundle'

/** Outcome of a full packaging run. */
export interface PackageResult {
  /** Publish mutations, null for a dry run. */
  published: PublishResult | null

  /** Whether the bundle was written in this run. */
  bundled: boolean

  /** Effective version used as release tag. */
  version: string

  /** Target triple reported by the built compiler. */
  target: string

  /** Bundle produced or reused. */
  bundle: Bundle
}
