/** Toolchain release requested on the command line. */
export interface ReleaseSpec {
  /** Release candidate ordinal, absent for a final release. */
  releaseCandidate?: number

  /** Base version (e.g. '14.0.0'). */
  version: string
}
