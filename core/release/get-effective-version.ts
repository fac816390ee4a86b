import type { ReleaseSpec } from '../../types/release-spec'

/**
 * Version used for file names and the release tag.
 *
 * @param release - Requested release.
 * @returns Version with an `rc<N>` suffix for release candidates.
 */
export function getEffectiveVersion(release: ReleaseSpec): string {
  if (release.releaseCandidate === undefined) {
    return release.version
  }
  return `${release.version}rc${release.releaseCandidate}`
}
