import type { ReleaseSpec } from '../../types/release-spec'

const RELEASE_HOST = 'http://releases.llvm.org'

const PRERELEASE_HOST = 'http://prereleases.llvm.org'

/**
 * Remote directory holding the source archives of a release.
 *
 * @param release - Requested release.
 * @returns Base URL without a trailing slash.
 */
export function getSourceBaseUrl(release: ReleaseSpec): string {
  if (release.releaseCandidate === undefined) {
    return `${RELEASE_HOST}/${release.version}`
  }
  return `${PRERELEASE_HOST}/${release.version}/rc${release.releaseCandidate}`
}
