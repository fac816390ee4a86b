import semver from 'semver'

import type { ReleaseSpec } from '../../types/release-spec'

import { AbortError } from '../errors/abort-error'

/**
 * Validate the requested version and release candidate.
 *
 * @param version - Version argument, a plain release version (e.g. '14.0.0').
 * @param releaseCandidate - Optional release candidate ordinal.
 * @returns Frozen release spec.
 */
export function parseReleaseSpec(
  version: string,
  releaseCandidate?: number,
): ReleaseSpec {
  let trimmed = version.trim()
  if (
    semver.valid(trimmed) !== trimmed ||
    semver.prerelease(trimmed) !== null
  ) {
    throw new AbortError(`Invalid version "${version}".`)
  }

  if (releaseCandidate === undefined) {
    return Object.freeze({ version: trimmed })
  }

  if (!Number.isInteger(releaseCandidate) || releaseCandidate < 1) {
    throw new AbortError(
      `Invalid release candidate "${releaseCandidate}". Expected a positive integer.`,
    )
  }

  return Object.freeze({ version: trimmed, releaseCandidate })
}
