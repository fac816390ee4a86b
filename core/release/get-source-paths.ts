import { join } from 'node:path'

import type { SourcePaths } from '../../types/source-paths'
import type { ReleaseSpec } from '../../types/release-spec'

import { getEffectiveVersion } from './get-effective-version'
import { getSourceBaseUrl } from './get-source-base-url'

/**
 * Derive archive names and extraction directories for a release.
 *
 * @param release - Requested release.
 * @param workDirectory - Directory the sources live in.
 * @returns Source paths.
 */
export function getSourcePaths(
  release: ReleaseSpec,
  workDirectory: string,
): SourcePaths {
  let version = getEffectiveVersion(release)
  let core = `llvm-${version}.src`
  let frontEnd = `cfe-${version}.src`

  return {
    frontEndDirectory: join(workDirectory, frontEnd),
    coreDirectory: join(workDirectory, core),
    frontEndArchive: `${frontEnd}.tar.xz`,
    baseUrl: getSourceBaseUrl(release),
    coreArchive: `${core}.tar.xz`,
    workDirectory,
  }
}
