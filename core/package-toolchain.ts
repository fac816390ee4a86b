import { resolve, join } from 'node:path'
import pc from 'picocolors'

import type { PackagerOptions } from '../types/packager-options'
import type { PackageResult } from '../types/package-result'
import type { Bundle } from '../types/bundle'

import { getEffectiveVersion } from './release/get-effective-version'
import { ensureBuildLayout } from './build/ensure-build-layout'
import { createGitHubClient } from './api/create-github-client'
import { getSourcePaths } from './release/get-source-paths'
import { bundleToolchain } from './bundle/bundle-toolchain'
import { getBundleName } from './bundle/get-bundle-name'
import { buildToolchain } from './build/build-toolchain'
import { fetchSources } from './sources/fetch-sources'
import { publishBundle } from './api/publish-bundle'
import { detectTarget } from './probe/detect-target'
import { AbortError } from './errors/abort-error'
import { runStep } from './report/run-step'

/** Repository the bundles are released in, under the owner's account. */
export const DEFAULT_RELEASE_REPO = 'llvm'

/**
 * Fetch, build, bundle and publish a toolchain release.
 *
 * Each stage checks for its own output first, so re-running after a failure
 * resumes the run. Publishing always runs its full replace-or-create cycle.
 *
 * @param options - Run options.
 * @returns What was produced and published.
 */
export async function packageToolchain(
  options: PackagerOptions,
): Promise<PackageResult> {
  let { release, retry } = options
  let workDirectory = resolve(options.workDirectory)
  let version = getEffectiveVersion(release)
  let paths = getSourcePaths(release, workDirectory)

  if (!options.dryRun && !options.credentials) {
    throw new AbortError('Credentials are required to publish a bundle.')
  }

  await fetchSources(paths, retry)

  let layout = await ensureBuildLayout(workDirectory)
  await buildToolchain(layout, paths.coreDirectory)

  let target = await runStep(
    'Detecting LLVM target',
    () => detectTarget(layout.installDirectory),
    value => `Detected target ${pc.yellow(value)}`,
  )

  let name = getBundleName(version, target)
  let bundle: Bundle = {
    archivePath: join(workDirectory, `${name}.tar.xz`),
    name,
  }

  let bundled = await runStep(
    `Bundling LLVM to ${bundle.archivePath}`,
    () => bundleToolchain(bundle, layout.installDirectory),
    written =>
      written ?
        `Bundled LLVM to ${bundle.archivePath}`
      : `Reusing existing ${bundle.archivePath}`,
  )

  if (options.dryRun || !options.credentials) {
    console.info(
      pc.yellow(`\n📋 Dry Run - ${name}.tar.xz would be released as ${version}\n`),
    )
    return { published: null, bundled, version, target, bundle }
  }

  let client = createGitHubClient({
    owner: options.owner ?? options.credentials.userName,
    repo: options.repo ?? DEFAULT_RELEASE_REPO,
    credentials: options.credentials,
  })

  let published = await publishBundle(
    client,
    { bundlePath: bundle.archivePath, tagName: version },
    retry,
  )

  return { published, bundled, version, target, bundle }
}
