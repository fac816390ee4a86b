import { join } from 'node:path'

import type { RetryOptions } from '../../types/retry-options'
import type { SourcePaths } from '../../types/source-paths'

import {
  getMergedFrontEndDirectory,
  mergeFrontEndSource,
} from './merge-front-end-source'
import { withRetries } from '../retry/with-retries'
import { extractArchive } from './extract-archive'
import { pathExists } from '../fs/path-exists'
import { downloadFile } from './download-file'
import { runStep } from '../report/run-step'

/**
 * Make sure the core tree exists with the front end merged into it.
 *
 * Every step is skipped when its output is already on disk, so an
 * interrupted run resumes where it stopped.
 *
 * @param paths - Source paths of the release.
 * @param retry - Retry bounds for downloads.
 */
export async function fetchSources(
  paths: SourcePaths,
  retry?: RetryOptions,
): Promise<void> {
  if (!(await pathExists(paths.coreDirectory))) {
    await fetchArchive(paths, paths.coreArchive, paths.coreDirectory, retry)
  }

  if (!(await pathExists(getMergedFrontEndDirectory(paths)))) {
    await fetchArchive(
      paths,
      paths.frontEndArchive,
      paths.frontEndDirectory,
      retry,
    )
    await mergeFrontEndSource(paths)
  }
}

async function fetchArchive(
  paths: SourcePaths,
  archive: string,
  directory: string,
  retry?: RetryOptions,
): Promise<void> {
  let archivePath = join(paths.workDirectory, archive)

  if (!(await pathExists(archivePath))) {
    await runStep(`Downloading ${archive}`, () =>
      withRetries(
        () => downloadFile(`${paths.baseUrl}/${archive}`, paths.workDirectory),
        retry,
      ),
    )
  }

  if (!(await pathExists(directory))) {
    await runStep(`Extracting ${archive}`, () =>
      extractArchive(archivePath, paths.workDirectory),
    )
  }
}
