import { rename } from 'node:fs/promises'
import { join } from 'node:path'

import type { SourcePaths } from '../../types/source-paths'

/**
 * Location of the front-end sources inside the core tree.
 *
 * @param paths - Source paths.
 * @returns Absolute path of `tools/clang` in the core tree.
 */
export function getMergedFrontEndDirectory(paths: SourcePaths): string {
  return join(paths.coreDirectory, 'tools', 'clang')
}

/**
 * Move the extracted front-end tree into the core tree as `tools/clang`.
 *
 * @param paths - Source paths.
 */
export async function mergeFrontEndSource(paths: SourcePaths): Promise<void> {
  await rename(paths.frontEndDirectory, getMergedFrontEndDirectory(paths))
}
