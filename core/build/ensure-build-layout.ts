import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'

import type { BuildLayout } from '../../types/build-layout'

/**
 * Create the build and install directories when missing.
 *
 * Existing contents are kept so CMake can rebuild incrementally.
 *
 * @param workDirectory - Directory holding both trees.
 * @returns Build layout.
 */
export async function ensureBuildLayout(
  workDirectory: string,
): Promise<BuildLayout> {
  let layout: BuildLayout = {
    installDirectory: join(workDirectory, 'install'),
    buildDirectory: join(workDirectory, 'build'),
  }

  await mkdir(layout.buildDirectory, { recursive: true })
  await mkdir(layout.installDirectory, { recursive: true })

  return layout
}
