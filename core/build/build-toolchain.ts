import pc from 'picocolors'

import type { BuildLayout } from '../../types/build-layout'

import { getCmakeArguments } from './get-cmake-arguments'
import { runCommand } from '../process/run-command'

/**
 * Configure, build and install the toolchain.
 *
 * Both CMake invocations run inside the build directory; the current
 * process never changes its own working directory.
 *
 * @param layout - Build and install directories.
 * @param sourceDirectory - Core source tree.
 */
export async function buildToolchain(
  layout: BuildLayout,
  sourceDirectory: string,
): Promise<void> {
  let cwd = layout.buildDirectory

  console.info(pc.cyan('\n⚙️  Configuring toolchain\n'))
  await runCommand(
    'cmake',
    getCmakeArguments(layout.installDirectory, sourceDirectory),
    { cwd },
  )

  console.info(pc.cyan('\n🔨 Building and installing toolchain\n'))
  await runCommand('cmake', ['--build', '.', '--target', 'install'], { cwd })
}
