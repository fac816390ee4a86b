import { chmod, lstat } from 'node:fs/promises'
import { basename, relative } from 'node:path'
import { create } from 'tar'

import type { Bundle } from '../../types/bundle'

import { collectInstallFiles } from './collect-install-files'
import { addExecutableBits } from './add-executable-bits'
import { isSharedLibrary } from './is-shared-library'
import { runCommand } from '../process/run-command'
import { pathExists } from '../fs/path-exists'

/**
 * Write the install tree into an xz-compressed tarball.
 *
 * Entries are stored under the bundle name instead of the install directory.
 * Shared libraries are made executable first since the install step leaves
 * them without execute bits. Nothing happens when the archive already exists.
 *
 * @param bundle - Bundle name and archive path (ending in `.tar.xz`).
 * @param installDirectory - Install prefix of the toolchain.
 * @returns False when an existing archive was kept.
 */
export async function bundleToolchain(
  bundle: Bundle,
  installDirectory: string,
): Promise<boolean> {
  if (await pathExists(bundle.archivePath)) {
    return false
  }

  let files = await collectInstallFiles(installDirectory)

  for (let file of files) {
    if (!isSharedLibrary(basename(file))) {
      continue
    }
    let info = await lstat(file)
    if (info.isFile()) {
      await chmod(file, addExecutableBits(info.mode & 0o7777))
    }
  }

  let tarPath = bundle.archivePath.replace(/\.xz$/u, '')

  await create(
    {
      prefix: bundle.name,
      cwd: installDirectory,
      file: tarPath,
    },
    files.map(file => relative(installDirectory, file)),
  )

  await runCommand('xz', ['-T0', '-f', tarPath])

  return true
}
