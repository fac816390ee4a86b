import { runCommand } from '../process/run-command'

/**
 * Extract an xz-compressed tarball.
 *
 * @param archive - Path of the `.tar.xz` file.
 * @param directory - Directory to extract into.
 */
export async function extractArchive(
  archive: string,
  directory: string,
): Promise<void> {
  await runCommand('tar', ['-xJf', archive, '-C', directory])
}
