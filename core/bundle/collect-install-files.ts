import { readdir, lstat, stat } from 'node:fs/promises'
import { join } from 'node:path'

/**
 * Recursively list the files of an install tree.
 *
 * Symlinks are listed as files unless they resolve to a directory; symlinked
 * directories are neither listed nor followed.
 *
 * @param directory - Absolute path of the tree root.
 * @returns Sorted absolute paths of files and file symlinks.
 */
export async function collectInstallFiles(
  directory: string,
): Promise<string[]> {
  let results: string[] = []

  async function walk(current: string): Promise<void> {
    let entries = await readdir(current)

    await Promise.all(
      entries.map(async entry => {
        let fullPath = join(current, entry)
        let entryStat = await lstat(fullPath)

        if (entryStat.isSymbolicLink()) {
          if (!(await pointsToDirectory(fullPath))) {
            results.push(fullPath)
          }
        } else if (entryStat.isDirectory()) {
          await walk(fullPath)
        } else {
          results.push(fullPath)
        }
      }),
    )
  }

  await walk(directory)

  return results.sort()
}

async function pointsToDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    /** Dangling link. */
    return false
  }
}
