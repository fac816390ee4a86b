import { access } from 'node:fs/promises'

/**
 * Check whether a path exists on disk.
 *
 * @param path - Absolute or relative path.
 * @returns True when the path can be accessed.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}
