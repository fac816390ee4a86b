/**
 * Check whether a file name looks like a shared library (`.so`, `.so.1`,
 * `.so.1.2`, ...).
 *
 * @param fileName - Base name of the file.
 * @returns True for shared library names.
 */
export function isSharedLibrary(fileName: string): boolean {
  return /\.so(?:\.\d+)*$/u.test(fileName)
}
