/**
 * Name of the bundle and of its top-level archive directory.
 *
 * @param version - Effective version.
 * @param target - Target triple of the built compiler.
 * @returns Bundle name (e.g. 'clang+llvm-14.0.0-x86_64-unknown-linux-gnu').
 */
export function getBundleName(version: string, target: string): string {
  return `clang+llvm-${version}-${target}`
}
