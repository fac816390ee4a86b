/**
 * Find the target triple in compiler driver output.
 *
 * @param output - Combined stdout and stderr of `clang -###`.
 * @returns Triple from the first `Target:` line, or null.
 */
export function parseTarget(output: string): string | null {
  for (let line of output.split(/\r?\n/u)) {
    let match = line.match(/^Target: (?<target>.*)$/u)
    if (match?.groups) {
      return match.groups['target'] ?? null
    }
  }
  return null
}
