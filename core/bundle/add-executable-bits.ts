/**
 * Grant execute permission to every class that can read the file.
 *
 * Existing bits are never removed.
 *
 * @param mode - Current file mode.
 * @returns Mode with execute bits derived from the read bits.
 */
export function addExecutableBits(mode: number): number {
  return mode | ((mode & 0o444) >> 2)
}
