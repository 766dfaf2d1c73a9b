/**
 * Clamps a score into [0, 1]. NaN maps to 0.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Code-unit ordering, independent of the host locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareStrings);
}
