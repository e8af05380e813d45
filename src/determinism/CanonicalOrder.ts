/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * NEVER use localeCompare.
 */

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Sorted copy, binary order. */
export function sortStringsBinary(values: Iterable<string>): string[] {
  return [...values].sort(stringCompareBinary);
}
