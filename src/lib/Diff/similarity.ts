import { diffChars } from 'diff';

/**
 * Ratio of characters two strings share, from 0 (nothing in common) to 1 (identical).
 *
 * Computed as `2 * M / (a.length + b.length)`, M being the length of the
 * unchanged runs of a character diff.
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  const common = diffChars(a, b)
    .filter(({ added, removed }) => !added && !removed)
    .reduce((sum, change) => sum + change.value.length, 0);
  return (2 * common) / total;
}
