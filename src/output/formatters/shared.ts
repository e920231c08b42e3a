/**
 * @module output/formatters/shared
 * @description Small rendering helpers shared by the report formatters
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-19
 */

/**
 * Count map entries by count descending, then key ascending
 */
export function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort(
    ([keyA, countA], [keyB, countB]) => countB - countA || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0)
  );
}

/**
 * Indented `key: count` lines
 */
export function countLines(counts: Record<string, number>, indent = '  '): string[] {
  return sortedCounts(counts).map(([key, count]) => `${indent}${key}: ${count}`);
}

/**
 * `Kind/name` plus the namespace in parentheses when there is one
 */
export function resourceLabel(kind: string | undefined, name: string | undefined, namespace?: string): string {
  const label = `${kind || 'Unknown'}/${name || '<unnamed>'}`;
  return namespace ? `${label} (${namespace})` : label;
}
