/**
 * Counts rows per key. Rows whose key is null are skipped. Keys keep the
 * order in which they were first seen.
 */
export function countBy<T, K>(rows: Iterable<T>, keyOf: (row: T) => K | null): Map<K, number> {
  const counts = new Map<K, number>();

  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return counts;
}

/** Count descending; ties stay in first-seen order. */
export function rankByCount<K>(counts: Map<K, number>, limit?: number): [K, number][] {
  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function countDistinct<T, K>(rows: Iterable<T>, keyOf: (row: T) => K | null): number {
  const seen = new Set<K>();

  for (const row of rows) {
    const key = keyOf(row);
    if (key !== null) seen.add(key);
  }

  return seen.size;
}
