/**
 * Statistics helpers shared by the concrete aggregate kinds.
 *
 * Counters saturate at `Number.MAX_SAFE_INTEGER` instead of losing
 * integer precision. Everything here is pure.
 */

export const MAX_COUNT = Number.MAX_SAFE_INTEGER;

/** Frequency table: observed variant name → occurrence count. */
export type FrequencyTable = ReadonlyMap<string, number>;

export function saturatingAdd(a: number, b: number): number {
  const sum = a + b;
  return sum > MAX_COUNT ? MAX_COUNT : sum;
}

/** Never goes below zero. */
export function saturatingSub(a: number, b: number): number {
  return a > b ? a - b : 0;
}

/**
 * Nearest-rank percentile over an unsorted sample set.
 *
 * Sorts a copy and picks the element at `floor(len * p / 100)`.
 * No interpolation. Returns `null` when there is no element at that rank
 * (always the case for an empty set).
 */
export function nearestRankPercentile(
  samples: readonly number[],
  percentile: number,
): number | null {
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.floor((sorted.length * percentile) / 100);
  return sorted[rank] ?? null;
}

export function percentile99(samples: readonly number[]): number | null {
  return nearestRankPercentile(samples, 99);
}

/** Key-wise saturating sum of two frequency tables. */
export function mergeFrequencies(a: FrequencyTable, b: FrequencyTable): Map<string, number> {
  const merged = new Map(a);
  for (const [key, count] of b) {
    merged.set(key, saturatingAdd(merged.get(key) ?? 0, count));
  }
  return merged;
}

/**
 * Highest-count key, or `null` for an empty table.
 * Ties go to the lexicographically smallest key so the result does not
 * depend on insertion order.
 */
export function mostUsed(table: FrequencyTable): string | null {
  let best: string | null = null;
  let bestCount = -1;
  for (const [key, count] of table) {
    if (count > bestCount || (count === bestCount && best !== null && key < best)) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

/** Sorted union of two sets. */
export function unionSorted(a: Iterable<string>, b: Iterable<string>): string[] {
  return [...new Set([...a, ...b])].sort();
}

/**
 * `sum / count` formatted with two decimals.
 * A zero denominator yields `"NaN"` (or `"Infinity"`); callers only bump
 * the numerator together with the denominator.
 */
export function formatRatio(sum: number, count: number): string {
  return (sum / count).toFixed(2);
}
