import type { BucketedTable, NormalizedTable, NormalizeSpec } from '../types.js';

/**
 * Orders and trims a bucketed table for display.
 *
 * The knobs compose in this order:
 *   1. fixed order (calendar charts) or plain string sort of the keys
 *   2. sortMax  — sort by count and keep |sortMax| entries; positive keeps
 *                 them ascending, negative descending
 *   3. maxKeys  — bar charts: keep only the last maxKeys keys
 *      foldOthers — pie charts: keep the maxKeys largest, sum the rest into
 *                 a single "<n> others" entry
 *
 * Array.prototype.sort is stable, so equal counts keep their previous order.
 */
export function normalize(
  { table, order }: BucketedTable,
  { sortMax, maxKeys, foldOthers }: NormalizeSpec
): NormalizedTable {
  const counts = new Map(table);
  const countOf = (key: string) => counts.get(key) ?? 0;

  let keys = order ? order.filter(key => counts.has(key)) : [...counts.keys()].sort();

  if (sortMax !== 0) {
    const descending = sortMax < 0;
    keys = keys.sort((a, b) => (descending ? countOf(b) - countOf(a) : countOf(a) - countOf(b)));
    const keep = Math.abs(sortMax);
    keys = descending ? keys.slice(0, keep) : keys.slice(-keep);
  }

  if (foldOthers) {
    return foldIntoOthers(keys, counts, maxKeys);
  }

  if (maxKeys > 0) {
    keys = keys.slice(-maxKeys);
  }

  return { keys, counts, othersKey: null };
}

function foldIntoOthers(keys: string[], counts: Map<string, number>, maxKeys: number): NormalizedTable {
  const ranked = [...keys].sort((a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0));
  if (maxKeys <= 0 || ranked.length <= maxKeys) {
    return { keys: ranked, counts, othersKey: null };
  }

  const kept = ranked.slice(0, maxKeys);
  const folded = ranked.slice(maxKeys);
  const othersKey = `${folded.length} others`;
  const display = new Map<string, number>();
  for (const key of kept) display.set(key, counts.get(key) ?? 0);
  display.set(othersKey, folded.reduce((sum, key) => sum + (counts.get(key) ?? 0), 0));

  return { keys: [...kept, othersKey], counts: display, othersKey };
}

/** Sum of the counts of the displayed keys. */
export function displayedTotal({ keys, counts }: NormalizedTable): number {
  return keys.reduce((sum, key) => sum + (counts.get(key) ?? 0), 0);
}
