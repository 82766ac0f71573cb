import type { MediaItemRef } from '../api/types.js';

export type SortCriteria = 'creation_time' | 'filename';
export type SortDirection = 'asc' | 'desc' | 'random';

export interface SortOptions {
  criteria: SortCriteria;
  direction: SortDirection;
}

/**
 * mulberry32: small 32-bit PRNG, good enough for shuffling test fixtures.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher–Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

const filenameCollator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

function compareBy(criteria: SortCriteria): (a: MediaItemRef, b: MediaItemRef) => number {
  if (criteria === 'filename') {
    return (a, b) => filenameCollator.compare(a.filename, b.filename);
  }
  return (a, b) => a.creationTime - b.creationTime;
}

/**
 * Orders fetched items and truncates to `maxCount`.
 *
 * Ascending and descending sorts are stable: ties keep fetch order in both
 * directions. `random` draws a fresh permutation from the whole set on every
 * call, so repeated calls may differ; pass `seed` to make it repeatable.
 * Truncation happens after ordering.
 */
export function order(
  items: readonly MediaItemRef[],
  sort: SortOptions,
  maxCount: number,
  seed?: number,
): MediaItemRef[] {
  let ordered: MediaItemRef[];

  if (sort.direction === 'random') {
    ordered = shuffle(items, seed === undefined ? Math.random : seededRandom(seed));
  } else {
    const compare = compareBy(sort.criteria);
    const sign = sort.direction === 'asc' ? 1 : -1;
    // Array.prototype.sort is stable, and negating the comparator keeps ties in place
    ordered = [...items].sort((a, b) => sign * compare(a, b));
  }

  return ordered.slice(0, Math.max(0, maxCount));
}
