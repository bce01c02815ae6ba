/**
 * @file Top-K result collection for similarity search
 *
 * Maintains the K best results in sorted order while candidates stream in,
 * so ranking never sorts the full candidate set. Order is given by a
 * comparator; the head of the array is the best result.
 */

export type Compare<T> = (a: T, b: T) => number;

/**
 * Insert `hit` into `out` (kept ascending under `compare`) and trim to `k`.
 * A hit that does not beat the current worst of a full list is dropped.
 */
export function pushTopK<T>(out: T[], hit: T, k: number, compare: Compare<T>): void {
  if (out.length >= k) {
    if (compare(hit, out[out.length - 1]) >= 0) {
      return;
    }
    out[out.length - 1] = hit;
  } else {
    out.push(hit);
  }
  for (let i = out.length - 1; i > 0 && compare(out[i], out[i - 1]) < 0; i--) {
    const t = out[i];
    out[i] = out[i - 1];
    out[i - 1] = t;
  }
}

/** Ascending distance, then ascending id. */
export function byDistanceThenId(a: { distance: number; id: number }, b: { distance: number; id: number }): number {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  return a.id - b.id;
}
