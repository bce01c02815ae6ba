/**
 * Math helpers for similarity/distance.
 *
 * @file Centralize hot-path math kernels (dot, norm, L2 distance) so the
 * metrics, k-means and the bruteforce scan share one implementation.
 */

/**
 *
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  // eslint-disable-next-line -- high performance
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    s += a[i] * b[i];
  }
  return s;
}

/**
 *
 */
export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

/** Squared L2 distance; cheaper than `l2` when only the order matters. */
export function l2sq(a: readonly number[], b: readonly number[]): number {
  // eslint-disable-next-line -- high performance
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    s += d * d;
  }
  return s;
}

/**
 *
 */
export function l2(a: readonly number[], b: readonly number[]): number {
  return Math.sqrt(l2sq(a, b));
}
