/**
 * @file Default clustering collaborator: seeded k-means
 *
 * Lloyd iterations over squared L2 with a deterministic xorshift32 RNG for
 * initial centroid selection, so the same input and seed always produce the
 * same partition.
 *
 * Notes:
 * - When n < k the chosen heads are duplicated; ties go to the lowest
 *   centroid id, so duplicates end up as empty clusters.
 * - A cluster that empties during refinement keeps its previous centroid.
 * - The returned assignment is recomputed against the final centroids.
 */
import type { ClusterFn, ClusterResult } from "../types";
import { l2sq } from "../util/math";

export type KMeansOptions = {
  iters?: number;
  seed?: number;
};

/**
 *
 */
export function createRng(seed: number): () => number {
  let s = seed >>> 0 || 1;
  return () => {
    // xorshift32
    let x = s;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    s = x >>> 0;
    return s / 0x100000000;
  };
}

function nearest(v: readonly number[], cents: readonly number[][]): number {
  let best = 0;
  let bestDist = Infinity;
  for (let c = 0; c < cents.length; c++) {
    const d = l2sq(v, cents[c]);
    if (d < bestDist) {
      bestDist = d;
      best = c;
    }
  }
  return best;
}

/** Partition `vectors` into exactly `k` clusters (some possibly empty). */
export function kmeans(vectors: readonly number[][], k: number, opts: KMeansOptions = {}): ClusterResult {
  const n = vectors.length;
  if (n === 0) {
    return { centroids: [], assignment: [] };
  }
  const kk = Math.max(1, Math.floor(k));
  const dim = vectors[0].length;
  const rng = createRng(opts.seed ?? 42);
  // Initialize with distinct random picks (or all of them if n<k)
  const chosen = new Set<number>();
  while (chosen.size < Math.min(kk, n)) {
    chosen.add(Math.floor(rng() * n));
  }
  const heads = Array.from(chosen, (idx) => vectors[idx].slice());
  const cents: number[][] = [];
  for (let c = 0; c < kk; c++) {
    cents.push(heads[c % heads.length].slice());
  }
  // Iterative refinement
  const iters = Math.max(1, opts.iters ?? 10);
  for (let it = 0; it < iters; it++) {
    const sums = cents.map(() => new Array<number>(dim).fill(0));
    const counts = new Array<number>(kk).fill(0);
    for (const v of vectors) {
      const best = nearest(v, cents);
      counts[best]++;
      const sum = sums[best];
      for (let d = 0; d < dim; d++) sum[d] += v[d];
    }
    for (let c = 0; c < kk; c++) {
      if (counts[c] === 0) continue; // keep previous
      cents[c] = sums[c].map((x) => x / counts[c]);
    }
  }
  const assignment = vectors.map((v) => nearest(v, cents));
  return { centroids: cents, assignment };
}

/** Bind options into a ClusterFn usable by the index. */
export function createKMeans(opts: KMeansOptions = {}): ClusterFn {
  return (vectors, k) => kmeans(vectors, k, opts);
}
