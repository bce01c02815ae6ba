/**
 * @file Inverted File (IVF) index over a shared store
 *
 * Why: restrict each query to the clusters whose centroids sit nearest to
 * it, then rank only those clusters' members exactly.
 *
 * Notes:
 * - The index borrows the store; it never copies or freezes it. Mutations
 *   after build() leave the partition stale until the next build(); the
 *   store's generation counter makes that observable via ivf_isStale().
 * - build() replaces the partition wholesale. There is no incremental path:
 *   ivf_addBulk() inserts and then rebuilds.
 * - Clusters are shortlisted with `shortlistMetric` (cosine unless
 *   configured), independently of the ranking `metric`.
 */
import type { CoreStore } from "../core/store";
import { add, getAll, has } from "../core/store";
import type { ClusterFn, DistanceFn, IVFOptions, IVFStats, Logger, Metric, SearchHit } from "../types";
import { DimensionMismatchError, EmptyStoreError, IndexNotBuiltError } from "../errors";
import { getDistanceFn, resolveMetric } from "../util/similarity";
import { defaultClusterCount, validateClusterResult } from "./cluster";
import { createKMeans } from "./kmeans";
import { bf_search, rankIds, toHits } from "./bruteforce";

export type IVFState<TMeta> = {
  type: "ivf";
  store: CoreStore<TMeta>;
  nprobe: number;
  metric: Metric;
  distance: DistanceFn;
  shortlistMetric: Metric;
  shortlistDistance: DistanceFn;
  fallbackFactor: number;
  clusterCount?: number;
  cluster: ClusterFn;
  logger: Logger;
  built: boolean;
  /** Store generation captured by the last successful build. */
  builtGeneration: number;
  centroids: number[][];
  /** Posting lists: cluster id -> store ids. */
  lists: number[][];
  /** Inverse of `lists`: store id -> cluster id. */
  assignment: Map<number, number>;
};

function positiveInteger(name: string, v: number | undefined, fallback: number): number {
  const x = v ?? fallback;
  if (!Number.isInteger(x) || x < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${String(v)}`);
  }
  return x;
}

/** Create an unbuilt index over `store`. Metric names are validated here, not at query time. */
export function createIVFState<TMeta>(store: CoreStore<TMeta>, opts: IVFOptions = {}): IVFState<TMeta> {
  const metric = resolveMetric(opts.metric ?? "cosine");
  const shortlistMetric = resolveMetric(opts.shortlistMetric ?? "cosine");
  const nprobe = positiveInteger("nprobe", opts.nprobe, 1);
  const clusterCount = opts.clusterCount === undefined ? undefined : positiveInteger("clusterCount", opts.clusterCount, 1);
  const fallbackFactor = opts.fallbackFactor ?? 2;
  if (!Number.isFinite(fallbackFactor) || fallbackFactor < 1) {
    throw new RangeError(`fallbackFactor must be a number >= 1, got ${String(opts.fallbackFactor)}`);
  }
  return {
    type: "ivf",
    store,
    nprobe,
    metric,
    distance: getDistanceFn(metric),
    shortlistMetric,
    shortlistDistance: getDistanceFn(shortlistMetric),
    fallbackFactor,
    clusterCount,
    cluster: opts.cluster ?? createKMeans(),
    logger: opts.logger ?? console,
    built: false,
    builtGeneration: -1,
    centroids: [],
    lists: [],
    assignment: new Map<number, number>(),
  };
}

/** Recompute the partition from a full store snapshot. */
export function ivf_build<TMeta>(h: IVFState<TMeta>): void {
  const snapshot = getAll(h.store);
  if (snapshot.length === 0) {
    throw new EmptyStoreError();
  }
  const n = snapshot.length;
  const k = h.clusterCount ?? defaultClusterCount(n);
  const res = h.cluster(
    snapshot.map((r) => r.vector),
    k,
  );
  validateClusterResult(res, n, h.store.dim);
  const lists: number[][] = res.centroids.map(() => []);
  const assignment = new Map<number, number>();
  for (let i = 0; i < n; i++) {
    const c = res.assignment[i];
    lists[c].push(snapshot[i].id);
    assignment.set(snapshot[i].id, c);
  }
  h.centroids = res.centroids.map((c) => c.slice());
  h.lists = lists;
  h.assignment = assignment;
  h.built = true;
  h.builtGeneration = h.store.generation;
  const max = lists.reduce((m, l) => Math.max(m, l.length), 0);
  const avg = n / lists.length;
  h.logger.info(`[IVF] built ${lists.length} cluster(s) over ${n} vector(s); avg list size ${avg.toFixed(2)}, max ${max}`);
}

/** Cluster ids in ascending shortlist distance from `q`; ties keep cluster id order. */
export function ivf_rankClusters<TMeta>(h: IVFState<TMeta>, q: readonly number[]): number[] {
  return h.centroids
    .map((c, id) => ({ id, d: h.shortlistDistance(q, c) }))
    .sort((a, b) => a.d - b.d || a.id - b.id)
    .map((x) => x.id);
}

/**
 * Live ids drawn from the probed clusters. When they number fewer than k, whole
 * clusters keep being pulled in shortlist order until the pool reaches
 * fallbackFactor*k or every cluster is used.
 */
export function ivf_candidates<TMeta>(h: IVFState<TMeta>, q: readonly number[], k: number): number[] {
  const order = ivf_rankClusters(h, q);
  const probe = Math.min(h.nprobe, order.length);
  const out: number[] = [];
  // Ids deleted since the build do not count toward k.
  const take = (c: number) => {
    for (const id of h.lists[c]) {
      if (has(h.store, id)) {
        out.push(id);
      }
    }
  };
  for (let i = 0; i < probe; i++) {
    take(order[i]);
  }
  if (out.length >= k) {
    return out;
  }
  const target = h.fallbackFactor * k;
  for (let i = probe; i < order.length && out.length < target; i++) {
    take(order[i]);
  }
  return out;
}

/**
 *
 */
export function ivf_search<TMeta>(h: IVFState<TMeta>, q: readonly number[], k: number): SearchHit<TMeta>[] {
  if (!h.built) {
    throw new IndexNotBuiltError();
  }
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
  if (q.length !== h.store.dim) {
    throw new DimensionMismatchError(h.store.dim, q.length);
  }
  const candidates = ivf_candidates(h, q, k);
  return toHits(h.store, rankIds(h.store, candidates, q, k, h.distance));
}

/** Insert each pair in order, then rebuild. Inserts already applied stay if a later one fails. */
export function ivf_addBulk<TMeta>(h: IVFState<TMeta>, vectors: readonly (readonly number[])[], metas: readonly TMeta[]): number[] {
  if (vectors.length !== metas.length) {
    throw new RangeError(`got ${vectors.length} vectors but ${metas.length} metadata entries`);
  }
  const ids = vectors.map((v, i) => add(h.store, v, metas[i]));
  ivf_build(h);
  return ids;
}

/** True once the store has changed since the last successful build. */
export function ivf_isStale<TMeta>(h: IVFState<TMeta>): boolean {
  return h.built && h.store.generation !== h.builtGeneration;
}

/**
 *
 */
export function ivf_stats<TMeta>(h: IVFState<TMeta>): IVFStats {
  if (!h.built) {
    return { built: false };
  }
  const sizes = h.lists.map((l) => l.length);
  const vectors = sizes.reduce((a, b) => a + b, 0);
  return {
    built: true,
    clusters: sizes.length,
    vectors,
    avgClusterSize: vectors / sizes.length,
    minClusterSize: sizes.reduce((m, x) => Math.min(m, x), Infinity),
    maxClusterSize: sizes.reduce((m, x) => Math.max(m, x), 0),
    emptyClusters: sizes.filter((x) => x === 0).length,
    nprobe: h.nprobe,
    stale: ivf_isStale(h),
  };
}

/** Evaluate IVF by comparing with bruteforce top-k; returns average recall and latency (ms). */
export function ivf_evaluate<TMeta>(
  h: IVFState<TMeta>,
  queries: readonly (readonly number[])[],
  k: number,
): { recall: number; latency: number } {
  let sumRecall = 0;
  let sumLatency = 0;
  for (const q of queries) {
    const t0 = Date.now();
    const hits = ivf_search(h, q, k);
    sumLatency += Date.now() - t0;
    const truth = bf_search(h.store, q, k, h.distance);
    const ids = new Set(truth.map((x) => x.id));
    const inter = hits.filter((x) => ids.has(x.id)).length;
    sumRecall += inter / Math.max(1, truth.length);
  }
  const n = Math.max(1, queries.length);
  return { recall: sumRecall / n, latency: sumLatency / n };
}
