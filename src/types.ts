/**
 * @file Core type definitions for the vector store and IVF index
 *
 * This module defines the public types shared across the store, the
 * distance metrics, the clustering contract and the IVF index:
 * - Metric identifiers and distance function shape
 * - Record shapes returned by the store and by searches
 * - IVF construction options and stats output
 */

/**
 * Distance metric identifier. Every metric returns a dissimilarity:
 * lower is closer.
 * - 'cosine': 1 - cosine similarity, roughly in [0, 2]
 * - 'euclidean': L2 norm of the difference
 * - 'negDot': negated dot product, for pre-normalized vectors
 */
export type Metric = "cosine" | "euclidean" | "negDot";

export type DistanceFn = (a: readonly number[], b: readonly number[]) => number;

/** Result returned by get(): vector and meta for an id. */
export type VectorRecord<TMeta> = {
  vector: number[];
  meta: TMeta;
};

/** Row returned by getAll(): id + vector + meta. */
export type StoredRow<TMeta> = { id: number } & VectorRecord<TMeta>;

/** Search result: the record plus its distance to the query (lower is closer). */
export type SearchHit<TMeta> = StoredRow<TMeta> & {
  distance: number;
};

/** Output of a clustering collaborator. */
export type ClusterResult = {
  centroids: number[][];
  /** One cluster id per input vector, each in [0, centroids.length). */
  assignment: number[];
};

/** Clustering collaborator: partitions `vectors` into (at most) `k` clusters. */
export type ClusterFn = (vectors: readonly number[][], k: number) => ClusterResult;

/** Minimal logging surface; `console` satisfies it. */
export type Logger = Pick<Console, "info" | "warn">;

/** IVF index construction options. */
export type IVFOptions = {
  /** Clusters probed per query. default: 1 */
  nprobe?: number;
  /** Ranking metric for candidates. default: 'cosine' */
  metric?: Metric | string;
  /** Metric used to shortlist clusters by centroid. default: 'cosine' */
  shortlistMetric?: Metric | string;
  /** Candidate target, as a multiple of k, when probed clusters undershoot. default: 2 */
  fallbackFactor?: number;
  /** Fixed cluster count; default heuristic is floor(n/10)+1. */
  clusterCount?: number;
  /** Clustering collaborator; default is seeded k-means. */
  cluster?: ClusterFn;
  logger?: Logger;
};

export type IVFStats =
  | { built: false }
  | {
      built: true;
      clusters: number;
      vectors: number;
      avgClusterSize: number;
      minClusterSize: number;
      maxClusterSize: number;
      emptyClusters: number;
      nprobe: number;
      stale: boolean;
    };
