/**
 * @file Clustering collaborator contract
 *
 * The index never assumes how clusters are computed. It asks for `k`
 * clusters and checks that the answer is usable before replacing its
 * partition: one assignment per input, each pointing at an existing
 * centroid, and every centroid in the input space.
 */
import type { ClusterResult } from "../types";
import { ClusteringContractError } from "../errors";

/** One cluster per ~10 vectors, at least one. */
export function defaultClusterCount(n: number): number {
  return Math.floor(n / 10) + 1;
}

/**
 *
 */
export function validateClusterResult(res: ClusterResult, n: number, dim: number): void {
  if (!Array.isArray(res.centroids) || res.centroids.length === 0) {
    throw new ClusteringContractError("no centroids returned");
  }
  const assigned = Array.isArray(res.assignment) ? res.assignment.length : 0;
  if (assigned !== n) {
    throw new ClusteringContractError(`expected ${n} assignments, got ${assigned}`);
  }
  const k = res.centroids.length;
  for (let c = 0; c < k; c++) {
    if (res.centroids[c].length !== dim) {
      throw new ClusteringContractError(`centroid ${c} has length ${res.centroids[c].length}, want ${dim}`);
    }
  }
  for (let i = 0; i < n; i++) {
    const a = res.assignment[i];
    if (!Number.isInteger(a) || a < 0 || a >= k) {
      throw new ClusteringContractError(`assignment ${i} is ${a}, want an integer in [0, ${k})`);
    }
  }
}
