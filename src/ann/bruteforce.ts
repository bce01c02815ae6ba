/**
 * @file Exhaustive top-k scan
 *
 * Ranks every live record with the same ordering the IVF index uses
 * (ascending distance, ties by id). Serves as ground truth for recall
 * evaluation.
 */
import type { CoreStore } from "../core/store";
import { get, peek } from "../core/store";
import type { DistanceFn, SearchHit } from "../types";
import { DimensionMismatchError } from "../errors";
import { byDistanceThenId, pushTopK } from "../util/topk";

export type Ranked = { id: number; distance: number };

/** Rank `ids` against `q` and keep the best k; ids missing from the store are skipped. */
export function rankIds<TMeta>(
  store: CoreStore<TMeta>,
  ids: Iterable<number>,
  q: readonly number[],
  k: number,
  distance: DistanceFn,
): Ranked[] {
  const out: Ranked[] = [];
  for (const id of ids) {
    const row = peek(store, id);
    if (!row) {
      continue;
    }
    pushTopK(out, { id, distance: distance(q, row.vector) }, k, byDistanceThenId);
  }
  return out;
}

/** Materialize ranked ids into hits carrying copies of vector and meta. */
export function toHits<TMeta>(store: CoreStore<TMeta>, ranked: readonly Ranked[]): SearchHit<TMeta>[] {
  return ranked.map(({ id, distance }) => ({ id, ...get(store, id), distance }));
}

/**
 *
 */
export function bf_search<TMeta>(
  store: CoreStore<TMeta>,
  q: readonly number[],
  k: number,
  distance: DistanceFn,
): SearchHit<TMeta>[] {
  if (q.length !== store.dim) {
    throw new DimensionMismatchError(store.dim, q.length);
  }
  return toHits(store, rankIds(store, store.rows.keys(), q, k, distance));
}
