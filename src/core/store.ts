/**
 * @file Canonical record store: ids, vectors and metadata
 *
 * The store owns the authoritative collection. Ids come from a monotonically
 * increasing counter and are never reused after a delete. Every successful
 * mutation bumps `generation`, which lets an index built from an earlier
 * snapshot report itself as stale.
 */
import { DimensionMismatchError, NotFoundError } from "../errors";
import type { StoredRow, VectorRecord } from "../types";
import { isNumberArray } from "../util/guards";

export interface CoreStore<TMeta = unknown> {
  readonly dim: number;
  nextId: number;
  /** id -> { vector, meta }; vector and meta always travel together. */
  rows: Map<number, VectorRecord<TMeta>>;
  generation: number;
}

/**
 *
 */
export function createStore<TMeta = unknown>(dim: number): CoreStore<TMeta> {
  if (!Number.isInteger(dim) || dim <= 0) {
    throw new Error("dim must be positive integer");
  }
  return {
    dim,
    nextId: 0,
    rows: new Map<number, VectorRecord<TMeta>>(),
    generation: 0,
  };
}

/**
 *
 */
export function size<T>(s: CoreStore<T>): number {
  return s.rows.size;
}

/**
 *
 */
export function has<T>(s: CoreStore<T>, id: number): boolean {
  return s.rows.has(id);
}

/** Append a record and return its freshly assigned id. Components must be finite. */
export function add<T>(s: CoreStore<T>, vector: readonly number[], meta: T): number {
  if (vector.length !== s.dim) {
    throw new DimensionMismatchError(s.dim, vector.length);
  }
  // Components must survive the JSON round trip: no NaN or Infinity.
  if (!isNumberArray(vector)) {
    throw new RangeError("vector components must be finite numbers");
  }
  const id = s.nextId;
  s.rows.set(id, { vector: vector.slice(), meta });
  s.nextId++;
  s.generation++;
  return id;
}

/** Read a record by id; throws NotFoundError when absent. */
export function get<T>(s: CoreStore<T>, id: number): VectorRecord<T> {
  const row = s.rows.get(id);
  if (!row) {
    throw new NotFoundError(id);
  }
  return { vector: row.vector.slice(), meta: row.meta };
}

/** Look up without throwing or copying; for internal read paths. */
export function peek<T>(s: CoreStore<T>, id: number): Readonly<VectorRecord<T>> | undefined {
  return s.rows.get(id);
}

/** Remove a record. Returns true if removed, false if the id was absent. */
export function remove<T>(s: CoreStore<T>, id: number): boolean {
  if (!s.rows.delete(id)) {
    return false;
  }
  s.generation++;
  return true;
}

/** Snapshot of all live records in ascending id order. */
export function getAll<T>(s: CoreStore<T>): StoredRow<T>[] {
  const ids = Array.from(s.rows.keys()).sort((a, b) => a - b);
  return ids.map((id) => ({ id, ...get(s, id) }));
}
