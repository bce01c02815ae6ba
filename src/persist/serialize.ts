/**
 * @file Store document (de)serialization
 *
 * One file holds one store as a JSON document:
 *
 * ```json
 * { "dimension": 3, "next_id": 2,
 *   "vectors":  { "0": [1, 0, 0], "1": [0, 1, 0] },
 *   "metadata": { "0": { "t": "a" }, "1": null } }
 * ```
 *
 * Ids are string keys so the document stays valid for key-based formats;
 * decoding turns them back into integers. Decoding is all-or-nothing: any
 * schema violation raises CorruptDataError and no store is produced.
 */
import { createStore, type CoreStore } from "../core/store";
import { CorruptDataError } from "../errors";
import { hasOwn, isNonNegativeInteger, isNumberArray, isObject } from "../util/guards";

export type StoreDocument = {
  dimension: number;
  next_id: number;
  vectors: Record<string, number[]>;
  metadata: Record<string, unknown>;
};

const ID_KEY = /^(0|[1-9][0-9]*)$/;

/** Build the persisted document for a store. `undefined` metadata is written as null. */
export function toDocument<T>(s: CoreStore<T>): StoreDocument {
  const vectors: Record<string, number[]> = {};
  const metadata: Record<string, unknown> = {};
  for (const [id, row] of s.rows) {
    const key = String(id);
    vectors[key] = row.vector.slice();
    metadata[key] = row.meta === undefined ? null : row.meta;
  }
  return { dimension: s.dim, next_id: s.nextId, vectors, metadata };
}

/**
 *
 */
export function encodeStore<T>(s: CoreStore<T>): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(toDocument(s)));
}

/** Validate an untyped value against the document schema. */
export function parseDocument(raw: unknown): StoreDocument {
  if (!isObject(raw)) {
    throw new CorruptDataError("document must be an object");
  }
  for (const field of ["dimension", "next_id", "vectors", "metadata"] as const) {
    if (!hasOwn(raw, field)) {
      throw new CorruptDataError(`missing field '${field}'`);
    }
  }
  const { dimension, next_id: nextId, vectors, metadata } = raw;
  if (!isNonNegativeInteger(dimension) || dimension === 0) {
    throw new CorruptDataError("'dimension' must be a positive integer");
  }
  if (!isNonNegativeInteger(nextId)) {
    throw new CorruptDataError("'next_id' must be a non-negative integer");
  }
  if (!isObject(vectors)) {
    throw new CorruptDataError("'vectors' must be an object");
  }
  if (!isObject(metadata)) {
    throw new CorruptDataError("'metadata' must be an object");
  }
  const outVectors: Record<string, number[]> = {};
  for (const [key, vec] of Object.entries(vectors)) {
    if (!ID_KEY.test(key)) {
      throw new CorruptDataError(`invalid id key '${key}'`);
    }
    if (Number(key) >= nextId) {
      throw new CorruptDataError(`id ${key} is not below next_id ${nextId}`);
    }
    if (!isNumberArray(vec)) {
      throw new CorruptDataError(`vector ${key} must be an array of numbers`);
    }
    if (vec.length !== dimension) {
      throw new CorruptDataError(`vector ${key} has length ${vec.length}, want ${dimension}`);
    }
    if (!hasOwn(metadata, key)) {
      throw new CorruptDataError(`metadata missing for id ${key}`);
    }
    outVectors[key] = vec;
  }
  for (const key of Object.keys(metadata)) {
    if (!hasOwn(vectors, key)) {
      throw new CorruptDataError(`metadata for id ${key} has no vector`);
    }
  }
  return { dimension, next_id: nextId, vectors: outVectors, metadata };
}

/** Rebuild a store from a validated document. */
export function fromDocument(doc: StoreDocument): CoreStore<unknown> {
  const s = createStore<unknown>(doc.dimension);
  const ids = Object.keys(doc.vectors)
    .map(Number)
    .sort((a, b) => a - b);
  for (const id of ids) {
    const key = String(id);
    s.rows.set(id, { vector: doc.vectors[key].slice(), meta: doc.metadata[key] });
  }
  s.nextId = doc.next_id;
  return s;
}

/** Decode bytes produced by encodeStore(). Throws CorruptDataError on any schema violation. */
export function decodeStore(bytes: Uint8Array): CoreStore<unknown> {
  const parsed = ((): unknown => {
    try {
      return JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
    } catch (e) {
      throw new CorruptDataError("not valid JSON", { cause: e });
    }
  })();
  return fromDocument(parseDocument(parsed));
}
