/**
 * @file Tests for the persisted store document format
 */
import { createStore, add, remove, getAll, get } from "../core/store";
import { encodeStore, decodeStore, toDocument, parseDocument } from "./serialize";
import { CorruptDataError } from "../errors";

const enc = (x: unknown) => new TextEncoder().encode(JSON.stringify(x));

describe("persist/serialize", () => {
  it("writes ids as string keys with dimension and next_id", () => {
    const s = createStore<{ t: string } | undefined>(2);
    add(s, [1, 2], { t: "a" });
    const gone = add(s, [3, 4], { t: "b" });
    add(s, [5, 6], undefined);
    remove(s, gone);
    expect(toDocument(s)).toEqual({
      dimension: 2,
      next_id: 3,
      vectors: { "0": [1, 2], "2": [5, 6] },
      metadata: { "0": { t: "a" }, "2": null },
    });
  });

  it("round-trips dimension, next_id, vectors and metadata", () => {
    const s = createStore<{ t: string; n: number[] }>(3);
    add(s, [0.1, -0.25, 3.5], { t: "a", n: [1] });
    add(s, [1e-7, 2, -8], { t: "b", n: [] });
    remove(s, 0);
    add(s, [4, 5, 6], { t: "c", n: [2, 3] });
    const back = decodeStore(encodeStore(s));
    expect(back.dim).toBe(3);
    expect(back.nextId).toBe(3);
    expect(getAll(back)).toEqual(getAll(s));
    expect(Array.from(back.rows.keys())).toEqual([1, 2]);
  });

  it("reloads undefined metadata as null", () => {
    const s = createStore<string | undefined>(1);
    add(s, [1], undefined);
    expect(get(s, 0).meta).toBeUndefined();
    const back = decodeStore(encodeStore(s));
    expect(get(back, 0).meta).toBeNull();
  });

  it("rejects bytes that are not JSON", () => {
    expect(() => decodeStore(new TextEncoder().encode("{nope"))).toThrow(CorruptDataError);
    expect(() => decodeStore(new Uint8Array([0xff, 0xfe]))).toThrow(/not valid JSON/);
  });

  it("rejects missing fields", () => {
    expect(() => decodeStore(enc({ dimension: 2, next_id: 0, vectors: {} }))).toThrow(/missing field 'metadata'/);
    expect(() => decodeStore(enc([1, 2]))).toThrow(/document must be an object/);
  });

  it("rejects wrong field types", () => {
    const base = { dimension: 2, next_id: 1, vectors: { "0": [1, 2] }, metadata: { "0": null } };
    expect(() => parseDocument({ ...base, dimension: "2" })).toThrow(/'dimension' must be a positive integer/);
    expect(() => parseDocument({ ...base, next_id: -1 })).toThrow(/'next_id' must be a non-negative integer/);
    expect(() => parseDocument({ ...base, vectors: [] })).toThrow(/'vectors' must be an object/);
    expect(() => parseDocument({ ...base, vectors: { "0": [1, "2"] } })).toThrow(/vector 0 must be an array of numbers/);
  });

  it("rejects vectors of the wrong length", () => {
    const doc = { dimension: 3, next_id: 1, vectors: { "0": [1, 2] }, metadata: { "0": null } };
    expect(() => parseDocument(doc)).toThrow(/vector 0 has length 2, want 3/);
  });

  it("rejects mismatched key sets", () => {
    expect(() => parseDocument({ dimension: 1, next_id: 2, vectors: { "0": [1] }, metadata: {} })).toThrow(
      /metadata missing for id 0/,
    );
    expect(() =>
      parseDocument({ dimension: 1, next_id: 2, vectors: { "0": [1] }, metadata: { "0": 1, "1": 2 } }),
    ).toThrow(/metadata for id 1 has no vector/);
  });

  it("rejects non-integer keys and ids at or above next_id", () => {
    expect(() => parseDocument({ dimension: 1, next_id: 5, vectors: { a: [1] }, metadata: { a: 1 } })).toThrow(
      /invalid id key 'a'/,
    );
    expect(() => parseDocument({ dimension: 1, next_id: 5, vectors: { "01": [1] }, metadata: { "01": 1 } })).toThrow(
      /invalid id key '01'/,
    );
    expect(() => parseDocument({ dimension: 1, next_id: 3, vectors: { "3": [1] }, metadata: { "3": 1 } })).toThrow(
      /id 3 is not below next_id 3/,
    );
  });

  it("keeps assigning ids from next_id after load", () => {
    const back = decodeStore(enc({ dimension: 1, next_id: 10, vectors: { "4": [1] }, metadata: { "4": "x" } }));
    expect(add(back, [2], "y")).toBe(10);
  });
});
