/**
 * @file Unit tests for top-k helpers
 */
import { pushTopK, byDistanceThenId } from "./topk";

describe("util/topk", () => {
  it("keeps the k smallest in ascending order", () => {
    const out: number[] = [];
    for (const x of [5, 1, 4, 2, 3, 0]) {
      pushTopK(out, x, 3, (a, b) => a - b);
    }
    expect(out).toEqual([0, 1, 2]);
  });

  it("keeps fewer than k when fewer arrive", () => {
    const out: number[] = [];
    pushTopK(out, 2, 5, (a, b) => a - b);
    pushTopK(out, 1, 5, (a, b) => a - b);
    expect(out).toEqual([1, 2]);
  });

  it("breaks distance ties by id", () => {
    const out: { id: number; distance: number }[] = [];
    pushTopK(out, { id: 7, distance: 0.5 }, 2, byDistanceThenId);
    pushTopK(out, { id: 3, distance: 0.5 }, 2, byDistanceThenId);
    pushTopK(out, { id: 9, distance: 0.1 }, 2, byDistanceThenId);
    expect(out.map((h) => h.id)).toEqual([9, 3]);
  });
});
