/**
 * @file Tests for the default k-means collaborator
 */
import { kmeans, createKMeans, createRng } from "./kmeans";

describe("ann/kmeans", () => {
  it("rng is deterministic per seed and stays in [0, 1)", () => {
    const a = createRng(7);
    const b = createRng(7);
    for (let i = 0; i < 100; i++) {
      const x = a();
      expect(x).toBe(b());
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it("separates two well-apart groups", () => {
    const near = [
      [0, 0],
      [0.2, 0.1],
      [0.1, 0.3],
      [0.3, 0.2],
      [0.15, 0.05],
    ];
    const far = [
      [10, 10],
      [10.2, 9.9],
      [9.8, 10.1],
      [10.1, 10.3],
      [9.9, 9.7],
    ];
    const { centroids, assignment } = kmeans([...near, ...far], 2, { seed: 3 });
    expect(centroids).toHaveLength(2);
    const first = assignment.slice(0, 5);
    const second = assignment.slice(5);
    expect(new Set(first).size).toBe(1);
    expect(new Set(second).size).toBe(1);
    expect(first[0]).not.toBe(second[0]);
  });

  it("returns k centroids even when n < k, leaving the extras empty", () => {
    const { centroids, assignment } = kmeans(
      [
        [1, 0],
        [0, 1],
      ],
      4,
    );
    expect(centroids).toHaveLength(4);
    expect(assignment).toHaveLength(2);
    expect(new Set(assignment)).toEqual(new Set([0, 1]));
  });

  it("handles empty input", () => {
    expect(kmeans([], 3)).toEqual({ centroids: [], assignment: [] });
  });

  it("is reproducible for a given seed", () => {
    const rng = createRng(11);
    const data = Array.from({ length: 40 }, () => [rng(), rng(), rng()]);
    const run = createKMeans({ seed: 5, iters: 4 });
    expect(run(data, 5)).toEqual(run(data, 5));
  });

  it("does not mutate its input", () => {
    const data = [
      [1, 2],
      [3, 4],
      [5, 6],
    ];
    kmeans(data, 2);
    expect(data).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
  });
});
