/**
 * @file Unit tests for distance functions
 */
import { cosineDistance, euclideanDistance, negDotDistance, getDistanceFn, isMetric, resolveMetric } from "./similarity";
import { UnknownMetricError } from "../errors";

describe("util/similarity", () => {
  it("cosine distance is ~0 for parallel vectors and ~2 for opposite", () => {
    expect(cosineDistance([1, 0, 0], [3, 0, 0])).toBeCloseTo(0, 6);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2, 6);
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1, 6);
  });

  it("cosine distance of a zero vector is 1 instead of NaN", () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it("euclidean distance is the L2 norm of the difference", () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });

  it("negDot is lower for larger dot products", () => {
    expect(negDotDistance([1, 2], [3, 4])).toBe(-11);
    expect(negDotDistance([1, 0], [1, 0])).toBeLessThan(negDotDistance([1, 0], [0.5, 0]));
  });

  it("resolves names and rejects unknown ones", () => {
    expect(getDistanceFn("cosine")).toBe(cosineDistance);
    expect(getDistanceFn("euclidean")).toBe(euclideanDistance);
    expect(getDistanceFn("negDot")).toBe(negDotDistance);
    expect(() => getDistanceFn("manhattan")).toThrow(UnknownMetricError);
    expect(() => getDistanceFn("manhattan")).toThrow(/Supported metrics: cosine, euclidean, negDot/);
  });

  it("resolveMetric returns the name or throws with the offending value", () => {
    expect(resolveMetric("euclidean")).toBe("euclidean");
    expect(() => resolveMetric(undefined)).toThrow(/Unsupported metric: undefined/);
  });

  it("isMetric ignores inherited keys", () => {
    expect(isMetric("toString")).toBe(false);
    expect(isMetric("negDot")).toBe(true);
    expect(isMetric(3)).toBe(false);
  });
});
