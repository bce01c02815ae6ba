/**
 * @file Distance functions for vector comparison
 *
 * Central registry mapping metric names to their distance functions. All
 * three return a dissimilarity, so callers sort ascending regardless of the
 * metric:
 * - cosine: 1 - a·b / (‖a‖‖b‖ + ε)
 * - euclidean: ‖a - b‖₂
 * - negDot: -(a·b), for pre-normalized vectors
 *
 * Names are resolved once, when an index is constructed, so an unknown
 * identifier fails early instead of on the first query.
 */

import type { DistanceFn, Metric } from "../types";
import { UnknownMetricError } from "../errors";
import { dot, l2, norm } from "./math";

/** Guards the cosine denominator against zero-length vectors. */
export const COSINE_EPSILON = 1e-8;

/**
 *
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - dot(a, b) / (norm(a) * norm(b) + COSINE_EPSILON);
}

/**
 *
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  return l2(a, b);
}

/**
 *
 */
export function negDotDistance(a: readonly number[], b: readonly number[]): number {
  return -dot(a, b);
}

const DISTANCE: Record<Metric, DistanceFn> = {
  cosine: cosineDistance,
  euclidean: euclideanDistance,
  negDot: negDotDistance,
};

export const METRICS: readonly string[] = Object.keys(DISTANCE);

/** Narrow an arbitrary string to a supported metric name. */
export function isMetric(name: unknown): name is Metric {
  return typeof name === "string" && Object.prototype.hasOwnProperty.call(DISTANCE, name);
}

/** Validate a metric identifier; throws UnknownMetricError for anything unsupported. */
export function resolveMetric(name: unknown): Metric {
  if (!isMetric(name)) {
    throw new UnknownMetricError(String(name), METRICS);
  }
  return name;
}

/** Resolve a metric name to its distance function; throws UnknownMetricError otherwise. */
export function getDistanceFn(metric: string): DistanceFn {
  return DISTANCE[resolveMetric(metric)];
}
