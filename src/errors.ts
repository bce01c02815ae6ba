/**
 * @file Error types raised by the store, the metrics and the IVF index
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

/** Thrown when a vector's length differs from the store dimension. */
export class DimensionMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;
  constructor(expected: number, actual: number) {
    super(`dim mismatch: got ${actual}, want ${expected}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Thrown by get() when the id is not present. */
export class NotFoundError extends Error {
  readonly id: number;
  constructor(id: number) {
    super(`id ${id} not found`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

/** Thrown when build() runs against a store with no records. */
export class EmptyStoreError extends Error {
  constructor() {
    super("cannot build index: store is empty");
    this.name = "EmptyStoreError";
  }
}

/** Thrown when a search needs a built index and none exists. */
export class IndexNotBuiltError extends Error {
  constructor() {
    super("index not built: call build() first");
    this.name = "IndexNotBuiltError";
  }
}

/** Thrown when a persisted store document is malformed. */
export class CorruptDataError extends Error {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`corrupt store data: ${detail}`, options);
    this.name = "CorruptDataError";
  }
}

/** Thrown when a metric identifier is not one of the supported names. */
export class UnknownMetricError extends Error {
  readonly metric: string;
  constructor(metric: string, supported: readonly string[]) {
    super(`Unsupported metric: ${metric}. Supported metrics: ${supported.join(", ")}`);
    this.name = "UnknownMetricError";
    this.metric = metric;
  }
}

/** Thrown when a clustering collaborator returns output that breaks its contract. */
export class ClusteringContractError extends Error {
  constructor(detail: string) {
    super(`clustering contract violated: ${detail}`);
    this.name = "ClusteringContractError";
  }
}

/** Thrown when the embedding provider fails or answers with an unusable body. */
export class EmbeddingProviderError extends Error {
  readonly status?: number;
  constructor(message: string, status?: number) {
    super(message);
    this.name = "EmbeddingProviderError";
    this.status = status;
  }
}
