/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Aggregates the store, the IVF index, persistence and the client facade.
 * Config loading, the HTTP server and the storage backends have their own
 * entrypoints (./config, ./http-server, ./storage/*, ./embeddings).
 */

/**
 * Shared types
 * @public
 */
export type {
  Metric,
  DistanceFn,
  VectorRecord,
  StoredRow,
  SearchHit,
  ClusterResult,
  ClusterFn,
  Logger,
  IVFOptions,
  IVFStats,
} from "./types";

/**
 * Errors
 * @public
 */
export {
  DimensionMismatchError,
  NotFoundError,
  EmptyStoreError,
  IndexNotBuiltError,
  CorruptDataError,
  UnknownMetricError,
  ClusteringContractError,
  EmbeddingProviderError,
} from "./errors";

/**
 * Store operations (functional state + ops)
 * @public
 */
export type { CoreStore } from "./core/store";
export { createStore, add, get, has, remove, getAll, size } from "./core/store";

/**
 * Distance metrics
 * @public
 */
export {
  cosineDistance,
  euclideanDistance,
  negDotDistance,
  getDistanceFn,
  resolveMetric,
  isMetric,
  METRICS,
  COSINE_EPSILON,
} from "./util/similarity";

/**
 * IVF index, exhaustive scan and the default clustering collaborator
 * @public
 */
export type { IVFState } from "./ann/ivf";
export {
  createIVFState,
  ivf_build,
  ivf_search,
  ivf_addBulk,
  ivf_stats,
  ivf_isStale,
  ivf_evaluate,
} from "./ann/ivf";
export { bf_search } from "./ann/bruteforce";
export { kmeans, createKMeans, type KMeansOptions } from "./ann/kmeans";
export { defaultClusterCount } from "./ann/cluster";

/**
 * Persistence
 * @public
 */
export { saveStore, loadStore, saveToFile, loadFromFile, type StoreDocument } from "./persist";
export type { FileIO } from "./storage/types";

/**
 * Client facade
 * @public
 */
export type { IVFStoreClient, ClientOptions, PersistTarget } from "./client/types";
export { createClient, openStore } from "./client/create";
