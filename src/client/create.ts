/**
 * @file Client facade: thin wrappers over the store and the IVF index
 *
 * - createClient: wraps a new (or given) store with an index
 * - openStore: loads a persisted store, or creates an empty one when the
 *   target does not exist yet
 */
import type { ClientOptions, IVFStoreClient, PersistTarget } from "./types";
import type { CoreStore } from "../core/store";
import { add, createStore, get, getAll, has, remove, size } from "../core/store";
import {
  createIVFState,
  ivf_addBulk,
  ivf_build,
  ivf_evaluate,
  ivf_isStale,
  ivf_search,
  ivf_stats,
} from "../ann/ivf";
import { loadStore, saveStore } from "../persist/store_io";
import { DimensionMismatchError, EmbeddingProviderError } from "../errors";
import { hasErrorCode } from "../util/guards";

/** Create a client over a fresh store of `opts.dim`, or over `opts.store`. */
export function createClient<TMeta = unknown>(opts: ClientOptions<TMeta>): IVFStoreClient<TMeta> {
  const store = opts.store ?? createStoreFor<TMeta>(opts.dim);
  if (opts.dim !== undefined && opts.dim !== store.dim) {
    throw new DimensionMismatchError(opts.dim, store.dim);
  }
  const index = createIVFState(store, opts.index);
  const embed = opts.embed;
  const persist = opts.persist;

  const client: IVFStoreClient<TMeta> = {
    store,
    index,
    dim: store.dim,
    get size() {
      return size(store);
    },
    canSave: persist !== undefined,
    canEmbed: embed !== undefined,
    add: (vector, meta) => add(store, vector, meta),
    get: (id) => get(store, id),
    has: (id) => has(store, id),
    delete: (id) => remove(store, id),
    getAll: () => getAll(store),
    addBulk: (vectors, metas) => ivf_addBulk(index, vectors, metas),
    build: () => {
      ivf_build(index);
      return ivf_stats(index);
    },
    search: (query, k) => ivf_search(index, query, k),
    searchText: async (text, k) => {
      if (!embed) {
        throw new Error("text search requires an embeddings provider");
      }
      const vector = await embed(text);
      if (vector.length !== store.dim) {
        throw new EmbeddingProviderError(
          `embedding provider returned ${vector.length} dimensions, store expects ${store.dim}`,
        );
      }
      return ivf_search(index, vector, k);
    },
    stats: () => ivf_stats(index),
    isStale: () => ivf_isStale(index),
    evaluate: (queries, k) => ivf_evaluate(index, queries, k),
    save: async () => {
      if (!persist) {
        throw new Error("no store path configured");
      }
      await saveStore(store, persist.io, persist.path);
    },
  };
  return client;
}

function createStoreFor<TMeta>(dim: number | undefined): CoreStore<TMeta> {
  if (dim === undefined) {
    throw new Error("dim is required when no store is given");
  }
  return createStore<TMeta>(dim);
}

/**
 * Load the store at `target`, or create an empty store of `dim` when the
 * file does not exist. A loaded store whose dimension differs from `dim`
 * raises DimensionMismatchError.
 */
export async function openStore(target: PersistTarget, dim?: number): Promise<CoreStore<unknown>> {
  try {
    const store = await loadStore(target.io, target.path);
    if (dim !== undefined && store.dim !== dim) {
      throw new DimensionMismatchError(dim, store.dim);
    }
    return store;
  } catch (e) {
    if (hasErrorCode(e) && e.code === "ENOENT") {
      return createStoreFor<unknown>(dim);
    }
    throw e;
  }
}
