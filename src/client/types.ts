/**
 * @file IVFStoreClient public facade types
 */
import type { CoreStore } from "../core/store";
import type { IVFState } from "../ann/ivf";
import type { EmbedFn } from "../embeddings/types";
import type { FileIO } from "../storage/types";
import type { IVFOptions, IVFStats, SearchHit, StoredRow, VectorRecord } from "../types";

export type PersistTarget = { io: FileIO; path: string };

export type ClientOptions<TMeta> = {
  /** Required unless `store` is given. */
  dim?: number;
  /** Existing store to wrap (e.g. one returned by loadStore). */
  store?: CoreStore<TMeta>;
  index?: IVFOptions;
  embed?: EmbedFn;
  persist?: PersistTarget;
};

export type IVFStoreClient<TMeta = unknown> = {
  readonly store: CoreStore<TMeta>;
  readonly index: IVFState<TMeta>;
  readonly dim: number;
  readonly size: number;
  /** True when a persist target is attached. */
  readonly canSave: boolean;
  /** True when an embedding provider is attached. */
  readonly canEmbed: boolean;
  add(vector: readonly number[], meta: TMeta): number;
  get(id: number): VectorRecord<TMeta>;
  has(id: number): boolean;
  delete(id: number): boolean;
  getAll(): StoredRow<TMeta>[];
  /** Insert every row, then rebuild the index. */
  addBulk(vectors: readonly (readonly number[])[], metas: readonly TMeta[]): number[];
  build(): IVFStats;
  search(query: readonly number[], k: number): SearchHit<TMeta>[];
  /** Embed `text`, then search with the resulting vector. */
  searchText(text: string, k: number): Promise<SearchHit<TMeta>[]>;
  stats(): IVFStats;
  isStale(): boolean;
  evaluate(queries: readonly (readonly number[])[], k: number): { recall: number; latency: number };
  save(): Promise<void>;
};
