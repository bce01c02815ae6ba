/**
 * @file Open a client from a normalized AppConfig
 */
import path from "node:path";
import type { AppConfig, EmbeddingsConfig } from "../config/types";
import type { IVFStoreClient, PersistTarget } from "./types";
import type { FileIO } from "../storage/types";
import type { EmbedFn } from "../embeddings/types";
import type { ClusterFn, Logger } from "../types";
import { createNodeFileIO } from "../storage/node";
import { createOpenAIEmbedder } from "../embeddings/openai";
import { createKMeans } from "../ann/kmeans";
import { createClient, openStore } from "./create";

export type ClientDeps = {
  /** FileIO that holds the store file; default: Node FileIO rooted at dirname(storePath). */
  io?: FileIO;
  env?: Record<string, string | undefined>;
  fetch?: typeof fetch;
  logger?: Logger;
  cluster?: ClusterFn;
};

/** Env var consulted for the embeddings API key when none is configured. */
export const DEFAULT_API_KEY_ENV = "OPENAI_API_KEY";

function createEmbedder(emb: EmbeddingsConfig, deps: ClientDeps, logger: Logger): EmbedFn | undefined {
  const envName = emb.apiKeyEnv ?? DEFAULT_API_KEY_ENV;
  const env = deps.env ?? process.env;
  const apiKey = emb.apiKey ?? env[envName];
  if (!apiKey) {
    logger.warn(`[embeddings] no API key (set ${envName}); text search is disabled`);
    return undefined;
  }
  return createOpenAIEmbedder({
    apiKey,
    model: emb.model,
    baseURL: emb.baseURL,
    dimensions: emb.dimensions,
    fetch: deps.fetch,
  });
}

function persistTarget(storePath: string, io: FileIO | undefined): PersistTarget {
  if (io) {
    return { io, path: storePath };
  }
  return { io: createNodeFileIO(path.dirname(storePath)), path: path.basename(storePath) };
}

/** Open (or create) the configured store, attach an index, and build it when the store has rows. */
export async function createClientFromConfig(cfg: AppConfig, deps: ClientDeps = {}): Promise<IVFStoreClient<unknown>> {
  const logger = deps.logger ?? console;
  const dim = cfg.database?.dim;
  const persist = cfg.storePath ? persistTarget(cfg.storePath, deps.io) : undefined;
  if (!persist && dim === undefined) {
    throw new Error("config needs database.dim or storePath");
  }
  const store = persist ? await openStore(persist, dim) : undefined;
  const idx = cfg.index ?? {};
  const client = createClient<unknown>({
    dim,
    store,
    persist,
    embed: cfg.server?.embeddings ? createEmbedder(cfg.server.embeddings, deps, logger) : undefined,
    index: {
      metric: idx.metric,
      shortlistMetric: idx.shortlistMetric,
      nprobe: idx.nprobe,
      clusterCount: idx.clusterCount,
      fallbackFactor: idx.fallbackFactor,
      cluster: deps.cluster ?? createKMeans(idx.kmeans),
      logger,
    },
  });
  if ((idx.buildOnOpen ?? true) && client.size > 0) {
    client.build();
  }
  return client;
}
