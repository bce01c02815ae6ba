/**
 * @file Config types: single source for AppConfig and its sections
 */
import type { Metric } from "../types";
import type { KMeansOptions } from "../ann/kmeans";

export type CorsOptions =
  | boolean
  | {
      origin?: string | string[];
      allowMethods?: string[];
      allowHeaders?: string[];
      exposeHeaders?: string[];
      maxAge?: number;
      credentials?: boolean;
    };

export type EmbeddingsConfig = {
  provider?: "openai";
  /** If set, read API key from this env var name (default: OPENAI_API_KEY) */
  apiKeyEnv?: string;
  /** Explicit API key (not recommended to commit) */
  apiKey?: string;
  model?: string;
  baseURL?: string;
  dimensions?: number;
};

export type ServerOptions = {
  port?: number;
  host?: string;
  cors?: CorsOptions;
  embeddings?: EmbeddingsConfig;
};

export type DatabaseOptions = {
  /** Vector dimension for a store created from scratch; checked against a loaded store. */
  dim?: number;
};

export type IndexConfig = {
  metric?: Metric;
  shortlistMetric?: Metric;
  nprobe?: number;
  clusterCount?: number;
  fallbackFactor?: number;
  kmeans?: KMeansOptions;
  /** Build the index right after opening a non-empty store. default: true */
  buildOnOpen?: boolean;
};

export type AppConfig = {
  name?: string;
  /** Store file; relative paths resolve against the config file's directory. */
  storePath?: string;
  database?: DatabaseOptions;
  index?: IndexConfig;
  server?: ServerOptions;
};
