/**
 * @file Config normalization + validation (raw -> AppConfig)
 */
import path from "node:path";
import type { AppConfig, CorsOptions, EmbeddingsConfig, IndexConfig, ServerOptions } from "./types";
import type { Metric } from "../types";
import { isObject } from "../util/guards";
import { isMetric, METRICS } from "../util/similarity";

export type RawAppConfig = AppConfig;

export type NormalizeOptions = {
  /** Directory that relative paths (storePath) resolve against. default: process.cwd() */
  baseDir?: string;
};

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: RawAppConfig): RawAppConfig {
  return x;
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

function isPositiveInteger(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

function readMetric(v: unknown, key: string, errors: string[]): Metric | undefined {
  if (v === undefined) {
    return undefined;
  }
  if (!isMetric(v)) {
    errors.push(`${key} must be one of ${METRICS.join(", ")}`);
    return undefined;
  }
  return v;
}

function readPositiveInteger(v: unknown, key: string, errors: string[]): number | undefined {
  if (v === undefined) {
    return undefined;
  }
  if (!isPositiveInteger(v)) {
    errors.push(`${key} must be a positive integer`);
    return undefined;
  }
  return v;
}

function readString(v: unknown, key: string, errors: string[]): string | undefined {
  if (v === undefined) {
    return undefined;
  }
  if (typeof v !== "string") {
    errors.push(`${key} must be a string`);
    return undefined;
  }
  return v;
}

function readSection(v: unknown, key: string, errors: string[]): Record<string, unknown> {
  if (v === undefined) {
    return {};
  }
  if (!isObject(v)) {
    errors.push(`${key} must be an object`);
    return {};
  }
  return v;
}

function normalizeIndex(raw: unknown, errors: string[]): IndexConfig {
  const x = readSection(raw, "index", errors);
  const out: IndexConfig = {
    metric: readMetric(x.metric, "index.metric", errors),
    shortlistMetric: readMetric(x.shortlistMetric, "index.shortlistMetric", errors),
    nprobe: readPositiveInteger(x.nprobe, "index.nprobe", errors),
    clusterCount: readPositiveInteger(x.clusterCount, "index.clusterCount", errors),
  };
  if (x.fallbackFactor !== undefined) {
    const f = x.fallbackFactor;
    if (typeof f !== "number" || !Number.isFinite(f) || f < 1) {
      errors.push("index.fallbackFactor must be a finite number >= 1");
    } else {
      out.fallbackFactor = f;
    }
  }
  if (x.kmeans !== undefined) {
    const km = readSection(x.kmeans, "index.kmeans", errors);
    const iters = readPositiveInteger(km.iters, "index.kmeans.iters", errors);
    const seed = km.seed;
    if (seed !== undefined && (typeof seed !== "number" || !Number.isInteger(seed))) {
      errors.push("index.kmeans.seed must be an integer");
    }
    out.kmeans = { iters, seed: typeof seed === "number" ? seed : undefined };
  }
  if (x.buildOnOpen !== undefined) {
    if (typeof x.buildOnOpen !== "boolean") {
      errors.push("index.buildOnOpen must be a boolean");
    } else {
      out.buildOnOpen = x.buildOnOpen;
    }
  }
  return out;
}

function normalizeCors(v: unknown, errors: string[]): CorsOptions | undefined {
  if (v === undefined || typeof v === "boolean") {
    return v;
  }
  if (!isObject(v)) {
    errors.push("server.cors must be a boolean or an object");
    return undefined;
  }
  const origin = v.origin;
  if (origin !== undefined && typeof origin !== "string" && !isStringArray(origin)) {
    errors.push("server.cors.origin must be a string or string[]");
  }
  const list = (key: "allowMethods" | "allowHeaders" | "exposeHeaders"): string[] | undefined => {
    const x = v[key];
    if (x === undefined) {
      return undefined;
    }
    if (!isStringArray(x)) {
      errors.push(`server.cors.${key} must be a string[]`);
      return undefined;
    }
    return x;
  };
  const maxAge = v.maxAge;
  if (maxAge !== undefined && typeof maxAge !== "number") {
    errors.push("server.cors.maxAge must be a number");
  }
  const credentials = v.credentials;
  if (credentials !== undefined && typeof credentials !== "boolean") {
    errors.push("server.cors.credentials must be a boolean");
  }
  return {
    origin: typeof origin === "string" || isStringArray(origin) ? origin : undefined,
    allowMethods: list("allowMethods"),
    allowHeaders: list("allowHeaders"),
    exposeHeaders: list("exposeHeaders"),
    maxAge: typeof maxAge === "number" ? maxAge : undefined,
    credentials: typeof credentials === "boolean" ? credentials : undefined,
  };
}

function normalizeEmbeddings(v: unknown, errors: string[]): EmbeddingsConfig | undefined {
  if (v === undefined) {
    return undefined;
  }
  const x = readSection(v, "server.embeddings", errors);
  if (x.provider !== undefined && x.provider !== "openai") {
    errors.push("server.embeddings.provider must be 'openai'");
  }
  return {
    provider: "openai",
    apiKeyEnv: readString(x.apiKeyEnv, "server.embeddings.apiKeyEnv", errors),
    apiKey: readString(x.apiKey, "server.embeddings.apiKey", errors),
    model: readString(x.model, "server.embeddings.model", errors),
    baseURL: readString(x.baseURL, "server.embeddings.baseURL", errors),
    dimensions: readPositiveInteger(x.dimensions, "server.embeddings.dimensions", errors),
  };
}

function normalizeServer(raw: unknown, errors: string[]): ServerOptions {
  const x = readSection(raw, "server", errors);
  const out: ServerOptions = {
    host: readString(x.host, "server.host", errors),
    cors: normalizeCors(x.cors, errors),
    embeddings: normalizeEmbeddings(x.embeddings, errors),
  };
  if (x.port !== undefined) {
    const p = x.port;
    if (typeof p !== "number" || !Number.isInteger(p) || p < 0 || p > 65535) {
      errors.push("server.port must be an integer in [0, 65535]");
    } else {
      out.port = p;
    }
  }
  return out;
}

/** Normalize raw config into runtime AppConfig. Throws listing every invalid field. */
export function normalizeConfig(raw: unknown, opts: NormalizeOptions = {}): AppConfig {
  if (!isObject(raw)) {
    throw new Error("config must be an object (JS/TS module export)");
  }
  const errors: string[] = [];
  const name = readString(raw.name, "name", errors);
  const storePath = readString(raw.storePath, "storePath", errors);
  const database = readSection(raw.database, "database", errors);
  const dim = readPositiveInteger(database.dim, "database.dim", errors);
  const index = normalizeIndex(raw.index, errors);
  const server = normalizeServer(raw.server, errors);
  if (errors.length > 0) {
    throw new Error(`invalid config: ${errors.join("; ")}`);
  }
  const baseDir = opts.baseDir ?? process.cwd();
  return {
    name,
    storePath: storePath ? path.resolve(baseDir, storePath) : undefined,
    database: { dim },
    index,
    server,
  } satisfies AppConfig;
}
