/**
 * @file Small helpers for the HTTP server
 */
import type { AppConfig } from "../config/types";
import { hasOwn, isNumberArray, isObject } from "../util/guards";
import { httpError } from "./common/errors";

export const REDACTED = "[redacted]";

/** Normalize unknown to number[] when possible, else null. */
export function toNumberArray(v: unknown): number[] | null {
  return isNumberArray(v) ? v : null;
}

/** Copy of the config with secrets replaced, for safe exposure. */
export function redactConfig(cfg: AppConfig): AppConfig {
  const emb = cfg.server?.embeddings;
  if (!cfg.server || !emb?.apiKey) {
    return cfg;
  }
  return { ...cfg, server: { ...cfg.server, embeddings: { ...emb, apiKey: REDACTED } } };
}

export type ParsedVectorBody = { vector: number[]; meta: unknown };
export type ParsedSearchBody = { vector: number[]; k: number } | { text: string; k: number };

export const DEFAULT_K = 5;

/**
 * Validate a single vector row payload `{ vector, meta? }`.
 * @returns parsed body or null if invalid
 */
export function parseVectorBody(x: unknown): ParsedVectorBody | null {
  if (!isObject(x)) {
    return null;
  }
  const vector = toNumberArray(x.vector);
  if (!vector) {
    return null;
  }
  return { vector, meta: x.meta ?? null };
}

/**
 * Validate a bulk payload `{ rows: [...] }`.
 * @returns parsed rows or null if any row is invalid
 */
export function parseBulkBody(x: unknown): ParsedVectorBody[] | null {
  if (!hasOwn(x, "rows") || !Array.isArray(x.rows)) {
    return null;
  }
  const parsed: ParsedVectorBody[] = [];
  for (const r of x.rows) {
    const v = parseVectorBody(r);
    if (!v) {
      return null;
    }
    parsed.push(v);
  }
  return parsed;
}

/** Validate a search payload: `{ vector, k? }` or `{ text, k? }`. Throws 400 on bad input. */
export function parseSearchBody(x: unknown): ParsedSearchBody {
  if (!isObject(x)) {
    throw httpError(400, "vector:number[] or text:string required");
  }
  if (x.k !== undefined && typeof x.k !== "number") {
    throw httpError(400, "k must be a number");
  }
  const k = typeof x.k === "number" ? x.k : DEFAULT_K;
  const vector = toNumberArray(x.vector);
  if (vector) {
    return { vector, k };
  }
  if (typeof x.text === "string") {
    return { text: x.text, k };
  }
  throw httpError(400, "vector:number[] or text:string required");
}
