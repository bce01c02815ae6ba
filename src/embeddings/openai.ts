/**
 * @file OpenAI-compatible embeddings provider
 */
import type { EmbedFn, OpenAIEmbeddingOptions } from "./types";
import { EmbeddingProviderError } from "../errors";
import { errorMessage, hasOwn, isNumberArray, isObject } from "../util/guards";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

function readEmbeddings(json: unknown): number[][] {
  if (!hasOwn(json, "data") || !Array.isArray(json.data)) {
    throw new EmbeddingProviderError("embeddings response has no data[]");
  }
  return json.data.map((d: unknown, i: number) => {
    if (!hasOwn(d, "embedding") || !isNumberArray(d.embedding)) {
      throw new EmbeddingProviderError(`embeddings response item ${i} has no numeric embedding`);
    }
    return d.embedding;
  });
}

function readErrorMessage(json: unknown, status: number): string {
  if (hasOwn(json, "error") && isObject(json.error) && typeof json.error.message === "string") {
    return json.error.message;
  }
  return `embeddings request failed with status ${status}`;
}

/** Embed a batch of texts in one request; order of the result follows `texts`. */
export async function embedOpenAI(texts: string[], opts: OpenAIEmbeddingOptions): Promise<number[][]> {
  const doFetch = opts.fetch ?? fetch;
  const url = `${(opts.baseURL ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "")}/embeddings`;
  const payload: Record<string, unknown> = { model: opts.model ?? DEFAULT_EMBEDDING_MODEL, input: texts };
  if (opts.dimensions !== undefined) {
    payload.dimensions = opts.dimensions;
  }
  const res = await (async () => {
    try {
      return await doFetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${opts.apiKey}`,
        },
        body: JSON.stringify(payload),
      });
    } catch (e) {
      throw new EmbeddingProviderError(`embeddings request failed: ${errorMessage(e)}`);
    }
  })();
  const json: unknown = await res.json().catch((e: unknown) => {
    throw new EmbeddingProviderError(`embeddings response is not JSON: ${errorMessage(e)}`, res.status);
  });
  if (!res.ok) {
    throw new EmbeddingProviderError(readErrorMessage(json, res.status), res.status);
  }
  const out = readEmbeddings(json);
  if (out.length !== texts.length) {
    throw new EmbeddingProviderError(`expected ${texts.length} embeddings, got ${out.length}`, res.status);
  }
  return out;
}

/** Single-text EmbedFn bound to the given provider options. */
export function createOpenAIEmbedder(opts: OpenAIEmbeddingOptions): EmbedFn {
  return async (text: string) => {
    const [vec] = await embedOpenAI([text], opts);
    return vec;
  };
}
