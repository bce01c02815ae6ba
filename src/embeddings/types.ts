/**
 * @file Embedding provider contract
 *
 * `embed` turns text into a vector of the store's dimension. It may fail
 * (network, rate limit); retry and pacing between calls belong to the
 * caller.
 */
export type EmbedFn = (text: string) => Promise<number[]>;

export type OpenAIEmbeddingOptions = {
  apiKey: string;
  /** default: text-embedding-3-small */
  model?: string;
  /** default: https://api.openai.com/v1 */
  baseURL?: string;
  /** Requested output dimension, for models that support shortening. */
  dimensions?: number;
  fetch?: typeof fetch;
};
