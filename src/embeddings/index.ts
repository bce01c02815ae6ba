/**
 * @file Embeddings barrel
 */
export type { EmbedFn, OpenAIEmbeddingOptions } from "./types";
export { embedOpenAI, createOpenAIEmbedder, DEFAULT_EMBEDDING_MODEL, DEFAULT_OPENAI_BASE_URL } from "./openai";
