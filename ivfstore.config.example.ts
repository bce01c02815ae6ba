/**
 * @file Executable config example (TS)
 * Copy to ivfstore.config.ts (or .mjs/.json) next to where the server starts.
 */
import { defineConfig } from "./src/config";

export default defineConfig({
  name: "docs",
  // Relative to this file; created on first save when absent
  storePath: ".ivfstore/docs.json",
  database: { dim: 1536 },
  index: { metric: "cosine", nprobe: 4, kmeans: { iters: 10, seed: 42 } },
  server: {
    port: 8787,
    cors: true,
    // Key is read from OPENAI_API_KEY unless apiKeyEnv names another variable
    embeddings: { provider: "openai", model: "text-embedding-3-small" },
  },
});
