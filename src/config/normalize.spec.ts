/**
 * @file Specs: normalize + validation for AppConfig
 */
import path from "node:path";
import { defineConfig, normalizeConfig } from "./normalize";

describe("config/normalize", () => {
  it("defineConfig returns input for authoring ergonomics", () => {
    const cfg = defineConfig({ name: "a", database: { dim: 3 } });
    expect(cfg.name).toBe("a");
  });

  it("rejects non-object configs", () => {
    expect(() => normalizeConfig(null)).toThrow(/config must be an object/);
    expect(() => normalizeConfig([])).toThrow(/config must be an object/);
  });

  it("resolves storePath against baseDir and keeps provided values", () => {
    const base = path.resolve("/srv/app");
    const out = normalizeConfig(
      {
        name: "n",
        storePath: "data/db.json",
        database: { dim: 3 },
        index: { metric: "euclidean", nprobe: 2, fallbackFactor: 3, kmeans: { iters: 5, seed: 7 } },
        server: { port: 1234, cors: true, embeddings: { apiKeyEnv: "EMB_KEY" } },
      },
      { baseDir: base },
    );
    expect(out.name).toBe("n");
    expect(out.storePath).toBe(path.join(base, "data", "db.json"));
    expect(out.database).toEqual({ dim: 3 });
    expect(out.index).toMatchObject({ metric: "euclidean", nprobe: 2, fallbackFactor: 3, kmeans: { iters: 5, seed: 7 } });
    expect(out.server).toMatchObject({ port: 1234, cors: true, embeddings: { provider: "openai", apiKeyEnv: "EMB_KEY" } });
  });

  it("lists every invalid field in one error", () => {
    let message = "";
    try {
      normalizeConfig({ database: { dim: 0 }, index: { metric: "manhattan", nprobe: 1.5 }, server: { port: "80" } });
    } catch (e) {
      message = e instanceof Error ? e.message : String(e);
    }
    expect(message).toBe(
      "invalid config: database.dim must be a positive integer; " +
        "index.metric must be one of cosine, euclidean, negDot; " +
        "index.nprobe must be a positive integer; " +
        "server.port must be an integer in [0, 65535]",
    );
  });

  it("validates cors and embeddings sections", () => {
    expect(() => normalizeConfig({ server: { cors: "yes" } })).toThrow(/server.cors must be a boolean or an object/);
    expect(() => normalizeConfig({ server: { cors: { origin: 1 } } })).toThrow(/server.cors.origin must be a string or string\[\]/);
    expect(() => normalizeConfig({ server: { embeddings: { provider: "other" } } })).toThrow(
      /server.embeddings.provider must be 'openai'/,
    );
    expect(() => normalizeConfig({ index: { fallbackFactor: 0.5 } })).toThrow(/index.fallbackFactor must be a finite number >= 1/);
  });

  it("leaves storePath undefined when not set", () => {
    expect(normalizeConfig({ database: { dim: 2 } }).storePath).toBeUndefined();
  });
});
