/**
 * @file Tests for the OpenAI-compatible embeddings provider (fake fetch)
 */
import { embedOpenAI, createOpenAIEmbedder } from "./openai";
import { EmbeddingProviderError } from "../errors";

function fakeFetch(status: number, body: unknown) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
  });
}

describe("embeddings/openai", () => {
  it("posts model and input with bearer auth and returns vectors in order", async () => {
    const f = fakeFetch(200, { data: [{ embedding: [0.1, 0.2] }, { embedding: [0.3, 0.4] }] });
    const out = await embedOpenAI(["a", "b"], { apiKey: "test-secret", baseURL: "http://emb.local/v1/", fetch: f });
    expect(out).toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
    expect(f).toHaveBeenCalledTimes(1);
    const [url, init] = f.mock.calls[0];
    expect(url).toBe("http://emb.local/v1/embeddings");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({ model: "text-embedding-3-small", input: ["a", "b"] });
  });

  it("forwards requested dimensions", async () => {
    const f = fakeFetch(200, { data: [{ embedding: [1, 2, 3] }] });
    const embed = createOpenAIEmbedder({ apiKey: "test-secret", model: "m", dimensions: 3, fetch: f });
    expect(await embed("hello")).toEqual([1, 2, 3]);
    expect(JSON.parse(String(f.mock.calls[0][1]?.body))).toEqual({ model: "m", input: ["hello"], dimensions: 3 });
  });

  it("surfaces provider errors with status, without retrying", async () => {
    const f = fakeFetch(429, { error: { message: "Rate limit reached" } });
    const err = await embedOpenAI(["x"], { apiKey: "test-secret", fetch: f }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    expect(err).toMatchObject({ message: "Rate limit reached", status: 429 });
    expect(f).toHaveBeenCalledTimes(1);
  });

  it("wraps network failures", async () => {
    const f = vi.fn(async () => {
      throw new Error("ECONNREFUSED");
    });
    await expect(embedOpenAI(["x"], { apiKey: "test-secret", fetch: f })).rejects.toThrow(
      "embeddings request failed: ECONNREFUSED",
    );
  });

  it("rejects malformed bodies", async () => {
    await expect(embedOpenAI(["x"], { apiKey: "test-secret", fetch: fakeFetch(200, { data: [{}] }) })).rejects.toThrow(
      /item 0 has no numeric embedding/,
    );
    await expect(embedOpenAI(["x"], { apiKey: "test-secret", fetch: fakeFetch(200, {}) })).rejects.toThrow(
      /has no data\[\]/,
    );
    await expect(embedOpenAI(["x", "y"], { apiKey: "test-secret", fetch: fakeFetch(200, { data: [{ embedding: [1] }] }) })).rejects.toThrow(
      /expected 2 embeddings, got 1/,
    );
  });
});
