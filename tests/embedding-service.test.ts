import { afterEach, describe, expect, it, vi } from "vitest";
import { RAG_CONFIG } from "../src/rag/config.js";
import { OpenRouterEmbeddingService, ensureEmbeddingModel } from "../src/rag/embedding-service.js";
import { ConfigurationError, QueryCancelledError, ServiceError, TimeoutError } from "../src/rag/errors.js";
import { OpenRouterClient } from "../src/rag/openrouter.js";

function settingsStore(initial: Record<string, string> = {}) {
  const values = new Map(Object.entries(initial));
  return {
    values,
    getSetting: (key: string) => values.get(key) ?? null,
    setSetting: (key: string, value: string) => {
      values.set(key, value);
    },
  };
}

describe("OpenRouterEmbeddingService", () => {
  it("embeds in batches and keeps input order", async () => {
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });
    const embeddings = vi
      .spyOn(client, "embeddings")
      .mockImplementation(async (_model, input) => input.map((t) => [typeof t === "string" ? Number(t.slice(1)) : -1]));
    const service = new OpenRouterEmbeddingService(client, "embed-model");

    const texts = Array.from({ length: 45 }, (_, i) => `t${i}`);
    const progress: number[] = [];
    const vectors = await service.embedTexts(texts, { onProgress: (done) => progress.push(done) });

    expect(embeddings).toHaveBeenCalledTimes(Math.ceil(45 / RAG_CONFIG.embeddingBatchSize));
    expect(vectors).toEqual(texts.map((_, i) => [i]));
    expect(progress.at(-1)).toBe(45);
  });

  it("prefixes queries with the retrieval instruction", async () => {
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });
    const embeddings = vi.spyOn(client, "embeddings").mockResolvedValue([[0.5, 0.5]]);
    const service = new OpenRouterEmbeddingService(client, "embed-model");

    await expect(service.embedQuery("inversion height")).resolves.toEqual([0.5, 0.5]);
    expect(embeddings).toHaveBeenCalledWith("embed-model", [`${RAG_CONFIG.queryPrefix}inversion height`], undefined);
  });
});

describe("OpenRouterClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("turns rate limiting into a retryable service error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("slow down", { status: 429 })));
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });

    const err = await client.embeddings("m", ["a"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({ service: "embeddings", status: 429, message: "embeddings API error (429): slow down" });
    expect(err instanceof ServiceError && err.isRetryable()).toBe(true);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Response.json({ data: [{ embedding: [1] }] })));
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });

    await expect(client.embeddings("m", ["a", "b"])).rejects.toThrow("embeddings returned 1 vectors for 2 inputs");
  });

  it("reports an aborted request as a cancellation", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init: { signal?: AbortSignal }) => {
        throw init.signal?.reason ?? new Error("aborted");
      }),
    );
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });
    const controller = new AbortController();
    controller.abort();

    const err = await client.embeddings("m", ["a"], controller.signal).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryCancelledError);
    expect(err).toMatchObject({ message: "embeddings request was cancelled" });
  });

  it("keeps a timeout as the abort reason", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init: { signal?: AbortSignal }) => {
        throw init.signal?.reason ?? new Error("aborted");
      }),
    );
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });
    const controller = new AbortController();
    const timeout = new TimeoutError("text index lookup", 50);
    controller.abort(timeout);

    await expect(client.embeddings("m", ["a"], controller.signal)).rejects.toBe(timeout);
  });

  it("does not retry client errors", () => {
    expect(new ServiceError({ service: "chat", message: "bad", status: 400 }).isRetryable()).toBe(false);
    expect(new ServiceError({ service: "chat", message: "down", status: 503 }).isRetryable()).toBe(true);
  });
});

describe("ensureEmbeddingModel", () => {
  it("records the model on first ingest", async () => {
    const settings = settingsStore();
    await ensureEmbeddingModel(settings, async () => 0, "model-a", { record: true });
    expect(settings.values.get("text_embedding_model")).toBe("model-a");
  });

  it("does not record when only checking", async () => {
    const settings = settingsStore();
    await ensureEmbeddingModel(settings, async () => 0, "model-a");
    expect(settings.values.size).toBe(0);
  });

  it("refuses a different model once the index holds vectors", async () => {
    const settings = settingsStore({ text_embedding_model: "model-a" });
    await expect(ensureEmbeddingModel(settings, async () => 3, "model-b", { record: true })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(settings.values.get("text_embedding_model")).toBe("model-a");
  });

  it("accepts a new model when the index is empty", async () => {
    const settings = settingsStore({ text_embedding_model: "model-a" });
    await ensureEmbeddingModel(settings, async () => 0, "model-b", { record: true });
    expect(settings.values.get("text_embedding_model")).toBe("model-b");
  });
});
