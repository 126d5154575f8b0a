import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OpenRouterClient } from "../src/rag/openrouter.js";
import { TextIndex } from "../src/rag/vector-store.js";
import {
  LocalVisualIndex,
  OpenRouterVisualEmbeddingService,
  StubVisualIndex,
  type VisualEmbeddingService,
} from "../src/rag/visual-index.js";
import { captureLogger, degradedWarnings } from "./helpers.js";

describe("vector indices", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "sciqa-vectors-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("searches an empty text index without creating it", async () => {
    const index = new TextIndex(path.join(dir, "text"));
    await expect(index.search([1, 0], 3)).resolves.toEqual([]);
    await expect(index.size()).resolves.toBe(0);
  });

  it("stores chunk vectors by citation and returns hits by similarity", async () => {
    const index = new TextIndex(path.join(dir, "text"));
    await index.upsertChunks([
      { docId: 1, page: 1, unitId: 0, vector: [1, 0] },
      { docId: 1, page: 2, unitId: 3, vector: [0, 1] },
      { docId: 2, page: 1, unitId: 0, vector: [0.6, 0.8] },
    ]);

    const hits = await index.search([1, 0], 2);
    expect(hits.map((h) => [h.docId, h.page, h.chunkId])).toEqual([
      [1, 1, 0],
      [2, 1, 0],
    ]);
    expect(hits[0]?.score).toBeCloseTo(1, 5);
    expect(hits[1]?.score).toBeCloseTo(0.6, 5);

    await index.upsertChunks([{ docId: 1, page: 1, unitId: 0, vector: [0, 1] }]);
    await expect(index.size()).resolves.toBe(3);

    await index.removeChunks([{ docId: 1, page: 2, unitId: 3 }]);
    await expect(index.removeDocument(1)).resolves.toBe(1);
    const rest = await index.search([1, 0], 5);
    expect(rest.map((h) => h.docId)).toEqual([2]);
  });

  it("indexes page images and answers page-level hits", async () => {
    const embedder: VisualEmbeddingService = {
      embedPage: async (png) => (png[0] === 1 ? [1, 0] : [0, 1]),
      embedQuery: async () => [1, 0],
    };
    const visual = new LocalVisualIndex(path.join(dir, "visual"), embedder);

    await expect(
      visual.indexPages(4, [
        { page: 1, png: new Uint8Array([1]) },
        { page: 2, png: new Uint8Array([2]) },
      ]),
    ).resolves.toBe(2);

    const hits = await visual.search("inversion profile", 1);
    expect(hits.map((h) => [h.docId, h.page])).toEqual([[4, 1]]);
    await expect(visual.removeDocument(4)).resolves.toBe(2);
  });

  it("stub visual index is always empty and says so", async () => {
    const { logger, lines } = captureLogger();
    const stub = new StubVisualIndex(logger);
    await expect(stub.search()).resolves.toEqual([]);
    await expect(stub.indexPages(7)).resolves.toBe(0);
    expect(degradedWarnings(lines).map((l) => l.msg)).toEqual([
      "Degraded mode: visual index unavailable; retrieving from text only",
      "Degraded mode: visual index unavailable; pages of doc 7 not indexed",
    ]);
  });
});

describe("OpenRouterVisualEmbeddingService", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function stubEmbeddings() {
    const bodies: unknown[] = [];
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init: { body: string }) => {
        bodies.push(JSON.parse(init.body));
        return Response.json({ data: [{ embedding: [0.25, 0.75] }] });
      }),
    );
    const client = new OpenRouterClient({ apiKey: "test-key", baseUrl: "http://localhost" });
    return { bodies, service: new OpenRouterVisualEmbeddingService(client, "page-embedder") };
  }

  it("sends the page as an image content part, not as text", async () => {
    const { bodies, service } = stubEmbeddings();

    await expect(service.embedPage(new Uint8Array([1, 2]))).resolves.toEqual([0.25, 0.75]);
    expect(bodies).toEqual([
      {
        model: "page-embedder",
        input: [{ content: [{ type: "image_url", image_url: { url: "data:image/png;base64,AQI=" } }] }],
      },
    ]);
  });

  it("embeds questions as plain text in the same space", async () => {
    const { bodies, service } = stubEmbeddings();

    await service.embedQuery("inversion profile");
    expect(bodies).toEqual([{ model: "page-embedder", input: ["inversion profile"] }]);
  });
});
