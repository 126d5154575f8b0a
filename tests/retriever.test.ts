import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { QueryCancelledError, RetrievalError } from "../src/rag/errors.js";
import type { MetadataStore } from "../src/rag/metadata-store.js";
import { HybridRetriever, type RetrieverDeps, type RetrieverOptions } from "../src/rag/retriever.js";
import type { PageHit, TextHit } from "../src/rag/types.js";
import { StubVisualIndex } from "../src/rag/visual-index.js";
import { addDocument, captureLogger, degradedWarnings, memoryStore } from "./helpers.js";

const OPTIONS: RetrieverOptions = {
  textTopK: 12,
  visualTopK: 6,
  maxEvidenceItems: 16,
  textWeight: 1.0,
  visualWeight: 0.8,
  textTimeoutMs: 1000,
  visualTimeoutMs: 1000,
};

const never = <T>() => new Promise<T>(() => {});

describe("HybridRetriever", () => {
  let store: MetadataStore;

  beforeEach(() => {
    store = memoryStore();
    const docId = addDocument(store, "a.pdf");
    store.upsertPage(docId, 1, null);
    store.replacePageChunks(docId, 1, [
      { text: "alpha", sectionName: "Abstract" },
      { text: "beta", sectionName: null },
    ]);
    store.upsertPage(docId, 2, "doc_1/page-2.png");
    store.replacePageFigures(docId, 2, [
      { contentHash: "h", imageRef: "doc_1/fig-h.png", ocrText: "axis", enrichment: null },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  function build(overrides: Partial<RetrieverDeps> & { textHits?: TextHit[] } = {}) {
    const { logger, lines } = captureLogger();
    const textHits = overrides.textHits ?? [
      { docId: 1, page: 1, chunkId: 0, score: 0.9 },
      { docId: 1, page: 1, chunkId: 1, score: 0.5 },
    ];
    const deps: RetrieverDeps = {
      store,
      textIndex: { search: vi.fn(async () => textHits) },
      visualIndex: new StubVisualIndex(logger),
      embedder: { embedQuery: vi.fn(async () => [1, 0]) },
      logger,
      options: OPTIONS,
      ...overrides,
    };
    return { retriever: new HybridRetriever(deps), lines, deps };
  }

  it("falls back to text only with a degraded warning when no visual index is bound", async () => {
    const { retriever, lines } = build();
    const evidence = await retriever.retrieve("what is alpha?");

    expect(evidence.degraded).toEqual(["visual"]);
    expect(evidence.items.map((i) => i.citations)).toEqual([["[1:1:0]"], ["[1:1:1]"]]);
    expect(evidence.items.map((i) => i.score)).toEqual([1, 0]);
    expect(degradedWarnings(lines).map((l) => l.capability)).toEqual(["visual"]);
  });

  it("treats a visual timeout as an empty visual list", async () => {
    const { retriever, lines } = build({
      options: { ...OPTIONS, visualTimeoutMs: 20 },
      visualIndex: { available: true, search: () => never<PageHit[]>() },
    });
    const evidence = await retriever.retrieve("q");

    expect(evidence.items).toHaveLength(2);
    expect(evidence.degraded).toEqual(["visual"]);
    expect(degradedWarnings(lines).map((l) => l.msg)).toEqual([
      "Degraded mode: visual lookup failed, continuing with text only: visual index lookup timed out after 20ms",
    ]);
  });

  it("fails retryably when the text lookup times out", async () => {
    const { retriever } = build({
      options: { ...OPTIONS, textTimeoutMs: 20 },
      embedder: { embedQuery: () => never<number[]>() },
    });
    const err = await retriever.retrieve("q").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetrievalError);
    expect(err).toMatchObject({ message: "Text index lookup failed: text index lookup timed out after 20ms" });
    expect(err instanceof RetrievalError && err.isRetryable()).toBe(true);
  });

  it("returns an empty evidence set when both lookups are empty", async () => {
    const { retriever } = build({ textHits: [] });
    const evidence = await retriever.retrieve("q");
    expect(evidence.items).toEqual([]);
    expect(evidence.question).toBe("q");
  });

  it("expands a visual page hit into the page and its figures", async () => {
    const { retriever } = build({
      textHits: [{ docId: 1, page: 1, chunkId: 0, score: 0.4 }],
      visualIndex: { available: true, search: async () => [{ docId: 1, page: 2, score: 12.5 }] },
    });
    const evidence = await retriever.retrieve("q");

    expect(evidence.degraded).toEqual([]);
    expect(evidence.items).toEqual([
      {
        kind: "chunk",
        docId: 1,
        page: 1,
        chunkId: 0,
        sectionName: "Abstract",
        text: "alpha",
        score: 1,
        citations: ["[1:1:0]"],
      },
      { kind: "page", docId: 1, page: 2, score: 0.8, citations: ["[1:2:0]"] },
      {
        kind: "figure",
        docId: 1,
        page: 2,
        figureId: 0,
        ocrText: "axis",
        enrichment: null,
        score: 0.8,
        citations: ["[1:2:0]"],
      },
    ]);
  });

  it("skips index hits whose metadata is not there", async () => {
    const { retriever, lines } = build({
      textHits: [
        { docId: 1, page: 1, chunkId: 0, score: 0.9 },
        { docId: 9, page: 1, chunkId: 0, score: 0.8 },
      ],
      visualIndex: { available: true, search: async () => [{ docId: 9, page: 4, score: 1 }] },
    });
    const evidence = await retriever.retrieve("q");

    expect(evidence.items.map((i) => i.citations)).toEqual([["[1:1:0]"]]);
    expect(lines.filter((l) => l.msg === "Chunk not yet available in metadata store")).toHaveLength(1);
    expect(lines.filter((l) => l.msg === "Page not yet available in metadata store")).toHaveLength(1);
  });

  it("bounds the evidence set", async () => {
    const { retriever } = build({ options: { ...OPTIONS, maxEvidenceItems: 1 } });
    const evidence = await retriever.retrieve("q");
    expect(evidence.items.map((i) => i.citations)).toEqual([["[1:1:0]"]]);
  });

  it("passes k through to both indices", async () => {
    const search = vi.fn(async (): Promise<PageHit[]> => []);
    const { retriever, deps } = build({ visualIndex: { available: true, search } });
    await retriever.retrieve("q", 3, 2);
    expect(deps.textIndex.search).toHaveBeenCalledWith([1, 0], 3);
    expect(search).toHaveBeenCalledWith("q", 2, expect.any(AbortSignal));
  });

  it("surfaces cancellation", async () => {
    const { retriever } = build();
    const controller = new AbortController();
    controller.abort();
    await expect(retriever.retrieve("q", undefined, undefined, { signal: controller.signal })).rejects.toBeInstanceOf(
      QueryCancelledError,
    );
  });
});
