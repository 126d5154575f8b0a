import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { loadConfig } from "../src/rag/config.js";
import { QueryCancelledError } from "../src/rag/errors.js";
import type { EmbeddingService } from "../src/rag/embedding-service.js";
import { FigureEnricher, NoOpCaptioner, NoOpOcr } from "../src/rag/figure-enrichment.js";
import { Ingestor } from "../src/rag/ingest.js";
import type { MetadataStore } from "../src/rag/metadata-store.js";
import { TextIndex } from "../src/rag/vector-store.js";
import { StubVisualIndex } from "../src/rag/visual-index.js";
import { memoryStore, silentLogger } from "./helpers.js";

const pdf = vi.hoisted((): { pages: string[] } => ({ pages: [] }));

vi.mock("../src/rag/pdf-extractor.js", () => ({
  openPdf: async () => ({ destroy: async () => undefined }),
  extractPdf: async (filePath: string) => ({
    source: "paper.pdf",
    filePath,
    pages: pdf.pages.map((text, i) => ({ pageNumber: i + 1, text })),
  }),
}));

vi.mock("../src/rag/figure-extractor.js", () => ({
  extractPageFigures: async () => [],
}));

vi.mock("../src/rag/page-renderer.js", () => ({
  renderPdfPages: async () => new Map<number, string>(),
  loadImage: async () => null,
}));

const ABSTRACT = "Abstract\nWe study stable boundary layers.";
const RESULTS = "Results\nA temperature inversion was observed above the boundary layer.";

describe("Ingestor", () => {
  let dir: string;
  let file: string;
  let store: MetadataStore;
  let textIndex: TextIndex;
  let embedTexts: Mock<(texts: string[]) => Promise<number[][]>>;
  let ingestor: Ingestor;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "sciqa-ingest-"));
    file = path.join(dir, "paper.pdf");
    await writeFile(file, "%PDF-1.7 v1");
    pdf.pages = [ABSTRACT, RESULTS];

    const config = loadConfig({ SCIQA_DATA_DIR: path.join(dir, "data") });
    const logger = silentLogger();
    store = memoryStore();
    textIndex = new TextIndex(config.paths.textIndexDir);
    embedTexts = vi.fn(async (texts: string[]) => texts.map(() => [1, 0]));
    const embedder = {
      model: "embed-model",
      embedTexts,
      embedQuery: async () => [1, 0],
    } satisfies EmbeddingService;

    ingestor = new Ingestor({
      config,
      store,
      textIndex,
      visualIndex: new StubVisualIndex(logger),
      embedder,
      enricher: new FigureEnricher(new NoOpOcr(), new NoOpCaptioner(), logger, 1000),
      logger,
    });
  });

  afterEach(async () => {
    store.close();
    await rm(dir, { recursive: true, force: true });
  });

  const ids = (docId: number) => store.listChunks(docId).map((c) => [c.page, c.chunkId]);

  it("stores chunks, vectors and the embedding model on first ingest", async () => {
    const [report] = await ingestor.ingest(dir, { skipVisual: true });

    expect(report).toEqual({
      filePath: file,
      docId: 1,
      status: "ingested",
      pages: 2,
      chunksAdded: 2,
      chunksRemoved: 0,
      figures: 0,
      visualPages: 0,
    });
    expect(ids(1)).toEqual([
      [1, 0],
      [2, 0],
    ]);
    expect(store.getChunk({ docId: 1, page: 2, unitId: 0 })).toMatchObject({ sectionName: "Results", text: RESULTS });
    expect(store.getSetting("text_embedding_model")).toBe("embed-model");
    await expect(textIndex.size()).resolves.toBe(2);
  });

  it("skips an unchanged file", async () => {
    await ingestor.ingest(file, { skipVisual: true });
    const [report] = await ingestor.ingest(file, { skipVisual: true });

    expect(report).toMatchObject({ status: "unchanged", docId: 1 });
    expect(embedTexts).toHaveBeenCalledTimes(1);
  });

  it("keeps ids of unchanged chunks and never reuses removed ones", async () => {
    await ingestor.ingest(file, { skipVisual: true });

    await writeFile(file, "%PDF-1.7 v2");
    pdf.pages = [ABSTRACT, "Results\nNo inversion was observed."];
    const [report] = await ingestor.ingest(file, { skipVisual: true });

    expect(report).toMatchObject({ status: "ingested", docId: 1, chunksAdded: 1, chunksRemoved: 1 });
    expect(ids(1)).toEqual([
      [1, 0],
      [2, 1],
    ]);
    expect(embedTexts).toHaveBeenLastCalledWith(["Results\nNo inversion was observed."], expect.anything());
    await expect(textIndex.size()).resolves.toBe(2);
  });

  it("re-embeds everything when forced without changing ids", async () => {
    await ingestor.ingest(file, { skipVisual: true });
    const [report] = await ingestor.ingest(file, { skipVisual: true, force: true });

    expect(report).toMatchObject({ status: "ingested", docId: 1, chunksAdded: 0, chunksRemoved: 0 });
    expect(embedTexts).toHaveBeenCalledTimes(2);
    expect(embedTexts.mock.calls[1]?.[0]).toHaveLength(2);
    expect(ids(1)).toEqual([
      [1, 0],
      [2, 0],
    ]);
  });

  it("brings a reset document back under a new doc_id", async () => {
    await ingestor.ingest(file, { skipVisual: true });
    const [report] = await ingestor.ingest(file, { skipVisual: true, reset: true });

    expect(report).toMatchObject({ status: "ingested", docId: 2, chunksAdded: 2 });
    expect(store.getDocument(1)).toBeNull();
    expect(ids(2)).toEqual([
      [1, 0],
      [2, 0],
    ]);
    await expect(textIndex.size()).resolves.toBe(2);
  });

  it("stops at the first file once the run is cancelled", async () => {
    await writeFile(path.join(dir, "second.pdf"), "%PDF-1.7 other");
    const controller = new AbortController();
    embedTexts.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error("This operation was aborted");
    });

    await expect(ingestor.ingest(dir, { skipVisual: true, signal: controller.signal })).rejects.toBeInstanceOf(
      QueryCancelledError,
    );
    expect(embedTexts).toHaveBeenCalledTimes(1);
    expect(store.listDocuments().map((d) => d.ingestedAt)).toEqual([null]);
  });

  it("does not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(ingestor.ingest(file, { signal: controller.signal })).rejects.toThrow("ingest was cancelled");
    expect(store.listDocuments()).toEqual([]);
  });

  it("reports a missing path as a failure of the whole run", async () => {
    await expect(ingestor.ingest(path.join(dir, "missing.pdf"))).rejects.toThrow("No such file or directory");
  });
});
