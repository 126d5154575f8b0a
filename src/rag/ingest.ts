import { rm } from "node:fs/promises";
import path from "node:path";
import { PageChunker } from "./chunking/page-chunker.js";
import type { ChunkingStrategy } from "./chunking/types.js";
import type { AppConfig } from "./config.js";
import { ensureEmbeddingModel, type EmbeddingService } from "./embedding-service.js";
import { IngestionError, QueryCancelledError, errorMessage } from "./errors.js";
import type { FigureEnricher } from "./figure-enrichment.js";
import { extractPageFigures, type ExtractedFigure } from "./figure-extractor.js";
import { hashFile, listPdfs } from "./file-scanner.js";
import { KeyedLock } from "./keyed-lock.js";
import { logDegraded, type Logger } from "./logger.js";
import type { MetadataStore, NewFigure } from "./metadata-store.js";
import { loadImage, renderPdfPages } from "./page-renderer.js";
import { extractPdf, openPdf, type PdfDocument } from "./pdf-extractor.js";
import type { CitationRef, ExtractedDocument } from "./types.js";
import type { TextIndex } from "./vector-store.js";
import type { PageImage, VisualIndex } from "./visual-index.js";

export interface IngestOptions {
  /** re-embed, re-enrich and re-render even when the file hash is unchanged */
  force?: boolean;
  /** drop the document (and its ids) first; it comes back under a new doc_id */
  reset?: boolean;
  skipVisual?: boolean;
  signal?: AbortSignal;
}

export type IngestStatus = "ingested" | "unchanged" | "failed";

export interface IngestReport {
  filePath: string;
  docId: number | null;
  status: IngestStatus;
  pages: number;
  chunksAdded: number;
  chunksRemoved: number;
  figures: number;
  visualPages: number;
  error?: string;
}

export interface IngestorDeps {
  config: AppConfig;
  store: MetadataStore;
  textIndex: TextIndex;
  visualIndex: VisualIndex;
  embedder: EmbeddingService;
  enricher: FigureEnricher;
  logger: Logger;
  chunking?: ChunkingStrategy;
}

function emptyReport(filePath: string, status: IngestStatus, docId: number | null = null): IngestReport {
  return { filePath, docId, status, pages: 0, chunksAdded: 0, chunksRemoved: 0, figures: 0, visualPages: 0 };
}

/**
 * Writes metadata, text vectors, page images, figures and visual vectors for
 * PDFs. One document is ingested at a time per path; different paths may run
 * concurrently. Unchanged files are skipped unless forced.
 */
export class Ingestor {
  private readonly locks = new KeyedLock();
  private readonly logger: Logger;
  private readonly chunking: ChunkingStrategy;
  private modelChecked = false;

  constructor(private readonly deps: IngestorDeps) {
    this.logger = deps.logger.child({ component: "ingest" });
    this.chunking = deps.chunking ?? new PageChunker(deps.config.chunking);
  }

  async ingest(target: string, options: IngestOptions = {}): Promise<IngestReport[]> {
    const files = await listPdfs(target);
    this.logger.info({ target, files: files.length }, "Scanning for PDFs");

    const reports: IngestReport[] = [];
    for (const filePath of files) {
      if (options.signal?.aborted) throw new QueryCancelledError("ingest");
      try {
        reports.push(await this.ingestFile(filePath, options));
      } catch (err) {
        if (err instanceof QueryCancelledError) throw err;
        if (options.signal?.aborted) throw new QueryCancelledError("ingest");
        this.logger.error({ filePath, err }, "Ingestion failed");
        reports.push({ ...emptyReport(filePath, "failed"), error: errorMessage(err) });
      }
    }
    return reports;
  }

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestReport> {
    const abs = path.resolve(filePath);
    await this.checkEmbeddingModel();
    return this.locks.run(abs, () => this.runFile(abs, options));
  }

  /** Removes a document from every store. Its ids are gone for good. */
  async removeDocument(docId: number): Promise<void> {
    await this.deps.textIndex.removeDocument(docId);
    await this.deps.visualIndex.removeDocument(docId);
    this.deps.store.deleteDocument(docId);
    await rm(path.join(this.deps.config.paths.pagesDir, `doc_${docId}`), { recursive: true, force: true });
    await rm(path.join(this.deps.config.paths.figuresDir, `doc_${docId}`), { recursive: true, force: true });
  }

  private async checkEmbeddingModel(): Promise<void> {
    if (this.modelChecked) return;
    await ensureEmbeddingModel(this.deps.store, () => this.deps.textIndex.size(), this.deps.embedder.model, {
      record: true,
    });
    this.modelChecked = true;
  }

  private async runFile(filePath: string, options: IngestOptions): Promise<IngestReport> {
    const { store } = this.deps;
    const fileHash = await hashFile(filePath);
    let existing = store.getDocumentByPath(filePath);

    if (existing && options.reset) {
      this.logger.info({ filePath, docId: existing.docId }, "Resetting document");
      await this.removeDocument(existing.docId);
      existing = null;
    }

    if (existing && existing.fileHash === fileHash && existing.ingestedAt !== null && !options.force) {
      this.logger.info({ filePath, docId: existing.docId }, "Unchanged, skipping");
      return emptyReport(filePath, "unchanged", existing.docId);
    }

    // A previous run that stopped half-way left rows without vectors.
    const embedAll = options.force === true || existing === null || existing.ingestedAt === null;

    const pdf = await openPdf(filePath);
    try {
      const doc = await extractPdf(filePath, pdf);
      const docId = store.assignDocument({
        filePath,
        fileName: doc.source,
        fileHash,
        pageCount: doc.pages.length,
      });
      const report = emptyReport(filePath, "ingested", docId);
      report.pages = doc.pages.length;
      this.logger.info({ filePath, docId, pages: doc.pages.length }, "Ingesting document");

      const truncated = store.truncatePages(docId, doc.pages.length);
      await this.deps.textIndex.removeChunks(truncated);
      for (const page of doc.pages) store.upsertPage(docId, page.pageNumber, null);

      await this.ingestText(docId, doc, embedAll, report, options.signal);
      report.chunksRemoved += truncated.length;

      await this.ingestFigures(docId, pdf, doc, options.force === true, report);

      if (!options.skipVisual) {
        await this.ingestVisual(docId, filePath, options.force === true, report, options.signal);
      }

      store.markIngested(docId);
      this.logger.info({ ...report }, "Document ingested");
      return report;
    } catch (err) {
      if (err instanceof IngestionError || err instanceof QueryCancelledError) throw err;
      throw new IngestionError(filePath, `Ingestion of ${path.basename(filePath)} failed: ${errorMessage(err)}`, err);
    } finally {
      await pdf.destroy();
    }
  }

  private async ingestText(
    docId: number,
    doc: ExtractedDocument,
    embedAll: boolean,
    report: IngestReport,
    signal?: AbortSignal,
  ): Promise<void> {
    const { store, textIndex, embedder } = this.deps;
    const chunks = this.chunking.chunk(doc);

    const removed: CitationRef[] = [];
    const toEmbed: Array<CitationRef & { text: string }> = [];

    for (const page of doc.pages) {
      const onPage = chunks.filter((c) => c.page === page.pageNumber);
      const result = store.replacePageChunks(
        docId,
        page.pageNumber,
        onPage.map((c) => ({ text: c.text, sectionName: c.sectionName })),
      );
      for (const unitId of result.removed) removed.push({ docId, page: page.pageNumber, unitId });

      const fresh = new Set(result.added);
      result.ids.forEach((unitId, i) => {
        const chunk = onPage[i];
        if (chunk && (embedAll || fresh.has(unitId))) {
          toEmbed.push({ docId, page: page.pageNumber, unitId, text: chunk.text });
        }
      });
      report.chunksAdded += result.added.length;
    }

    report.chunksRemoved += removed.length;
    await textIndex.removeChunks(removed);

    if (toEmbed.length === 0) return;
    const vectors = await embedder.embedTexts(
      toEmbed.map((c) => c.text),
      {
        signal,
        onProgress: (done, total) => this.logger.debug({ docId, done, total }, "Embedding chunks"),
      },
    );
    await textIndex.upsertChunks(
      toEmbed.map((c, i) => ({ docId: c.docId, page: c.page, unitId: c.unitId, vector: vectors[i] ?? [] })),
    );
  }

  private async ingestFigures(
    docId: number,
    pdf: PdfDocument,
    doc: ExtractedDocument,
    force: boolean,
    report: IngestReport,
  ): Promise<void> {
    const { store, enricher, config } = this.deps;

    for (const page of doc.pages) {
      let extracted: ExtractedFigure[];
      try {
        extracted = await extractPageFigures(pdf, page.pageNumber, { figuresDir: config.paths.figuresDir, docId });
      } catch (err) {
        logDegraded(this.logger, "figures", `figure extraction failed on page ${page.pageNumber}: ${errorMessage(err)}`);
        continue;
      }

      const figures: NewFigure[] = [];
      for (const fig of extracted) {
        const prior = force ? null : store.getFigureByHash(docId, page.pageNumber, fig.contentHash);
        const enriched = prior
          ? { ocrText: prior.ocrText, enrichment: prior.enrichment }
          : await enricher.enrich(fig.png, `${docId}:${page.pageNumber}:${fig.contentHash.slice(0, 8)}`);
        figures.push({ contentHash: fig.contentHash, imageRef: fig.imageRef, ...enriched });
      }

      store.replacePageFigures(docId, page.pageNumber, figures);
      report.figures += figures.length;
    }
  }

  private async ingestVisual(
    docId: number,
    filePath: string,
    force: boolean,
    report: IngestReport,
    signal?: AbortSignal,
  ): Promise<void> {
    const { store, visualIndex, config } = this.deps;

    let refs: Map<number, string>;
    try {
      refs = await renderPdfPages(filePath, { pagesDir: config.paths.pagesDir, docId, force });
    } catch (err) {
      logDegraded(this.logger, "rendering", `page rendering failed for doc ${docId}: ${errorMessage(err)}`);
      return;
    }
    for (const [page, ref] of refs) store.upsertPage(docId, page, ref);

    if (!visualIndex.available) {
      logDegraded(this.logger, "visual", `visual index unavailable; pages of doc ${docId} rendered but not indexed`);
      return;
    }

    const images: PageImage[] = [];
    for (const [page, ref] of refs) {
      const png = await loadImage(config.paths.pagesDir, ref);
      if (png) images.push({ page, png });
    }

    try {
      await visualIndex.removeDocument(docId);
      report.visualPages = await visualIndex.indexPages(docId, images, signal);
    } catch (err) {
      if (err instanceof QueryCancelledError) throw err;
      logDegraded(this.logger, "visual", `visual indexing failed for doc ${docId}: ${errorMessage(err)}`);
    }
  }
}
