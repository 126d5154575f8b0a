import { formatCitation } from "./citations.js";
import type { EmbeddingService } from "./embedding-service.js";
import { QueryCancelledError, RetrievalError, errorMessage } from "./errors.js";
import { minMaxNormalize, rankEvidence } from "./fusion.js";
import { logDegraded, type Logger } from "./logger.js";
import type { MetadataStore } from "./metadata-store.js";
import { withTimeout } from "./timeout.js";
import type { EvidenceItem, EvidenceSet, PageHit, TextHit } from "./types.js";
import type { TextIndex } from "./vector-store.js";
import type { VisualIndex } from "./visual-index.js";

export interface RetrieverOptions {
  textTopK: number;
  visualTopK: number;
  maxEvidenceItems: number;
  textWeight: number;
  visualWeight: number;
  textTimeoutMs: number;
  visualTimeoutMs: number;
}

export interface RetrieverDeps {
  store: Pick<MetadataStore, "getChunk" | "getPage" | "getFiguresForPage">;
  textIndex: Pick<TextIndex, "search">;
  visualIndex: Pick<VisualIndex, "available" | "search">;
  embedder: Pick<EmbeddingService, "embedQuery">;
  logger: Logger;
  options: RetrieverOptions;
}

/**
 * Text and page-visual retrieval fused into one bounded evidence set.
 * Read-only against every store.
 */
export class HybridRetriever {
  private readonly logger: Logger;

  constructor(private readonly deps: RetrieverDeps) {
    this.logger = deps.logger.child({ component: "retriever" });
  }

  async retrieve(
    question: string,
    kText = this.deps.options.textTopK,
    kVisual = this.deps.options.visualTopK,
    options: { signal?: AbortSignal } = {},
  ): Promise<EvidenceSet> {
    const degraded: string[] = [];
    if (!this.deps.visualIndex.available) degraded.push("visual");

    const [textHits, pageHits] = await Promise.all([
      this.searchText(question, kText, options.signal),
      this.searchVisual(question, kVisual, options.signal).catch((err: unknown): PageHit[] => {
        if (err instanceof QueryCancelledError) throw err;
        logDegraded(this.logger, "visual", `visual lookup failed, continuing with text only: ${errorMessage(err)}`);
        if (!degraded.includes("visual")) degraded.push("visual");
        return [];
      }),
    ]);

    const items = [...this.joinText(textHits), ...this.joinVisual(pageHits)];
    const ranked = rankEvidence(items, this.deps.options.maxEvidenceItems);

    this.logger.info(
      {
        textHits: textHits.length,
        pageHits: pageHits.length,
        evidence: ranked.length,
        dropped: items.length - ranked.length,
        degraded,
      },
      "Retrieved evidence",
    );

    return { question, items: ranked, degraded };
  }

  private async searchText(question: string, k: number, signal?: AbortSignal): Promise<TextHit[]> {
    if (k <= 0) return [];
    try {
      return await withTimeout(
        "text index lookup",
        this.deps.options.textTimeoutMs,
        async (s) => {
          const vector = await this.deps.embedder.embedQuery(question, s);
          return this.deps.textIndex.search(vector, k);
        },
        signal,
      );
    } catch (err) {
      if (err instanceof QueryCancelledError) throw err;
      throw new RetrievalError(`Text index lookup failed: ${errorMessage(err)}`, err);
    }
  }

  private async searchVisual(question: string, k: number, signal?: AbortSignal): Promise<PageHit[]> {
    if (k <= 0) return [];
    return withTimeout(
      "visual index lookup",
      this.deps.options.visualTimeoutMs,
      (s) => this.deps.visualIndex.search(question, k, s),
      signal,
    );
  }

  /** Hits whose metadata rows are not there yet are skipped, not errors. */
  private joinText(hits: TextHit[]): EvidenceItem[] {
    const normalized = minMaxNormalize(hits.map((h) => h.score));
    const items: EvidenceItem[] = [];
    hits.forEach((hit, i) => {
      const ref = { docId: hit.docId, page: hit.page, unitId: hit.chunkId };
      const chunk = this.deps.store.getChunk(ref);
      if (!chunk) {
        this.logger.debug({ ref }, "Chunk not yet available in metadata store");
        return;
      }
      items.push({
        kind: "chunk",
        docId: chunk.docId,
        page: chunk.page,
        chunkId: chunk.chunkId,
        sectionName: chunk.sectionName,
        text: chunk.text,
        score: this.deps.options.textWeight * (normalized[i] ?? 0),
        citations: [formatCitation(ref)],
      });
    });
    return items;
  }

  /** A page hit grounds image-level claims, so the page's figures come along. */
  private joinVisual(hits: PageHit[]): EvidenceItem[] {
    const normalized = minMaxNormalize(hits.map((h) => h.score));
    const items: EvidenceItem[] = [];
    hits.forEach((hit, i) => {
      if (!this.deps.store.getPage(hit.docId, hit.page)) {
        this.logger.debug({ docId: hit.docId, page: hit.page }, "Page not yet available in metadata store");
        return;
      }
      const score = this.deps.options.visualWeight * (normalized[i] ?? 0);
      const figures = this.deps.store.getFiguresForPage(hit.docId, hit.page);
      const tokens = figures.map((f) =>
        formatCitation({ docId: f.docId, page: f.page, unitId: f.figureId }),
      );

      items.push({ kind: "page", docId: hit.docId, page: hit.page, score, citations: tokens });
      figures.forEach((figure, j) => {
        items.push({
          kind: "figure",
          docId: figure.docId,
          page: figure.page,
          figureId: figure.figureId,
          ocrText: figure.ocrText,
          enrichment: figure.enrichment,
          score,
          citations: tokens.slice(j, j + 1),
        });
      });
    });
    return items;
  }
}
