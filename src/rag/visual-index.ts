import type { AppConfig, Capabilities } from "./config.js";
import { logDegraded, type Logger } from "./logger.js";
import { pngDataUrl, type OpenRouterClient } from "./openrouter.js";
import type { PageHit } from "./types.js";
import { VectraCollection, readInt, type VectorRecord } from "./vector-store.js";

/** Page-image and query embeddings in one shared space (ColPali-style retriever). */
export interface VisualEmbeddingService {
  embedPage(png: Uint8Array, signal?: AbortSignal): Promise<number[]>;
  embedQuery(query: string, signal?: AbortSignal): Promise<number[]>;
}

export class OpenRouterVisualEmbeddingService implements VisualEmbeddingService {
  constructor(
    private readonly client: OpenRouterClient,
    private readonly model: string,
  ) {}

  async embedPage(png: Uint8Array, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.client.embeddings(
      this.model,
      [{ content: [{ type: "image_url", image_url: { url: pngDataUrl(png) } }] }],
      signal,
      "visual-embeddings",
    );
    return vector ?? [];
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.client.embeddings(this.model, [query], signal, "visual-embeddings");
    return vector ?? [];
  }
}

export interface PageImage {
  page: number;
  png: Uint8Array;
}

/**
 * `score_pages(query) -> (page_ref, score)[]` at page granularity. Holds
 * (docId, page) by value; the metadata store decides what exists.
 */
export interface VisualIndex {
  readonly available: boolean;
  search(question: string, k: number, signal?: AbortSignal): Promise<PageHit[]>;
  indexPages(docId: number, pages: PageImage[], signal?: AbortSignal): Promise<number>;
  removeDocument(docId: number): Promise<number>;
}

export class LocalVisualIndex implements VisualIndex {
  readonly available = true;
  private readonly collection: VectraCollection;

  constructor(
    folderPath: string,
    private readonly embedder: VisualEmbeddingService,
  ) {
    this.collection = new VectraCollection(folderPath);
  }

  async search(question: string, k: number, signal?: AbortSignal): Promise<PageHit[]> {
    const vector = await this.embedder.embedQuery(question, signal);
    const matches = await this.collection.query(vector, k);
    const hits: PageHit[] = [];
    for (const m of matches) {
      const docId = readInt(m.metadata, "docId");
      const page = readInt(m.metadata, "page");
      if (docId === null || page === null) continue;
      hits.push({ docId, page, score: m.score });
    }
    return hits;
  }

  async indexPages(docId: number, pages: PageImage[], signal?: AbortSignal): Promise<number> {
    const records: VectorRecord[] = [];
    for (const p of pages) {
      records.push({
        id: `${docId}:${p.page}`,
        vector: await this.embedder.embedPage(p.png, signal),
        metadata: { docId, page: p.page },
      });
    }
    await this.collection.upsert(records);
    return records.length;
  }

  async removeDocument(docId: number): Promise<number> {
    return this.collection.removeWhere("docId", docId);
  }
}

/** Stand-in when no visual retriever is configured: always empty. */
export class StubVisualIndex implements VisualIndex {
  readonly available = false;

  constructor(private readonly logger: Logger) {}

  async search(): Promise<PageHit[]> {
    logDegraded(this.logger, "visual", "visual index unavailable; retrieving from text only");
    return [];
  }

  async indexPages(docId: number): Promise<number> {
    logDegraded(this.logger, "visual", `visual index unavailable; pages of doc ${docId} not indexed`);
    return 0;
  }

  async removeDocument(): Promise<number> {
    return 0;
  }
}

export function createVisualIndex(
  config: AppConfig,
  capabilities: Capabilities,
  client: OpenRouterClient | null,
  logger: Logger,
): VisualIndex {
  const model = config.models.visualEmbedding;
  if (!capabilities.visual || !client || !model) {
    return new StubVisualIndex(logger);
  }
  return new LocalVisualIndex(
    config.paths.visualIndexDir,
    new OpenRouterVisualEmbeddingService(client, model),
  );
}
