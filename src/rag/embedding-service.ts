import { RAG_CONFIG } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { OpenRouterClient } from "./openrouter.js";

/** `embed(text) -> fixed-length float vector`, batched. */
export interface EmbeddingService {
  readonly model: string;
  embedTexts(
    texts: string[],
    options?: { signal?: AbortSignal; onProgress?: (done: number, total: number) => void },
  ): Promise<number[][]>;
  embedQuery(query: string, signal?: AbortSignal): Promise<number[]>;
}

export class OpenRouterEmbeddingService implements EmbeddingService {
  constructor(
    private readonly client: OpenRouterClient,
    readonly model: string,
  ) {}

  async embedTexts(
    texts: string[],
    options: { signal?: AbortSignal; onProgress?: (done: number, total: number) => void } = {},
  ): Promise<number[][]> {
    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += RAG_CONFIG.embeddingBatchSize) {
      batches.push({
        texts: texts.slice(i, i + RAG_CONFIG.embeddingBatchSize),
        startIdx: i,
      });
    }

    const results: number[][] = new Array<number[]>(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(RAG_CONFIG.embeddingConcurrency, queue.length) },
      async () => {
        while (queue.length > 0) {
          const batch = queue.shift();
          if (!batch) break;
          const embeddings = await this.client.embeddings(this.model, batch.texts, options.signal);
          embeddings.forEach((embedding, j) => {
            results[batch.startIdx + j] = embedding;
          });
          completed += batch.texts.length;
          options.onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const prefixed = RAG_CONFIG.queryPrefix + query;
    const [embedding] = await this.client.embeddings(this.model, [prefixed], signal);
    return embedding ?? [];
  }
}

const EMBEDDING_MODEL_SETTING = "text_embedding_model";

interface SettingsStore {
  getSetting(key: string): string | null;
  setSetting(key: string, value: string): void;
}

/**
 * Vectors from two embedding models are not comparable. A non-empty text
 * index built with another model is a configuration error; otherwise the
 * configured model is recorded when `record` is set.
 */
export async function ensureEmbeddingModel(
  settings: SettingsStore,
  indexSize: () => Promise<number>,
  model: string,
  options: { record?: boolean } = {},
): Promise<void> {
  const stored = settings.getSetting(EMBEDDING_MODEL_SETTING);
  if (stored !== null && stored !== model && (await indexSize()) > 0) {
    throw new ConfigurationError(
      `Text index was built with embedding model "${stored}" but TEXT_EMBEDDING_MODEL is "${model}". ` +
        "Restore the model, or delete the text index and re-ingest with --force.",
    );
  }
  if (options.record && stored !== model) settings.setSetting(EMBEDDING_MODEL_SETTING, model);
}
