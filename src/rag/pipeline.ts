import { RAG_CONFIG, requireApiKey, resolveCapabilities, type AppConfig, type Capabilities } from "./config.js";
import { OpenRouterEmbeddingService, ensureEmbeddingModel, type EmbeddingService } from "./embedding-service.js";
import { QueryCancelledError } from "./errors.js";
import {
  FigureEnricher,
  NoOpCaptioner,
  NoOpOcr,
  VisionCaptioner,
  VisionOcrService,
} from "./figure-enrichment.js";
import { CitationConstrainedGenerator, OpenRouterGenerationService } from "./generator.js";
import { Ingestor } from "./ingest.js";
import { assertEnglishOutput } from "./language-policy.js";
import type { Logger } from "./logger.js";
import { MetadataStore, type StoreStats } from "./metadata-store.js";
import { OpenRouterClient } from "./openrouter.js";
import { PolicyGuard } from "./policy-guard.js";
import { HybridRetriever } from "./retriever.js";
import type { EvidenceSet, FinalAnswer, PolicyViolation } from "./types.js";
import { TextIndex } from "./vector-store.js";
import { createVisualIndex, type VisualIndex } from "./visual-index.js";

export type QueryResult =
  | { status: "answered"; answer: FinalAnswer; evidence: EvidenceSet; answerId: number }
  | { status: "policy_violation"; violation: PolicyViolation; evidence: EvidenceSet };

export interface RagPipeline {
  query(question: string, options?: { signal?: AbortSignal }): Promise<QueryResult>;
  stats(): StoreStats;
  close(): void;
}

export interface PipelineDeps {
  store: MetadataStore;
  retriever: HybridRetriever;
  generator: CitationConstrainedGenerator;
  guard: PolicyGuard;
  logger: Logger;
}

/**
 * question -> retrieve -> generate -> guard -> answer. Nothing reaches the
 * caller as an answer without passing the guard; the only write is the
 * accepted answer.
 */
export function createRagPipeline(deps: PipelineDeps): RagPipeline {
  const logger = deps.logger.child({ component: "pipeline" });

  return {
    async query(question, options = {}) {
      const started = Date.now();
      const evidence = await deps.retriever.retrieve(question, undefined, undefined, options);
      const draft = await deps.generator.generate(question, evidence, options);
      const result = deps.guard.enforce(draft);

      if (!result.ok) {
        logger.warn(
          {
            violation: result.violation.kind,
            details: result.violation.kind === "citation" ? result.violation.details.length : 0,
            states: result.states,
          },
          "Answer rejected by policy guard",
        );
        return { status: "policy_violation", violation: result.violation, evidence };
      }

      if (options.signal?.aborted) throw new QueryCancelledError("query");

      const text = assertEnglishOutput(result.answer.text);
      const answerId = deps.store.recordAnswer(question, result.answer);
      logger.info(
        {
          answerId,
          evidence: evidence.items.length,
          citations: result.answer.resolvedCitations.length,
          degraded: evidence.degraded,
          ms: Date.now() - started,
        },
        "Answer accepted",
      );
      return { status: "answered", answer: { ...result.answer, text }, evidence, answerId };
    },

    stats() {
      return deps.store.stats();
    },

    close() {
      deps.store.close();
    },
  };
}

/** Stores and model services bound once per process. */
export interface RagServices {
  config: AppConfig;
  capabilities: Capabilities;
  client: OpenRouterClient;
  store: MetadataStore;
  textIndex: TextIndex;
  visualIndex: VisualIndex;
  embedder: EmbeddingService;
}

export function openServices(config: AppConfig, logger: Logger): RagServices {
  const client = new OpenRouterClient({ apiKey: requireApiKey(config), baseUrl: config.baseUrl });
  const capabilities = resolveCapabilities(config);
  logger.debug({ capabilities }, "Resolved capabilities");

  return {
    config,
    capabilities,
    client,
    store: MetadataStore.open(config.paths.sqlitePath),
    textIndex: new TextIndex(config.paths.textIndexDir),
    visualIndex: createVisualIndex(config, capabilities, client, logger),
    embedder: new OpenRouterEmbeddingService(client, config.models.textEmbedding),
  };
}

export async function initRagPipeline(config: AppConfig, logger: Logger): Promise<RagPipeline> {
  const services = openServices(config, logger);
  const { store, textIndex, visualIndex, embedder, client } = services;

  try {
    await ensureEmbeddingModel(store, () => textIndex.size(), embedder.model);
  } catch (err) {
    store.close();
    throw err;
  }

  const retriever = new HybridRetriever({
    store,
    textIndex,
    visualIndex,
    embedder,
    logger,
    options: {
      ...config.retrieval,
      textTimeoutMs: config.timeouts.textMs,
      visualTimeoutMs: config.timeouts.visualMs,
    },
  });
  const generator = new CitationConstrainedGenerator(
    new OpenRouterGenerationService(client, config.models.llm, RAG_CONFIG.generationMaxTokens),
    logger,
    config.timeouts.generationMs,
  );

  const stats = store.stats();
  logger.info({ documents: stats.documents, chunks: stats.chunks, figures: stats.figures }, "RAG ready");

  return createRagPipeline({ store, retriever, generator, guard: new PolicyGuard(store), logger });
}

export function initIngestor(services: RagServices, logger: Logger): Ingestor {
  const { config, capabilities, client } = services;
  const vlm = config.models.vlm;
  const ocrModel = config.models.ocr;

  const enricher = new FigureEnricher(
    capabilities.ocr && ocrModel ? new VisionOcrService(client, ocrModel) : new NoOpOcr(),
    capabilities.captioning && vlm ? new VisionCaptioner(client, vlm) : new NoOpCaptioner(),
    logger,
    config.timeouts.enrichmentMs,
  );

  return new Ingestor({ ...services, enricher, logger });
}
