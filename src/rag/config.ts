import path from "node:path";
import { z } from "zod";
import type { ChunkingOptions } from "./chunking/types.js";
import { ConfigurationError, LANGUAGE_POLICY_MESSAGE } from "./errors.js";

export const RAG_CONFIG = {
  dataDir: "data",
  sqliteFile: "metadata.sqlite3",
  textIndexDir: "text-index",
  visualIndexDir: "visual-index",
  pagesDir: "pages",
  figuresDir: "figures",

  outputLanguage: "en",
  textEmbeddingModel: "qwen/qwen3-embedding-8b",
  llmModel: "qwen/qwen3.5-27b",

  openRouterBaseUrl: "https://openrouter.ai/api/v1",

  embeddingBatchSize: 20,
  embeddingConcurrency: 5,

  queryPrefix: "Instruct: Retrieve relevant passages from scientific papers\nQuery: ",

  textTopK: 12,
  visualTopK: 6,
  maxEvidenceItems: 16,
  textWeight: 1.0,
  visualWeight: 0.8,

  textTimeoutMs: 15_000,
  visualTimeoutMs: 10_000,
  generationTimeoutMs: 120_000,
  enrichmentTimeoutMs: 60_000,

  maxChunkLength: 1400,
  chunkOverlap: 200,

  renderScale: 1.5,
  renderConcurrency: 3,
  minFigureSide: 64,

  generationMaxTokens: 1024,
} as const;

const optionalModel = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().optional(),
  OPENROUTER_BASE_URL: z.string().url().default(RAG_CONFIG.openRouterBaseUrl),
  OUTPUT_LANGUAGE: z.string().default(RAG_CONFIG.outputLanguage),
  TEXT_EMBEDDING_MODEL: z.string().trim().min(1).default(RAG_CONFIG.textEmbeddingModel),
  LLM_MODEL: z.string().trim().min(1).default(RAG_CONFIG.llmModel),
  VLM_MODEL: optionalModel,
  OCR_MODEL: optionalModel,
  VISUAL_EMBEDDING_MODEL: optionalModel,
  SCIQA_DATA_DIR: z.string().min(1).default(RAG_CONFIG.dataDir),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  TEXT_TOP_K: positiveInt(RAG_CONFIG.textTopK),
  VISUAL_TOP_K: positiveInt(RAG_CONFIG.visualTopK),
  MAX_EVIDENCE_ITEMS: positiveInt(RAG_CONFIG.maxEvidenceItems),
  TEXT_TIMEOUT_MS: positiveInt(RAG_CONFIG.textTimeoutMs),
  VISUAL_TIMEOUT_MS: positiveInt(RAG_CONFIG.visualTimeoutMs),
  GENERATION_TIMEOUT_MS: positiveInt(RAG_CONFIG.generationTimeoutMs),
  CHUNK_MAX_LENGTH: positiveInt(RAG_CONFIG.maxChunkLength),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(RAG_CONFIG.chunkOverlap),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  outputLanguage: "en";
  apiKey: string | undefined;
  baseUrl: string;
  models: {
    textEmbedding: string;
    llm: string;
    vlm: string | undefined;
    ocr: string | undefined;
    visualEmbedding: string | undefined;
  };
  paths: {
    dataDir: string;
    sqlitePath: string;
    textIndexDir: string;
    visualIndexDir: string;
    pagesDir: string;
    figuresDir: string;
  };
  retrieval: {
    textTopK: number;
    visualTopK: number;
    maxEvidenceItems: number;
    textWeight: number;
    visualWeight: number;
  };
  chunking: ChunkingOptions;
  timeouts: {
    textMs: number;
    visualMs: number;
    generationMs: number;
    enrichmentMs: number;
  };
  logLevel: LogLevel;
}

/**
 * Which optional collaborators are bound for this process. Resolved once at
 * startup; call sites hold the matching implementation and never re-check.
 */
export interface Capabilities {
  visual: boolean;
  captioning: boolean;
  ocr: boolean;
}

export function enforceStartupLanguagePolicy(outputLanguage: string): "en" {
  if (outputLanguage.trim().toLowerCase() !== "en") {
    throw new ConfigurationError(LANGUAGE_POLICY_MESSAGE);
  }
  return "en";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, issues]) => `${key}: ${(issues ?? []).join(", ")}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration (${fields})`);
  }
  const e = parsed.data;
  if (e.CHUNK_OVERLAP >= e.CHUNK_MAX_LENGTH) {
    throw new ConfigurationError("Invalid configuration (CHUNK_OVERLAP must be smaller than CHUNK_MAX_LENGTH)");
  }

  const dataDir = path.resolve(e.SCIQA_DATA_DIR);

  return Object.freeze({
    outputLanguage: enforceStartupLanguagePolicy(e.OUTPUT_LANGUAGE),
    apiKey: e.OPENROUTER_API_KEY || undefined,
    baseUrl: e.OPENROUTER_BASE_URL.replace(/\/+$/, ""),
    models: {
      textEmbedding: e.TEXT_EMBEDDING_MODEL,
      llm: e.LLM_MODEL,
      vlm: e.VLM_MODEL,
      ocr: e.OCR_MODEL,
      visualEmbedding: e.VISUAL_EMBEDDING_MODEL,
    },
    paths: {
      dataDir,
      sqlitePath: path.join(dataDir, RAG_CONFIG.sqliteFile),
      textIndexDir: path.join(dataDir, RAG_CONFIG.textIndexDir),
      visualIndexDir: path.join(dataDir, RAG_CONFIG.visualIndexDir),
      pagesDir: path.join(dataDir, RAG_CONFIG.pagesDir),
      figuresDir: path.join(dataDir, RAG_CONFIG.figuresDir),
    },
    retrieval: {
      textTopK: e.TEXT_TOP_K,
      visualTopK: e.VISUAL_TOP_K,
      maxEvidenceItems: e.MAX_EVIDENCE_ITEMS,
      textWeight: RAG_CONFIG.textWeight,
      visualWeight: RAG_CONFIG.visualWeight,
    },
    chunking: {
      maxChunkLength: e.CHUNK_MAX_LENGTH,
      chunkOverlap: e.CHUNK_OVERLAP,
    },
    timeouts: {
      textMs: e.TEXT_TIMEOUT_MS,
      visualMs: e.VISUAL_TIMEOUT_MS,
      generationMs: e.GENERATION_TIMEOUT_MS,
      enrichmentMs: RAG_CONFIG.enrichmentTimeoutMs,
    },
    logLevel: e.LOG_LEVEL,
  });
}

export function resolveCapabilities(config: AppConfig): Capabilities {
  const hasKey = config.apiKey !== undefined;
  return {
    visual: hasKey && config.models.visualEmbedding !== undefined,
    captioning: hasKey && config.models.vlm !== undefined,
    ocr: hasKey && config.models.ocr !== undefined,
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError("OPENROUTER_API_KEY environment variable is required.");
  }
  return config.apiKey;
}
