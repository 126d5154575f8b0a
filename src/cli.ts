import { parseArgs } from "node:util";
import { loadConfig, resolveCapabilities, type AppConfig } from "./rag/config.js";
import { ConfigurationError, LanguagePolicyError, QueryCancelledError, RagError, errorMessage } from "./rag/errors.js";
import type { IngestOptions, IngestReport } from "./rag/ingest.js";
import { assertEnglishOutput } from "./rag/language-policy.js";
import { createLogger, type Logger } from "./rag/logger.js";
import { MetadataStore } from "./rag/metadata-store.js";
import { initIngestor, initRagPipeline, openServices, type QueryResult, type RagPipeline } from "./rag/pipeline.js";
import type { FinalAnswer } from "./rag/types.js";
import { TextIndex } from "./rag/vector-store.js";

// ── Exit codes ──────────────────────────────────────────────────────────────
export const EXIT = {
  ok: 0,
  failure: 1,
  usage: 2,
  policyViolation: 3,
  retryable: 4,
  cancelled: 130,
} as const;

export const USAGE = [
  "Usage:",
  "  sciqa ingest <pdf|dir> [--force] [--reset] [--skip-visual]",
  '  sciqa query "<question>" [--json]',
  "  sciqa health",
].join("\n");

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const stdio: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

// ── Output ──────────────────────────────────────────────────────────────────

/** Every line that may carry model output is checked before it is printed. */
function printChecked(io: CliIO, text: string): void {
  io.out(assertEnglishOutput(text));
}

export function formatCitations(answer: FinalAnswer): string[] {
  return answer.resolvedCitations.map(
    (c) => `- [${c.docId}:${c.page}:${c.unitId}] ${c.kind}, document ${c.docId}, page ${c.page}`,
  );
}

export function printQueryResult(result: QueryResult, json: boolean, io: CliIO): number {
  if (result.status === "policy_violation") {
    io.err(result.violation.message);
    if (result.violation.kind === "citation") {
      for (const detail of result.violation.details) io.err(`  ${detail}`);
    }
    return EXIT.policyViolation;
  }

  if (json) {
    printChecked(
      io,
      JSON.stringify({
        status: result.status,
        answer: result.answer.text,
        citations: result.answer.resolvedCitations,
        degraded: result.evidence.degraded,
      }),
    );
    return EXIT.ok;
  }

  printChecked(io, result.answer.text);
  const citations = formatCitations(result.answer);
  if (citations.length > 0) {
    io.out("");
    io.out("Citations:");
    for (const line of citations) io.out(line);
  }
  return EXIT.ok;
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof QueryCancelledError) return EXIT.cancelled;
  if (err instanceof ConfigurationError) return EXIT.usage;
  if (err instanceof LanguagePolicyError) return EXIT.policyViolation;
  if (err instanceof RagError && err.isRetryable()) return EXIT.retryable;
  return EXIT.failure;
}

// ── Commands ────────────────────────────────────────────────────────────────

export async function runQuery(
  pipeline: RagPipeline,
  question: string,
  options: { json: boolean; signal?: AbortSignal },
  io: CliIO = stdio,
): Promise<number> {
  const result = await pipeline.query(question, { signal: options.signal });
  return printQueryResult(result, options.json, io);
}

export function formatIngestReport(report: IngestReport): string {
  const name = report.filePath;
  switch (report.status) {
    case "unchanged":
      return `unchanged  ${name} (doc ${report.docId ?? "?"})`;
    case "failed":
      return `failed     ${name}: ${report.error ?? "unknown error"}`;
    case "ingested":
      return (
        `ingested   ${name} (doc ${report.docId ?? "?"}): ${report.pages} pages, ` +
        `+${report.chunksAdded}/-${report.chunksRemoved} chunks, ${report.figures} figures, ` +
        `${report.visualPages} visual pages`
      );
  }
}

async function ingestCommand(
  config: AppConfig,
  logger: Logger,
  target: string,
  options: IngestOptions,
  io: CliIO,
): Promise<number> {
  const services = openServices(config, logger);
  try {
    const ingestor = initIngestor(services, logger);
    const reports = await ingestor.ingest(target, options);
    for (const report of reports) io.out(formatIngestReport(report));
    if (reports.length === 0) io.err(`No PDFs found under ${target}`);
    return reports.some((r) => r.status === "failed") ? EXIT.failure : EXIT.ok;
  } finally {
    services.store.close();
  }
}

async function queryCommand(
  config: AppConfig,
  logger: Logger,
  question: string,
  json: boolean,
  signal: AbortSignal,
  io: CliIO,
): Promise<number> {
  const pipeline = await initRagPipeline(config, logger);
  try {
    return await runQuery(pipeline, question, { json, signal }, io);
  } finally {
    pipeline.close();
  }
}

export async function runHealth(config: AppConfig, io: CliIO = stdio): Promise<number> {
  const capabilities = resolveCapabilities(config);
  const store = MetadataStore.open(config.paths.sqlitePath);
  try {
    const stats = store.stats();
    const textVectors = await new TextIndex(config.paths.textIndexDir).size();
    const line = (ok: boolean, label: string) => io.out(`${ok ? "ok     " : "missing"}  ${label}`);

    line(true, `metadata store ${config.paths.sqlitePath}`);
    line(config.apiKey !== undefined, "OPENROUTER_API_KEY");
    line(true, `text embeddings (${config.models.textEmbedding}), ${textVectors} vectors`);
    line(true, `generation (${config.models.llm})`);
    line(capabilities.visual, `visual retrieval${config.models.visualEmbedding ? ` (${config.models.visualEmbedding})` : ""}`);
    line(capabilities.captioning, `figure captioning${config.models.vlm ? ` (${config.models.vlm})` : ""}`);
    line(capabilities.ocr, `figure OCR${config.models.ocr ? ` (${config.models.ocr})` : ""}`);
    io.out(
      `documents ${stats.documents}, pages ${stats.pages}, chunks ${stats.chunks}, ` +
        `figures ${stats.figures}, answers ${stats.answers}`,
    );
    return config.apiKey ? EXIT.ok : EXIT.usage;
  } finally {
    store.close();
  }
}

// ── Entry ───────────────────────────────────────────────────────────────────

const ARG_OPTIONS = {
  force: { type: "boolean", default: false },
  reset: { type: "boolean", default: false },
  "skip-visual": { type: "boolean", default: false },
  json: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

const COMMANDS = ["ingest", "query", "health"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: ARG_OPTIONS });
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env, io: CliIO = stdio): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    io.err(errorMessage(err));
    io.err(USAGE);
    return EXIT.usage;
  }

  const [command, ...rest] = parsed.positionals;
  if (parsed.values.help || !command) {
    io.err(USAGE);
    return command ? EXIT.ok : EXIT.usage;
  }
  if (!isCommand(command)) {
    io.err(`Unknown command: ${command}`);
    io.err(USAGE);
    return EXIT.usage;
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    io.err(errorMessage(err));
    return exitCodeFor(err);
  }
  const logger = createLogger({ level: config.logLevel, pretty: process.stderr.isTTY });

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    switch (command) {
      case "ingest": {
        const target = rest[0];
        if (!target || rest.length > 1) {
          io.err(USAGE);
          return EXIT.usage;
        }
        return await ingestCommand(
          config,
          logger,
          target,
          {
            force: parsed.values.force,
            reset: parsed.values.reset,
            skipVisual: parsed.values["skip-visual"],
            signal: controller.signal,
          },
          io,
        );
      }
      case "query": {
        const question = rest.join(" ").trim();
        if (!question) {
          io.err(USAGE);
          return EXIT.usage;
        }
        return await queryCommand(config, logger, question, parsed.values.json, controller.signal, io);
      }
      case "health":
        return await runHealth(config, io);
    }
  } catch (err) {
    const code = exitCodeFor(err);
    logger.error({ err, code }, "Command failed");
    io.err(errorMessage(err));
    return code;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}
