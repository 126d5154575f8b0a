import { createLogger, type Logger } from "../src/rag/logger.js";
import { MetadataStore } from "../src/rag/metadata-store.js";

export interface CapturedLog {
  level: number;
  msg: string;
  degraded?: boolean;
  capability?: string;
  [key: string]: unknown;
}

/** A debug-level logger whose JSON lines land in `lines` instead of stderr. */
export function captureLogger(): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return createLogger({ level: "silent", destination: { write() {} } });
}

export const WARN = 40;

export function degradedWarnings(lines: CapturedLog[]): CapturedLog[] {
  return lines.filter((l) => l.level === WARN && l.degraded === true);
}

export function memoryStore(): MetadataStore {
  return MetadataStore.open(":memory:");
}

export function addDocument(store: MetadataStore, name: string, pageCount = 3): number {
  return store.assignDocument({
    filePath: `/papers/${name}`,
    fileName: name,
    fileHash: `hash-${name}`,
    pageCount,
  });
}

/**
 * Three documents; doc 3 page 2 holds chunk 5, the only stored text about a
 * temperature inversion.
 */
export function seedInversionScenario(store: MetadataStore): void {
  addDocument(store, "a.pdf");
  addDocument(store, "b.pdf");
  const docId = addDocument(store, "c.pdf");
  store.upsertPage(docId, 2, null);
  for (let i = 0; i < 5; i++) store.assignChunk(docId, 2);
  store.replacePageChunks(docId, 2, [
    { text: "A temperature inversion was observed above the boundary layer.", sectionName: "Results" },
  ]);
}
