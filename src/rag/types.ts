export interface CitationRef {
  docId: number;
  page: number;
  /** chunk_id or figure_id; both come from the same per-page counter */
  unitId: number;
}

export type UnitKind = "chunk" | "figure";

// ── Metadata store records ──────────────────────────────────────────────────

export interface DocumentRecord {
  docId: number;
  filePath: string;
  fileName: string;
  fileHash: string;
  pageCount: number;
  ingestedAt: string | null;
}

export interface PageRecord {
  docId: number;
  page: number;
  imageRef: string | null;
}

export interface ChunkRecord {
  docId: number;
  page: number;
  chunkId: number;
  sectionName: string | null;
  text: string;
}

export interface FigureEnrichment {
  caption: string;
  entities: string[];
  bullets: string[];
}

export interface FigureRecord {
  docId: number;
  page: number;
  figureId: number;
  imageRef: string;
  ocrText: string | null;
  enrichment: FigureEnrichment | null;
}

export type ResolvedUnit =
  | ({ kind: "chunk" } & ChunkRecord)
  | ({ kind: "figure" } & FigureRecord);

// ── Ingestion ───────────────────────────────────────────────────────────────

export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface ExtractedDocument {
  source: string;
  filePath: string;
  pages: PageContent[];
}

export interface TextChunk {
  text: string;
  page: number;
  sectionName: string | null;
}

// ── Retrieval ───────────────────────────────────────────────────────────────

export interface TextHit {
  docId: number;
  page: number;
  chunkId: number;
  score: number;
}

export interface PageHit {
  docId: number;
  page: number;
  score: number;
}

interface EvidenceBase {
  docId: number;
  page: number;
  /** fused, normalized relevance */
  score: number;
  citations: string[];
}

export interface ChunkEvidence extends EvidenceBase {
  kind: "chunk";
  chunkId: number;
  sectionName: string | null;
  text: string;
}

export interface PageEvidence extends EvidenceBase {
  kind: "page";
}

export interface FigureEvidence extends EvidenceBase {
  kind: "figure";
  figureId: number;
  ocrText: string | null;
  enrichment: FigureEnrichment | null;
}

export type EvidenceItem = ChunkEvidence | PageEvidence | FigureEvidence;

/** Ranked, bounded, per-query; never persisted. */
export interface EvidenceSet {
  question: string;
  items: EvidenceItem[];
  degraded: string[];
}

// ── Generation and policy ───────────────────────────────────────────────────

export interface DraftAnswer {
  text: string;
  /** scanned from text; untrusted until the guard resolves them */
  rawCitations: string[];
  suppliedCitations: string[];
  insufficientEvidence: boolean;
}

export interface ResolvedCitation {
  kind: UnitKind;
  docId: number;
  page: number;
  unitId: number;
}

export interface FinalAnswer {
  text: string;
  resolvedCitations: ResolvedCitation[];
}

export type PolicyViolation =
  | { kind: "language"; message: string }
  | { kind: "citation"; message: string; details: string[] };

export type GuardState = "received" | "script_checked" | "citations_checked" | "accepted" | "rejected";

export type GuardResult =
  | { ok: true; answer: FinalAnswer; states: GuardState[] }
  | { ok: false; violation: PolicyViolation; states: GuardState[] };
