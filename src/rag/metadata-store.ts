import { createHash } from "node:crypto";
import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { parseCitation } from "./citations.js";
import { DATABASE_PRAGMAS, SCHEMA_STATEMENTS } from "./schema.js";
import type {
  ChunkRecord,
  CitationRef,
  DocumentRecord,
  FigureEnrichment,
  FigureRecord,
  FinalAnswer,
  PageRecord,
  ResolvedUnit,
} from "./types.js";

interface DocumentRow {
  doc_id: number;
  file_path: string;
  file_name: string;
  file_hash: string;
  page_count: number;
  ingested_at: string | null;
}

interface PageRow {
  doc_id: number;
  page_number: number;
  image_ref: string | null;
}

interface ChunkRow {
  doc_id: number;
  page_number: number;
  chunk_id: number;
  section_name: string | null;
  text: string;
}

interface FigureRow {
  doc_id: number;
  page_number: number;
  figure_id: number;
  image_ref: string;
  ocr_text: string | null;
  caption: string | null;
  entities_json: string | null;
  bullets_json: string | null;
}

interface UnitHashRow {
  unit_id: number;
  content_hash: string;
}

export interface NewDocument {
  filePath: string;
  fileName: string;
  fileHash: string;
  pageCount: number;
}

export interface NewChunk {
  text: string;
  sectionName: string | null;
}

export interface NewFigure {
  contentHash: string;
  imageRef: string;
  ocrText: string | null;
  enrichment: FigureEnrichment | null;
}

/** Ids per input position, plus what changed relative to the previous ingestion. */
export interface ReplaceResult {
  ids: number[];
  added: number[];
  removed: number[];
}

export interface StoreStats {
  documents: number;
  pages: number;
  chunks: number;
  figures: number;
  answers: number;
}

function utcNow(): string {
  return new Date().toISOString();
}

export function contentHash(data: string | NodeJS.ArrayBufferView): string {
  return createHash("sha256").update(data).digest("hex");
}

function toDocument(row: DocumentRow): DocumentRecord {
  return {
    docId: row.doc_id,
    filePath: row.file_path,
    fileName: row.file_name,
    fileHash: row.file_hash,
    pageCount: row.page_count,
    ingestedAt: row.ingested_at,
  };
}

function toChunk(row: ChunkRow): ChunkRecord {
  return {
    docId: row.doc_id,
    page: row.page_number,
    chunkId: row.chunk_id,
    sectionName: row.section_name,
    text: row.text,
  };
}

function parseStringArray(json: string | null): string[] {
  if (!json) return [];
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}

function toFigure(row: FigureRow): FigureRecord {
  return {
    docId: row.doc_id,
    page: row.page_number,
    figureId: row.figure_id,
    imageRef: row.image_ref,
    ocrText: row.ocr_text,
    enrichment:
      row.caption === null
        ? null
        : {
            caption: row.caption,
            entities: parseStringArray(row.entities_json),
            bullets: parseStringArray(row.bullets_json),
          },
  };
}

/**
 * Single writer of doc_id, page, chunk_id and figure_id, and the authority on
 * whether a citation token names something real.
 *
 * Chunk and figure ids on a page come from one monotonic counter
 * (`pages.next_unit_id`), so `[doc:page:unit]` never names both kinds.
 * Readers return null or [] for rows that are not there yet.
 */
export class MetadataStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    for (const pragma of DATABASE_PRAGMAS) this.db.pragma(pragma.replace(/^PRAGMA\s+/, ""));
    for (const statement of SCHEMA_STATEMENTS) this.db.exec(statement);
  }

  static open(sqlitePath: string): MetadataStore {
    if (sqlitePath !== ":memory:") {
      mkdirSync(path.dirname(sqlitePath), { recursive: true });
    }
    return new MetadataStore(new Database(sqlitePath));
  }

  close(): void {
    this.db.close();
  }

  // ── Documents ─────────────────────────────────────────────────────────────

  /** Upsert by file path; an existing path keeps its doc_id. */
  assignDocument(doc: NewDocument): number {
    const now = utcNow();
    const existing = this.db
      .prepare<[string], { doc_id: number }>("SELECT doc_id FROM documents WHERE file_path = ?")
      .get(doc.filePath);

    if (existing) {
      this.db
        .prepare(
          `UPDATE documents SET file_name = ?, file_hash = ?, page_count = ?, ingested_at = NULL, updated_at = ?
           WHERE doc_id = ?`,
        )
        .run(doc.fileName, doc.fileHash, doc.pageCount, now, existing.doc_id);
      return existing.doc_id;
    }

    const result = this.db
      .prepare(
        `INSERT INTO documents(file_path, file_name, file_hash, page_count, created_at, updated_at)
         VALUES(?,?,?,?,?,?)`,
      )
      .run(doc.filePath, doc.fileName, doc.fileHash, doc.pageCount, now, now);
    return Number(result.lastInsertRowid);
  }

  getDocument(docId: number): DocumentRecord | null {
    const row = this.db
      .prepare<[number], DocumentRow>("SELECT * FROM documents WHERE doc_id = ?")
      .get(docId);
    return row ? toDocument(row) : null;
  }

  getDocumentByPath(filePath: string): DocumentRecord | null {
    const row = this.db
      .prepare<[string], DocumentRow>("SELECT * FROM documents WHERE file_path = ?")
      .get(filePath);
    return row ? toDocument(row) : null;
  }

  listDocuments(): DocumentRecord[] {
    return this.db
      .prepare<[], DocumentRow>("SELECT * FROM documents ORDER BY doc_id ASC")
      .all()
      .map(toDocument);
  }

  markIngested(docId: number): void {
    const now = utcNow();
    this.db
      .prepare("UPDATE documents SET ingested_at = ?, updated_at = ? WHERE doc_id = ?")
      .run(now, now, docId);
  }

  /** Explicit reset. Pages, chunks and figures cascade; vectors are the caller's job. */
  deleteDocument(docId: number): boolean {
    return this.db.prepare("DELETE FROM documents WHERE doc_id = ?").run(docId).changes > 0;
  }

  // ── Pages ─────────────────────────────────────────────────────────────────

  upsertPage(docId: number, page: number, imageRef: string | null): void {
    this.db
      .prepare(
        `INSERT INTO pages(doc_id, page_number, image_ref, created_at) VALUES(?,?,?,?)
         ON CONFLICT(doc_id, page_number) DO UPDATE SET
           image_ref = COALESCE(excluded.image_ref, pages.image_ref), present = 1`,
      )
      .run(docId, page, imageRef, utcNow());
  }

  getPage(docId: number, page: number): PageRecord | null {
    const row = this.db
      .prepare<[number, number], PageRow>(
        "SELECT doc_id, page_number, image_ref FROM pages WHERE doc_id = ? AND page_number = ? AND present = 1",
      )
      .get(docId, page);
    return row ? { docId: row.doc_id, page: row.page_number, imageRef: row.image_ref } : null;
  }

  listPages(docId: number): PageRecord[] {
    return this.db
      .prepare<[number], PageRow>(
        "SELECT doc_id, page_number, image_ref FROM pages WHERE doc_id = ? AND present = 1 ORDER BY page_number ASC",
      )
      .all(docId)
      .map((row) => ({ docId: row.doc_id, page: row.page_number, imageRef: row.image_ref }));
  }

  /**
   * Drop the content of pages past the new page count; returns the chunk refs
   * that went with them. The page rows stay behind, marked absent, so their
   * id counters survive a document that later grows again.
   */
  truncatePages(docId: number, pageCount: number): CitationRef[] {
    const run = this.db.transaction((): CitationRef[] => {
      const removed = this.db
        .prepare<[number, number], { page_number: number; chunk_id: number }>(
          "SELECT page_number, chunk_id FROM chunks WHERE doc_id = ? AND page_number > ? ORDER BY page_number, chunk_id",
        )
        .all(docId, pageCount)
        .map((r) => ({ docId, page: r.page_number, unitId: r.chunk_id }));
      this.db.prepare("DELETE FROM chunks WHERE doc_id = ? AND page_number > ?").run(docId, pageCount);
      this.db.prepare("DELETE FROM figures WHERE doc_id = ? AND page_number > ?").run(docId, pageCount);
      this.db
        .prepare("UPDATE pages SET present = 0, image_ref = NULL WHERE doc_id = ? AND page_number > ?")
        .run(docId, pageCount);
      return removed;
    });
    return run();
  }

  // ── Identifier assignment ─────────────────────────────────────────────────

  private nextUnitId(docId: number, page: number): number {
    const row = this.db
      .prepare<[number, number], { unit_id: number }>(
        `UPDATE pages SET next_unit_id = next_unit_id + 1
         WHERE doc_id = ? AND page_number = ?
         RETURNING next_unit_id - 1 AS unit_id`,
      )
      .get(docId, page);
    if (!row) {
      throw new Error(`Page ${docId}:${page} must exist before assigning ids on it`);
    }
    return row.unit_id;
  }

  assignChunk(docId: number, page: number): number {
    return this.nextUnitId(docId, page);
  }

  assignFigure(docId: number, page: number): number {
    return this.nextUnitId(docId, page);
  }

  /**
   * Make the page's chunks equal to `chunks`. A chunk whose text hash matches
   * an existing chunk on the page keeps that chunk's id; the rest get fresh
   * ids. Ids are never recycled.
   */
  replacePageChunks(docId: number, page: number, chunks: NewChunk[]): ReplaceResult {
    const run = this.db.transaction((): ReplaceResult => {
      const pool = this.hashPool(
        "SELECT chunk_id AS unit_id, content_hash FROM chunks WHERE doc_id = ? AND page_number = ? ORDER BY chunk_id ASC",
        docId,
        page,
      );
      const insert = this.db.prepare(
        `INSERT INTO chunks(doc_id, page_number, chunk_id, content_hash, section_name, text, created_at)
         VALUES(?,?,?,?,?,?,?)`,
      );
      const updateSection = this.db.prepare(
        "UPDATE chunks SET section_name = ? WHERE doc_id = ? AND page_number = ? AND chunk_id = ?",
      );

      const ids: number[] = [];
      const added: number[] = [];
      for (const chunk of chunks) {
        const hash = contentHash(chunk.text);
        const reused = pool.get(hash)?.shift();
        if (reused !== undefined) {
          updateSection.run(chunk.sectionName, docId, page, reused);
          ids.push(reused);
          continue;
        }
        const chunkId = this.assignChunk(docId, page);
        insert.run(docId, page, chunkId, hash, chunk.sectionName, chunk.text, utcNow());
        ids.push(chunkId);
        added.push(chunkId);
      }

      const removed = [...pool.values()].flat().sort((a, b) => a - b);
      const del = this.db.prepare(
        "DELETE FROM chunks WHERE doc_id = ? AND page_number = ? AND chunk_id = ?",
      );
      for (const chunkId of removed) del.run(docId, page, chunkId);

      return { ids, added, removed };
    });
    return run();
  }

  /** Same contract as replacePageChunks, keyed by image content hash. */
  replacePageFigures(docId: number, page: number, figures: NewFigure[]): ReplaceResult {
    const run = this.db.transaction((): ReplaceResult => {
      const pool = this.hashPool(
        "SELECT figure_id AS unit_id, content_hash FROM figures WHERE doc_id = ? AND page_number = ? ORDER BY figure_id ASC",
        docId,
        page,
      );
      const insert = this.db.prepare(
        `INSERT INTO figures(doc_id, page_number, figure_id, content_hash, image_ref, ocr_text, caption,
                             entities_json, bullets_json, created_at)
         VALUES(?,?,?,?,?,?,?,?,?,?)`,
      );
      const update = this.db.prepare(
        `UPDATE figures SET image_ref = ?, ocr_text = ?, caption = ?, entities_json = ?, bullets_json = ?
         WHERE doc_id = ? AND page_number = ? AND figure_id = ?`,
      );

      const ids: number[] = [];
      const added: number[] = [];
      for (const fig of figures) {
        const e = fig.enrichment;
        const enrichmentColumns = [
          fig.ocrText,
          e ? e.caption : null,
          e ? JSON.stringify(e.entities) : null,
          e ? JSON.stringify(e.bullets) : null,
        ] as const;
        const reused = pool.get(fig.contentHash)?.shift();
        if (reused !== undefined) {
          update.run(fig.imageRef, ...enrichmentColumns, docId, page, reused);
          ids.push(reused);
          continue;
        }
        const figureId = this.assignFigure(docId, page);
        insert.run(docId, page, figureId, fig.contentHash, fig.imageRef, ...enrichmentColumns, utcNow());
        ids.push(figureId);
        added.push(figureId);
      }

      const removed = [...pool.values()].flat().sort((a, b) => a - b);
      const del = this.db.prepare(
        "DELETE FROM figures WHERE doc_id = ? AND page_number = ? AND figure_id = ?",
      );
      for (const figureId of removed) del.run(docId, page, figureId);

      return { ids, added, removed };
    });
    return run();
  }

  private hashPool(sql: string, docId: number, page: number): Map<string, number[]> {
    const pool = new Map<string, number[]>();
    for (const row of this.db.prepare<[number, number], UnitHashRow>(sql).all(docId, page)) {
      const ids = pool.get(row.content_hash) ?? [];
      ids.push(row.unit_id);
      pool.set(row.content_hash, ids);
    }
    return pool;
  }

  // ── Reads ─────────────────────────────────────────────────────────────────

  getChunk(ref: CitationRef): ChunkRecord | null {
    const row = this.db
      .prepare<[number, number, number], ChunkRow>(
        `SELECT doc_id, page_number, chunk_id, section_name, text FROM chunks
         WHERE doc_id = ? AND page_number = ? AND chunk_id = ?`,
      )
      .get(ref.docId, ref.page, ref.unitId);
    return row ? toChunk(row) : null;
  }

  getFigure(ref: CitationRef): FigureRecord | null {
    const row = this.db
      .prepare<[number, number, number], FigureRow>(
        `SELECT doc_id, page_number, figure_id, image_ref, ocr_text, caption, entities_json, bullets_json
         FROM figures WHERE doc_id = ? AND page_number = ? AND figure_id = ?`,
      )
      .get(ref.docId, ref.page, ref.unitId);
    return row ? toFigure(row) : null;
  }

  getFigureByHash(docId: number, page: number, hash: string): FigureRecord | null {
    const row = this.db
      .prepare<[number, number, string], FigureRow>(
        `SELECT doc_id, page_number, figure_id, image_ref, ocr_text, caption, entities_json, bullets_json
         FROM figures WHERE doc_id = ? AND page_number = ? AND content_hash = ?
         ORDER BY figure_id ASC LIMIT 1`,
      )
      .get(docId, page, hash);
    return row ? toFigure(row) : null;
  }

  getFiguresForPage(docId: number, page: number): FigureRecord[] {
    return this.db
      .prepare<[number, number], FigureRow>(
        `SELECT doc_id, page_number, figure_id, image_ref, ocr_text, caption, entities_json, bullets_json
         FROM figures WHERE doc_id = ? AND page_number = ? ORDER BY figure_id ASC`,
      )
      .all(docId, page)
      .map(toFigure);
  }

  listChunks(docId: number): ChunkRecord[] {
    return this.db
      .prepare<[number], ChunkRow>(
        `SELECT doc_id, page_number, chunk_id, section_name, text FROM chunks
         WHERE doc_id = ? ORDER BY page_number ASC, chunk_id ASC`,
      )
      .all(docId)
      .map(toChunk);
  }

  /** Read-only; NotFound is null. Malformed tokens are NotFound too. */
  resolve(token: string): ResolvedUnit | null {
    const ref = parseCitation(token);
    if (!ref) return null;
    const chunk = this.getChunk(ref);
    if (chunk) return { kind: "chunk", ...chunk };
    const figure = this.getFigure(ref);
    if (figure) return { kind: "figure", ...figure };
    return null;
  }

  // ── Settings and answers ──────────────────────────────────────────────────

  getSetting(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM settings WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  setSetting(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO settings(key, value) VALUES(?,?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      )
      .run(key, value);
  }

  /** Only accepted answers are stored; callers check the language policy first. */
  recordAnswer(question: string, answer: FinalAnswer): number {
    const result = this.db
      .prepare("INSERT INTO answers(question, text, citations_json, created_at) VALUES(?,?,?,?)")
      .run(question, answer.text, JSON.stringify(answer.resolvedCitations), utcNow());
    return Number(result.lastInsertRowid);
  }

  stats(): StoreStats {
    const count = (table: string, where = "1"): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table} WHERE ${where}`).get()?.n ?? 0;
    return {
      documents: count("documents"),
      pages: count("pages", "present = 1"),
      chunks: count("chunks"),
      figures: count("figures"),
      answers: count("answers"),
    };
  }
}
