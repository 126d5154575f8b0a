/**
 * SQLite schema for the metadata store. Identifiers are assigned here and
 * nowhere else; the vector indices only hold copies of them.
 */

export const DATABASE_PRAGMAS = [
  "PRAGMA journal_mode = WAL",
  "PRAGMA foreign_keys = ON",
  "PRAGMA synchronous = NORMAL",
  "PRAGMA busy_timeout = 5000",
] as const;

export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  doc_id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_path TEXT NOT NULL UNIQUE,
  file_name TEXT NOT NULL,
  file_hash TEXT NOT NULL,
  page_count INTEGER NOT NULL,
  ingested_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS pages (
  doc_id INTEGER NOT NULL,
  page_number INTEGER NOT NULL CHECK (page_number >= 1),
  image_ref TEXT,
  next_unit_id INTEGER NOT NULL DEFAULT 0,
  present INTEGER NOT NULL DEFAULT 1 CHECK (present IN (0, 1)),
  created_at TEXT NOT NULL,
  PRIMARY KEY (doc_id, page_number),
  FOREIGN KEY (doc_id) REFERENCES documents(doc_id) ON DELETE CASCADE
)
`;

export const CREATE_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS chunks (
  doc_id INTEGER NOT NULL,
  page_number INTEGER NOT NULL,
  chunk_id INTEGER NOT NULL CHECK (chunk_id >= 0),
  content_hash TEXT NOT NULL,
  section_name TEXT,
  text TEXT NOT NULL,
  created_at TEXT NOT NULL,
  PRIMARY KEY (doc_id, page_number, chunk_id),
  FOREIGN KEY (doc_id, page_number) REFERENCES pages(doc_id, page_number) ON DELETE CASCADE
)
`;

export const CREATE_FIGURES_TABLE = `
CREATE TABLE IF NOT EXISTS figures (
  doc_id INTEGER NOT NULL,
  page_number INTEGER NOT NULL,
  figure_id INTEGER NOT NULL CHECK (figure_id >= 0),
  content_hash TEXT NOT NULL,
  image_ref TEXT NOT NULL,
  ocr_text TEXT,
  caption TEXT,
  entities_json TEXT,
  bullets_json TEXT,
  created_at TEXT NOT NULL,
  PRIMARY KEY (doc_id, page_number, figure_id),
  FOREIGN KEY (doc_id, page_number) REFERENCES pages(doc_id, page_number) ON DELETE CASCADE
)
`;

export const CREATE_SETTINGS_TABLE = `
CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
)
`;

export const CREATE_ANSWERS_TABLE = `
CREATE TABLE IF NOT EXISTS answers (
  answer_id INTEGER PRIMARY KEY AUTOINCREMENT,
  question TEXT NOT NULL,
  text TEXT NOT NULL,
  citations_json TEXT NOT NULL,
  created_at TEXT NOT NULL
)
`;

export const CREATE_INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_chunks_doc_page ON chunks(doc_id, page_number)",
  "CREATE INDEX IF NOT EXISTS idx_figures_doc_page ON figures(doc_id, page_number)",
] as const;

export const SCHEMA_STATEMENTS = [
  CREATE_DOCUMENTS_TABLE,
  CREATE_PAGES_TABLE,
  CREATE_CHUNKS_TABLE,
  CREATE_FIGURES_TABLE,
  CREATE_SETTINGS_TABLE,
  CREATE_ANSWERS_TABLE,
  ...CREATE_INDEXES,
] as const;
