/**
 * Database schema for documents, the device catalog and the vector index
 *
 * @module services/storage/schema
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

/**
 * Per-connection pragmas. WAL lets queries read while an ingestion
 * transaction writes; busy_timeout bounds lock waits before SQLITE_BUSY.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA busy_timeout = 5000',
] as const;

const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`;

const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  file_name TEXT NOT NULL,
  file_path TEXT,
  file_type TEXT NOT NULL CHECK (file_type IN ('pdf', 'txt')),
  file_size INTEGER NOT NULL,
  file_hash TEXT NOT NULL,
  device_type TEXT NOT NULL,
  brand TEXT NOT NULL,
  model TEXT,
  status TEXT NOT NULL CHECK (status IN ('PENDING', 'PROCESSING', 'INDEXED', 'FAILED')),
  chunks_count INTEGER,
  error_message TEXT,
  uploaded_at TEXT NOT NULL,
  processing_started_at TEXT,
  processing_completed_at TEXT,
  CHECK (status != 'INDEXED' OR chunks_count >= 1),
  CHECK (status != 'FAILED' OR length(error_message) > 0)
)`;

const CREATE_DEVICE_CATALOG_TABLE = `
CREATE TABLE IF NOT EXISTS device_catalog (
  device_type TEXT NOT NULL,
  brand TEXT NOT NULL,
  model TEXT NOT NULL DEFAULT '',
  updated_at TEXT NOT NULL,
  PRIMARY KEY (device_type, brand, model)
)`;

const CREATE_INDEX_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS index_chunks (
  id TEXT PRIMARY KEY,
  collection TEXT NOT NULL,
  document_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  total_chunks INTEGER NOT NULL,
  text TEXT NOT NULL,
  device_type TEXT NOT NULL,
  brand TEXT NOT NULL,
  model TEXT NOT NULL,
  source_file TEXT NOT NULL,
  section_type TEXT,
  detected_model TEXT,
  page_number INTEGER,
  character_start INTEGER NOT NULL,
  character_end INTEGER NOT NULL,
  overlap_previous INTEGER NOT NULL DEFAULT 0,
  overlap_next INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
)`;

const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_device ON documents(device_type, brand)',
  'CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status)',
  'CREATE INDEX IF NOT EXISTS idx_index_chunks_document ON index_chunks(collection, document_id)',
  'CREATE INDEX IF NOT EXISTS idx_index_chunks_filter ON index_chunks(collection, device_type, brand, model)',
] as const;

/**
 * vec0 virtual table holding one vector per index_chunks row
 */
export function createVecTableSql(dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS vec_chunks USING vec0(
  chunk_id TEXT PRIMARY KEY,
  vector FLOAT[${dimension}]
)`;
}

/**
 * Create every table and index. Idempotent.
 * The sqlite-vec extension must already be loaded.
 */
export function initializeSchema(db: Database.Database, dimension: number): void {
  const init = db.transaction(() => {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);
    db.exec(CREATE_DOCUMENTS_TABLE);
    db.exec(CREATE_DEVICE_CATALOG_TABLE);
    db.exec(CREATE_INDEX_CHUNKS_TABLE);
    db.exec(createVecTableSql(dimension));
    for (const statement of CREATE_INDEXES) {
      db.exec(statement);
    }

    // Stamped last so a crash mid-init leaves no version row
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at)
       VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
  });
  init();
}
