/**
 * Vector Index - sqlite-vec storage of (vector, text, metadata) triples
 *
 * Chunk text and metadata live in index_chunks; vectors live in the
 * vec_chunks virtual table under the same id. Queries are brute-force
 * vec_distance_l2() scans joined to the metadata table, so filters are
 * applied before ranking. Hits report squared L2 distance. Every row
 * belongs to one collection.
 *
 * Writes for one document run in a single transaction. better-sqlite3 runs
 * a transaction to completion before any other statement on the connection,
 * so a query never sees a half-written or half-deleted document.
 *
 * @module services/storage/vector-index
 */

import type Database from 'better-sqlite3';
import { isSectionType, type ChunkMetadata } from '../../models/chunk.js';
import type { MetadataFilter } from '../../models/retrieval.js';
import { compileMetadataFilter } from './filter.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

export type VectorIndexErrorCode =
  | 'INVALID_VECTOR_DIMENSIONS'
  | 'STORE_FAILED'
  | 'SEARCH_FAILED'
  | 'DELETE_FAILED';

export class VectorIndexError extends Error {
  constructor(
    message: string,
    public readonly code: VectorIndexErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VectorIndexError';
  }
}

/**
 * The index could not be reached (closed connection, lock contention).
 * Callers retry this with backoff; other index errors are not retried.
 */
export class IndexUnavailableError extends Error {
  readonly code = 'INDEX_UNAVAILABLE';

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IndexUnavailableError';
  }
}

export function isIndexUnavailable(error: unknown): boolean {
  return error instanceof IndexUnavailableError;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface VectorEntry {
  id: string;
  vector: Float32Array;
  text: string;
  metadata: ChunkMetadata;
}

export interface VectorHit {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  /**
   * Squared Euclidean distance. For unit vectors this is 2 * (1 - cosine
   * similarity), in [0, 4]: 2 for orthogonal, 4 for opposite.
   */
  distance: number;
}

export interface VectorIndex {
  readonly dimensions: number;

  /** Insert or replace the entry with this id */
  upsert(id: string, vector: Float32Array, text: string, metadata: ChunkMetadata): Promise<void>;

  /** Insert or replace all entries atomically */
  upsertMany(entries: VectorEntry[]): Promise<void>;

  /**
   * Up to k nearest entries matching filter, by ascending distance and then
   * ascending chunk_index. k <= 0 returns [].
   */
  query(vector: Float32Array, k: number, filter: MetadataFilter): Promise<VectorHit[]>;

  /** Remove every entry of a document atomically; returns the count removed */
  delete(documentId: string): Promise<number>;

  count(documentId?: string): Promise<number>;
}

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  total_chunks: number;
  text: string;
  device_type: string;
  brand: string;
  model: string;
  source_file: string;
  section_type: string | null;
  detected_model: string | null;
  page_number: number | null;
  character_start: number;
  character_end: number;
  overlap_previous: number;
  overlap_next: number;
}

interface SearchRow extends ChunkRow {
  distance: number;
}

interface ChunkInsertParams {
  id: string;
  collection: string;
  document_id: string;
  chunk_index: number;
  total_chunks: number;
  text: string;
  device_type: string;
  brand: string;
  model: string;
  source_file: string;
  section_type: string | null;
  detected_model: string | null;
  page_number: number | null;
  character_start: number;
  character_end: number;
  overlap_previous: number;
  overlap_next: number;
  created_at: string;
}

const CHUNK_COLUMNS = `c.id, c.document_id, c.chunk_index, c.total_chunks, c.text, c.device_type,
  c.brand, c.model, c.source_file, c.section_type, c.detected_model, c.page_number,
  c.character_start, c.character_end, c.overlap_previous, c.overlap_next`;

/** SQLite result codes that mean "try again later" */
const UNAVAILABLE_CODES = /^SQLITE_(BUSY|LOCKED|CANTOPEN|IOERR)/;

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export class SqliteVectorIndex implements VectorIndex {
  readonly dimensions: number;

  constructor(
    private readonly db: Database.Database,
    private readonly collection: string,
    dimensions: number
  ) {
    this.dimensions = dimensions;
  }

  async upsert(
    id: string,
    vector: Float32Array,
    text: string,
    metadata: ChunkMetadata
  ): Promise<void> {
    await this.upsertMany([{ id, vector, text, metadata }]);
  }

  async upsertMany(entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) return;
    for (const entry of entries) {
      this.assertDimensions(entry.vector, entry.id);
    }

    this.run('STORE_FAILED', { count: entries.length }, () => {
      const deleteVector = this.db.prepare<[string]>('DELETE FROM vec_chunks WHERE chunk_id = ?');
      const deleteChunk = this.db.prepare<[string]>('DELETE FROM index_chunks WHERE id = ?');
      const insertVector = this.db.prepare<[string, Buffer]>(
        'INSERT INTO vec_chunks (chunk_id, vector) VALUES (?, ?)'
      );
      const insertChunk = this.db.prepare<ChunkInsertParams>(`
        INSERT INTO index_chunks (
          id, collection, document_id, chunk_index, total_chunks, text, device_type, brand, model,
          source_file, section_type, detected_model, page_number, character_start, character_end,
          overlap_previous, overlap_next, created_at
        ) VALUES (
          @id, @collection, @document_id, @chunk_index, @total_chunks, @text, @device_type, @brand,
          @model, @source_file, @section_type, @detected_model, @page_number, @character_start,
          @character_end, @overlap_previous, @overlap_next, @created_at
        )`);

      const now = new Date().toISOString();
      const writeAll = this.db.transaction((batch: VectorEntry[]) => {
        for (const entry of batch) {
          // vec0 has no upsert: replace by delete + insert
          deleteVector.run(entry.id);
          deleteChunk.run(entry.id);
          insertVector.run(entry.id, toBuffer(entry.vector));
          insertChunk.run({
            ...entry.metadata,
            id: entry.id,
            collection: this.collection,
            text: entry.text,
            created_at: now,
          });
        }
      });
      writeAll(entries);
    });
  }

  async query(vector: Float32Array, k: number, filter: MetadataFilter): Promise<VectorHit[]> {
    if (k <= 0) return [];
    this.assertDimensions(vector, 'query');

    const compiled = compileMetadataFilter(filter);
    const sql = `
      SELECT ${CHUNK_COLUMNS}, vec_distance_l2(v.vector, ?) AS distance
      FROM vec_chunks v
      JOIN index_chunks c ON c.id = v.chunk_id
      WHERE c.collection = ?${compiled.sql}
      ORDER BY distance ASC, c.chunk_index ASC
      LIMIT ?`;

    const rows = this.run('SEARCH_FAILED', { k, filter: filter.kind }, () =>
      this.db
        .prepare<unknown[], SearchRow>(sql)
        .all(toBuffer(vector), this.collection, ...compiled.params, Math.floor(k))
    );

    return rows.map((row) => ({
      id: row.id,
      text: row.text,
      metadata: toMetadata(row),
      distance: row.distance * row.distance,
    }));
  }

  async delete(documentId: string): Promise<number> {
    return this.run('DELETE_FAILED', { documentId }, () => {
      const ids = this.db
        .prepare<[string, string], { id: string }>(
          'SELECT id FROM index_chunks WHERE collection = ? AND document_id = ?'
        )
        .all(this.collection, documentId);
      if (ids.length === 0) return 0;

      const deleteVector = this.db.prepare<[string]>('DELETE FROM vec_chunks WHERE chunk_id = ?');
      const deleteChunks = this.db.prepare<[string, string]>(
        'DELETE FROM index_chunks WHERE collection = ? AND document_id = ?'
      );
      const deleteAll = this.db.transaction(() => {
        for (const { id } of ids) {
          deleteVector.run(id);
        }
        return deleteChunks.run(this.collection, documentId).changes;
      });

      const removed = deleteAll();
      console.error(`[VectorIndex] Deleted ${removed} chunks of document ${documentId}`);
      return removed;
    });
  }

  async count(documentId?: string): Promise<number> {
    return this.run('SEARCH_FAILED', { documentId }, () => {
      const row =
        documentId === undefined
          ? this.db
              .prepare<[string], { count: number }>(
                'SELECT COUNT(*) AS count FROM index_chunks WHERE collection = ?'
              )
              .get(this.collection)
          : this.db
              .prepare<[string, string], { count: number }>(
                'SELECT COUNT(*) AS count FROM index_chunks WHERE collection = ? AND document_id = ?'
              )
              .get(this.collection, documentId);
      return row?.count ?? 0;
    });
  }

  private assertDimensions(vector: Float32Array, id: string): void {
    if (vector.length !== this.dimensions) {
      throw new VectorIndexError(
        `Vector ${id} has ${vector.length} dimensions, expected ${this.dimensions}`,
        'INVALID_VECTOR_DIMENSIONS',
        { id, actual: vector.length, expected: this.dimensions }
      );
    }
  }

  /**
   * Run a database operation, mapping failures to IndexUnavailableError
   * (retryable) or VectorIndexError
   */
  private run<T>(code: VectorIndexErrorCode, details: Record<string, unknown>, fn: () => T): T {
    if (!this.db.open) {
      throw new IndexUnavailableError('Vector index connection is closed', details);
    }
    try {
      return fn();
    } catch (error) {
      const sqliteCode =
        error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
      const message = error instanceof Error ? error.message : String(error);
      if (UNAVAILABLE_CODES.test(sqliteCode)) {
        throw new IndexUnavailableError(`Vector index unavailable: ${message}`, {
          ...details,
          sqliteCode,
        });
      }
      throw new VectorIndexError(`Vector index operation failed: ${message}`, code, {
        ...details,
        sqliteCode: sqliteCode || undefined,
      });
    }
  }
}

function toBuffer(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

function toMetadata(row: ChunkRow): ChunkMetadata {
  return {
    document_id: row.document_id,
    chunk_index: row.chunk_index,
    total_chunks: row.total_chunks,
    device_type: row.device_type,
    brand: row.brand,
    model: row.model,
    source_file: row.source_file,
    section_type: row.section_type !== null && isSectionType(row.section_type) ? row.section_type : null,
    detected_model: row.detected_model,
    page_number: row.page_number,
    character_start: row.character_start,
    character_end: row.character_end,
    overlap_previous: row.overlap_previous,
    overlap_next: row.overlap_next,
  };
}
