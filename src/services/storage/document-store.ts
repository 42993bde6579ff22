/**
 * DocumentStore - document records, lifecycle transitions and device catalog
 *
 * Transitions are single conditional UPDATEs, so an illegal transition
 * changes nothing and chunks_count is written in the same statement that
 * moves a document to INDEXED.
 *
 * Security: All SQL uses parameterized queries via db.prepare()
 *
 * @module services/storage/document-store
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { DeviceCategory } from '../../models/device.js';
import {
  isSupportedFileType,
  type DocumentLifecycle,
  type DocumentStatus,
  type ManualDocument,
  type SupportedFileType,
} from '../../models/document.js';

export type DocumentStoreErrorCode =
  | 'DOCUMENT_NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'INVALID_RECORD';

export class DocumentStoreError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentStoreErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocumentStoreError';
  }
}

export interface NewDocument {
  file_name: string;
  file_path: string | null;
  file_type: SupportedFileType;
  file_size: number;
  file_hash: string;
  device_type: string;
  brand: string;
  model: string | null;
}

export interface ListDocumentsOptions {
  deviceType?: string;
  brand?: string;
  status?: DocumentStatus;
  limit?: number;
  offset?: number;
}

interface DocumentRow {
  id: string;
  file_name: string;
  file_path: string | null;
  file_type: string;
  file_size: number;
  file_hash: string;
  device_type: string;
  brand: string;
  model: string | null;
  status: string;
  chunks_count: number | null;
  error_message: string | null;
  uploaded_at: string;
  processing_started_at: string | null;
  processing_completed_at: string | null;
}

interface CatalogRow {
  device_type: string;
  brand: string;
  model: string;
  updated_at: string;
}

export class DocumentStore {
  constructor(private readonly db: Database.Database) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // DOCUMENT CRUD
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Insert a new PENDING document
   */
  create(input: NewDocument): ManualDocument {
    const id = uuidv4();
    const uploadedAt = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO documents (
          id, file_name, file_path, file_type, file_size, file_hash, device_type, brand, model,
          status, uploaded_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'PENDING', ?)`
      )
      .run(
        id,
        input.file_name,
        input.file_path,
        input.file_type,
        input.file_size,
        input.file_hash,
        input.device_type,
        input.brand,
        input.model,
        uploadedAt
      );
    return { ...input, id, uploaded_at: uploadedAt, lifecycle: { status: 'PENDING' } };
  }

  get(id: string): ManualDocument | null {
    const row = this.db
      .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?')
      .get(id);
    return row ? rowToDocument(row) : null;
  }

  /**
   * @throws DocumentStoreError DOCUMENT_NOT_FOUND
   */
  require(id: string): ManualDocument {
    const doc = this.get(id);
    if (!doc) {
      throw new DocumentStoreError(`Document "${id}" not found`, 'DOCUMENT_NOT_FOUND', {
        documentId: id,
      });
    }
    return doc;
  }

  list(options: ListDocumentsOptions = {}): { documents: ManualDocument[]; total: number } {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (options.deviceType) {
      conditions.push('device_type = ?');
      params.push(options.deviceType);
    }
    if (options.brand) {
      conditions.push('brand = ?');
      params.push(options.brand);
    }
    if (options.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const total =
      this.db
        .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM documents ${where}`)
        .get(...params)?.count ?? 0;
    const rows = this.db
      .prepare<unknown[], DocumentRow>(
        `SELECT * FROM documents ${where} ORDER BY uploaded_at DESC, id ASC LIMIT ? OFFSET ?`
      )
      .all(...params, options.limit ?? 50, options.offset ?? 0);

    return { documents: rows.map(rowToDocument), total };
  }

  /**
   * @returns true if a record was removed
   */
  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM documents WHERE id = ?').run(id).changes > 0;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE TRANSITIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /** PENDING -> PROCESSING */
  markProcessing(id: string): ManualDocument {
    const changes = this.db
      .prepare<[string, string]>(
        `UPDATE documents SET status = 'PROCESSING', processing_started_at = ?
         WHERE id = ? AND status = 'PENDING'`
      )
      .run(new Date().toISOString(), id).changes;
    return this.afterTransition(id, changes, 'PROCESSING');
  }

  /** PROCESSING -> INDEXED, setting chunks_count in the same statement */
  markIndexed(id: string, chunksCount: number): ManualDocument {
    if (!Number.isInteger(chunksCount) || chunksCount < 1) {
      throw new DocumentStoreError(
        `Cannot mark document "${id}" INDEXED with ${chunksCount} chunks`,
        'INVALID_TRANSITION',
        { documentId: id, chunksCount }
      );
    }
    const changes = this.db
      .prepare<[number, string, string]>(
        `UPDATE documents
         SET status = 'INDEXED', chunks_count = ?, error_message = NULL, processing_completed_at = ?
         WHERE id = ? AND status = 'PROCESSING'`
      )
      .run(chunksCount, new Date().toISOString(), id).changes;
    return this.afterTransition(id, changes, 'INDEXED');
  }

  /** PENDING or PROCESSING -> FAILED */
  markFailed(id: string, errorMessage: string): ManualDocument {
    const message = errorMessage.trim() || 'Ingestion failed with no error message';
    const changes = this.db
      .prepare<[string, string, string]>(
        `UPDATE documents
         SET status = 'FAILED', error_message = ?, chunks_count = NULL, processing_completed_at = ?
         WHERE id = ? AND status IN ('PENDING', 'PROCESSING')`
      )
      .run(message, new Date().toISOString(), id).changes;
    return this.afterTransition(id, changes, 'FAILED');
  }

  /**
   * Fail every document left PENDING or PROCESSING by a previous process.
   * No job survives a restart, so these would otherwise never settle.
   *
   * @returns number of documents failed
   */
  failInterrupted(message: string): number {
    const changes = this.db
      .prepare<[string, string]>(
        `UPDATE documents SET status = 'FAILED', error_message = ?, processing_completed_at = ?
         WHERE status IN ('PENDING', 'PROCESSING')`
      )
      .run(message, new Date().toISOString()).changes;
    if (changes > 0) {
      console.error(`[DocumentStore] Marked ${changes} interrupted documents FAILED`);
    }
    return changes;
  }

  private afterTransition(id: string, changes: number, target: DocumentStatus): ManualDocument {
    const doc = this.require(id);
    if (changes === 0) {
      throw new DocumentStoreError(
        `Cannot move document "${id}" from ${doc.lifecycle.status} to ${target}`,
        'INVALID_TRANSITION',
        { documentId: id, from: doc.lifecycle.status, to: target }
      );
    }
    console.error(`[DocumentStore] ${id} -> ${target}`);
    return doc;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DEVICE CATALOG
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Record a device type / brand / model combination
   */
  recordDevice(deviceType: string, brand: string, model: string | null): void {
    this.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO device_catalog (device_type, brand, model, updated_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(device_type, brand, model) DO UPDATE SET updated_at = excluded.updated_at`
      )
      .run(deviceType, brand, model ?? '', new Date().toISOString());
  }

  listDevices(): DeviceCategory[] {
    const rows = this.db
      .prepare<[], CatalogRow>(
        'SELECT device_type, brand, model, updated_at FROM device_catalog ORDER BY device_type, brand, model'
      )
      .all();
    return groupCatalog(rows);
  }

  getDevice(deviceType: string): DeviceCategory | null {
    const rows = this.db
      .prepare<[string], CatalogRow>(
        `SELECT device_type, brand, model, updated_at FROM device_catalog
         WHERE device_type = ? ORDER BY brand, model`
      )
      .all(deviceType);
    return groupCatalog(rows)[0] ?? null;
  }
}

function groupCatalog(rows: CatalogRow[]): DeviceCategory[] {
  const categories = new Map<string, DeviceCategory>();
  for (const row of rows) {
    let category = categories.get(row.device_type);
    if (!category) {
      category = { device_type: row.device_type, brands: [], models: {}, updated_at: row.updated_at };
      categories.set(row.device_type, category);
    }
    if (!category.brands.includes(row.brand)) {
      category.brands.push(row.brand);
      category.models[row.brand] = [];
    }
    if (row.model !== '') {
      category.models[row.brand].push(row.model);
    }
    if (row.updated_at > category.updated_at) {
      category.updated_at = row.updated_at;
    }
  }
  return [...categories.values()];
}

function rowToLifecycle(row: DocumentRow): DocumentLifecycle {
  switch (row.status) {
    case 'PENDING':
      return { status: 'PENDING' };
    case 'PROCESSING':
      return { status: 'PROCESSING', startedAt: row.processing_started_at ?? row.uploaded_at };
    case 'INDEXED':
      return {
        status: 'INDEXED',
        chunksCount: row.chunks_count ?? 0,
        processedAt: row.processing_completed_at ?? row.uploaded_at,
      };
    case 'FAILED':
      return {
        status: 'FAILED',
        errorMessage: row.error_message ?? '',
        failedAt: row.processing_completed_at ?? row.uploaded_at,
      };
    default:
      throw new DocumentStoreError(`Document "${row.id}" has unknown status "${row.status}"`, 'INVALID_RECORD', {
        documentId: row.id,
      });
  }
}

function rowToDocument(row: DocumentRow): ManualDocument {
  if (!isSupportedFileType(row.file_type)) {
    throw new DocumentStoreError(
      `Document "${row.id}" has unsupported file type "${row.file_type}"`,
      'INVALID_RECORD',
      { documentId: row.id }
    );
  }
  return {
    id: row.id,
    file_name: row.file_name,
    file_path: row.file_path,
    file_type: row.file_type,
    file_size: row.file_size,
    file_hash: row.file_hash,
    device_type: row.device_type,
    brand: row.brand,
    model: row.model,
    uploaded_at: row.uploaded_at,
    lifecycle: rowToLifecycle(row),
  };
}
