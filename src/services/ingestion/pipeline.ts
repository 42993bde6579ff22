/**
 * IngestionService - document lifecycle orchestration
 *
 * ingest() validates the request, records a PENDING document and schedules
 * processing in the background. Processing runs extract -> normalize ->
 * chunk -> embed -> upsert and settles the document as INDEXED or FAILED.
 *
 * Invariants:
 * - Chunks are written only after every chunk is embedded, in one upsert.
 * - Any failure after the upsert removes the document's index rows again.
 * - A supervising timeout aborts the job at the next stage boundary (or
 *   while a stage is still pending) and fails the document.
 * - At most one job per document id.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/ingestion/pipeline
 */

import * as path from 'path';
import type { ChunkingConfig, IndexRetryConfig, IngestionConfig } from '../config.js';
import { chunkId, UNKNOWN_MODEL, type ChunkMetadata } from '../../models/chunk.js';
import type { ManualDocument, SupportedFileType } from '../../models/document.js';
import { isSupportedFileType } from '../../models/document.js';
import { chunkText, type ChunkResult } from '../chunking/chunker.js';
import { detectStructuralHints, normalizePages } from '../chunking/text-normalizer.js';
import type { EmbeddingService } from '../embedding/embedder.js';
import { ExtractionError, type TextExtractor } from '../extraction/extractor.js';
import type { DocumentStore } from '../storage/document-store.js';
import { isIndexUnavailable, type VectorEntry, type VectorIndex } from '../storage/vector-index.js';
import { computeHash } from '../../utils/hash.js';
import { withRetry } from '../../utils/backoff.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type IngestionErrorCode =
  | 'INVALID_REQUEST'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'FILE_TOO_LARGE'
  | 'JOB_ALREADY_RUNNING'
  | 'INGESTION_TIMEOUT'
  | 'NO_CHUNKS';

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly code: IngestionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IngestionError';
    Error.captureStackTrace?.(this, IngestionError);
  }
}

export interface IngestRequest {
  bytes: Uint8Array;
  fileName: string;
  deviceType: string;
  brand: string;
  model?: string | null;
  /** Path the bytes were read from, if any */
  filePath?: string | null;
}

export interface IngestionDependencies {
  store: DocumentStore;
  extractor: TextExtractor;
  embedder: Pick<EmbeddingService, 'embedDocuments'>;
  index: VectorIndex;
  chunking: ChunkingConfig;
  ingestion: IngestionConfig;
  indexRetry: IndexRetryConfig;
}

export const INSUFFICIENT_TEXT_MESSAGE = 'Insufficient text extracted from document';

/** The index write of a running job, once it has started */
interface UpsertProgress {
  upsert: Promise<void> | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class IngestionService {
  private readonly jobs = new Map<string, Promise<void>>();

  constructor(private readonly deps: IngestionDependencies) {}

  /**
   * Accept a manual for ingestion.
   *
   * @returns The new document id; processing continues in the background
   * @throws IngestionError INVALID_REQUEST, UNSUPPORTED_FILE_TYPE or FILE_TOO_LARGE
   */
  ingest(request: IngestRequest): string {
    const accepted = this.validateRequest(request);
    const doc = this.deps.store.create({
      file_name: accepted.fileName,
      file_path: request.filePath ?? null,
      file_type: accepted.fileType,
      file_size: request.bytes.byteLength,
      file_hash: computeHash(request.bytes),
      device_type: accepted.deviceType,
      brand: accepted.brand,
      model: accepted.model,
    });
    console.error(
      `[Ingestion] Accepted ${doc.file_name} as ${doc.id} (${doc.device_type}/${doc.brand}/${doc.model ?? UNKNOWN_MODEL})`
    );
    this.startJob(doc, request.bytes);
    return doc.id;
  }

  isRunning(documentId: string): boolean {
    return this.jobs.has(documentId);
  }

  /**
   * Resolve once the document's job (if any) has settled
   */
  async waitFor(documentId: string): Promise<ManualDocument> {
    const job = this.jobs.get(documentId);
    if (job) {
      await job;
    }
    return this.deps.store.require(documentId);
  }

  /** Wait for every running job to settle */
  async drain(): Promise<void> {
    await Promise.all([...this.jobs.values()]);
  }

  private startJob(doc: ManualDocument, bytes: Uint8Array): void {
    const job = this.runJob(doc, bytes).finally(() => {
      this.jobs.delete(doc.id);
    });
    this.jobs.set(doc.id, job);
  }

  /** Never rejects: every outcome is recorded on the document */
  private async runJob(doc: ManualDocument, bytes: Uint8Array): Promise<void> {
    const timeoutMs = this.deps.ingestion.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const progress: UpsertProgress = { upsert: null };
    const started = Date.now();

    try {
      // Let ingest() return before any work starts
      await Promise.resolve();
      this.deps.store.markProcessing(doc.id);
      const chunksCount = await this.process(doc, bytes, controller.signal, progress);
      this.deps.store.markIndexed(doc.id, chunksCount);
      console.error(
        `[Ingestion] ${doc.id} INDEXED with ${chunksCount} chunks in ${Date.now() - started}ms`
      );
      this.recordDevice(doc);
    } catch (error) {
      const message = controller.signal.aborted
        ? `Ingestion timed out after ${timeoutMs} ms`
        : error instanceof Error
          ? error.message
          : String(error);
      console.error(`[Ingestion] ${doc.id} failed: ${message}`);
      await this.settleFailure(doc.id, message, progress);
    } finally {
      clearTimeout(timer);
    }
  }

  private async process(
    doc: ManualDocument,
    bytes: Uint8Array,
    signal: AbortSignal,
    progress: UpsertProgress
  ): Promise<number> {
    const { chunking, ingestion, indexRetry } = this.deps;

    this.logStage(doc.id, 'extract');
    const extracted = await untilAborted(this.deps.extractor.extract(bytes, doc.file_type), signal);

    if (extracted.text.replace(/\s/g, '').length < ingestion.minExtractedTextLength) {
      throw new ExtractionError(INSUFFICIENT_TEXT_MESSAGE, 'INSUFFICIENT_TEXT', {
        minimum: ingestion.minExtractedTextLength,
      });
    }

    this.logStage(doc.id, 'normalize', signal);
    const normalized = normalizePages(extracted.pages);
    const hints = detectStructuralHints(normalized.text);

    this.logStage(doc.id, 'chunk', signal);
    const chunks = chunkText(normalized.text, chunking, normalized.pageOffsets);
    if (chunks.length === 0) {
      throw new IngestionError('Document produced no chunks', 'NO_CHUNKS', { documentId: doc.id });
    }
    console.error(`[Ingestion] ${doc.id} produced ${chunks.length} chunks`);

    this.logStage(doc.id, 'embed', signal);
    const vectors = await untilAborted(
      this.deps.embedder.embedDocuments(chunks.map((c) => c.text)),
      signal
    );

    this.logStage(doc.id, 'upsert', signal);
    const entries = chunks.map(
      (chunk, i): VectorEntry => ({
        id: chunkId(doc.id, chunk.index),
        vector: vectors[i],
        text: chunk.text,
        metadata: toChunkMetadata(doc, chunk, chunks.length, hints),
      })
    );
    progress.upsert = withRetry(() => this.deps.index.upsertMany(entries), isIndexUnavailable, {
      ...indexRetry,
      label: 'Ingestion',
      signal,
    });
    await untilAborted(progress.upsert, signal);

    throwIfAborted(signal);
    return chunks.length;
  }

  private async settleFailure(
    documentId: string,
    message: string,
    progress: UpsertProgress
  ): Promise<void> {
    if (progress.upsert) {
      // A write still in flight must land before the compensating delete runs
      await Promise.allSettled([progress.upsert]);
      try {
        const removed = await withRetry(
          () => this.deps.index.delete(documentId),
          isIndexUnavailable,
          { ...this.deps.indexRetry, label: 'Ingestion' }
        );
        console.error(`[Ingestion] ${documentId} compensating delete removed ${removed} chunks`);
      } catch (error) {
        console.error(
          `[Ingestion] ${documentId} compensating delete failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    try {
      this.deps.store.markFailed(documentId, message);
    } catch (error) {
      console.error(
        `[Ingestion] ${documentId} could not be marked FAILED: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private recordDevice(doc: ManualDocument): void {
    try {
      this.deps.store.recordDevice(doc.device_type, doc.brand, doc.model);
    } catch (error) {
      console.error(
        `[Ingestion] Device catalog update failed for ${doc.id}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private logStage(documentId: string, stage: string, signal?: AbortSignal): void {
    if (signal) throwIfAborted(signal);
    console.error(`[Ingestion] ${documentId} stage: ${stage}`);
  }

  private validateRequest(request: IngestRequest): {
    fileName: string;
    fileType: SupportedFileType;
    deviceType: string;
    brand: string;
    model: string | null;
  } {
    const fileName = path.basename(request.fileName.trim());
    const deviceType = request.deviceType.trim();
    const brand = request.brand.trim();
    const model = request.model?.trim() || null;

    if (!fileName) {
      throw new IngestionError('File name is required', 'INVALID_REQUEST');
    }
    if (!deviceType || !brand) {
      throw new IngestionError('device_type and brand are required', 'INVALID_REQUEST', {
        deviceType: request.deviceType,
        brand: request.brand,
      });
    }

    const extension = path.extname(fileName).slice(1).toLowerCase();
    if (!isSupportedFileType(extension) || !this.deps.ingestion.allowedExtensions.includes(extension)) {
      throw new IngestionError(
        `File type ".${extension}" is not allowed. Allowed: ${this.deps.ingestion.allowedExtensions.join(', ')}`,
        'UNSUPPORTED_FILE_TYPE',
        { fileName, extension }
      );
    }

    const maxBytes = this.deps.ingestion.maxUploadSizeMb * 1024 * 1024;
    if (request.bytes.byteLength > maxBytes) {
      throw new IngestionError(
        `File is ${request.bytes.byteLength} bytes, limit is ${this.deps.ingestion.maxUploadSizeMb} MB`,
        'FILE_TOO_LARGE',
        { fileName, size: request.bytes.byteLength, maxBytes }
      );
    }

    return { fileName, fileType: extension, deviceType, brand, model };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function toChunkMetadata(
  doc: ManualDocument,
  chunk: ChunkResult,
  totalChunks: number,
  hints: { sectionType?: ChunkMetadata['section_type']; detectedModel?: string }
): ChunkMetadata {
  return {
    document_id: doc.id,
    chunk_index: chunk.index,
    total_chunks: totalChunks,
    device_type: doc.device_type,
    brand: doc.brand,
    model: doc.model ?? UNKNOWN_MODEL,
    source_file: doc.file_name,
    section_type: hints.sectionType ?? null,
    detected_model: hints.detectedModel ?? null,
    page_number: chunk.pageNumber,
    character_start: chunk.startOffset,
    character_end: chunk.endOffset,
    overlap_previous: chunk.overlapWithPrevious,
    overlap_next: chunk.overlapWithNext,
  };
}

function timeoutError(): IngestionError {
  return new IngestionError('Ingestion timed out', 'INGESTION_TIMEOUT');
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw timeoutError();
  }
}

/**
 * Settle with the stage's result, or reject as soon as the signal aborts.
 * The stage itself keeps running; its late result is ignored.
 */
function untilAborted<T>(stage: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(timeoutError());
    stage.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
