/**
 * RagRuntime - wires configuration, storage and services together
 *
 * One runtime owns one database connection and exposes the operations the
 * MCP tools call: ingest, query, document management, the device catalog
 * and the health report.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/runtime
 */

import type Database from 'better-sqlite3';
import type { PipelineConfig } from './config.js';
import { describeConfig } from './config.js';
import type { DeviceCategory } from '../models/device.js';
import type { ManualDocument } from '../models/document.js';
import type { GeneratedAnswer } from '../models/retrieval.js';
import {
  overallStatus,
  type DatabaseHealth,
  type EmbeddingHealth,
  type HealthReport,
  type LanguageModelHealth,
} from '../models/health.js';
import {
  DocumentStore,
  DocumentStoreError,
  SqliteVectorIndex,
  buildMetadataFilter,
  isIndexUnavailable,
  openDatabase,
  type ListDocumentsOptions,
  type VectorIndex,
} from './storage/index.js';
import type { EmbeddingClient } from './embedding/client.js';
import { EmbeddingService, createEmbeddingClient } from './embedding/embedder.js';
import { DefaultTextExtractor, type TextExtractor } from './extraction/extractor.js';
import { Retriever } from './retrieval/retriever.js';
import { assembleContext } from './generation/context.js';
import { AnswerGenerator } from './generation/answer-generator.js';
import type { LanguageModelClient } from './generation/llm/client.js';
import { createLanguageModelClient } from './generation/llm/factory.js';
import { IngestionError, IngestionService, type IngestRequest } from './ingestion/pipeline.js';
import { withRetry } from '../utils/backoff.js';

export interface RuntimeOverrides {
  extractor?: TextExtractor;
  embeddingClient?: EmbeddingClient;
  languageModel?: LanguageModelClient;
  /** Open connection to use instead of storage.databasePath; not closed by close() */
  database?: Database.Database;
  /** Index to use instead of the sqlite-vec index */
  vectorIndex?: VectorIndex;
}

export interface QueryOptions {
  deviceType?: string | null;
  brand?: string | null;
  model?: string | null;
  topK?: number;
  relevanceThreshold?: number;
}

export interface DeleteResult {
  document_id: string;
  chunks_removed: number;
}

const INTERRUPTED_MESSAGE = 'Ingestion interrupted by a server restart';

const HEALTH_CHECK_TEXT = 'washing machine does not drain';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RagRuntime {
  readonly store: DocumentStore;
  readonly index: VectorIndex;
  readonly ingestion: IngestionService;
  private readonly embedder: EmbeddingService;
  private readonly languageModel: LanguageModelClient;
  private readonly retriever: Retriever;
  private readonly generator: AnswerGenerator;
  private closed = false;

  constructor(
    readonly config: PipelineConfig,
    private readonly db: Database.Database,
    private readonly ownsDatabase: boolean,
    deps: {
      extractor: TextExtractor;
      embeddingClient: EmbeddingClient;
      languageModel: LanguageModelClient;
      vectorIndex?: VectorIndex;
    }
  ) {
    const embedder = new EmbeddingService(deps.embeddingClient, config.embedding);
    this.embedder = embedder;
    this.languageModel = deps.languageModel;
    this.store = new DocumentStore(db);
    this.index =
      deps.vectorIndex ??
      new SqliteVectorIndex(db, config.storage.collection, config.embedding.dimension);
    this.retriever = new Retriever(embedder, this.index, config.retrieval, config.indexRetry);
    this.generator = new AnswerGenerator(deps.languageModel, config.generation);
    this.ingestion = new IngestionService({
      store: this.store,
      extractor: deps.extractor,
      embedder,
      index: this.index,
      chunking: config.chunking,
      ingestion: config.ingestion,
      indexRetry: config.indexRetry,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INGESTION
  // ═══════════════════════════════════════════════════════════════════════════

  ingest(request: IngestRequest): string {
    return this.ingestion.ingest(request);
  }

  waitForDocument(documentId: string): Promise<ManualDocument> {
    return this.ingestion.waitFor(documentId);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Answer a troubleshooting question from the indexed manuals.
   * No chunk above the threshold is a successful "no context" answer.
   */
  async query(text: string, options: QueryOptions = {}): Promise<GeneratedAnswer> {
    const started = Date.now();
    const results = await this.retriever.retrieve(text, {
      k: options.topK ?? this.config.retrieval.topK,
      filter: buildMetadataFilter({
        deviceType: options.deviceType,
        brand: options.brand,
        model: options.model,
      }),
      relevanceThreshold: options.relevanceThreshold ?? this.config.retrieval.relevanceThreshold,
    });
    const answer = await this.generator.generate(text, assembleContext(results));
    console.error(
      `[Query] "${text.slice(0, 50)}" context=${answer.contextFound} sources=${answer.sources.length} in ${Date.now() - started}ms`
    );
    return answer;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DOCUMENTS
  // ═══════════════════════════════════════════════════════════════════════════

  getDocument(documentId: string): ManualDocument {
    return this.store.require(documentId);
  }

  listDocuments(options: ListDocumentsOptions = {}): { documents: ManualDocument[]; total: number } {
    return this.store.list(options);
  }

  /**
   * Remove a document's index rows, then its record.
   *
   * @throws IngestionError JOB_ALREADY_RUNNING while the document is processing
   * @throws DocumentStoreError DOCUMENT_NOT_FOUND
   */
  async deleteDocument(documentId: string): Promise<DeleteResult> {
    if (this.ingestion.isRunning(documentId)) {
      throw new IngestionError(
        `Document ${documentId} is still being processed`,
        'JOB_ALREADY_RUNNING',
        { documentId }
      );
    }
    this.store.require(documentId);

    const removed = await withRetry(() => this.index.delete(documentId), isIndexUnavailable, {
      ...this.config.indexRetry,
      label: 'Runtime',
    });
    if (!this.store.delete(documentId)) {
      throw new DocumentStoreError(`Document "${documentId}" not found`, 'DOCUMENT_NOT_FOUND', {
        documentId,
      });
    }
    console.error(`[Runtime] Deleted document ${documentId} (${removed} chunks)`);
    return { document_id: documentId, chunks_removed: removed };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DEVICE CATALOG
  // ═══════════════════════════════════════════════════════════════════════════

  listDevices(): DeviceCategory[] {
    return this.store.listDevices();
  }

  getDevice(deviceType: string): DeviceCategory | null {
    return this.store.getDevice(deviceType.trim());
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HEALTH
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Check the database, embed a short text and reach the language model.
   * An unreachable model only degrades the report: ingestion and
   * no-context answers still work without it.
   */
  async health(): Promise<HealthReport> {
    const [database, embedding, llm] = await Promise.all([
      this.checkDatabase(),
      this.checkEmbedding(),
      this.checkLanguageModel(),
    ]);
    const report: HealthReport = {
      status: overallStatus([database.status, embedding.status, llm.status]),
      checked_at: new Date().toISOString(),
      services: { database, embedding, llm },
    };
    console.error(
      `[Health] ${report.status}: database=${database.status} embedding=${embedding.status} llm=${llm.status}`
    );
    return report;
  }

  private async checkDatabase(): Promise<DatabaseHealth> {
    const started = Date.now();
    const base = { path: this.db.name, sqlite_vec_version: null, documents: null };
    if (!this.db.open) {
      return { ...base, status: 'unhealthy', latency_ms: 0, error: 'Database connection is closed' };
    }
    try {
      const version = this.db.prepare<[], { version: string }>('SELECT vec_version() AS version').get();
      const documents = this.db
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM documents')
        .get();
      return {
        ...base,
        status: 'healthy',
        latency_ms: Date.now() - started,
        sqlite_vec_version: version?.version ?? null,
        documents: documents?.count ?? 0,
      };
    } catch (error) {
      return { ...base, status: 'unhealthy', latency_ms: Date.now() - started, error: errorMessage(error) };
    }
  }

  private async checkEmbedding(): Promise<EmbeddingHealth> {
    const started = Date.now();
    const base = {
      provider: this.config.embedding.provider,
      model: this.embedder.modelName,
      dimension: this.config.embedding.dimension,
    };
    try {
      await this.embedder.embedQuery(HEALTH_CHECK_TEXT);
      return { ...base, status: 'healthy', latency_ms: Date.now() - started };
    } catch (error) {
      return { ...base, status: 'unhealthy', latency_ms: Date.now() - started, error: errorMessage(error) };
    }
  }

  private async checkLanguageModel(): Promise<LanguageModelHealth> {
    const started = Date.now();
    const base = { provider: this.languageModel.provider, model: this.languageModel.model };
    try {
      await this.languageModel.checkHealth();
      return { ...base, status: 'healthy', latency_ms: Date.now() - started };
    } catch (error) {
      return { ...base, status: 'degraded', latency_ms: Date.now() - started, error: errorMessage(error) };
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Close the database if this runtime opened it. Jobs still running fail
   * on their next index write and are recovered as FAILED on next start.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
      console.error('[Runtime] Database closed');
    }
  }
}

/**
 * Build a runtime from configuration. Providers not overridden are created
 * from config (sentence-transformers or hashing embeddings, Ollama or Gemini).
 */
export function createRagRuntime(config: PipelineConfig, overrides: RuntimeOverrides = {}): RagRuntime {
  const db =
    overrides.database ??
    openDatabase(config.storage.databasePath, { dimension: config.embedding.dimension });

  const runtime = new RagRuntime(config, db, overrides.database === undefined, {
    extractor: overrides.extractor ?? new DefaultTextExtractor(),
    embeddingClient: overrides.embeddingClient ?? createEmbeddingClient(config.embedding),
    languageModel: overrides.languageModel ?? createLanguageModelClient(config.generation),
    vectorIndex: overrides.vectorIndex,
  });

  runtime.store.failInterrupted(INTERRUPTED_MESSAGE);
  console.error(`[Runtime] Ready: ${describeConfig(config)}`);
  return runtime;
}
