/**
 * Pipeline Configuration
 *
 * One explicit configuration object, validated with zod and handed to each
 * component at construction. Values come from environment variables (loaded
 * from .env by the entry point) with per-section overrides for tests.
 *
 * FAIL FAST: invalid values throw ConfigurationError at startup, listing
 * every problem at once.
 *
 * @module services/config
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { SUPPORTED_FILE_TYPES } from '../models/document.js';

/** Output dimension of sentence-transformers/all-MiniLM-L6-v2 */
export const EMBEDDING_DIMENSION = 384;

export const DEFAULT_DATABASE_PATH = path.join(os.homedir(), '.device-manual-rag', 'manuals.db');

const DEFAULT_LLM_MODELS = {
  ollama: 'llama3.1',
  gemini: 'gemini-2.5-flash',
} as const;

type ConfigErrorCode = 'INVALID_CONFIGURATION' | 'MISSING_API_KEY';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode = 'INVALID_CONFIGURATION',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace?.(this, ConfigurationError);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const positiveInt = () => z.coerce.number().int().positive();

const extensionList = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((part) => part.trim().toLowerCase().replace(/^\./, ''))
          .filter((part) => part.length > 0)
      : value,
  z.array(z.enum(SUPPORTED_FILE_TYPES)).min(1)
);

const ChunkingSchema = z.object({
  chunkSize: positiveInt().default(1000),
  chunkOverlap: z.coerce.number().int().min(0).default(200),
});

const EmbeddingSchema = z.object({
  provider: z.enum(['sentence-transformers', 'hashing']).default('sentence-transformers'),
  model: z.string().min(1).default('sentence-transformers/all-MiniLM-L6-v2'),
  dimension: z.coerce
    .number()
    .int()
    .refine((value) => value === EMBEDDING_DIMENSION, {
      message: `embedding dimension must be ${EMBEDDING_DIMENSION}`,
    })
    .default(EMBEDDING_DIMENSION),
  batchSize: positiveInt().default(32),
  maxInputTokens: positiveInt().default(256),
  pythonPath: z.string().min(1).optional(),
  workerTimeoutMs: positiveInt().default(300_000),
});

const RetrievalSchema = z.object({
  topK: positiveInt().default(5),
  relevanceThreshold: z.coerce.number().min(0).max(1).default(0.3),
  overfetchFactor: z.coerce.number().min(1).max(10).default(2),
});

const GenerationSchema = z
  .object({
    provider: z.enum(['ollama', 'gemini']).default('ollama'),
    model: z.string().min(1).optional(),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    maxTokens: positiveInt().default(1000),
    requestTimeoutMs: positiveInt().default(60_000),
    ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
    geminiApiKey: z.string().min(1).optional(),
    noContextStrategy: z.enum(['fixed-answer', 'model']).default('fixed-answer'),
    retry: z
      .object({
        maxAttempts: positiveInt().default(3),
        baseDelayMs: positiveInt().default(500),
        maxDelayMs: positiveInt().default(10_000),
      })
      .default({}),
    circuitBreaker: z
      .object({
        failureThreshold: positiveInt().default(5),
        recoveryTimeMs: positiveInt().default(60_000),
      })
      .default({}),
  })
  .transform((generation) => ({
    ...generation,
    model: generation.model ?? DEFAULT_LLM_MODELS[generation.provider],
  }));

const StorageSchema = z.object({
  databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  collection: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, 'collection must be 1-64 letters, digits, "_" or "-"')
    .default('device_manuals'),
});

const IndexRetrySchema = z.object({
  maxAttempts: positiveInt().default(3),
  baseDelayMs: positiveInt().default(200),
  maxDelayMs: positiveInt().default(5000),
});

const IngestionSchema = z.object({
  timeoutMs: positiveInt().default(300_000),
  minExtractedTextLength: z.coerce.number().int().min(0).default(100),
  maxUploadSizeMb: z.coerce.number().positive().default(50),
  allowedExtensions: extensionList.default(['pdf', 'txt']),
});

export const PipelineConfigSchema = z
  .object({
    chunking: ChunkingSchema.default({}),
    embedding: EmbeddingSchema.default({}),
    retrieval: RetrievalSchema.default({}),
    generation: GenerationSchema.default({}),
    storage: StorageSchema.default({}),
    indexRetry: IndexRetrySchema.default({}),
    ingestion: IngestionSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.chunking.chunkOverlap >= config.chunking.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'chunkOverlap'],
        message: `chunk overlap (${config.chunking.chunkOverlap}) must be smaller than chunk size (${config.chunking.chunkSize})`,
      });
    }
    if (config.generation.provider === 'gemini' && !config.generation.geminiApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['generation', 'geminiApiKey'],
        message: 'GEMINI_API_KEY is required when LLM_PROVIDER=gemini',
      });
    }
  });

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type ChunkingConfig = PipelineConfig['chunking'];
export type EmbeddingConfig = PipelineConfig['embedding'];
export type RetrievalConfig = PipelineConfig['retrieval'];
export type GenerationConfig = PipelineConfig['generation'];
export type StorageConfig = PipelineConfig['storage'];
export type IndexRetryConfig = PipelineConfig['indexRetry'];
export type IngestionConfig = PipelineConfig['ingestion'];

/**
 * Per-section overrides, applied on top of the environment. An override
 * explicitly set to undefined falls back to the default, not the env value.
 */
export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/** Read an env var, treating blank values as unset */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Build the pipeline configuration from environment variables.
 *
 * Environment variables (defaults in parentheses):
 *   CHUNK_SIZE (1000), CHUNK_OVERLAP (200)
 *   EMBEDDING_PROVIDER (sentence-transformers), EMBEDDING_MODEL, EMBEDDING_DIMENSION (384),
 *   EMBEDDING_BATCH_SIZE (32), EMBEDDING_MAX_TOKENS (256), EMBEDDING_PYTHON_PATH,
 *   EMBEDDING_WORKER_TIMEOUT_MS (300000)
 *   RETRIEVAL_TOP_K (5), RELEVANCE_THRESHOLD (0.3), RETRIEVAL_OVERFETCH_FACTOR (2)
 *   LLM_PROVIDER (ollama), LLM_MODEL, LLM_TEMPERATURE (0.3), LLM_MAX_TOKENS (1000),
 *   LLM_REQUEST_TIMEOUT_MS (60000), OLLAMA_BASE_URL, GEMINI_API_KEY,
 *   NO_CONTEXT_STRATEGY (fixed-answer)
 *   VECTOR_DB_PATH (~/.device-manual-rag/manuals.db), VECTOR_COLLECTION (device_manuals)
 *   INDEX_RETRY_ATTEMPTS (3), INDEX_RETRY_BASE_DELAY_MS (200)
 *   INGESTION_TIMEOUT_MS (300000), MIN_EXTRACTED_TEXT_LENGTH (100),
 *   MAX_UPLOAD_SIZE_MB (50), ALLOWED_EXTENSIONS (pdf,txt)
 *
 * @throws ConfigurationError listing every invalid value
 */
export function loadPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const raw = {
    chunking: {
      chunkSize: readEnv(env, 'CHUNK_SIZE'),
      chunkOverlap: readEnv(env, 'CHUNK_OVERLAP'),
      ...overrides.chunking,
    },
    embedding: {
      provider: readEnv(env, 'EMBEDDING_PROVIDER'),
      model: readEnv(env, 'EMBEDDING_MODEL'),
      dimension: readEnv(env, 'EMBEDDING_DIMENSION'),
      batchSize: readEnv(env, 'EMBEDDING_BATCH_SIZE'),
      maxInputTokens: readEnv(env, 'EMBEDDING_MAX_TOKENS'),
      pythonPath: readEnv(env, 'EMBEDDING_PYTHON_PATH'),
      workerTimeoutMs: readEnv(env, 'EMBEDDING_WORKER_TIMEOUT_MS'),
      ...overrides.embedding,
    },
    retrieval: {
      topK: readEnv(env, 'RETRIEVAL_TOP_K'),
      relevanceThreshold: readEnv(env, 'RELEVANCE_THRESHOLD'),
      overfetchFactor: readEnv(env, 'RETRIEVAL_OVERFETCH_FACTOR'),
      ...overrides.retrieval,
    },
    generation: {
      provider: readEnv(env, 'LLM_PROVIDER'),
      model: readEnv(env, 'LLM_MODEL'),
      temperature: readEnv(env, 'LLM_TEMPERATURE'),
      maxTokens: readEnv(env, 'LLM_MAX_TOKENS'),
      requestTimeoutMs: readEnv(env, 'LLM_REQUEST_TIMEOUT_MS'),
      ollamaBaseUrl: readEnv(env, 'OLLAMA_BASE_URL'),
      geminiApiKey: readEnv(env, 'GEMINI_API_KEY'),
      noContextStrategy: readEnv(env, 'NO_CONTEXT_STRATEGY'),
      ...overrides.generation,
    },
    storage: {
      databasePath: readEnv(env, 'VECTOR_DB_PATH'),
      collection: readEnv(env, 'VECTOR_COLLECTION'),
      ...overrides.storage,
    },
    indexRetry: {
      maxAttempts: readEnv(env, 'INDEX_RETRY_ATTEMPTS'),
      baseDelayMs: readEnv(env, 'INDEX_RETRY_BASE_DELAY_MS'),
      ...overrides.indexRetry,
    },
    ingestion: {
      timeoutMs: readEnv(env, 'INGESTION_TIMEOUT_MS'),
      minExtractedTextLength: readEnv(env, 'MIN_EXTRACTED_TEXT_LENGTH'),
      maxUploadSizeMb: readEnv(env, 'MAX_UPLOAD_SIZE_MB'),
      allowedExtensions: readEnv(env, 'ALLOWED_EXTENSIONS'),
      ...overrides.ingestion,
    },
  };

  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const location = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${location}${e.message}`;
    });
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join('; ')}`, 'INVALID_CONFIGURATION', {
      issues,
    });
  }
  return result.data;
}

/**
 * One-line summary for the startup log. Secrets are not included.
 */
export function describeConfig(config: PipelineConfig): string {
  return [
    `chunk=${config.chunking.chunkSize}/${config.chunking.chunkOverlap}`,
    `embedding=${config.embedding.provider}:${config.embedding.model}`,
    `top_k=${config.retrieval.topK}`,
    `threshold=${config.retrieval.relevanceThreshold}`,
    `overfetch=${config.retrieval.overfetchFactor}`,
    `llm=${config.generation.provider}:${config.generation.model}`,
    `collection=${config.storage.collection}`,
  ].join(' ');
}
