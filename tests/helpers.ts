/**
 * Shared test helpers
 *
 * Temp directories, a test configuration on the hashing embedder, chunk
 * metadata factories and a scripted language model stand-in.
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { vi } from 'vitest';
import {
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
} from '../src/services/config.js';
import { isSqliteVecAvailable } from '../src/services/storage/database.js';
import type { ChunkMetadata } from '../src/models/chunk.js';
import type {
  GenerateOptions,
  GenerateResult,
  LanguageModelClient,
} from '../src/services/generation/llm/client.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC AVAILABILITY CHECK
// ═══════════════════════════════════════════════════════════════════════════════

export const sqliteVecAvailable = isSqliteVecAvailable();

if (!sqliteVecAvailable) {
  console.warn(
    'WARNING: sqlite-vec extension not available. Index and store tests will be skipped.'
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/** Prefixes must match tests/global-teardown.ts */
export type TempPrefix = 'rag-index-' | 'rag-store-' | 'rag-ingest-' | 'rag-runtime-' | 'rag-tools-' | 'rag-extract-';

export function createTempDir(prefix: TempPrefix): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  if (existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Configuration independent of the process environment: hashing
 * embeddings, fast index retries and whatever the test overrides
 */
export function testConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return loadPipelineConfig(
    {
      ...overrides,
      embedding: { provider: 'hashing', ...overrides.embedding },
      indexRetry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, ...overrides.indexRetry },
    },
    {}
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function makeMetadata(overrides: Partial<ChunkMetadata> = {}): ChunkMetadata {
  return {
    document_id: 'doc-1',
    chunk_index: 0,
    total_chunks: 1,
    device_type: 'washing_machine',
    brand: 'Acme',
    model: 'WM-100',
    source_file: 'wm-100.pdf',
    section_type: null,
    detected_model: null,
    page_number: 1,
    character_start: 0,
    character_end: 10,
    overlap_previous: 0,
    overlap_next: 0,
    ...overrides,
  };
}

/**
 * Unit vector of the given dimension pointing mostly along `axis`, tilted
 * toward axis+1 by `tilt`
 */
export function axisVector(dimension: number, axis: number, tilt = 0): Float32Array {
  const vector = new Float32Array(dimension);
  vector[axis] = Math.cos(tilt);
  vector[(axis + 1) % dimension] = Math.sin(tilt);
  return vector;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LANGUAGE MODEL STAND-IN
// ═══════════════════════════════════════════════════════════════════════════════

export class ScriptedLanguageModel implements LanguageModelClient {
  readonly provider = 'scripted';
  readonly model = 'scripted-model';
  readonly prompts: string[] = [];
  readonly generate = vi.fn(
    async (prompt: string, _options: GenerateOptions): Promise<GenerateResult> => {
      this.prompts.push(prompt);
      return { text: this.reply, model: this.model };
    }
  );

  readonly checkHealth = vi.fn(async (): Promise<void> => undefined);

  constructor(private readonly reply = 'Check that the drain hose is not kinked.') {}
}
