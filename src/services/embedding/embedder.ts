/**
 * EmbeddingService - validation and batching around an EmbeddingClient
 *
 * Every input is checked before it reaches the model (empty, too long) and
 * every output is checked after (dimension, finite, non-zero) and scaled to
 * unit length. Input is never truncated.
 *
 * @module services/embedding/embedder
 */

import type { EmbeddingConfig } from '../config.js';
import {
  EmbeddingError,
  estimateTokenCount,
  l2Normalize,
  type EmbeddingClient,
} from './client.js';
import { HashingEmbeddingClient } from './hashing.js';
import { SentenceTransformerClient } from './sentence-transformer.js';

export class EmbeddingService {
  constructor(
    private readonly client: EmbeddingClient,
    private readonly config: Pick<EmbeddingConfig, 'dimension' | 'batchSize' | 'maxInputTokens'>
  ) {}

  get modelName(): string {
    return this.client.modelName;
  }

  /**
   * Embed chunk texts in batches of config.batchSize.
   *
   * @returns One unit-length vector per text, in input order
   * @throws EmbeddingError on invalid input or model failure; nothing is
   *   returned for a partially embedded set
   */
  async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }
    texts.forEach((text, index) => this.validateInput(text, index));

    const vectors: Float32Array[] = [];
    const batchSize = this.config.batchSize;
    const totalBatches = Math.ceil(texts.length / batchSize);

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      if (totalBatches > 1) {
        console.error(
          `[EMBED] Processing batch ${Math.floor(i / batchSize) + 1}/${totalBatches} (${batch.length} texts)`
        );
      }
      const raw = await this.client.embedBatch(batch);
      if (raw.length !== batch.length) {
        throw new EmbeddingError(
          `Embedding client returned ${raw.length} vectors for ${batch.length} texts`,
          'EMBEDDING_FAILED',
          { expected: batch.length, actual: raw.length }
        );
      }
      raw.forEach((vector, offset) => vectors.push(this.finalize(vector, i + offset)));
    }

    return vectors;
  }

  /**
   * Embed a single query text
   */
  async embedQuery(text: string): Promise<Float32Array> {
    this.validateInput(text, 0);
    const [vector] = await this.client.embedBatch([text]);
    if (!vector) {
      throw new EmbeddingError('Embedding client returned no vector for query', 'EMBEDDING_FAILED');
    }
    return this.finalize(vector, 0);
  }

  private validateInput(text: string, index: number): void {
    if (text.trim().length === 0) {
      throw new EmbeddingError(`Text ${index} is empty`, 'EMPTY_INPUT', { index });
    }
    const tokens = estimateTokenCount(text);
    if (tokens > this.config.maxInputTokens) {
      throw new EmbeddingError(
        `Text ${index} has about ${tokens} tokens, limit is ${this.config.maxInputTokens}`,
        'INPUT_TOO_LONG',
        { index, tokens, limit: this.config.maxInputTokens }
      );
    }
  }

  private finalize(vector: Float32Array, index: number): Float32Array {
    if (vector.length !== this.config.dimension) {
      throw new EmbeddingError(
        `Embedding ${index} has wrong dimensions: ${vector.length}, expected ${this.config.dimension}`,
        'DIMENSION_MISMATCH',
        { index, actualDim: vector.length }
      );
    }
    return l2Normalize(vector);
  }
}

/**
 * Build the embedding client selected by config.provider
 */
export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbeddingClient(config.dimension);
    case 'sentence-transformers':
      return new SentenceTransformerClient({
        modelName: config.model,
        pythonPath: config.pythonPath,
        maxInputTokens: config.maxInputTokens,
        batchSize: config.batchSize,
        timeoutMs: config.workerTimeoutMs,
      });
  }
}
