/**
 * HashingEmbeddingClient Tests
 */

import { describe, it, expect } from 'vitest';
import { HashingEmbeddingClient, HASHING_MODEL_NAME } from '../../../src/services/embedding/hashing.js';
import { EmbeddingService } from '../../../src/services/embedding/embedder.js';

function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot;
}

describe('HashingEmbeddingClient', () => {
  const client = new HashingEmbeddingClient();
  const service = new EmbeddingService(client, { dimension: 384, batchSize: 32, maxInputTokens: 512 });

  it('produces 384-dimensional vectors', async () => {
    const [vector] = await client.embedBatch(['Reset the dishwasher']);
    expect(vector).toBeInstanceOf(Float32Array);
    expect(vector).toHaveLength(384);
    expect(client.modelName).toBe(HASHING_MODEL_NAME);
  });

  it('is deterministic', async () => {
    const [first] = await client.embedBatch(['Error E21 drain pump']);
    const [second] = await new HashingEmbeddingClient().embedBatch(['Error E21 drain pump']);
    expect(Array.from(first)).toEqual(Array.from(second));
  });

  it('ignores case', async () => {
    const [upper, lower] = await client.embedBatch(['DRAIN PUMP', 'drain pump']);
    expect(Array.from(upper)).toEqual(Array.from(lower));
  });

  it('places texts sharing words closer than unrelated texts', async () => {
    const [query, related, unrelated] = await service.embedDocuments([
      'washer drain pump error',
      'the drain pump of the washer reports an error',
      'adjust television screen brightness',
    ]);
    expect(cosine(query, related)).toBeGreaterThan(cosine(query, unrelated));
  });

  it('gives text without letters or digits a non-zero vector', async () => {
    const [vector] = await service.embedDocuments(['?!']);
    expect(vector.some((value) => value !== 0)).toBe(true);
  });
});
