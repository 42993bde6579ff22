/**
 * Local feature-hashing embedder
 *
 * Deterministic, dependency-free vectors for offline use and tests. Word
 * unigrams and character trigrams are hashed (FNV-1a) into signed buckets,
 * so texts sharing vocabulary land close together under cosine distance.
 * It is not a semantic model.
 *
 * @module services/embedding/hashing
 */

import { EMBEDDING_DIMENSION } from '../config.js';
import type { EmbeddingClient } from './client.js';

export const HASHING_MODEL_NAME = 'feature-hashing-v1';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(value: string, seed: number = FNV_OFFSET): number {
  let hash = seed;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbeddingClient implements EmbeddingClient {
  readonly modelName = HASHING_MODEL_NAME;

  constructor(readonly dimensions: number = EMBEDDING_DIMENSION) {}

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

    for (const word of words) {
      this.addFeature(vector, `w:${word}`, 1);
      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(vector, `t:${padded.slice(i, i + 3)}`, 0.5);
      }
    }

    // Text with no letters or digits still gets a stable non-zero vector
    if (words.length === 0) {
      this.addFeature(vector, `raw:${text}`, 1);
    }
    return vector;
  }

  private addFeature(vector: Float32Array, feature: string, weight: number): void {
    const bucket = fnv1a(feature) % this.dimensions;
    const sign = (fnv1a(feature, 0x9747b28c) & 1) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}
