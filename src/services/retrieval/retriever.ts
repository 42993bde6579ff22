/**
 * Retriever - query embedding, similarity search, scoring and thresholding
 *
 * The index is asked for k' = ceil(k * overfetchFactor) candidates so that
 * results dropped by the relevance threshold don't force a second query.
 * An empty result is a valid "no relevant context" outcome; embedding and
 * index failures propagate.
 *
 * @module services/retrieval/retriever
 */

import type { RetrievalConfig, IndexRetryConfig } from '../config.js';
import type { MetadataFilter, RetrievalResult } from '../../models/retrieval.js';
import type { EmbeddingService } from '../embedding/embedder.js';
import { isIndexUnavailable, type VectorIndex } from '../storage/vector-index.js';
import { MATCH_ALL } from '../storage/filter.js';
import { withRetry } from '../../utils/backoff.js';

export interface RetrieveOptions {
  /** Maximum results; k <= 0 returns [] */
  k: number;
  filter?: MetadataFilter;
  relevanceThreshold: number;
}

/**
 * relevance = 1 / (1 + distance). 1.0 at distance 0, strictly decreasing.
 */
export function relevanceFromDistance(distance: number): number {
  return 1 / (1 + Math.max(0, distance));
}

export function overfetchCount(k: number, overfetchFactor: number): number {
  return Math.ceil(k * Math.max(1, overfetchFactor));
}

export class Retriever {
  constructor(
    private readonly embedder: Pick<EmbeddingService, 'embedQuery'>,
    private readonly index: VectorIndex,
    private readonly config: Pick<RetrievalConfig, 'overfetchFactor'>,
    private readonly retry: IndexRetryConfig
  ) {}

  async retrieve(queryText: string, options: RetrieveOptions): Promise<RetrievalResult[]> {
    const k = Math.floor(options.k);
    if (k <= 0) {
      return [];
    }

    const queryVector = await this.embedder.embedQuery(queryText);
    const fetchCount = overfetchCount(k, this.config.overfetchFactor);
    const filter = options.filter ?? MATCH_ALL;

    const hits = await withRetry(
      () => this.index.query(queryVector, fetchCount, filter),
      isIndexUnavailable,
      { ...this.retry, label: 'Retriever' }
    );

    const scored = hits
      .map((hit, order) => ({
        hit,
        order,
        relevanceScore: relevanceFromDistance(hit.distance),
      }))
      .filter((entry) => entry.relevanceScore >= options.relevanceThreshold);

    // Index order (ascending distance, then chunk_index) breaks ties
    scored.sort((a, b) => b.relevanceScore - a.relevanceScore || a.order - b.order);

    const results = scored.slice(0, k).map(
      ({ hit, relevanceScore }, position): RetrievalResult => ({
        chunk: { ...hit.metadata, id: hit.id, text: hit.text },
        relevanceScore,
        distance: Math.max(0, hit.distance),
        rank: position + 1,
      })
    );

    console.error(
      `[Retriever] "${queryText.slice(0, 50)}" k=${k} fetched=${hits.length} passed=${scored.length} returned=${results.length}`
    );
    return results;
  }
}
