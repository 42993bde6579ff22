/**
 * Retrieval, context and answer models
 */

import type { FilterableField, IndexedChunk } from './chunk.js';

/**
 * Single-field equality constraint
 */
export interface EqualityFilter {
  kind: 'eq';
  field: FilterableField;
  value: string;
}

/**
 * Closed metadata filter: no constraint, one equality, or a conjunction of
 * equalities. There is no disjunction or negation.
 */
export type MetadataFilter =
  | { kind: 'all' }
  | EqualityFilter
  | { kind: 'and'; clauses: EqualityFilter[] };

/**
 * Caller-facing filter fields; unset fields are unconstrained
 */
export interface FilterFields {
  deviceType?: string | null;
  brand?: string | null;
  model?: string | null;
}

export interface RetrievalResult {
  chunk: IndexedChunk;

  /** 1 / (1 + distance), in [0, 1] */
  relevanceScore: number;

  /** Non-negative distance reported by the index */
  distance: number;

  /** 1-based position after scoring and thresholding */
  rank: number;
}

/**
 * Read-only excerpt of a retrieved chunk returned with an answer
 */
export interface Citation {
  /** First 200 characters of the chunk text */
  content: string;
  source_file: string;
  page_number: number | null;
  section_name: string | null;
  relevance_score: number;
}

export type AssembledContext =
  | { kind: 'empty' }
  | { kind: 'context'; text: string; included: RetrievalResult[] };

export interface GeneratedAnswer {
  answer: string;

  /** One citation per result included in the context, in rank order */
  sources: Citation[];

  /** False when no chunk passed the relevance threshold */
  contextFound: boolean;

  /** Model that produced the answer, null for the fixed no-context answer */
  model: string | null;
}
