/**
 * Embedding client contract and shared vector helpers
 *
 * @module services/embedding/client
 */

export type EmbeddingErrorCode =
  | 'EMPTY_INPUT'
  | 'INPUT_TOO_LONG'
  | 'DIMENSION_MISMATCH'
  | 'EMBEDDING_FAILED'
  | 'MODEL_NOT_FOUND'
  | 'PARSE_ERROR'
  | 'WORKER_ERROR';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

/**
 * A model that maps texts to fixed-length vectors.
 *
 * Implementations return one vector per input, in input order. They need not
 * normalize; EmbeddingService validates and normalizes every vector.
 */
export interface EmbeddingClient {
  readonly modelName: string;
  readonly dimensions: number;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

/** Tolerance for ‖v‖₂ = 1 */
export const UNIT_NORM_TOLERANCE = 1e-3;

export function l2Norm(vector: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length.
 *
 * @throws EmbeddingError if the vector is zero or contains non-finite values
 */
export function l2Normalize(vector: Float32Array): Float32Array {
  const norm = l2Norm(vector);
  if (!Number.isFinite(norm) || norm === 0) {
    throw new EmbeddingError(`Cannot normalize vector with norm ${norm}`, 'EMBEDDING_FAILED', {
      norm,
    });
  }
  const normalized = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    normalized[i] = vector[i] / norm;
  }
  return normalized;
}

const TOKEN_PATTERN = /\w+|[^\w\s]/g;

/**
 * Rough word-piece count used to reject oversized input before it reaches
 * the model. Words and punctuation marks count as one token each; the
 * worker's tokenizer makes the exact check.
 */
export function estimateTokenCount(text: string): number {
  return text.match(TOKEN_PATTERN)?.length ?? 0;
}
