/**
 * Manual document records and their ingestion lifecycle
 *
 * A document moves PENDING -> PROCESSING -> INDEXED, or ends in FAILED.
 * The lifecycle is a tagged union so every consumer handles each state.
 */

/**
 * File types the ingestion pipeline can extract text from
 */
export const SUPPORTED_FILE_TYPES = ['pdf', 'txt'] as const;

export type SupportedFileType = (typeof SUPPORTED_FILE_TYPES)[number];

export function isSupportedFileType(value: string): value is SupportedFileType {
  return SUPPORTED_FILE_TYPES.some((type) => type === value);
}

export type DocumentStatus = 'PENDING' | 'PROCESSING' | 'INDEXED' | 'FAILED';

export const DOCUMENT_STATUSES: readonly DocumentStatus[] = [
  'PENDING',
  'PROCESSING',
  'INDEXED',
  'FAILED',
];

/**
 * Lifecycle state of a document. Timestamps are ISO 8601.
 */
export type DocumentLifecycle =
  | { status: 'PENDING' }
  | { status: 'PROCESSING'; startedAt: string }
  | { status: 'INDEXED'; chunksCount: number; processedAt: string }
  | { status: 'FAILED'; errorMessage: string; failedAt: string };

/**
 * A device manual accepted for ingestion
 */
export interface ManualDocument {
  /** UUID v4 identifier */
  id: string;

  /** Original filename */
  file_name: string;

  /** Absolute path the file was read from, null when uploaded as bytes */
  file_path: string | null;

  file_type: SupportedFileType;

  /** File size in bytes */
  file_size: number;

  /** SHA-256 hash of file content (format: 'sha256:...') */
  file_hash: string;

  device_type: string;
  brand: string;

  /** Null when the uploader did not name a model */
  model: string | null;

  /** ISO 8601 timestamp when the document was accepted */
  uploaded_at: string;

  lifecycle: DocumentLifecycle;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Whether the lifecycle is in a state no job will move it out of
 */
export function isTerminal(lifecycle: DocumentLifecycle): boolean {
  switch (lifecycle.status) {
    case 'PENDING':
    case 'PROCESSING':
      return false;
    case 'INDEXED':
    case 'FAILED':
      return true;
    default:
      return assertNever(lifecycle);
  }
}

/**
 * Flatten a lifecycle into the snake_case fields returned by tools
 */
export function describeLifecycle(lifecycle: DocumentLifecycle): {
  status: DocumentStatus;
  chunks_count: number | null;
  error_message: string | null;
  processing_started_at: string | null;
  processing_completed_at: string | null;
} {
  switch (lifecycle.status) {
    case 'PENDING':
      return {
        status: 'PENDING',
        chunks_count: null,
        error_message: null,
        processing_started_at: null,
        processing_completed_at: null,
      };
    case 'PROCESSING':
      return {
        status: 'PROCESSING',
        chunks_count: null,
        error_message: null,
        processing_started_at: lifecycle.startedAt,
        processing_completed_at: null,
      };
    case 'INDEXED':
      return {
        status: 'INDEXED',
        chunks_count: lifecycle.chunksCount,
        error_message: null,
        processing_started_at: null,
        processing_completed_at: lifecycle.processedAt,
      };
    case 'FAILED':
      return {
        status: 'FAILED',
        chunks_count: null,
        error_message: lifecycle.errorMessage,
        processing_started_at: null,
        processing_completed_at: lifecycle.failedAt,
      };
    default:
      return assertNever(lifecycle);
  }
}
