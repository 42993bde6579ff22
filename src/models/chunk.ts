/**
 * Chunk interfaces for indexed manual segments
 *
 * A chunk is a contiguous slice of a document's normalized text plus the
 * classification metadata copied from its document. Chunks are owned by the
 * vector index; nothing else persists them.
 */

/** Placeholder model name stored when the uploader gave none */
export const UNKNOWN_MODEL = 'Unknown';

/** Metadata fields a retrieval filter may constrain */
export const FILTERABLE_FIELDS = ['device_type', 'brand', 'model'] as const;

export type FilterableField = (typeof FILTERABLE_FIELDS)[number];

export const SECTION_TYPES = [
  'troubleshooting',
  'installation',
  'user_guide',
  'quick_start',
  'maintenance',
  'specifications',
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export function isSectionType(value: string): value is SectionType {
  return SECTION_TYPES.some((type) => type === value);
}

/**
 * Metadata stored alongside each chunk vector
 */
export interface ChunkMetadata {
  document_id: string;

  /** 0-based position within the document */
  chunk_index: number;

  total_chunks: number;

  device_type: string;
  brand: string;

  /** Document model, or UNKNOWN_MODEL */
  model: string;

  /** Original filename of the document */
  source_file: string;

  /** Section keyword found near the top of the document */
  section_type: SectionType | null;

  /** Model identifier found near the top of the document */
  detected_model: string | null;

  /** 1-based page the chunk starts on, null when the source has no pages */
  page_number: number | null;

  /** Offsets into the normalized document text */
  character_start: number;
  character_end: number;

  /** Characters shared with the neighbouring chunks */
  overlap_previous: number;
  overlap_next: number;
}

/**
 * A chunk as stored in (and returned from) the vector index
 */
export interface IndexedChunk extends ChunkMetadata {
  id: string;
  text: string;
}

/**
 * Stable id for a chunk, so re-upserting a document replaces its entries
 */
export function chunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}:${chunkIndex}`;
}
