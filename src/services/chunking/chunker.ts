/**
 * Recursive Character Chunker
 *
 * Splits normalized manual text into overlapping chunks of at most
 * chunkSize characters. Splitting prefers paragraph breaks, then line
 * breaks, then spaces, and only cuts between characters for a region that
 * has no coarser boundary.
 *
 * Every chunk is an exact slice of the input, so removing each chunk's
 * overlapWithPrevious prefix and concatenating the rest gives back the input.
 *
 * @module services/chunking/chunker
 */

import { ConfigurationError } from '../config.js';
import { pageForOffset, type PageOffset } from './text-normalizer.js';

/** Separator hierarchy, coarsest first. '' means "between any two characters". */
export const SEPARATORS = ['\n\n', '\n', ' ', ''] as const;

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Result of chunking - ready for embedding
 */
export interface ChunkResult {
  /** 0-based position within the document */
  index: number;

  text: string;

  /** Start offset in the normalized text (inclusive) */
  startOffset: number;

  /** End offset in the normalized text (exclusive) */
  endOffset: number;

  /** Characters shared with the previous chunk */
  overlapWithPrevious: number;

  /** Characters shared with the next chunk */
  overlapWithNext: number;

  /** 1-based page of startOffset, null without page information */
  pageNumber: number | null;
}

interface Span {
  start: number;
  end: number;
}

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Split text into overlapping chunks.
 *
 * Deterministic: identical text and options give identical chunks.
 * Empty or whitespace-only text yields no chunks; text no longer than
 * chunkSize yields exactly one.
 *
 * @throws ConfigurationError for an invalid size/overlap combination
 */
export function chunkText(
  text: string,
  options: ChunkingOptions,
  pageOffsets: PageOffset[] = []
): ChunkResult[] {
  validateChunkingOptions(options);

  if (text.trim().length === 0) {
    return [];
  }

  const spans =
    text.length <= options.chunkSize
      ? [{ start: 0, end: text.length }]
      : mergePieces(splitRegion(text, 0, text.length, 0, options.chunkSize), options);

  return spans.map((span, index) => {
    const previous = index > 0 ? spans[index - 1] : undefined;
    const next = index < spans.length - 1 ? spans[index + 1] : undefined;
    return {
      index,
      text: text.slice(span.start, span.end),
      startOffset: span.start,
      endOffset: span.end,
      overlapWithPrevious: previous ? Math.max(0, previous.end - span.start) : 0,
      overlapWithNext: next ? Math.max(0, span.end - next.start) : 0,
      pageNumber: pageForOffset(span.start, pageOffsets),
    };
  });
}

/**
 * Split [start, end) into pieces no longer than chunkSize using the
 * coarsest separator the region contains. The separator stays attached to
 * the end of the piece before it, so the pieces tile the region.
 */
function splitRegion(
  text: string,
  start: number,
  end: number,
  separatorIndex: number,
  chunkSize: number
): Span[] {
  const region = text.slice(start, end);
  let level = separatorIndex;
  while (SEPARATORS[level] !== '' && !region.includes(SEPARATORS[level])) {
    level++;
  }
  const separator = SEPARATORS[level];

  if (separator === '') {
    const chars: Span[] = [];
    for (let pos = start; pos < end; pos++) {
      chars.push({ start: pos, end: pos + 1 });
    }
    return chars;
  }

  const pieces: Span[] = [];
  let pos = start;
  while (pos < end) {
    const found = text.indexOf(separator, pos);
    const pieceEnd = found === -1 || found + separator.length > end ? end : found + separator.length;

    if (pieceEnd - pos <= chunkSize) {
      pieces.push({ start: pos, end: pieceEnd });
    } else {
      pieces.push(...splitRegion(text, pos, pieceEnd, level + 1, chunkSize));
    }
    pos = pieceEnd;
  }
  return pieces;
}

/**
 * Greedily merge consecutive pieces into chunks of at most chunkSize.
 *
 * The next chunk starts at the earliest piece boundary whose suffix of the
 * previous chunk is within chunkOverlap and still leaves room for the next
 * unseen piece, so every chunk advances past the previous one.
 */
function mergePieces(pieces: Span[], options: ChunkingOptions): Span[] {
  const { chunkSize, chunkOverlap } = options;
  const chunks: Span[] = [];
  let first = 0;

  while (first < pieces.length) {
    const windowStart = pieces[first].start;
    let next = first;
    while (next < pieces.length && pieces[next].end - windowStart <= chunkSize) {
      next++;
    }

    const windowEnd = pieces[next - 1].end;
    chunks.push({ start: windowStart, end: windowEnd });
    if (next === pieces.length) break;

    const upcomingEnd = pieces[next].end;
    let carried = first + 1;
    while (
      carried < next &&
      (windowEnd - pieces[carried].start > chunkOverlap ||
        upcomingEnd - pieces[carried].start > chunkSize)
    ) {
      carried++;
    }
    first = carried;
  }

  return chunks;
}
