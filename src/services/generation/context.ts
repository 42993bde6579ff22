/**
 * Context assembly and citation formatting
 *
 * @module services/generation/context
 */

import type { AssembledContext, Citation, RetrievalResult } from '../../models/retrieval.js';

/** Citation content never exceeds this, ellipsis included */
export const CITATION_EXCERPT_LENGTH = 200;

const ELLIPSIS = '...';

export function formatSourceBlock(result: RetrievalResult): string {
  const { source_file, page_number } = result.chunk;
  return `[Source: ${source_file}, Page: ${page_number ?? 'N/A'}]\n${result.chunk.text}`;
}

/**
 * Join retrieval results into one context block, in rank order
 */
export function assembleContext(results: RetrievalResult[]): AssembledContext {
  if (results.length === 0) {
    return { kind: 'empty' };
  }
  const included = [...results].sort((a, b) => a.rank - b.rank);
  return {
    kind: 'context',
    text: included.map(formatSourceBlock).join('\n\n'),
    included,
  };
}

export function toCitation(result: RetrievalResult): Citation {
  const text = result.chunk.text;
  return {
    content:
      text.length > CITATION_EXCERPT_LENGTH
        ? text.slice(0, CITATION_EXCERPT_LENGTH - ELLIPSIS.length) + ELLIPSIS
        : text,
    source_file: result.chunk.source_file,
    page_number: result.chunk.page_number,
    section_name: result.chunk.section_type,
    relevance_score: Math.round(result.relevanceScore * 1000) / 1000,
  };
}
