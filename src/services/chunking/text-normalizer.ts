/**
 * Text Normalizer for Extracted Manual Text
 *
 * Cleans raw extractor output before chunking and scans the top of the
 * document for lightweight structural hints (section type, model number).
 *
 * @module services/chunking/text-normalizer
 */

import type { SectionType } from '../../models/chunk.js';

/** Only this many leading lines are scanned for hints */
export const HINT_SCAN_LINES = 50;

const PAGE_SEPARATOR = '\n';

/**
 * Model identifier following the word "model", optionally with "no.",
 * "number" or "#" and a separator. The identifier must contain a digit so
 * prose like "model of washer" does not match.
 */
const MODEL_PATTERN =
  /\bmodel(?:\s*(?:no\.?|number|#))?\s*[:#.-]?\s*([A-Z0-9](?:[A-Z0-9./-]*[A-Z0-9])?)/gi;

/**
 * Section keywords in priority order; the first match wins.
 */
const SECTION_KEYWORDS: ReadonlyArray<{ pattern: RegExp; section: SectionType }> = [
  { pattern: /\btroubleshooting\b/i, section: 'troubleshooting' },
  { pattern: /\binstallation\b/i, section: 'installation' },
  { pattern: /\b(?:user|owner'?s?)\s+(?:guide|manual)\b/i, section: 'user_guide' },
  { pattern: /\bquick\s*start\b/i, section: 'quick_start' },
  { pattern: /\bmaintenance\b/i, section: 'maintenance' },
  { pattern: /\bspecifications?\b/i, section: 'specifications' },
];

export interface PageText {
  /** 1-based page number */
  page: number;
  text: string;
}

/**
 * Character range of one page inside the normalized document text
 */
export interface PageOffset {
  page: number;
  start: number;
  end: number;
}

export interface NormalizedDocument {
  text: string;
  pageOffsets: PageOffset[];
}

export interface StructuralHints {
  sectionType?: SectionType;
  detectedModel?: string;
}

/**
 * Normalize raw extracted text.
 *
 * Trims every line and drops lines that are empty or whitespace-only, so
 * the result has no blank lines and no leading or trailing newline.
 */
export function normalizeText(raw: string): string {
  if (raw.length === 0) {
    return raw;
  }
  return raw
    .replace(/\r\n?/g, '\n')
    .replace(/\u0000/g, '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Normalize each page separately and join them with a line break,
 * recording where every non-empty page lands in the joined text.
 */
export function normalizePages(pages: PageText[]): NormalizedDocument {
  const parts: string[] = [];
  const pageOffsets: PageOffset[] = [];
  let cursor = 0;

  for (const page of pages) {
    const text = normalizeText(page.text);
    if (text.length === 0) continue;

    if (parts.length > 0) {
      cursor += PAGE_SEPARATOR.length;
    }
    pageOffsets.push({ page: page.page, start: cursor, end: cursor + text.length });
    parts.push(text);
    cursor += text.length;
  }

  return { text: parts.join(PAGE_SEPARATOR), pageOffsets };
}

/**
 * Scan the first HINT_SCAN_LINES lines for a section keyword and a model
 * identifier. Absent hints stay unset.
 */
export function detectStructuralHints(text: string): StructuralHints {
  const head = text.split('\n').slice(0, HINT_SCAN_LINES);
  const hints: StructuralHints = {};

  for (const line of head) {
    if (hints.sectionType === undefined) {
      const keyword = SECTION_KEYWORDS.find(({ pattern }) => pattern.test(line));
      if (keyword) hints.sectionType = keyword.section;
    }

    if (hints.detectedModel === undefined) {
      for (const match of line.matchAll(MODEL_PATTERN)) {
        const candidate = match[1];
        if (candidate !== undefined && /\d/.test(candidate)) {
          hints.detectedModel = candidate.toUpperCase();
          break;
        }
      }
    }

    if (hints.sectionType !== undefined && hints.detectedModel !== undefined) break;
  }

  return hints;
}

/**
 * Page a character offset falls on, or null when the document has no pages
 */
export function pageForOffset(offset: number, pageOffsets: PageOffset[]): number | null {
  let page: number | null = null;
  for (const range of pageOffsets) {
    if (range.start > offset) break;
    page = range.page;
  }
  return page;
}
