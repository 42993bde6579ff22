/**
 * Text Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  detectStructuralHints,
  normalizePages,
  normalizeText,
  pageForOffset,
} from '../../../src/services/chunking/text-normalizer.js';

describe('normalizeText', () => {
  it('converts CRLF, trims lines and drops blank lines', () => {
    const raw = '  Line one  \r\n\r\n\r\n\r\nLine two\t\n   \nLine three\u0000';
    expect(normalizeText(raw)).toBe('Line one\nLine two\nLine three');
  });

  it('drops blank and whitespace-only lines between text', () => {
    expect(normalizeText('Line one\n\n\n   \nLine two')).toBe('Line one\nLine two');
  });

  it('keeps single line breaks and removes paragraph breaks', () => {
    expect(normalizeText('Step 1\nStep 2\n\nNotes')).toBe('Step 1\nStep 2\nNotes');
  });

  it('drops leading and trailing blank lines', () => {
    expect(normalizeText('\n\n  Title\n\n')).toBe('Title');
  });

  it('returns empty text unchanged', () => {
    expect(normalizeText('')).toBe('');
  });

  it('reduces whitespace-only text to empty', () => {
    expect(normalizeText(' \n\t\n ')).toBe('');
  });
});

describe('normalizePages', () => {
  it('joins non-empty pages with a line break and records offsets', () => {
    const result = normalizePages([
      { page: 1, text: 'Page one text' },
      { page: 2, text: '   ' },
      { page: 3, text: 'Page three' },
    ]);

    expect(result.text).toBe('Page one text\nPage three');
    expect(result.pageOffsets).toEqual([
      { page: 1, start: 0, end: 13 },
      { page: 3, start: 14, end: 24 },
    ]);
    expect(result.text.slice(14, 24)).toBe('Page three');
  });

  it('returns empty text and no offsets for no pages', () => {
    expect(normalizePages([])).toEqual({ text: '', pageOffsets: [] });
  });
});

describe('pageForOffset', () => {
  const offsets = [
    { page: 1, start: 0, end: 13 },
    { page: 3, start: 14, end: 24 },
  ];

  it('returns the page whose range starts at or before the offset', () => {
    expect(pageForOffset(0, offsets)).toBe(1);
    expect(pageForOffset(13, offsets)).toBe(1);
    expect(pageForOffset(14, offsets)).toBe(3);
    expect(pageForOffset(23, offsets)).toBe(3);
  });

  it('returns null without page information', () => {
    expect(pageForOffset(5, [])).toBeNull();
  });
});

describe('detectStructuralHints', () => {
  it('detects the section keyword and an upper-cased model identifier', () => {
    const text = 'Troubleshooting Guide\nModel: wm-2000x\nInstallation steps';
    expect(detectStructuralHints(text)).toEqual({
      sectionType: 'troubleshooting',
      detectedModel: 'WM-2000X',
    });
  });

  it('uses keyword priority within a line', () => {
    expect(detectStructuralHints('Maintenance and Troubleshooting').sectionType).toBe(
      'troubleshooting'
    );
  });

  it('takes the first line that matches', () => {
    expect(detectStructuralHints('Installation\nTroubleshooting').sectionType).toBe('installation');
  });

  it('accepts "Model No." and skips identifiers without digits', () => {
    expect(detectStructuralHints('This model of washer\nModel No. ABC123').detectedModel).toBe(
      'ABC123'
    );
  });

  it('ignores lines past the scan window', () => {
    const filler = Array.from({ length: 60 }, (_, i) => `filler line ${i}`);
    filler[55] = 'Troubleshooting';
    filler[56] = 'Model: XY900';
    expect(detectStructuralHints(filler.join('\n'))).toEqual({});
  });

  it('returns no hints for plain prose', () => {
    expect(detectStructuralHints('Keep the door closed while running.')).toEqual({});
  });
});
