/**
 * Metadata Filter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildMetadataFilter,
  compileMetadataFilter,
  matchesFilter,
  MATCH_ALL,
} from '../../../src/services/storage/filter.js';

describe('buildMetadataFilter', () => {
  it('matches everything when no field is set', () => {
    expect(buildMetadataFilter()).toEqual(MATCH_ALL);
    expect(buildMetadataFilter({ deviceType: null, brand: '  ', model: undefined })).toEqual({
      kind: 'all',
    });
  });

  it('builds a single equality for one field', () => {
    expect(buildMetadataFilter({ brand: ' Acme ' })).toEqual({
      kind: 'eq',
      field: 'brand',
      value: 'Acme',
    });
  });

  it('builds a conjunction in device_type, brand, model order', () => {
    expect(buildMetadataFilter({ model: 'WM-100', deviceType: 'washing_machine' })).toEqual({
      kind: 'and',
      clauses: [
        { kind: 'eq', field: 'device_type', value: 'washing_machine' },
        { kind: 'eq', field: 'model', value: 'WM-100' },
      ],
    });
  });
});

describe('compileMetadataFilter', () => {
  it('compiles no constraint to an empty fragment', () => {
    expect(compileMetadataFilter(MATCH_ALL)).toEqual({ sql: '', params: [] });
  });

  it('compiles each clause to a parameterized equality', () => {
    const filter = buildMetadataFilter({ deviceType: 'TV', brand: "O'Brien" });
    expect(compileMetadataFilter(filter)).toEqual({
      sql: ' AND c.device_type = ? AND c.brand = ?',
      params: ['TV', "O'Brien"],
    });
  });
});

describe('matchesFilter', () => {
  const metadata = { device_type: 'TV', brand: 'Acme', model: 'Unknown' };

  it('accepts metadata satisfying every clause', () => {
    expect(matchesFilter(metadata, buildMetadataFilter({ brand: 'Acme', model: 'Unknown' }))).toBe(true);
    expect(matchesFilter(metadata, MATCH_ALL)).toBe(true);
  });

  it('rejects metadata failing any clause', () => {
    expect(matchesFilter(metadata, buildMetadataFilter({ brand: 'Acme', model: 'X1' }))).toBe(false);
  });

  it('matches values exactly, including case', () => {
    expect(matchesFilter(metadata, buildMetadataFilter({ brand: 'acme' }))).toBe(false);
  });
});
