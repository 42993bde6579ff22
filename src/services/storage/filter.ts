/**
 * Metadata filter construction and SQL compilation
 *
 * @module services/storage/filter
 */

import type { FilterableField } from '../../models/chunk.js';
import type { EqualityFilter, FilterFields, MetadataFilter } from '../../models/retrieval.js';

export const MATCH_ALL: MetadataFilter = { kind: 'all' };

/**
 * Build a filter from optional fields. Unset or blank fields are left
 * unconstrained; values are trimmed and matched exactly.
 */
export function buildMetadataFilter(fields: FilterFields = {}): MetadataFilter {
  const candidates: Array<[FilterableField, string | null | undefined]> = [
    ['device_type', fields.deviceType],
    ['brand', fields.brand],
    ['model', fields.model],
  ];

  const clauses: EqualityFilter[] = [];
  for (const [field, raw] of candidates) {
    const value = raw?.trim();
    if (value) {
      clauses.push({ kind: 'eq', field, value });
    }
  }

  if (clauses.length === 0) return MATCH_ALL;
  if (clauses.length === 1) return clauses[0];
  return { kind: 'and', clauses };
}

/** Column for each filterable field; keys are the only names ever interpolated */
const FIELD_COLUMNS: Record<FilterableField, string> = {
  device_type: 'c.device_type',
  brand: 'c.brand',
  model: 'c.model',
};

/**
 * Compile a filter into a parameterized SQL fragment ("AND ..." or "")
 */
export function compileMetadataFilter(filter: MetadataFilter): { sql: string; params: string[] } {
  const clauses = equalityClauses(filter);
  return {
    sql: clauses.map((clause) => ` AND ${FIELD_COLUMNS[clause.field]} = ?`).join(''),
    params: clauses.map((clause) => clause.value),
  };
}

export function equalityClauses(filter: MetadataFilter): EqualityFilter[] {
  switch (filter.kind) {
    case 'all':
      return [];
    case 'eq':
      return [filter];
    case 'and':
      return filter.clauses;
  }
}

/**
 * Whether chunk metadata satisfies the filter
 */
export function matchesFilter(
  metadata: Record<FilterableField, string>,
  filter: MetadataFilter
): boolean {
  return equalityClauses(filter).every((clause) => metadata[clause.field] === clause.value);
}
