/**
 * Storage Service Module
 *
 * Database setup, the vector index and the document store.
 */

export { openDatabase, isSqliteVecAvailable, DatabaseError, type DatabaseErrorCode } from './database.js';

export { initializeSchema, SCHEMA_VERSION } from './schema.js';

export { buildMetadataFilter, compileMetadataFilter, MATCH_ALL } from './filter.js';

export {
  SqliteVectorIndex,
  VectorIndexError,
  IndexUnavailableError,
  isIndexUnavailable,
  type VectorIndex,
  type VectorEntry,
  type VectorHit,
} from './vector-index.js';

export {
  DocumentStore,
  DocumentStoreError,
  type NewDocument,
  type ListDocumentsOptions,
} from './document-store.js';
