/**
 * SQLite connection setup
 *
 * Opens a better-sqlite3 connection, applies pragmas, loads the sqlite-vec
 * extension and creates the schema. Database files are created with mode
 * 0o600 inside a 0o700 directory.
 *
 * @module services/storage/database
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import fs from 'fs';
import path from 'path';
import { DATABASE_PRAGMAS, initializeSchema } from './schema.js';

export type DatabaseErrorCode = 'OPEN_FAILED' | 'EXTENSION_LOAD_FAILED' | 'SCHEMA_FAILED';

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

const IN_MEMORY = ':memory:';

export interface OpenDatabaseOptions {
  /** Vector dimension of the vec_chunks table */
  dimension: number;
}

/**
 * Open (creating if needed) the database at databasePath
 *
 * @throws DatabaseError naming the step that failed
 */
export function openDatabase(databasePath: string, options: OpenDatabaseOptions): Database.Database {
  let db: Database.Database;
  try {
    if (databasePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true, mode: 0o700 });
    }
    const isNew = databasePath !== IN_MEMORY && !fs.existsSync(databasePath);
    db = new Database(databasePath);
    if (isNew) {
      fs.chmodSync(databasePath, 0o600);
    }
  } catch (error) {
    throw new DatabaseError(`Failed to open database at ${databasePath}: ${String(error)}`, 'OPEN_FAILED', {
      databasePath,
    });
  }

  try {
    for (const pragma of DATABASE_PRAGMAS) {
      db.exec(pragma);
    }
    loadVectorExtension(db);
    initializeSchema(db, options.dimension);
  } catch (error) {
    db.close();
    if (error instanceof DatabaseError) throw error;
    throw new DatabaseError(`Failed to initialize database schema: ${String(error)}`, 'SCHEMA_FAILED', {
      databasePath,
    });
  }

  console.error(`[Database] Opened ${databasePath}`);
  return db;
}

function loadVectorExtension(db: Database.Database): void {
  try {
    sqliteVec.load(db);
  } catch (error) {
    throw new DatabaseError(
      `Failed to load sqlite-vec extension: ${String(error)}. Ensure the sqlite-vec platform package is installed.`,
      'EXTENSION_LOAD_FAILED'
    );
  }
}

/**
 * Whether sqlite-vec can be loaded into a connection on this platform
 */
export function isSqliteVecAvailable(): boolean {
  const db = new Database(IN_MEMORY);
  try {
    sqliteVec.load(db);
    return true;
  } catch {
    return false;
  } finally {
    db.close();
  }
}
