/**
 * SQLite connection for the diagnostics run store.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/diagnostics-config.js';
import { loadConfig, toRuntimeConfig } from '../config/loader.js';
import { createLogger } from '../utils/logger.js';
import { StorageError } from '../utils/errors.js';
import { loadSchemaStatements, SCHEMA_VERSION } from './schema-loader.js';

const log = createLogger('db');

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` returns this instance instead of opening a file.
 * Use `resetDb()` to clear it.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   const testDb = new Database(':memory:');
 *   runMigrations(testDb);
 *   setDb(testDb);
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear any custom database and close the singleton connection.
 */
export function resetDb(): void {
  customDb = null;
  closeDb();
}

/**
 * Return the custom database, the open singleton, or a new connection to
 * `dbPath` (default: the configured `output.dbPath`).
 */
export function getDb(dbPath?: string): Database.Database {
  if (customDb) {
    return customDb;
  }
  if (db) {
    return db;
  }

  const resolvedPath = resolvePath(dbPath ?? toRuntimeConfig(loadConfig()).dbPath);

  const dir = dirname(resolvedPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const database = new Database(resolvedPath);

  database.pragma('foreign_keys = ON');
  database.pragma('journal_mode = WAL');

  try {
    runMigrations(database);
  } catch (error) {
    database.close();
    throw new StorageError(
      `Failed to initialize database at ${resolvedPath}`,
      'DB_QUERY_FAILED',
      error,
    );
  }

  db = database;
  return db;
}

/**
 * Close the singleton connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current schema version, 0 for an empty database.
 */
export function getSchemaVersion(database: Database.Database): number {
  const table = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'",
    )
    .get();
  if (!table) return 0;

  const row = database
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Bring the schema up to date.
 */
export function runMigrations(database: Database.Database): void {
  const current = getSchemaVersion(database);
  if (current >= SCHEMA_VERSION) return;

  const statements = loadSchemaStatements();
  database.transaction(() => {
    for (const statement of statements) {
      database.exec(statement);
    }
  })();

  log.debug('Schema migrated', { from: current, to: SCHEMA_VERSION });
}

/**
 * Generate a run id.
 */
export function generateId(): string {
  return crypto.randomUUID();
}
