/**
 * Test utilities for storage tests: an in-memory database with the
 * production schema applied.
 *
 * ```typescript
 * let db: Database.Database;
 *
 * beforeEach(() => {
 *   db = createTestDb();
 *   setupTestDb(db);
 * });
 *
 * afterEach(() => {
 *   teardownTestDb(db);
 * });
 * ```
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { setDb, resetDb, runMigrations } from '../../src/storage/db.js';

/**
 * Create an in-memory SQLite database migrated with schema.sql.
 */
export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

/**
 * Route every store module to `db`.
 */
export function setupTestDb(db: Database.Database): void {
  setDb(db);
}

/**
 * Close `db` and reset the singleton.
 */
export function teardownTestDb(db: Database.Database): void {
  resetDb();
  db.close();
}
