/**
 * Storage layer exports.
 */

// Database
export { getDb, setDb, resetDb, closeDb, generateId, getSchemaVersion, runMigrations } from './db.js';
export { splitStatements } from './schema-loader.js';

// Run store
export { saveRun, getRun, listRuns, deleteRun } from './diagnostics-store.js';
export type { StoredRun, NewRun, RunListing } from './diagnostics-store.js';
