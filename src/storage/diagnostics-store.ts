/**
 * Run history: rendered diagnostics tables saved per run.
 */

import { getDb, generateId } from './db.js';
import { StorageError } from '../utils/errors.js';
import { formatChamberIds, parseChamberIds, type ParsedSummaryRow } from '../report/diagnostics-report.js';
import type { BaselineReference, Thresholds } from '../signal/types.js';

/**
 * A stored diagnostics run.
 */
export interface StoredRun {
  id: string;
  createdAt: string;
  /** Input file or other description of where the trials came from. */
  source: string | null;
  reference: BaselineReference;
  thresholds: Thresholds;
  trialCount: number;
  rejectedCount: number;
  failedSets: number[];
  durationMs: number;
  /** Summary table rows, ordered by set id. */
  summaries: ParsedSummaryRow[];
  /** Combo table as CSV text. */
  comboCsv: string;
}

export type NewRun = Omit<StoredRun, 'id' | 'createdAt'>;

/** Listing entry returned by `listRuns`. */
export interface RunListing {
  id: string;
  createdAt: string;
  source: string | null;
  reference: BaselineReference;
  trialCount: number;
  setCount: number;
  largeChanges: number;
}

interface RunRow {
  id: string;
  created_at: string;
  source: string | null;
  reference: string;
  small_band: number;
  large_band: number;
  trial_count: number;
  rejected_count: number;
  failed_sets: string;
  combo_csv: string;
  duration_ms: number;
}

interface SummaryRow {
  set_id: number;
  total: number;
  small_changes: number;
  large_changes: number;
  large_cids: string;
}

interface ListingRow {
  id: string;
  created_at: string;
  source: string | null;
  reference: string;
  trial_count: number;
  set_count: number;
  large_changes: number | null;
}

function toReference(value: string): BaselineReference {
  return value === 'self' ? 'self' : 'set-median';
}

function parseSetIds(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((v): v is number => typeof v === 'number');
}

/**
 * Save a run and its summary rows. Returns the stored run.
 */
export function saveRun(run: NewRun): StoredRun {
  const db = getDb();
  const id = generateId();
  const createdAt = new Date().toISOString();

  const insertRun = db.prepare(`
    INSERT INTO diagnostic_runs
    (id, created_at, source, reference, small_band, large_band, trial_count, rejected_count, failed_sets, combo_csv, duration_ms)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertSummary = db.prepare(`
    INSERT INTO run_summaries (run_id, set_id, total, small_changes, large_changes, large_cids)
    VALUES (?, ?, ?, ?, ?, ?)
  `);

  const summaries = [...run.summaries].sort((a, b) => a.setId - b.setId);
  const failedSets = [...run.failedSets].sort((a, b) => a - b);
  const durationMs = Math.round(run.durationMs);

  try {
    db.transaction(() => {
      insertRun.run(
        id,
        createdAt,
        run.source,
        run.reference,
        run.thresholds.smallBand,
        run.thresholds.largeBand,
        run.trialCount,
        run.rejectedCount,
        JSON.stringify(failedSets),
        run.comboCsv,
        durationMs,
      );
      for (const s of summaries) {
        insertSummary.run(id, s.setId, s.total, s.smallChanges, s.largeChanges, formatChamberIds(s.largeCIDs));
      }
    })();
  } catch (error) {
    throw new StorageError(`Failed to save run ${id}`, 'DB_QUERY_FAILED', error);
  }

  return { ...run, id, createdAt, failedSets, durationMs, summaries };
}

/**
 * Load a stored run. Throws StorageError RUN_NOT_FOUND for an unknown id.
 */
export function getRun(id: string): StoredRun {
  const db = getDb();
  const row = db.prepare<[string], RunRow>('SELECT * FROM diagnostic_runs WHERE id = ?').get(id);
  if (!row) {
    throw new StorageError(`Run not found: ${id}`, 'RUN_NOT_FOUND');
  }

  const summaryRows = db
    .prepare<[string], SummaryRow>(
      `SELECT set_id, total, small_changes, large_changes, large_cids
       FROM run_summaries WHERE run_id = ? ORDER BY set_id`,
    )
    .all(id);

  return {
    id: row.id,
    createdAt: row.created_at,
    source: row.source,
    reference: toReference(row.reference),
    thresholds: { smallBand: row.small_band, largeBand: row.large_band },
    trialCount: row.trial_count,
    rejectedCount: row.rejected_count,
    failedSets: parseSetIds(row.failed_sets),
    durationMs: row.duration_ms,
    summaries: summaryRows.map((s) => ({
      setId: s.set_id,
      total: s.total,
      smallChanges: s.small_changes,
      largeChanges: s.large_changes,
      largeCIDs: parseChamberIds(s.large_cids),
    })),
    comboCsv: row.combo_csv,
  };
}

/**
 * Most recent runs first.
 */
export function listRuns(limit = 20): RunListing[] {
  const db = getDb();
  const rows = db
    .prepare<[number], ListingRow>(
      `SELECT r.id, r.created_at, r.source, r.reference, r.trial_count,
              COUNT(s.set_id) AS set_count, SUM(s.large_changes) AS large_changes
       FROM diagnostic_runs r
       LEFT JOIN run_summaries s ON s.run_id = r.id
       GROUP BY r.id
       ORDER BY r.created_at DESC, r.rowid DESC
       LIMIT ?`,
    )
    .all(limit);

  return rows.map((row) => ({
    id: row.id,
    createdAt: row.created_at,
    source: row.source,
    reference: toReference(row.reference),
    trialCount: row.trial_count,
    setCount: row.set_count,
    largeChanges: row.large_changes ?? 0,
  }));
}

/**
 * Delete a run and its summary rows. Throws StorageError RUN_NOT_FOUND for an unknown id.
 */
export function deleteRun(id: string): void {
  const db = getDb();
  const result = db.prepare('DELETE FROM diagnostic_runs WHERE id = ?').run(id);
  if (result.changes === 0) {
    throw new StorageError(`Run not found: ${id}`, 'RUN_NOT_FOUND');
  }
}
