/**
 * Renders aggregates into the tables consumed by the plotting collaborator.
 *
 * - Summary table: one row per set
 * - Combo table: three rows per combo (trough, speed, distance)
 * - Metric table: one row per set and metric
 *
 * Every aggregate is checked before any row is built, so a structural
 * problem never yields a partial table.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MalformedAggregateError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { METRICS, type ComboRecord, type Metric, type SetSummary } from '../signal/types.js';
import { parseCsv, toCsv, type Table, type TableCell } from './csv.js';

const log = createLogger('report');

/**
 * Export sentinel for a set without large-change chambers. Not a chamber id.
 */
export const NONE_SENTINEL = 'None';

export const SUMMARY_COLUMNS = ['set_id', 'total', 'small_changes', 'large_changes', 'large_cIDs'] as const;

export const COMBO_PREFIX_COLUMNS = ['set_id', 'combo_id', 'filename', 'stat'] as const;

export const METRIC_COLUMNS = [
  'set_id',
  'stat',
  'total',
  'no_change',
  'small_changes',
  'large_changes',
  'large_prop',
  'large_cIDs',
] as const;

/** Exported names of each metric, in combo row order. */
export const STAT_NAMES: Record<Metric, string> = {
  troughCount: 'trough',
  speed: 'speed',
  distance: 'distance',
};

/** File names written by `writeReport`. */
export const REPORT_FILES = {
  summary: 'diagnostics_summary.csv',
  combos: 'diagnostics_combos.csv',
  metrics: 'diagnostics_metrics.csv',
} as const;

export interface RenderedReport {
  summaryTable: Table;
  comboTable: Table;
}

/** A summary row read back from CSV. */
export interface ParsedSummaryRow {
  setId: number;
  total: number;
  smallChanges: number;
  largeChanges: number;
  largeCIDs: string[];
}

// ── Structural checks ───────────────────────────────────

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function missing(what: string, field: string): MalformedAggregateError {
  return new MalformedAggregateError(`${what} is missing field '${field}'`, 'MISSING_FIELD');
}

function checkSummary(summary: SetSummary): void {
  const what = `Summary for set ${String(summary?.setId)}`;
  if (!isCount(summary?.setId)) throw missing(what, 'setId');
  if (!isCount(summary.total)) throw missing(what, 'total');
  if (!isCount(summary.smallChanges)) throw missing(what, 'smallChanges');
  if (!isCount(summary.largeChanges)) throw missing(what, 'largeChanges');
  if (!isStringArray(summary.largeCIDs)) {
    throw missing(what, 'largeCIDs');
  }
}

function checkCombo(combo: ComboRecord): void {
  const what = `Combo ${String(combo?.setId)}/${String(combo?.comboId)}`;
  if (!isCount(combo?.setId)) throw missing(what, 'setId');
  if (typeof combo.comboId !== 'string') throw missing(what, 'comboId');
  if (typeof combo.label !== 'string') throw missing(what, 'label');
  if (typeof combo.series !== 'object' || combo.series === null) throw missing(what, 'series');

  for (const metric of METRICS) {
    if (!isNumberArray(combo.series[metric])) {
      throw new MalformedAggregateError(`${what} has no ${STAT_NAMES[metric]} series`, 'MISSING_SERIES');
    }
  }
}

// ── Rendering ───────────────────────────────────────────

/**
 * Comma-joined chamber ids, or the sentinel when there are none.
 */
export function formatChamberIds(ids: readonly string[]): string {
  return ids.length > 0 ? ids.join(',') : NONE_SENTINEL;
}

/**
 * Inverse of `formatChamberIds`.
 */
export function parseChamberIds(cell: string): string[] {
  if (cell === NONE_SENTINEL || cell.length === 0) return [];
  return cell.split(',');
}

/**
 * Render the summary and combo tables.
 * Throws MalformedAggregateError before building any row if an aggregate is malformed.
 */
export function render(
  summaries: ReadonlyMap<number, SetSummary>,
  combos: ReadonlyMap<string, ComboRecord>,
): RenderedReport {
  for (const summary of summaries.values()) checkSummary(summary);
  for (const combo of combos.values()) checkCombo(combo);

  const summaryRows: TableCell[][] = [...summaries.values()]
    .sort((a, b) => a.setId - b.setId)
    .map((s) => [s.setId, s.total, s.smallChanges, s.largeChanges, formatChamberIds(s.largeCIDs)]);

  const comboList = [...combos.values()];
  const width = comboList.reduce(
    (max, c) => Math.max(max, ...METRICS.map((metric) => c.series[metric].length)),
    0,
  );
  const valueColumns = Array.from({ length: width }, (_, i) => `value_${i + 1}`);

  const comboRows: TableCell[][] = [];
  for (const combo of comboList) {
    for (const metric of METRICS) {
      const values: TableCell[] = combo.series[metric].slice();
      while (values.length < width) values.push('');
      comboRows.push([combo.setId, combo.comboId, combo.label, STAT_NAMES[metric], ...values]);
    }
  }

  return {
    summaryTable: { columns: [...SUMMARY_COLUMNS], rows: summaryRows },
    comboTable: { columns: [...COMBO_PREFIX_COLUMNS, ...valueColumns], rows: comboRows },
  };
}

/**
 * Render the per-metric breakdown: for each set, how many trials showed no,
 * small or large change in each metric, and which chambers changed largely.
 */
export function renderMetricTable(summaries: ReadonlyMap<number, SetSummary>): Table {
  for (const summary of summaries.values()) {
    checkSummary(summary);
    const what = `Summary for set ${summary.setId}`;
    if (typeof summary.byMetric !== 'object' || summary.byMetric === null) {
      throw missing(what, 'byMetric');
    }
    for (const metric of METRICS) {
      const tally = summary.byMetric[metric];
      if (
        typeof tally !== 'object' ||
        tally === null ||
        !isCount(tally.noChange) ||
        !isCount(tally.small) ||
        !isCount(tally.large) ||
        !isStringArray(tally.largeCIDs)
      ) {
        throw missing(what, `byMetric.${metric}`);
      }
    }
  }

  const rows: TableCell[][] = [];
  for (const s of [...summaries.values()].sort((a, b) => a.setId - b.setId)) {
    for (const metric of METRICS) {
      const tally = s.byMetric[metric];
      rows.push([
        s.setId,
        STAT_NAMES[metric],
        s.total,
        tally.noChange,
        tally.small,
        tally.large,
        s.total > 0 ? tally.large / s.total : 0,
        formatChamberIds(tally.largeCIDs),
      ]);
    }
  }

  return { columns: [...METRIC_COLUMNS], rows };
}

// ── Parsing ─────────────────────────────────────────────

function parseCount(cell: string | undefined, column: string, line: number): number {
  const value = Number(cell);
  if (cell === undefined || cell === '' || !Number.isInteger(value) || value < 0) {
    throw new MalformedAggregateError(
      `Summary row ${line} has invalid ${column}: '${cell ?? ''}'`,
      'MALFORMED_CSV',
    );
  }
  return value;
}

/**
 * Read a summary table back from CSV text.
 */
export function parseSummaryTable(text: string): ParsedSummaryRow[] {
  const [header, ...rows] = parseCsv(text);
  if (!header || SUMMARY_COLUMNS.some((column, i) => header[i] !== column)) {
    throw new MalformedAggregateError(
      `Summary header must be ${SUMMARY_COLUMNS.join(',')}`,
      'MALFORMED_CSV',
    );
  }

  return rows.map((row, i) => ({
    setId: parseCount(row[0], 'set_id', i + 1),
    total: parseCount(row[1], 'total', i + 1),
    smallChanges: parseCount(row[2], 'small_changes', i + 1),
    largeChanges: parseCount(row[3], 'large_changes', i + 1),
    largeCIDs: parseChamberIds(row[4] ?? ''),
  }));
}

// ── Output ──────────────────────────────────────────────

export interface WrittenReport {
  summaryPath: string;
  comboPath: string;
  metricPath?: string;
}

/**
 * Write rendered tables as CSV files into `outDir`.
 */
export async function writeReport(
  outDir: string,
  report: RenderedReport,
  metricTable?: Table,
): Promise<WrittenReport> {
  await mkdir(outDir, { recursive: true });

  const summaryPath = join(outDir, REPORT_FILES.summary);
  const comboPath = join(outDir, REPORT_FILES.combos);
  await writeFile(summaryPath, toCsv(report.summaryTable));
  await writeFile(comboPath, toCsv(report.comboTable));

  let metricPath: string | undefined;
  if (metricTable) {
    metricPath = join(outDir, REPORT_FILES.metrics);
    await writeFile(metricPath, toCsv(metricTable));
  }

  log.info('Report written', { outDir, sets: report.summaryTable.rows.length });
  return { summaryPath, comboPath, metricPath };
}

/**
 * Print the summary table to the console.
 */
export function printSummaryTable(table: Table): void {
  const widths = [8, 7, 14, 14, 30];
  console.log(table.columns.map((c, i) => pad(c, widths[i] ?? 12)).join(' | '));
  console.log('-'.repeat(widths.reduce((sum, w) => sum + w + 3, 0)));
  for (const row of table.rows) {
    console.log(row.map((cell, i) => pad(String(cell), widths[i] ?? 12)).join(' | '));
  }
}

function pad(str: string, width: number): string {
  return str.padEnd(width).slice(0, width);
}
