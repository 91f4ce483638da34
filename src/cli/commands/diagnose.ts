import { readFile } from 'node:fs/promises';
import type { Command } from '../types.js';
import { getFlag, getNumberFlag, getPositionals } from '../utils.js';
import {
  loadConfig,
  toRuntimeConfig,
  validateExternalConfig,
  type ExternalConfig,
  type LoadConfigOptions,
} from '../../config/loader.js';
import { resolvePath } from '../../config/diagnostics-config.js';
import { ConfigError } from '../../utils/errors.js';
import { parseTrialsJson } from '../../signal/trial-input.js';
import { runDiagnostics, type DiagnosticsRun } from '../../pipeline/run-diagnostics.js';
import {
  printSummaryTable,
  render,
  renderMetricTable,
  writeReport,
  type RenderedReport,
  type WrittenReport,
} from '../../report/diagnostics-report.js';
import { toCsv } from '../../report/csv.js';
import { getDb, closeDb } from '../../storage/db.js';
import { saveRun } from '../../storage/diagnostics-store.js';
import type { BaselineReference } from '../../signal/types.js';

const USAGE =
  'flightmill diagnose <trials.json> [--out <dir>] [--reference self|set-median] ' +
  '[--small-band <n>] [--large-band <n>] [--min-trials <n>] [--save] [--db <path>]';

const VALUE_FLAGS = ['--out', '--reference', '--small-band', '--large-band', '--min-trials', '--db'] as const;

export interface DiagnoseArgs {
  input: string;
  outDir?: string;
  reference?: BaselineReference;
  smallBand?: number;
  largeBand?: number;
  minTrials?: number;
  /** Save the run to the store at the configured path. Implied by `dbPath`. */
  save: boolean;
  dbPath?: string;
}

export interface DiagnoseOutcome {
  run: DiagnosticsRun;
  report: RenderedReport;
  written: WrittenReport;
  /** Id of the stored run when saving was requested. */
  storedRunId?: string;
}

/**
 * Parse `diagnose` arguments. Throws on a missing input file or a bad flag value.
 */
export function parseDiagnoseArgs(args: string[]): DiagnoseArgs {
  const [input] = getPositionals(args, VALUE_FLAGS);
  if (!input) {
    throw new Error(`Input file required. Usage: ${USAGE}`);
  }

  const reference = getFlag(args, '--reference');
  if (reference !== undefined && reference !== 'self' && reference !== 'set-median') {
    throw new Error(`--reference must be 'self' or 'set-median', got '${reference}'`);
  }

  const dbPath = getFlag(args, '--db');
  return {
    input,
    outDir: getFlag(args, '--out'),
    reference,
    smallBand: getNumberFlag(args, '--small-band'),
    largeBand: getNumberFlag(args, '--large-band'),
    minTrials: getNumberFlag(args, '--min-trials'),
    save: args.includes('--save') || dbPath !== undefined,
    dbPath,
  };
}

function toOverrides(parsed: DiagnoseArgs): ExternalConfig {
  return {
    thresholds: { smallBand: parsed.smallBand, largeBand: parsed.largeBand },
    baseline: { reference: parsed.reference, minTrials: parsed.minTrials },
    output: { outDir: parsed.outDir, dbPath: parsed.dbPath },
  };
}

/**
 * Run diagnostics over a trial file, write the CSV tables and optionally
 * store the run.
 */
export async function diagnose(
  parsed: DiagnoseArgs,
  loadOptions: Omit<LoadConfigOptions, 'cliOverrides'> = {},
  signal?: AbortSignal,
): Promise<DiagnoseOutcome> {
  const external = loadConfig({ ...loadOptions, cliOverrides: toOverrides(parsed) });
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  const config = toRuntimeConfig(external);

  const trials = parseTrialsJson(await readFile(parsed.input, 'utf-8'), config.armLength);
  const thresholds = { smallBand: config.smallBand, largeBand: config.largeBand };

  const run = await runDiagnostics(trials, {
    thresholds,
    reference: config.reference,
    minTrials: config.minTrials,
    selfFraction: config.selfFraction,
    detect: { speedBounds: config.speedBounds },
    concurrency: config.concurrency,
    signal,
  });

  const report = render(run.summaries, run.combos);
  const written = await writeReport(resolvePath(config.outDir), report, renderMetricTable(run.summaries));

  if (!parsed.save) {
    return { run, report, written };
  }

  getDb(config.dbPath);
  const stored = saveRun({
    source: parsed.input,
    reference: config.reference,
    thresholds,
    trialCount: trials.length,
    rejectedCount: run.rejected.length,
    failedSets: run.failedSets.map((f) => f.setId),
    durationMs: run.durationMs,
    summaries: [...run.summaries.values()].map((s) => ({
      setId: s.setId,
      total: s.total,
      smallChanges: s.smallChanges,
      largeChanges: s.largeChanges,
      largeCIDs: [...s.largeCIDs],
    })),
    comboCsv: toCsv(report.comboTable),
  });

  return { run, report, written, storedRunId: stored.id };
}

export const diagnoseCommand: Command = {
  name: 'diagnose',
  description: 'Classify trials and write diagnostics tables',
  usage: USAGE,
  handler: async (args) => {
    let parsed: DiagnoseArgs;
    try {
      parsed = parseDiagnoseArgs(args);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(2);
    }

    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);

    let outcome: DiagnoseOutcome;
    try {
      outcome = await diagnose(parsed, {}, controller.signal);
    } finally {
      process.removeListener('SIGINT', onSigint);
      closeDb();
    }

    const { run, report, written, storedRunId } = outcome;
    printSummaryTable(report.summaryTable);
    console.log('');

    for (const { trial, error } of run.rejected) {
      console.log(`Excluded ${trial}: ${error.message}`);
    }
    for (const { setId, error } of run.failedSets) {
      console.log(`Skipped set ${setId}: ${error.message}`);
    }
    if (run.incompleteSets.length > 0) {
      console.log(`Interrupted: sets ${run.incompleteSets.join(', ')} were not emitted.`);
      process.exitCode = 130;
    }

    console.log(`Summary: ${written.summaryPath}`);
    console.log(`Combos:  ${written.comboPath}`);
    if (written.metricPath) {
      console.log(`Metrics: ${written.metricPath}`);
    }
    if (storedRunId) {
      console.log(`Stored run ${storedRunId}`);
    }
  },
};
