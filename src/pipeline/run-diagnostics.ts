/**
 * End-to-end diagnostics run over a batch of trials.
 *
 * Two passes per set:
 * 1. Scatter: detect troughs for every trial (bounded concurrency)
 * 2. Per set: build baselines, classify, and fold into an accumulator
 * 3. Gather: merge the per-set accumulators and finalize
 *
 * Failure isolation:
 * - InvalidSignalError drops the trial only
 * - UnknownGroupingError and MissingBaselineError drop the affected set only
 * - Aborting stops submitting trials; sets left incomplete are not emitted
 */

import {
  DiagnosticsError,
  InvalidSignalError,
  MissingBaselineError,
  UnknownGroupingError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { runPool } from '../utils/concurrency.js';
import { detect, type DetectOptions } from '../detect/change-detector.js';
import { selfBaseline, setMedianBaseline, DEFAULT_MIN_TRIALS } from '../classify/baseline.js';
import { classify, validateThresholds } from '../classify/anomaly-classifier.js';
import {
  accumulate,
  createAccumulator,
  finalizeAccumulator,
  mergeAccumulators,
  type SetAccumulator,
} from '../aggregate/set-aggregator.js';
import { assertGroupable, formatTrialId, groupableSetId } from '../signal/trial-id.js';
import type {
  Baseline,
  BaselineReference,
  ClassifiedTrial,
  ComboRecord,
  SetSummary,
  Thresholds,
  TrialSignal,
  TroughRecord,
} from '../signal/types.js';

const log = createLogger('diagnostics');

/**
 * Options for a diagnostics run.
 */
export interface RunDiagnosticsOptions {
  thresholds: Thresholds;
  /** Baseline policy. Default: 'set-median'. */
  reference?: BaselineReference;
  /** Minimum trials for a set median. Default: 2. */
  minTrials?: number;
  /** Leading fraction of the trial used by the 'self' baseline. Default: 0.5. */
  selfFraction?: number;
  /** Detector options shared by every trial. */
  detect?: DetectOptions;
  /** Maximum trials detected at once. Default: 4. */
  concurrency?: number;
  /** Stops submitting further trials. */
  signal?: AbortSignal;
  /** Called after each trial's detection settles. */
  progressCallback?: (progress: { done: number; total: number }) => void;
}

/** A trial left out of aggregation. */
export interface TrialFailure {
  /** Printable id, or the raw label when the id is unusable. */
  trial: string;
  error: DiagnosticsError;
}

/** A set left out of the output. */
export interface SetFailure {
  setId: number;
  error: DiagnosticsError;
}

/**
 * Result of a diagnostics run.
 */
export interface DiagnosticsRun {
  summaries: Map<number, SetSummary>;
  combos: Map<string, ComboRecord>;
  /** Classified trials of emitted sets. */
  classified: ClassifiedTrial[];
  /** Trials excluded for malformed input or unusable identity. */
  rejected: TrialFailure[];
  /** Sets aborted by grouping or baseline errors. */
  failedSets: SetFailure[];
  /** Sets with trials that were never processed because the run was aborted. */
  incompleteSets: number[];
  /** Trials whose detection was attempted. */
  processed: number;
  durationMs: number;
}

interface Detected {
  signal: TrialSignal;
  record: TroughRecord;
}

function describeTrial(signal: TrialSignal): string {
  try {
    assertGroupable(signal.id);
    return formatTrialId(signal.id);
  } catch {
    return signal.label ?? '<unidentified trial>';
  }
}

/**
 * Run detection, classification and aggregation over a batch of trials.
 */
export async function runDiagnostics(
  trials: Iterable<TrialSignal>,
  options: RunDiagnosticsOptions,
): Promise<DiagnosticsRun> {
  const startTime = Date.now();
  const {
    thresholds,
    reference = 'set-median',
    minTrials = DEFAULT_MIN_TRIALS,
    selfFraction = 0.5,
    concurrency = 4,
    signal,
    progressCallback,
  } = options;
  const detectOptions = options.detect ?? {};

  const thresholdErrors = validateThresholds(thresholds);
  if (thresholdErrors.length > 0) {
    throw new RangeError(`Invalid thresholds: ${thresholdErrors.join('; ')}`);
  }
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new RangeError(`Invalid concurrency: ${concurrency}`);
  }

  const signals = Array.from(trials);
  const rejected: TrialFailure[] = [];
  const failedSets = new Map<number, DiagnosticsError>();
  const detectedBySet = new Map<number, Detected[]>();

  // ── Scatter: per-trial detection ──────────────────────
  let done = 0;
  const pool = await runPool(
    signals,
    (trial): Detected => {
      try {
        assertGroupable(trial.id);
        return { signal: trial, record: detect(trial, detectOptions) };
      } finally {
        done++;
        progressCallback?.({ done, total: signals.length });
      }
    },
    { concurrency, signal },
  );

  const incompleteSets = new Set<number>();

  pool.outcomes.forEach((outcome, index) => {
    const trial = signals[index];
    const setId = groupableSetId(trial.id);

    if (!outcome) {
      if (setId !== undefined) incompleteSets.add(setId);
      return;
    }

    if (outcome.status === 'fulfilled') {
      if (setId === undefined) return;
      const bucket = detectedBySet.get(setId) ?? [];
      bucket.push(outcome.value);
      detectedBySet.set(setId, bucket);
      return;
    }

    const { reason } = outcome;
    if (reason instanceof UnknownGroupingError) {
      if (setId !== undefined) {
        if (!failedSets.has(setId)) failedSets.set(setId, reason);
      } else {
        rejected.push({ trial: describeTrial(trial), error: reason });
      }
      log.warn(`Trial has unusable identity: ${reason.message}`);
      return;
    }
    if (reason instanceof InvalidSignalError) {
      rejected.push({ trial: describeTrial(trial), error: reason });
      log.warn(`Excluding trial ${describeTrial(trial)}`, { code: reason.code });
      return;
    }
    throw reason;
  });

  // ── Per set: baselines, classification, fold ──────────
  const classified: ClassifiedTrial[] = [];
  const setAccumulators: SetAccumulator[] = [];
  const setIds = [...detectedBySet.keys()].sort((a, b) => a - b);

  for (const setId of setIds) {
    if (failedSets.has(setId) || incompleteSets.has(setId)) continue;
    const detected = detectedBySet.get(setId) ?? [];

    let setBaseline: Baseline | undefined;
    if (reference === 'set-median') {
      try {
        setBaseline = setMedianBaseline(
          detected.map((d) => d.record),
          minTrials,
        );
      } catch (error) {
        if (error instanceof MissingBaselineError) {
          failedSets.set(setId, error);
          log.warn(`Skipping set ${setId}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    let acc = createAccumulator();
    const setClassified: ClassifiedTrial[] = [];
    for (const { signal: trial, record } of detected) {
      const baseline = setBaseline ?? selfBaseline(trial, selfFraction, detectOptions);
      const classification = classify(record, baseline, thresholds, trial.id);
      const item: ClassifiedTrial = { signal: trial, record, classification };
      acc = accumulate(acc, item);
      setClassified.push(item);
    }

    setAccumulators.push(acc);
    classified.push(...setClassified);
  }

  // ── Gather ────────────────────────────────────────────
  const merged = setAccumulators.reduce(mergeAccumulators, createAccumulator());
  const { summaries, combos } = finalizeAccumulator(merged);

  if (pool.aborted) {
    log.warn('Run aborted before every trial was submitted', {
      submitted: pool.submitted,
      total: signals.length,
      incompleteSets: incompleteSets.size,
    });
  }

  log.info('Diagnostics complete', {
    trials: signals.length,
    sets: summaries.size,
    rejected: rejected.length,
    failedSets: failedSets.size,
  });

  return {
    summaries,
    combos,
    classified,
    rejected,
    failedSets: [...failedSets.entries()]
      .sort(([a], [b]) => a - b)
      .map(([setId, error]) => ({ setId, error })),
    incompleteSets: [...incompleteSets].sort((a, b) => a - b),
    processed: pool.submitted,
    durationMs: Date.now() - startTime,
  };
}
