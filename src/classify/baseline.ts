/**
 * Reference values for the anomaly classifier.
 *
 * - `self`: the trial's own leading segment, scaled to the full window
 * - `set-median`: per-metric medians over every record in the set
 *
 * A set-median baseline needs every record of the set first, so callers
 * run detection over the whole set before classifying any trial in it.
 */

import { MissingBaselineError } from '../utils/errors.js';
import { median } from '../utils/array-utils.js';
import { detect, detectSegment, leadingSegment, type DetectOptions } from '../detect/change-detector.js';
import type { Baseline, TrialSignal, TroughRecord } from '../signal/types.js';

/** Default minimum number of records for a set median. */
export const DEFAULT_MIN_TRIALS = 2;

function span(timestamps: readonly number[]): number {
  return timestamps.length > 1 ? timestamps[timestamps.length - 1] - timestamps[0] : 0;
}

/**
 * Baseline from the trial's own leading segment.
 *
 * Trough count and distance are scaled by full window / segment window so
 * a trial flying at a steady rate has zero deviation. Speed is a rate and
 * is not scaled. When the segment closes no revolution the full record is
 * used as its own reference.
 */
export function selfBaseline(
  signal: TrialSignal,
  fraction: number,
  options: DetectOptions = {},
): Baseline {
  const full = detect(signal, options);
  const segmentSpan = span(leadingSegment(signal.timestamps, fraction));

  if (segmentSpan === 0) {
    return {
      reference: 'self',
      troughCount: full.troughCount,
      speed: full.speed,
      distance: full.distance,
    };
  }

  const segment = detectSegment(signal, fraction, options);
  const scale = span(signal.timestamps) / segmentSpan;

  return {
    reference: 'self',
    troughCount: segment.troughCount * scale,
    speed: segment.speed,
    distance: segment.distance * scale,
  };
}

/**
 * Per-metric medians over a set's records.
 * Throws MissingBaselineError when fewer than `minTrials` records exist.
 */
export function setMedianBaseline(
  records: readonly TroughRecord[],
  minTrials: number = DEFAULT_MIN_TRIALS,
): Baseline {
  if (records.length < minTrials) {
    throw new MissingBaselineError(
      `Set median needs at least ${minTrials} trials, got ${records.length}`,
      'INSUFFICIENT_TRIALS',
    );
  }

  return {
    reference: 'set-median',
    troughCount: median(records.map((r) => r.troughCount)),
    speed: median(records.map((r) => r.speed)),
    distance: median(records.map((r) => r.distance)),
  };
}
