/**
 * Labels a trial's deviations from its baseline as small or large changes.
 *
 * For each metric the relative deviation |value - reference| / |reference|
 * is placed in one of three bands:
 *
 * - `d <= smallBand`: noise, ignored
 * - `smallBand < d <= largeBand`: small change
 * - `d > largeBand`: large change, chamber id recorded
 */

import {
  METRICS,
  type Baseline,
  type ChangeClassification,
  type ChangeLevel,
  type Metric,
  type Thresholds,
  type TrialId,
  type TroughRecord,
} from '../signal/types.js';

/**
 * Relative deviation of a value from its reference.
 * Zero when both are zero; Infinity when only the reference is zero.
 */
export function relativeDeviation(value: number, reference: number): number {
  if (reference === 0) {
    return value === 0 ? 0 : Number.POSITIVE_INFINITY;
  }
  return Math.abs(value - reference) / Math.abs(reference);
}

/**
 * Band a single deviation.
 */
export function changeLevel(deviation: number, thresholds: Thresholds): ChangeLevel {
  if (deviation > thresholds.largeBand) return 'large';
  if (deviation > thresholds.smallBand) return 'small';
  return 'none';
}

/**
 * Check band ordering. Returns error messages (empty when valid).
 */
export function validateThresholds(thresholds: Thresholds): string[] {
  const errors: string[] = [];
  const { smallBand, largeBand } = thresholds;

  if (!Number.isFinite(smallBand) || smallBand < 0) {
    errors.push('smallBand must be a finite number >= 0');
  }
  if (!Number.isFinite(largeBand) || largeBand < 0) {
    errors.push('largeBand must be a finite number >= 0');
  }
  if (errors.length === 0 && smallBand >= largeBand) {
    errors.push('smallBand must be less than largeBand');
  }

  return errors;
}

/**
 * Classify one trial's record against its baseline.
 */
export function classify(
  record: TroughRecord,
  baseline: Baseline,
  thresholds: Thresholds,
  trialId: TrialId,
): ChangeClassification {
  const deviations: Record<Metric, number> = {
    troughCount: relativeDeviation(record.troughCount, baseline.troughCount),
    speed: relativeDeviation(record.speed, baseline.speed),
    distance: relativeDeviation(record.distance, baseline.distance),
  };
  const byMetric: Record<Metric, ChangeLevel> = {
    troughCount: changeLevel(deviations.troughCount, thresholds),
    speed: changeLevel(deviations.speed, thresholds),
    distance: changeLevel(deviations.distance, thresholds),
  };

  const levels = METRICS.map((metric) => byMetric[metric]);
  const smallChanges = levels.filter((level) => level === 'small').length;
  const largeChanges = levels.filter((level) => level === 'large').length;

  return {
    trialId,
    smallChanges,
    largeChanges,
    largeCIDs: largeChanges > 0 ? [trialId.chamberId] : [],
    byMetric,
    deviations,
  };
}
