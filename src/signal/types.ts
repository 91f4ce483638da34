/**
 * Core types for flight-mill trial diagnostics.
 *
 * A trial is one insect tethered in one chamber for one recording. The
 * ingestion step (outside this package) turns the optical sensor log into
 * an ordered list of revolution-event timestamps.
 */

// ── Trial input ─────────────────────────────────────────

/** Structured identity assigned at ingestion. */
export interface TrialId {
  /** Experimental set (positive integer). */
  setId: number;
  /** Combination id within the set. */
  comboId: string;
  /** Chamber (mill channel) id. */
  chamberId: string;
}

/** A single trial's revolution log. */
export interface TrialSignal {
  id: TrialId;
  /** Revolution-event times in seconds since trial start, strictly increasing. */
  timestamps: readonly number[];
  /** Recording duration in seconds, at least the last timestamp. */
  duration: number;
  /** Mill arm length (pivot to insect) in metres. */
  armLength: number;
  /** Source filename, kept for traceability in exported tables. */
  label?: string;
}

// ── Derived metrics ─────────────────────────────────────

/** Metrics compared by the classifier. */
export type Metric = 'troughCount' | 'speed' | 'distance';

export const METRICS: readonly Metric[] = ['troughCount', 'speed', 'distance'];

/** Per-trial trough statistics. Frozen once created. */
export interface TroughRecord {
  /** Completed revolutions (direction-change events). */
  readonly troughCount: number;
  /** Mean seconds between counted troughs (0 when none). */
  readonly meanInterval: number;
  /** Cumulative distance over counted time, m/s. */
  readonly speed: number;
  /** Cumulative distance in metres. */
  readonly distance: number;
  /** Seconds covered by counted intervals. */
  readonly elapsed: number;
  /** Instantaneous speed of every interval, counted or not, m/s. */
  readonly intervalSpeeds: readonly number[];
}

/** Instantaneous speed limits; intervals outside are left out of distance. */
export interface SpeedBounds {
  /** Below this the arm is coasting after a bout. */
  min?: number;
  /** Above this the reading is treated as a sensor glitch. */
  max?: number;
}

// ── Classification ──────────────────────────────────────

export type BaselineReference = 'self' | 'set-median';

/** Reference values a trial's record is compared against. */
export interface Baseline {
  reference: BaselineReference;
  troughCount: number;
  speed: number;
  distance: number;
}

/** Relative deviation bands. */
export interface Thresholds {
  /** Deviations at or below this are noise. */
  smallBand: number;
  /** Deviations above this are large changes. */
  largeBand: number;
}

export type ChangeLevel = 'none' | 'small' | 'large';

export interface ChangeClassification {
  trialId: TrialId;
  smallChanges: number;
  largeChanges: number;
  /** Chamber ids that contributed large changes (at most one entry per trial). */
  largeCIDs: string[];
  byMetric: Record<Metric, ChangeLevel>;
  deviations: Record<Metric, number>;
}

// ── Aggregates ──────────────────────────────────────────
// Finalized aggregates are deeply frozen, so their arrays are typed readonly.

export interface MetricTally {
  noChange: number;
  small: number;
  large: number;
  /** Chamber ids with a large change in this metric. Sorted, unique. */
  largeCIDs: readonly string[];
}

export interface SetSummary {
  setId: number;
  total: number;
  smallChanges: number;
  largeChanges: number;
  /** Sorted, unique. Empty when no trial had a large change. */
  largeCIDs: readonly string[];
  byMetric: Record<Metric, MetricTally>;
}

export interface ComboSeries {
  troughCount: readonly number[];
  speed: readonly number[];
  distance: readonly number[];
}

export interface ComboRecord {
  setId: number;
  comboId: string;
  /** Filename label for traceability. */
  label: string;
  trialCount: number;
  /** Chamber ids in series order. */
  chamberIds: readonly string[];
  series: ComboSeries;
}

/** One classified trial, the unit folded by the set aggregator. */
export interface ClassifiedTrial {
  signal: TrialSignal;
  record: TroughRecord;
  classification: ChangeClassification;
}
