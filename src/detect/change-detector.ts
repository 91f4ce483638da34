/**
 * Trough detection over a trial's revolution log.
 *
 * Every event after the first closes one revolution of the mill arm, so a
 * trial with n events has n - 1 troughs. Each closed interval contributes
 * one circumference of distance; aggregate speed is cumulative distance
 * over the time those intervals cover.
 *
 * Algorithm:
 * 1. Validate the event sequence (non-empty, finite, strictly increasing)
 * 2. Compute instantaneous speed for each inter-event interval
 * 3. Drop intervals outside the optional speed bounds
 * 4. Sum distance and counted time over the remaining intervals
 */

import { InvalidSignalError } from '../utils/errors.js';
import { formatTrialId } from '../signal/trial-id.js';
import type { SpeedBounds, TrialSignal, TroughRecord } from '../signal/types.js';

export interface DetectOptions {
  /** Intervals outside these bounds are not counted. Default: none. */
  speedBounds?: SpeedBounds;
}

/**
 * Circular path length covered by one revolution.
 */
export function circumference(armLength: number): number {
  return 2 * Math.PI * armLength;
}

/**
 * Check that a trial's event log is usable.
 * Throws InvalidSignalError otherwise.
 */
export function validateSignal(signal: TrialSignal): void {
  const { timestamps, duration, armLength } = signal;
  const where = signal.id ? ` (${formatTrialId(signal.id)})` : '';

  if (!Array.isArray(timestamps) || timestamps.length === 0) {
    throw new InvalidSignalError(`Trial has no revolution events${where}`, 'EMPTY_SIGNAL');
  }

  for (let i = 0; i < timestamps.length; i++) {
    const t = timestamps[i];
    if (typeof t !== 'number' || !Number.isFinite(t)) {
      throw new InvalidSignalError(`Event ${i} is not a finite time${where}`, 'INVALID_TIMESTAMP');
    }
    if (i > 0 && t <= timestamps[i - 1]) {
      throw new InvalidSignalError(
        `Timestamps must be strictly increasing: ${timestamps[i - 1]} then ${t} at event ${i}${where}`,
        'NON_MONOTONIC',
      );
    }
  }

  const last = timestamps[timestamps.length - 1];
  if (typeof duration !== 'number' || !Number.isFinite(duration) || duration < last) {
    throw new InvalidSignalError(
      `Duration ${duration} is shorter than the last event at ${last}${where}`,
      'INVALID_DURATION',
    );
  }

  if (typeof armLength !== 'number' || !Number.isFinite(armLength) || armLength <= 0) {
    throw new InvalidSignalError(`Arm length must be positive, got ${armLength}${where}`, 'INVALID_ARM_LENGTH');
  }
}

function withinBounds(speed: number, bounds: SpeedBounds | undefined): boolean {
  if (!bounds) return true;
  if (bounds.min !== undefined && speed < bounds.min) return false;
  if (bounds.max !== undefined && speed > bounds.max) return false;
  return true;
}

/**
 * Build a record from an already-validated event list.
 */
function summarize(
  timestamps: readonly number[],
  armLength: number,
  options: DetectOptions,
): TroughRecord {
  const path = circumference(armLength);
  const intervalSpeeds: number[] = [];
  let troughCount = 0;
  let elapsed = 0;

  for (let i = 1; i < timestamps.length; i++) {
    const dt = timestamps[i] - timestamps[i - 1];
    const speed = path / dt;
    intervalSpeeds.push(speed);

    if (withinBounds(speed, options.speedBounds)) {
      troughCount++;
      elapsed += dt;
    }
  }

  // A single event closes no revolution: report zeros rather than 0/0
  const distance = troughCount * path;
  const speed = elapsed > 0 ? distance / elapsed : 0;
  const meanInterval = troughCount > 0 ? elapsed / troughCount : 0;

  return Object.freeze({
    troughCount,
    meanInterval,
    speed,
    distance,
    elapsed,
    intervalSpeeds: Object.freeze(intervalSpeeds),
  });
}

/**
 * Detect troughs over the full trial window.
 */
export function detect(signal: TrialSignal, options: DetectOptions = {}): TroughRecord {
  validateSignal(signal);
  return summarize(signal.timestamps, signal.armLength, options);
}

/**
 * Events inside the leading `fraction` of the window from the first event
 * to the last. A fraction of 1 keeps every event.
 */
export function leadingSegment(timestamps: readonly number[], fraction: number): readonly number[] {
  if (!(fraction > 0 && fraction <= 1)) {
    throw new RangeError(`Segment fraction must be in (0, 1], got ${fraction}`);
  }
  if (fraction === 1 || timestamps.length === 0) {
    return timestamps;
  }

  const first = timestamps[0];
  const cutoff = first + (timestamps[timestamps.length - 1] - first) * fraction;
  return timestamps.filter((t) => t <= cutoff);
}

/**
 * Detect troughs over the leading `fraction` of the trial window.
 */
export function detectSegment(
  signal: TrialSignal,
  fraction: number,
  options: DetectOptions = {},
): TroughRecord {
  validateSignal(signal);
  return summarize(leadingSegment(signal.timestamps, fraction), signal.armLength, options);
}
