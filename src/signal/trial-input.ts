/**
 * Reads trial batches from the JSON handed over by ingestion.
 *
 * Entries are converted field by field without judging them: a wrongly
 * typed field becomes a value the detector or grouping check rejects,
 * so one bad trial never aborts the batch.
 */

import { InvalidSignalError } from '../utils/errors.js';
import type { TrialSignal } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIdString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function toTrial(entry: unknown, defaultArmLength: number): TrialSignal {
  const raw = isRecord(entry) ? entry : {};

  const timestamps = Array.isArray(raw.timestamps)
    ? raw.timestamps.map((t: unknown) => (typeof t === 'number' ? t : NaN))
    : [];

  return {
    id: {
      setId: typeof raw.setId === 'number' ? raw.setId : NaN,
      comboId: toIdString(raw.comboId),
      chamberId: toIdString(raw.chamberId),
    },
    timestamps,
    duration: typeof raw.duration === 'number' ? raw.duration : NaN,
    armLength: typeof raw.armLength === 'number' ? raw.armLength : defaultArmLength,
    label: typeof raw.label === 'string' ? raw.label : undefined,
  };
}

/**
 * Convert parsed JSON into trial signals.
 * Throws InvalidSignalError (INVALID_INPUT) when the document is not an array.
 */
export function parseTrials(json: unknown, defaultArmLength: number): TrialSignal[] {
  if (!Array.isArray(json)) {
    throw new InvalidSignalError('Trial input must be a JSON array of trials', 'INVALID_INPUT');
  }
  return json.map((entry: unknown) => toTrial(entry, defaultArmLength));
}

/**
 * Parse trial JSON text.
 */
export function parseTrialsJson(text: string, defaultArmLength: number): TrialSignal[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidSignalError('Trial input is not valid JSON', 'INVALID_INPUT', error);
  }
  return parseTrials(parsed, defaultArmLength);
}
