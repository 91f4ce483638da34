/**
 * Trial identity helpers.
 *
 * Identity is structured from ingestion onwards. These helpers only
 * validate it and build the keys and labels used by the aggregator and
 * the exported tables.
 */

import { UnknownGroupingError } from '../utils/errors.js';
import { NONE_SENTINEL } from '../report/diagnostics-report.js';
import type { TrialId, TrialSignal } from './types.js';

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

/**
 * Assert that a trial carries a usable set, combo and chamber id.
 * Input arrives from JSON at run time, so each field is checked even
 * though the type already names it.
 */
export function assertGroupable(id: TrialId | undefined): asserts id is TrialId {
  const setId: unknown = id?.setId;
  if (typeof setId !== 'number' || !Number.isInteger(setId) || setId < 1) {
    throw new UnknownGroupingError(`Trial has no usable set id: ${String(setId)}`, 'MISSING_SET_ID');
  }
  if (isBlank(id?.comboId)) {
    throw new UnknownGroupingError(`Trial in set ${setId} has no combo id`, 'MISSING_COMBO_ID');
  }
  const chamberId: unknown = id?.chamberId;
  if (typeof chamberId !== 'string' || isBlank(chamberId)) {
    throw new UnknownGroupingError(`Trial in set ${setId} has no chamber id`, 'MISSING_CHAMBER_ID');
  }
  // Chamber ids are comma-joined in exported cells, with the sentinel for none.
  if (chamberId.includes(',') || chamberId === NONE_SENTINEL) {
    throw new UnknownGroupingError(
      `Trial in set ${setId} has a chamber id that cannot be exported: '${chamberId}'`,
      'INVALID_CHAMBER_ID',
    );
  }
}

/** Set id of a trial, or undefined when it is not usable. */
export function groupableSetId(id: TrialId | undefined): number | undefined {
  const setId: unknown = id?.setId;
  return typeof setId === 'number' && Number.isInteger(setId) && setId >= 1 ? setId : undefined;
}

/** Key for (set, combo) grouping. */
export function comboKey(setId: number, comboId: string): string {
  return `${setId}/${comboId}`;
}

/** Printable trial id, e.g. `set003/combo-A/ch7`. */
export function formatTrialId(id: TrialId): string {
  return `set${String(id.setId).padStart(3, '0')}/${id.comboId}/${id.chamberId}`;
}

/**
 * Label used in the combo table's filename column.
 * Falls back to `set<NNN>-<comboId>` when ingestion supplied no filename.
 */
export function trialLabel(signal: Pick<TrialSignal, 'id' | 'label'>): string {
  if (signal.label && signal.label.trim().length > 0) {
    return signal.label.trim();
  }
  return `set${String(signal.id.setId).padStart(3, '0')}-${signal.id.comboId}`;
}
