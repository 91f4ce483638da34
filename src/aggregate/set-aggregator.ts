/**
 * Groups classified trials by set and by (set, combo).
 *
 * Aggregation is a fold over explicit accumulator state. Every combine step
 * is a sum, a set union or a multiset append, so accumulators built from
 * disjoint slices of the input can be merged in any order and finalize to
 * the same result. Combo series are sorted by chamber id at finalize time
 * for the same reason.
 */

import { assertGroupable, comboKey, trialLabel } from '../signal/trial-id.js';
import {
  METRICS,
  type ClassifiedTrial,
  type ComboRecord,
  type Metric,
  type MetricTally,
  type SetSummary,
} from '../signal/types.js';

interface MetricCounter {
  noChange: number;
  small: number;
  large: number;
  largeCIDs: Set<string>;
}

interface SetTally {
  total: number;
  smallChanges: number;
  largeChanges: number;
  largeCIDs: Set<string>;
  byMetric: Record<Metric, MetricCounter>;
}

interface ComboEntry {
  chamberId: string;
  troughCount: number;
  speed: number;
  distance: number;
}

interface ComboTally {
  setId: number;
  comboId: string;
  labels: Set<string>;
  entries: ComboEntry[];
}

/** Mutable fold state. One per worker slice; merge before finalizing. */
export interface SetAccumulator {
  sets: Map<number, SetTally>;
  combos: Map<string, ComboTally>;
}

export interface AggregateResult {
  summaries: Map<number, SetSummary>;
  combos: Map<string, ComboRecord>;
}

function emptyCounter(): MetricCounter {
  return { noChange: 0, small: 0, large: 0, largeCIDs: new Set() };
}

function emptyMetricCounters(): Record<Metric, MetricCounter> {
  return { troughCount: emptyCounter(), speed: emptyCounter(), distance: emptyCounter() };
}

function finalizeCounter(counter: MetricCounter): MetricTally {
  return Object.freeze({
    noChange: counter.noChange,
    small: counter.small,
    large: counter.large,
    largeCIDs: Object.freeze([...counter.largeCIDs].sort()),
  });
}

function emptySetTally(): SetTally {
  return {
    total: 0,
    smallChanges: 0,
    largeChanges: 0,
    largeCIDs: new Set(),
    byMetric: emptyMetricCounters(),
  };
}

/**
 * Create an empty accumulator.
 */
export function createAccumulator(): SetAccumulator {
  return { sets: new Map(), combos: new Map() };
}

/**
 * Fold one classified trial into the accumulator.
 * Throws UnknownGroupingError when the trial's set or combo id is unusable.
 */
export function accumulate(acc: SetAccumulator, item: ClassifiedTrial): SetAccumulator {
  const { signal, record, classification } = item;
  assertGroupable(signal.id);
  const { setId, comboId, chamberId } = signal.id;

  let tally = acc.sets.get(setId);
  if (!tally) {
    tally = emptySetTally();
    acc.sets.set(setId, tally);
  }

  tally.total++;
  tally.smallChanges += classification.smallChanges;
  tally.largeChanges += classification.largeChanges;
  for (const cid of classification.largeCIDs) {
    tally.largeCIDs.add(cid);
  }
  for (const metric of METRICS) {
    const level = classification.byMetric[metric];
    const counter = tally.byMetric[metric];
    if (level === 'large') {
      counter.large++;
      counter.largeCIDs.add(chamberId);
    } else if (level === 'small') counter.small++;
    else counter.noChange++;
  }

  const key = comboKey(setId, comboId);
  let combo = acc.combos.get(key);
  if (!combo) {
    combo = { setId, comboId, labels: new Set(), entries: [] };
    acc.combos.set(key, combo);
  }

  combo.labels.add(trialLabel(signal));
  combo.entries.push({
    chamberId,
    troughCount: record.troughCount,
    speed: record.speed,
    distance: record.distance,
  });

  return acc;
}

/**
 * Merge two accumulators into a new one. Neither input is modified.
 */
export function mergeAccumulators(a: SetAccumulator, b: SetAccumulator): SetAccumulator {
  const merged = createAccumulator();

  for (const source of [a, b]) {
    for (const [setId, tally] of source.sets) {
      let target = merged.sets.get(setId);
      if (!target) {
        target = emptySetTally();
        merged.sets.set(setId, target);
      }
      target.total += tally.total;
      target.smallChanges += tally.smallChanges;
      target.largeChanges += tally.largeChanges;
      for (const cid of tally.largeCIDs) {
        target.largeCIDs.add(cid);
      }
      for (const metric of METRICS) {
        const into = target.byMetric[metric];
        const from = tally.byMetric[metric];
        into.noChange += from.noChange;
        into.small += from.small;
        into.large += from.large;
        for (const cid of from.largeCIDs) {
          into.largeCIDs.add(cid);
        }
      }
    }

    for (const [key, combo] of source.combos) {
      let target = merged.combos.get(key);
      if (!target) {
        target = { setId: combo.setId, comboId: combo.comboId, labels: new Set(), entries: [] };
        merged.combos.set(key, target);
      }
      for (const label of combo.labels) {
        target.labels.add(label);
      }
      target.entries.push(...combo.entries);
    }
  }

  return merged;
}

function compareEntries(a: ComboEntry, b: ComboEntry): number {
  if (a.chamberId !== b.chamberId) return a.chamberId < b.chamberId ? -1 : 1;
  return a.troughCount - b.troughCount || a.speed - b.speed || a.distance - b.distance;
}

/**
 * Produce deeply frozen summaries and combo records from fold state.
 */
export function finalizeAccumulator(acc: SetAccumulator): AggregateResult {
  const summaries = new Map<number, SetSummary>();
  const setIds = [...acc.sets.keys()].sort((x, y) => x - y);

  for (const setId of setIds) {
    const tally = acc.sets.get(setId);
    if (!tally) continue;

    summaries.set(
      setId,
      Object.freeze({
        setId,
        total: tally.total,
        smallChanges: tally.smallChanges,
        largeChanges: tally.largeChanges,
        largeCIDs: Object.freeze([...tally.largeCIDs].sort()),
        byMetric: Object.freeze({
          troughCount: finalizeCounter(tally.byMetric.troughCount),
          speed: finalizeCounter(tally.byMetric.speed),
          distance: finalizeCounter(tally.byMetric.distance),
        }),
      }),
    );
  }

  const combos = new Map<string, ComboRecord>();
  const tallies = [...acc.combos.values()].sort(
    (x, y) => x.setId - y.setId || (x.comboId < y.comboId ? -1 : x.comboId > y.comboId ? 1 : 0),
  );

  for (const tally of tallies) {
    const entries = tally.entries.slice().sort(compareEntries);
    combos.set(
      comboKey(tally.setId, tally.comboId),
      Object.freeze({
        setId: tally.setId,
        comboId: tally.comboId,
        label: [...tally.labels].sort().join(';'),
        trialCount: entries.length,
        chamberIds: Object.freeze(entries.map((e) => e.chamberId)),
        series: Object.freeze({
          troughCount: Object.freeze(entries.map((e) => e.troughCount)),
          speed: Object.freeze(entries.map((e) => e.speed)),
          distance: Object.freeze(entries.map((e) => e.distance)),
        }),
      }),
    );
  }

  return { summaries, combos };
}

/**
 * Aggregate classified trials in one pass.
 *
 * The result does not depend on the order of `items`.
 */
export function aggregate(items: Iterable<ClassifiedTrial>): AggregateResult {
  let acc = createAccumulator();
  for (const item of items) {
    acc = accumulate(acc, item);
  }
  return finalizeAccumulator(acc);
}
