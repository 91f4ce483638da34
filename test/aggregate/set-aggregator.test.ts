import { describe, it, expect } from 'vitest';
import {
  accumulate,
  aggregate,
  createAccumulator,
  finalizeAccumulator,
  mergeAccumulators,
} from '../../src/aggregate/set-aggregator.js';
import { classify } from '../../src/classify/anomaly-classifier.js';
import { setMedianBaseline } from '../../src/classify/baseline.js';
import { detect } from '../../src/detect/change-detector.js';
import { UnknownGroupingError } from '../../src/utils/errors.js';
import type { Baseline, ClassifiedTrial, TrialSignal, TroughRecord } from '../../src/signal/types.js';

const BANDS = { smallBand: 0.1, largeBand: 0.5 };
const BASELINE: Baseline = { reference: 'set-median', troughCount: 10, speed: 1, distance: 1 };

function item(
  setId: number,
  comboId: string,
  chamberId: string,
  troughCount: number,
  label?: string,
): ClassifiedTrial {
  const record: TroughRecord = {
    troughCount,
    speed: 1,
    distance: 1,
    meanInterval: 0,
    elapsed: 0,
    intervalSpeeds: [],
  };
  const id = { setId, comboId, chamberId };
  return {
    signal: { id, timestamps: [0], duration: 1, armLength: 0.1, label },
    record,
    classification: classify(record, BASELINE, BANDS, id),
  };
}

// trough 10 -> none, 12 -> small, 20 -> large
const ITEMS: ClassifiedTrial[] = [
  item(1, 'c1', 'A2', 10, 'a2.txt'),
  item(1, 'c1', 'A1', 20, 'a1.txt'),
  item(1, 'c2', 'B1', 12),
  item(2, 'c1', 'C1', 20),
  item(2, 'c1', 'C2', 20),
  item(1, 'c2', 'B2', 20),
];

/** A trial flown at one revolution per second for `revolutions` revolutions. */
function steady(chamberId: string, revolutions: number): TrialSignal {
  return {
    id: { setId: 3, comboId: 'c1', chamberId },
    timestamps: Array.from({ length: revolutions + 1 }, (_, i) => i),
    duration: revolutions,
    armLength: 0.1,
  };
}

function foldAll(items: ClassifiedTrial[]) {
  return items.reduce(accumulate, createAccumulator());
}

describe('set-aggregator', () => {
  describe('aggregate', () => {
    it('counts trials and changes per set', () => {
      const { summaries } = aggregate(ITEMS);

      expect([...summaries.keys()]).toEqual([1, 2]);
      expect(summaries.get(1)).toMatchObject({
        setId: 1,
        total: 4,
        smallChanges: 1,
        largeChanges: 2,
        largeCIDs: ['A1', 'B2'],
      });
      expect(summaries.get(2)).toMatchObject({
        setId: 2,
        total: 2,
        smallChanges: 0,
        largeChanges: 2,
        largeCIDs: ['C1', 'C2'],
      });
    });

    it('tallies each metric', () => {
      const summary = aggregate(ITEMS).summaries.get(1);

      expect(summary?.byMetric).toEqual({
        troughCount: { noChange: 1, small: 1, large: 2, largeCIDs: ['A1', 'B2'] },
        speed: { noChange: 4, small: 0, large: 0, largeCIDs: [] },
        distance: { noChange: 4, small: 0, large: 0, largeCIDs: [] },
      });
    });

    it('flags the 50-revolution trial against a median of 11 in trough count and distance', () => {
      const signals = [steady('ch0', 10), steady('ch1', 11), steady('ch2', 50)];
      const records = signals.map((signal) => detect(signal));
      const median = setMedianBaseline(records);
      const items = signals.map(
        (signal, i): ClassifiedTrial => ({
          signal,
          record: records[i],
          classification: classify(records[i], median, BANDS, signal.id),
        }),
      );

      const summary = aggregate(items).summaries.get(3);

      // Distance is revolutions times circumference, so it moves with trough count
      expect(summary).toMatchObject({
        total: 3,
        smallChanges: 0,
        largeChanges: 2,
        largeCIDs: ['ch2'],
      });
      expect(summary?.byMetric.troughCount).toEqual({ noChange: 2, small: 0, large: 1, largeCIDs: ['ch2'] });
      expect(summary?.byMetric.distance).toEqual({ noChange: 2, small: 0, large: 1, largeCIDs: ['ch2'] });
      expect(summary?.byMetric.speed).toEqual({ noChange: 3, small: 0, large: 0, largeCIDs: [] });
    });

    it('builds combo series ordered by chamber id', () => {
      const combo = aggregate(ITEMS).combos.get('1/c1');

      expect(combo).toEqual({
        setId: 1,
        comboId: 'c1',
        label: 'a1.txt;a2.txt',
        trialCount: 2,
        chamberIds: ['A1', 'A2'],
        series: { troughCount: [20, 10], speed: [1, 1], distance: [1, 1] },
      });
    });

    it('falls back to set and combo id for unlabelled trials', () => {
      expect(aggregate(ITEMS).combos.get('1/c2')?.label).toBe('set001-c2');
    });

    it('orders combos by set then combo id', () => {
      expect([...aggregate(ITEMS).combos.keys()]).toEqual(['1/c1', '1/c2', '2/c1']);
    });

    it('does not depend on input order', () => {
      const forward = aggregate(ITEMS);
      const reversed = aggregate([...ITEMS].reverse());
      const rotated = aggregate([...ITEMS.slice(3), ...ITEMS.slice(0, 3)]);

      expect(reversed).toEqual(forward);
      expect(rotated).toEqual(forward);
      expect([...reversed.summaries.keys()]).toEqual([...forward.summaries.keys()]);
    });

    it('returns deeply frozen records', () => {
      const { summaries, combos } = aggregate(ITEMS);
      const summary = summaries.get(1);
      const combo = combos.get('1/c1');

      expect(Object.isFrozen(summary)).toBe(true);
      expect(Object.isFrozen(summary?.largeCIDs)).toBe(true);
      expect(Object.isFrozen(summary?.byMetric)).toBe(true);
      expect(Object.isFrozen(summary?.byMetric.troughCount)).toBe(true);
      expect(Object.isFrozen(summary?.byMetric.troughCount.largeCIDs)).toBe(true);
      expect(Object.isFrozen(combo)).toBe(true);
      expect(Object.isFrozen(combo?.chamberIds)).toBe(true);
      expect(Object.isFrozen(combo?.series)).toBe(true);
      expect(Object.isFrozen(combo?.series.distance)).toBe(true);
    });

    it('returns empty maps for no input', () => {
      const { summaries, combos } = aggregate([]);
      expect(summaries.size).toBe(0);
      expect(combos.size).toBe(0);
    });
  });

  describe('accumulate', () => {
    it('rejects a trial without a usable id', () => {
      const bad = item(1, 'c1', 'A1', 10);
      const unusable: ClassifiedTrial = {
        ...bad,
        signal: { ...bad.signal, id: { setId: 1, comboId: '', chamberId: 'A1' } },
      };

      expect(() => accumulate(createAccumulator(), unusable)).toThrow(UnknownGroupingError);
    });
  });

  describe('mergeAccumulators', () => {
    it('equals sequential accumulation', () => {
      const merged = mergeAccumulators(foldAll(ITEMS.slice(0, 2)), foldAll(ITEMS.slice(2)));

      expect(finalizeAccumulator(merged)).toEqual(aggregate(ITEMS));
    });

    it('is order-independent', () => {
      const a = foldAll(ITEMS.slice(0, 3));
      const b = foldAll(ITEMS.slice(3));

      expect(finalizeAccumulator(mergeAccumulators(b, a))).toEqual(
        finalizeAccumulator(mergeAccumulators(a, b)),
      );
    });

    it('adds totals of disjoint slices of the same set', () => {
      const setOne = ITEMS.filter((i) => i.signal.id.setId === 1);
      const left = finalizeAccumulator(foldAll(setOne.slice(0, 1))).summaries.get(1);
      const right = finalizeAccumulator(foldAll(setOne.slice(1))).summaries.get(1);
      const whole = aggregate(setOne).summaries.get(1);

      expect(whole?.total).toBe((left?.total ?? 0) + (right?.total ?? 0));
      expect(whole?.largeChanges).toBe((left?.largeChanges ?? 0) + (right?.largeChanges ?? 0));
    });

    it('unions per-metric chamber ids across slices', () => {
      const setOne = ITEMS.filter((i) => i.signal.id.setId === 1);
      const merged = mergeAccumulators(foldAll(setOne.slice(0, 2)), foldAll(setOne.slice(2)));

      expect(finalizeAccumulator(merged).summaries.get(1)?.byMetric.troughCount.largeCIDs).toEqual([
        'A1',
        'B2',
      ]);
    });

    it('has the empty accumulator as identity', () => {
      const acc = foldAll(ITEMS);
      expect(finalizeAccumulator(mergeAccumulators(createAccumulator(), acc))).toEqual(
        finalizeAccumulator(acc),
      );
    });

    it('leaves its inputs unchanged', () => {
      const a = foldAll(ITEMS.slice(0, 2));
      const b = foldAll(ITEMS.slice(2));
      const before = finalizeAccumulator(a);

      mergeAccumulators(a, b);

      expect(finalizeAccumulator(a)).toEqual(before);
    });
  });
});
