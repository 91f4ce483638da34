import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  NONE_SENTINEL,
  REPORT_FILES,
  formatChamberIds,
  parseChamberIds,
  parseSummaryTable,
  printSummaryTable,
  render,
  renderMetricTable,
  writeReport,
} from '../../src/report/diagnostics-report.js';
import { toCsv } from '../../src/report/csv.js';
import { aggregate } from '../../src/aggregate/set-aggregator.js';
import { classify } from '../../src/classify/anomaly-classifier.js';
import { MalformedAggregateError } from '../../src/utils/errors.js';
import type { Baseline, ClassifiedTrial, ComboRecord, SetSummary, TroughRecord } from '../../src/signal/types.js';

const BANDS = { smallBand: 0.1, largeBand: 0.5 };
const BASELINE: Baseline = { reference: 'set-median', troughCount: 10, speed: 1, distance: 1 };

function item(setId: number, comboId: string, chamberId: string, troughCount: number, label?: string): ClassifiedTrial {
  const record: TroughRecord = { troughCount, speed: 1, distance: 1, meanInterval: 0, elapsed: 0, intervalSpeeds: [] };
  const id = { setId, comboId, chamberId };
  return {
    signal: { id, timestamps: [0], duration: 1, armLength: 0.1, label },
    record,
    classification: classify(record, BASELINE, BANDS, id),
  };
}

const { summaries, combos } = aggregate([
  item(1, 'c1', 'A1', 20, 'a1.txt'),
  item(1, 'c1', 'A2', 10, 'a2.txt'),
  item(1, 'c2', 'B1', 12),
  item(2, 'c1', 'C1', 10),
]);

function summary(overrides: Partial<SetSummary> = {}): SetSummary {
  return {
    setId: 1,
    total: 2,
    smallChanges: 0,
    largeChanges: 2,
    largeCIDs: ['A1', 'B2'],
    byMetric: {
      troughCount: { noChange: 0, small: 0, large: 2, largeCIDs: ['A1', 'B2'] },
      speed: { noChange: 2, small: 0, large: 0, largeCIDs: [] },
      distance: { noChange: 1, small: 0, large: 1, largeCIDs: ['B2'] },
    },
    ...overrides,
  };
}

describe('diagnostics-report', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('chamber id cells', () => {
    it('joins ids or writes the sentinel', () => {
      expect(formatChamberIds(['A1', 'B2'])).toBe('A1,B2');
      expect(formatChamberIds([])).toBe(NONE_SENTINEL);
    });

    it('reads the sentinel back as no ids', () => {
      expect(parseChamberIds('None')).toEqual([]);
      expect(parseChamberIds('')).toEqual([]);
      expect(parseChamberIds('A1,B2')).toEqual(['A1', 'B2']);
    });
  });

  describe('render', () => {
    it('builds one summary row per set', () => {
      const { summaryTable } = render(summaries, combos);

      expect(summaryTable.columns).toEqual(['set_id', 'total', 'small_changes', 'large_changes', 'large_cIDs']);
      expect(summaryTable.rows).toEqual([
        [1, 3, 1, 1, 'A1'],
        [2, 1, 0, 0, 'None'],
      ]);
    });

    it('builds three combo rows per combo padded to the widest series', () => {
      const { comboTable } = render(summaries, combos);

      expect(comboTable.columns).toEqual(['set_id', 'combo_id', 'filename', 'stat', 'value_1', 'value_2']);
      expect(comboTable.rows).toEqual([
        [1, 'c1', 'a1.txt;a2.txt', 'trough', 20, 10],
        [1, 'c1', 'a1.txt;a2.txt', 'speed', 1, 1],
        [1, 'c1', 'a1.txt;a2.txt', 'distance', 1, 1],
        [1, 'c2', 'set001-c2', 'trough', 12, ''],
        [1, 'c2', 'set001-c2', 'speed', 1, ''],
        [1, 'c2', 'set001-c2', 'distance', 1, ''],
        [2, 'c1', 'set002-c1', 'trough', 10, ''],
        [2, 'c1', 'set002-c1', 'speed', 1, ''],
        [2, 'c1', 'set002-c1', 'distance', 1, ''],
      ]);
    });

    it('renders empty tables for no aggregates', () => {
      const { summaryTable, comboTable } = render(new Map(), new Map());

      expect(toCsv(summaryTable)).toBe('set_id,total,small_changes,large_changes,large_cIDs\n');
      expect(comboTable.columns).toEqual(['set_id', 'combo_id', 'filename', 'stat']);
    });

    it('rejects a combo without a speed series', () => {
      const series = { troughCount: [1], speed: [1], distance: [1] };
      const combo: ComboRecord = { setId: 1, comboId: 'c1', label: 'x', trialCount: 1, chamberIds: ['A1'], series };
      Reflect.deleteProperty(series, 'speed');

      try {
        render(new Map(), new Map([['1/c1', combo]]));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedAggregateError);
        expect(error).toHaveProperty('code', 'MISSING_SERIES');
        expect(error).toHaveProperty('message', 'Combo 1/c1 has no speed series');
      }
    });

    it('rejects a summary without a total', () => {
      const broken = summary();
      Reflect.deleteProperty(broken, 'total');

      expect(() => render(new Map([[1, broken]]), combos)).toThrow("Summary for set 1 is missing field 'total'");
    });
  });

  describe('summary CSV', () => {
    it('quotes multiple large chamber ids', () => {
      const { summaryTable } = render(new Map([[1, summary()]]), new Map());

      expect(toCsv(summaryTable)).toBe(
        'set_id,total,small_changes,large_changes,large_cIDs\n1,2,0,2,"A1,B2"\n',
      );
    });

    it('round-trips through parseSummaryTable', () => {
      const text = toCsv(render(summaries, combos).summaryTable);

      expect(parseSummaryTable(text)).toEqual([
        { setId: 1, total: 3, smallChanges: 1, largeChanges: 1, largeCIDs: ['A1'] },
        { setId: 2, total: 1, smallChanges: 0, largeChanges: 0, largeCIDs: [] },
      ]);
    });

    it('rejects an unexpected header', () => {
      expect(() => parseSummaryTable('set,total\n1,2\n')).toThrow(MalformedAggregateError);
    });

    it('rejects a non-integer count', () => {
      expect(() =>
        parseSummaryTable('set_id,total,small_changes,large_changes,large_cIDs\n1,two,0,0,None\n'),
      ).toThrow("Summary row 1 has invalid total: 'two'");
    });
  });

  describe('renderMetricTable', () => {
    it('breaks each set down by metric', () => {
      const table = renderMetricTable(summaries);

      expect(table.columns).toEqual([
        'set_id',
        'stat',
        'total',
        'no_change',
        'small_changes',
        'large_changes',
        'large_prop',
        'large_cIDs',
      ]);
      expect(table.rows).toEqual([
        [1, 'trough', 3, 1, 1, 1, 1 / 3, 'A1'],
        [1, 'speed', 3, 3, 0, 0, 0, 'None'],
        [1, 'distance', 3, 3, 0, 0, 0, 'None'],
        [2, 'trough', 1, 1, 0, 0, 0, 'None'],
        [2, 'speed', 1, 1, 0, 0, 0, 'None'],
        [2, 'distance', 1, 1, 0, 0, 0, 'None'],
      ]);
    });

    it('lists the chambers with a large change in each metric', () => {
      const table = renderMetricTable(new Map([[1, summary()]]));

      expect(toCsv(table)).toBe(
        'set_id,stat,total,no_change,small_changes,large_changes,large_prop,large_cIDs\n' +
          '1,trough,2,0,0,2,1,"A1,B2"\n' +
          '1,speed,2,2,0,0,0,None\n' +
          '1,distance,2,1,0,1,0.5,B2\n',
      );
    });

    it('rejects a metric tally without chamber ids', () => {
      const broken = summary();
      Reflect.deleteProperty(broken.byMetric.speed, 'largeCIDs');

      expect(() => renderMetricTable(new Map([[1, broken]]))).toThrow(
        "Summary for set 1 is missing field 'byMetric.speed'",
      );
    });
  });

  describe('writeReport', () => {
    it('writes the tables into the output directory', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'flightmill-report-'));
      try {
        const outDir = join(dir, 'nested');
        const report = render(summaries, combos);
        const written = await writeReport(outDir, report, renderMetricTable(summaries));

        expect(written).toEqual({
          summaryPath: join(outDir, REPORT_FILES.summary),
          comboPath: join(outDir, REPORT_FILES.combos),
          metricPath: join(outDir, REPORT_FILES.metrics),
        });
        expect(await readFile(written.summaryPath, 'utf-8')).toBe(
          'set_id,total,small_changes,large_changes,large_cIDs\n1,3,1,1,A1\n2,1,0,0,None\n',
        );
        expect((await readFile(written.comboPath, 'utf-8')).split('\n')[4]).toBe('1,c2,set001-c2,trough,12,');
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('skips the metric table when none is given', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'flightmill-report-'));
      try {
        const written = await writeReport(dir, render(summaries, combos));
        expect(written.metricPath).toBeUndefined();
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('printSummaryTable', () => {
    it('prints a header, a rule and one line per row', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      printSummaryTable(render(summaries, combos).summaryTable);

      expect(log).toHaveBeenCalledTimes(4);
      expect(log.mock.calls[2][0]).toBe(
        '1        | 3       | 1              | 1              | A1                            ',
      );
    });
  });
});
