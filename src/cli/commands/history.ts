import type { Command } from '../types.js';
import { getFlag, getNumberFlag, getPositionals } from '../utils.js';
import { getDb, closeDb } from '../../storage/db.js';
import { deleteRun, getRun, listRuns } from '../../storage/diagnostics-store.js';
import { formatChamberIds } from '../../report/diagnostics-report.js';

const USAGE = 'flightmill history [list|show <id>|delete <id>] [--limit <n>] [--db <path>]';

export const historyCommand: Command = {
  name: 'history',
  description: 'List, show or delete stored runs',
  usage: USAGE,
  handler: async (args) => {
    const [subcommand = 'list', id] = getPositionals(args, ['--limit', '--db']);
    getDb(getFlag(args, '--db'));

    try {
      switch (subcommand) {
        case 'list': {
          const runs = listRuns(getNumberFlag(args, '--limit') ?? 20);
          if (runs.length === 0) {
            console.log('No stored runs.');
            break;
          }
          for (const run of runs) {
            console.log(
              `${run.id}  ${run.createdAt}  ${run.reference.padEnd(10)}  ` +
                `trials=${run.trialCount} sets=${run.setCount} large=${run.largeChanges}` +
                (run.source ? `  ${run.source}` : ''),
            );
          }
          break;
        }
        case 'show': {
          if (!id) {
            console.error(`Error: Run id required. Usage: ${USAGE}`);
            process.exit(2);
          }
          const run = getRun(id);
          console.log(`Run ${run.id} (${run.createdAt})`);
          console.log(`  Source: ${run.source ?? '-'}`);
          console.log(`  Reference: ${run.reference}`);
          console.log(`  Bands: small ${run.thresholds.smallBand}, large ${run.thresholds.largeBand}`);
          console.log(`  Trials: ${run.trialCount} (${run.rejectedCount} excluded)`);
          if (run.failedSets.length > 0) {
            console.log(`  Skipped sets: ${run.failedSets.join(', ')}`);
          }
          for (const s of run.summaries) {
            console.log(
              `  set ${s.setId}: total=${s.total} small=${s.smallChanges} large=${s.largeChanges} ` +
                `large_cIDs=${formatChamberIds(s.largeCIDs)}`,
            );
          }
          break;
        }
        case 'delete': {
          if (!id) {
            console.error(`Error: Run id required. Usage: ${USAGE}`);
            process.exit(2);
          }
          deleteRun(id);
          console.log(`Deleted run ${id}.`);
          break;
        }
        default:
          console.error(`Error: Unknown subcommand '${subcommand}'`);
          console.log(`Usage: ${USAGE}`);
          process.exit(2);
      }
    } finally {
      closeDb();
    }
  },
};
