/**
 * Bounded task pool for the per-trial scatter step.
 *
 * Tasks are submitted in input order to at most `concurrency` lanes.
 * Once the abort signal fires no further task is started; tasks already
 * running finish and their results are kept.
 */

export interface PoolOptions {
  /** Maximum tasks in flight. Default: 4. */
  concurrency?: number;
  /** Stops submission of further tasks. */
  signal?: AbortSignal;
}

/** Outcome of one submitted task. */
export type TaskOutcome<R> = { status: 'fulfilled'; value: R } | { status: 'rejected'; reason: unknown };

export interface PoolResult<R> {
  /** One slot per input item; `undefined` where the task was never submitted. */
  outcomes: Array<TaskOutcome<R> | undefined>;
  /** Number of tasks that were submitted. */
  submitted: number;
  /** Whether submission stopped early because of the abort signal. */
  aborted: boolean;
}

/**
 * Run `task` over every item with bounded concurrency.
 *
 * A rejected task does not stop the pool; its reason is kept in the
 * matching outcome slot.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R> | R,
  options: PoolOptions = {},
): Promise<PoolResult<R>> {
  const { concurrency = 4, signal } = options;
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a finite number of at least 1, got ${concurrency}`);
  }
  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const outcomes = new Array<TaskOutcome<R> | undefined>(items.length).fill(undefined);

  let next = 0;
  let submitted = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      submitted++;
      try {
        const value = await task(items[index], index);
        outcomes[index] = { status: 'fulfilled', value };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: items.length === 0 ? 0 : lanes }, () => lane()));

  return { outcomes, submitted, aborted: submitted < items.length };
}
