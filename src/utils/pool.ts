/**
 * Bounded-concurrency task runner.
 *
 * Items are started in input order by at most `concurrency` workers. Once
 * `shouldStart` returns false no further item is started; items already
 * running are awaited and their results kept. Results come back aligned with
 * the input, with `cancelled` for items that never started.
 */

export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'cancelled' };

export interface PoolOptions {
  concurrency: number;
  shouldStart?: () => boolean;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolOutcome<R>[]> {
  const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'cancelled' }));
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (options.shouldStart && !options.shouldStart()) return;
      const index = next++;
      try {
        outcomes[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, () => lane()));
  return outcomes;
}
