/**
 * Bounded-parallelism task runner
 */

import Debug from 'debug';

const debug = Debug('mediapeer:utils:worker-pool');

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Items are taken in input order; completion order is whatever the workers
 * produce. Once `signal` aborts no further item is started.
 * @returns Items that were never started because of the abort
 */
export async function runPool<T>(
  items: readonly T[],
  worker: (item: T) => Promise<void>,
  options: PoolOptions
): Promise<T[]> {
  const queue = [...items];
  const concurrency = Math.max(1, Math.min(options.concurrency, queue.length));

  const runWorker = async (): Promise<void> => {
    for (;;) {
      if (options.signal?.aborted) return;
      const item = queue.shift();
      if (item === undefined) return;
      await worker(item);
    }
  };

  debug(`Running ${queue.length} tasks with ${concurrency} workers`);
  await Promise.all(Array.from({ length: concurrency }, () => runWorker()));

  return queue;
}
