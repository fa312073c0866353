export type PoolOutcome<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight and keeps
 * going past failures; outcomes come back in input order.
 */
export async function asyncPool<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PoolOutcome<T, R>[]> {
  if (concurrency < 1) {
    throw new Error("Concurrency must be at least 1");
  }

  const outcomes: PoolOutcome<T, R>[] = new Array(items.length);
  let nextIndex = 0;

  async function runWorker() {
    while (nextIndex < items.length) {
      const current = nextIndex;
      nextIndex += 1;
      const item = items[current];
      try {
        outcomes[current] = { item, ok: true, value: await worker(item, current) };
      } catch (error) {
        outcomes[current] = { item, ok: false, error };
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => runWorker());
  await Promise.all(workers);
  return outcomes;
}
