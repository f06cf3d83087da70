export type PoolOutcome<R> = {
  results: R[];
  aborted: boolean;
};

/**
 * Runs `task` over `items` with at most `concurrency` in flight. The signal
 * is checked before each item starts; items already running finish. The
 * first task error stops further items from starting and is rethrown.
 */
export async function runPool<T, R>(
  items: T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<PoolOutcome<R>> {
  const results: R[] = [];
  const failures: unknown[] = [];
  let next = 0;
  let aborted = false;

  const worker = async () => {
    while (next < items.length && failures.length === 0) {
      if (signal?.aborted) {
        aborted = true;
        return;
      }
      const index = next++;
      try {
        results.push(await task(items[index], index));
      } catch (error) {
        failures.push(error);
        return;
      }
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));

  if (failures.length > 0) throw failures[0];
  return { results, aborted };
}
