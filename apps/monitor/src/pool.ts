// Bounded task pool.
//
// Runs `task` over `items` with at most `limit` tasks in flight and settles
// every one of them: a rejected task never stops its siblings.

export type Settled<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

export async function runBounded<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<Array<Settled<T, R>>> {
  if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`pool limit must be a positive integer, got ${limit}`);

  const results = new Array<Settled<T, R>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        results[index] = { item, ok: true, value: await task(item, index) };
      } catch (error) {
        results[index] = { item, ok: false, error };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
