/**
 * Run `task` over `items` with at most `concurrency` in flight.
 * Resolves once every task has settled; results keep input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
