/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pull from one shared iterator; settlements are stored by input index,
 * so callers get one result per item regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: PromiseSettledResult<R>, index: number, item: T) => void,
): Promise<Array<PromiseSettledResult<R>>> {
  if (items.length === 0) return [];
  const maxConcurrency = Math.max(
    1,
    Math.min(items.length, Math.floor(concurrency) || 1),
  );
  const results = new Array<PromiseSettledResult<R>>(items.length);
  const cursor = items.entries();

  async function runOneWorker(): Promise<void> {
    for (const [index, item] of cursor) {
      let settled: PromiseSettledResult<R>;
      try {
        settled = { status: "fulfilled", value: await worker(item, index) };
      } catch (error: unknown) {
        settled = { status: "rejected", reason: error };
      }
      results[index] = settled;
      onSettled?.(settled, index, item);
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}
