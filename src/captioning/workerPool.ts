/**
 * Runs `worker` over `items` with at most `concurrency` calls pending at once.
 * Results keep the order of `items`. Workers stop taking new items once
 * `shouldStop` returns true; items never started resolve to `skipped(item)`.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: { shouldStop?: () => boolean; skipped: (item: T) => R }
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (options.shouldStop?.()) {
        results[index] = options.skipped(item);
        continue;
      }
      results[index] = await worker(item, index);
    }
  };

  const laneCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: laneCount }, () => lane()));
  return results;
}
