/**
 * Bounded Concurrency
 */

/**
 * Run `worker` over `items` with at most `limit` calls in flight
 *
 * Results keep the order of `items` regardless of completion order.
 * A rejection from `worker` rejects the whole run.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  // Lanes share one iterator, so each item is claimed exactly once
  const pending = items.entries();

  const lane = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await worker(item, index);
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);

  return results;
}
