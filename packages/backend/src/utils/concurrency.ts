/**
 * Maps `items` through `worker` with at most `limit` calls in flight, keeping input order.
 * After the first failure no further items are started; the call waits for work already in
 * flight and then rethrows that failure.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  const failures: unknown[] = [];
  const pending = items.entries();

  const lane = async (): Promise<void> => {
    for (const [index, item] of pending) {
      if (failures.length > 0) {
        return;
      }
      try {
        results[index] = await worker(item, index);
      } catch (error) {
        failures.push(error);
        return;
      }
    }
  };

  const laneCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.allSettled(Array.from({ length: laneCount }, () => lane()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
