/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep input order. A worker rejection rejects the whole pool;
 * callers that want per-item isolation catch inside the worker.
 * An aborted signal stops new items from being picked up.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  const queue = items.entries();

  const lane = async (): Promise<void> => {
    signal?.throwIfAborted();
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
      signal?.throwIfAborted();
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < width; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return results;
}
