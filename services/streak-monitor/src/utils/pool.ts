/**
 * Runs `worker` over `items` with at most `limit` calls in flight. `onResult` fires in
 * completion order. Resolves after every item has settled; a rejecting worker rejects
 * the whole run, so workers that must not abort the run return a Result instead.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  onResult?: (result: R, item: T, index: number) => void,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function lane() {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      const result = await worker(item, index);
      results[index] = result;
      onResult?.(result, item, index);
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane());
  await Promise.all(lanes);
  return results;
}
