/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 * Results land at their item's index, so output order matches input order
 * whatever order the calls settle in. A rejection from `fn` rejects the whole
 * map; callers that need fault isolation catch inside `fn`.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let next = 0;

  async function worker() {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  }

  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}
