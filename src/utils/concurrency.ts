/**
 * Maps an async function over items with at most `concurrency` calls in
 * flight. Results keep input order. The first rejection rejects the whole
 * call; workers stop picking up new items once one has failed.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  let failed = false;

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), queue.length) },
    async () => {
      while (queue.length > 0 && !failed) {
        const entry = queue.shift();
        if (!entry) break;
        try {
          results[entry.index] = await fn(entry.item, entry.index);
        } catch (error: unknown) {
          failed = true;
          throw error;
        }
      }
    }
  );

  await Promise.all(workers);
  return results;
}
