/**
 * Runs `processor` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`; the first rejection rejects the whole run.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number = 4,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await processor(items[index], index);
    }
  };

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}
