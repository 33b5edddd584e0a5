/**
 * Maps values through an async mapper with at most `concurrency` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  values: readonly T[],
  concurrency: number,
  mapper: (value: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.min(concurrency, values.length || 1));
  const results = new Array<R>(values.length);
  let nextIndex = 0;

  const workers = Array.from({ length: size }, async () => {
    while (nextIndex < values.length) {
      const current = nextIndex;
      nextIndex += 1;
      results[current] = await mapper(values[current], current);
    }
  });

  await Promise.all(workers);
  return results;
}

export function chunk<T>(values: readonly T[], size: number): T[][] {
  const step = Math.max(1, size);
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += step) {
    chunks.push(values.slice(i, i + step));
  }
  return chunks;
}
