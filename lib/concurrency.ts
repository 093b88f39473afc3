/**
 * Map over items with at most `limit` calls in flight.
 * Results keep input order regardless of completion order.
 * Rejects with the first error; `fn` should capture failures itself
 * (see `tryCatchWith`) when partial results matter.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++
      results[index] = await fn(items[index], index)
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    () => worker()
  )
  await Promise.all(workers)
  return results
}
