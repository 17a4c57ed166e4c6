/** Runs `worker` over `items` with at most `limit` in flight; results keep input order. */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++
      const item = items[i]
      if (item === undefined) continue
      results[i] = await worker(item, i)
    }
  }

  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
  await Promise.all(Array.from({ length: width }, lane))
  return results
}
