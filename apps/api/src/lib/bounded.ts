export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' }

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Results keep the input order. A rejected call never stops the others. Once
 * `signal` is aborted, items that have not started are marked `skipped`;
 * calls already in flight are left to finish.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length)
  let cursor = 0

  async function drain() {
    while (cursor < items.length) {
      const index = cursor
      cursor += 1
      if (signal?.aborted) {
        results[index] = { status: 'skipped' }
        continue
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) }
      } catch (reason) {
        results[index] = { status: 'rejected', reason }
      }
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
  await Promise.all(Array.from({ length: workers }, () => drain()))
  return results
}
