/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight and
 * returns the results in input order.
 *
 * After the first rejection no further items are started; calls already in
 * flight are allowed to settle before the first error is rethrown, so callers
 * can clean up working files knowing nothing is still writing to them.
 */
export async function mapWithConcurrencyLimit<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length)
  const limit = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length || 1))
  let cursor = 0
  let failed = false
  let firstError: unknown = null
  const runners = Array.from({ length: limit }, async () => {
    while (!failed) {
      const index = cursor++
      if (index >= items.length) break
      try {
        results[index] = await worker(items[index], index)
      } catch (err) {
        if (!failed) firstError = err
        failed = true
        return
      }
    }
  })
  await Promise.all(runners)
  if (failed) throw firstError
  return results
}
