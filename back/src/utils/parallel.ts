export { parallelMap }

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight. Each result lands in the
 * slot of its input, so the output keeps input order whatever the completion order.
 * `fn` is expected to settle its own failures; a rejection aborts the whole map.
 */
const parallelMap = async <T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> => {
  const results = new Array<R>(items.length)
  const queue = items.map((item, index) => ({ item, index }))

  const worker = async (): Promise<void> => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await fn(next.item, next.index)
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}
