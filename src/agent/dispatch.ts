// pattern: Imperative Shell

/**
 * Run `worker` over `items` with at most `limit` in flight. Resolves once every
 * item has settled, with results in item order regardless of completion order.
 */
export async function dispatchBatch<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<Array<R>> {
  const results: Array<R> = [];
  const queue = items.map((item, index) => ({ item, index }));

  async function lane(): Promise<void> {
    for (let job = queue.shift(); job; job = queue.shift()) {
      results[job.index] = await worker(job.item, job.index);
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane());
  const settled = await Promise.allSettled(lanes);

  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
  return results;
}
