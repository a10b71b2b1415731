// Runs `fn` over `items` with at most `limit` calls in flight. Results keep the input
// positions, whatever order the calls finish in. `fn` is expected to handle its own
// failures: one rejection rejects the whole run.
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));

  const worker = async (): Promise<void> => {
    for (let task = queue.shift(); task; task = queue.shift()) {
      results[task.index] = await fn(task.item, task.index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
