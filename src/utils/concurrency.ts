/**
 * mapWithConcurrency — bounded parallel map that keeps input order
 *
 * At most `limit` tasks run at once. Results land at their input index no
 * matter which task finishes first. On the first failure no new task starts;
 * in-flight tasks are awaited and the first error is re-thrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const state: { failure?: { error: unknown } } = {};
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));

  const worker = async (): Promise<void> => {
    while (state.failure === undefined) {
      const job = queue.shift();
      if (!job) return;
      try {
        results[job.index] = await task(job.item, job.index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure !== undefined) {
    throw state.failure.error;
  }
  return results;
}
