/**
 * Runs task factories with at most `limit` in flight, keeping results in task order.
 * Each slot settles independently; a rejected task never stops the others.
 *
 * @param tasks - Task factories, started lazily as workers free up.
 * @param limit - Maximum number of concurrently running tasks (values below 1 are treated as 1).
 * @returns One settled result per task, in the same order as `tasks`.
 */
export async function settleWithConcurrencyLimit<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<PromiseSettledResult<T>[]> {
  const results: PromiseSettledResult<T>[] = new Array(tasks.length);
  let nextIndex = 0;

  async function runNext(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];
      if (!task) continue;
      try {
        results[index] = { status: 'fulfilled', value: await task() };
      } catch (reason: unknown) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const workerCount = Math.min(Math.max(1, Math.floor(limit)), tasks.length);
  const workers = Array.from({ length: workerCount }, () => runNext());
  await Promise.all(workers);
  return results;
}
