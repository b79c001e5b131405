// Interview Voice Analyzer - Bounded concurrency
// Fan-out/fan-in over a fixed number of in-flight promises. Results keep
// their input order regardless of completion order.

export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  let index = 0;

  async function next(): Promise<void> {
    while (index < tasks.length) {
      const currentIndex = index++;
      results[currentIndex] = await tasks[currentIndex]();
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(limit), tasks.length));
  const workers = Array.from({ length: tasks.length === 0 ? 0 : workerCount }, () => next());
  await Promise.all(workers);
  return results;
}

/**
 * Same scheduling as runWithConcurrency, but one rejected task does not stop
 * the others: each slot reports its own outcome.
 */
export function runSettledWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
): Promise<Array<PromiseSettledResult<T>>> {
  return runWithConcurrency(
    tasks.map((task) => async (): Promise<PromiseSettledResult<T>> => {
      try {
        return { status: "fulfilled", value: await task() };
      } catch (reason) {
        return { status: "rejected", reason };
      }
    }),
    limit,
  );
}
