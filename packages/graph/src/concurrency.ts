/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`, whatever order the calls finish in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array<R>(items.length);

  // Simple semaphore
  let running = 0;
  const queue: Array<() => void> = [];

  function release(): void {
    running--;
    const next = queue.shift();
    if (next) {
      next();
    }
  }

  function acquire(): Promise<void> {
    if (running < limit) {
      running++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      queue.push(() => {
        running++;
        resolve();
      });
    });
  }

  const tasks = items.map(async (item, index) => {
    await acquire();
    try {
      results[index] = await fn(item, index);
    } finally {
      release();
    }
  });

  await Promise.all(tasks);
  return results;
}
