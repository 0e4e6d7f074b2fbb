/**
 * Maps `items` through `task` with at most `concurrency` calls in flight and
 * returns results in input order. The first rejection rejects the whole call
 * and stops workers from picking up further items.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const workers = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const results: R[] = new Array(items.length);
  let cursor = 0;
  let failed = false;

  const runWorker = async () => {
    while (!failed) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) {
        return;
      }
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));
  return results;
}

export type Limiter = <R>(task: () => Promise<R>) => Promise<R>;

/**
 * Returns a function that runs tasks with at most `concurrency` of them in
 * flight across every caller; the rest wait in arrival order.
 */
export function createLimiter(concurrency: number): Limiter {
  const limit = Math.max(1, Math.floor(concurrency));
  const waiting: Array<() => void> = [];
  let active = 0;

  const release = () => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  return async <R>(task: () => Promise<R>): Promise<R> => {
    if (active >= limit) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}
