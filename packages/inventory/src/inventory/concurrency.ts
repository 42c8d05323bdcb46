import { availableParallelism } from "node:os";

/**
 * Default pool size: the host's available parallelism
 */
export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Run async tasks with a concurrency limit.
 * Items are started in input order; `fn` decides what to do with failures.
 */
export async function parallelLimit<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = defaultConcurrency()
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array(Math.max(1, Math.min(concurrency, items.length)))
    .fill(null)
    .map(() => worker());

  await Promise.all(workers);
  return results;
}
