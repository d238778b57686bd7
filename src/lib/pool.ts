/**
 * Tracker Relay — Worker Pool
 *
 * Fixed-width pool: `width` workers pull tasks from a shared cursor until the
 * queue is empty. Results are collected in completion order. The worker must
 * not throw; failures are expected to come back as values.
 */

export interface PoolOptions<R> {
  /** Called once per task as it completes */
  onResult?: (result: R, index: number) => void;
}

export async function runPool<T, R>(
  items: readonly T[],
  width: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions<R> = {}
): Promise<R[]> {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Pool width must be a positive integer, got ${width}`);
  }

  const results: R[] = [];
  let cursor = 0;

  const drain = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const result = await worker(items[index], index);
      results.push(result);
      options.onResult?.(result, index);
    }
  };

  const workers = Array.from({ length: Math.min(width, items.length) }, () => drain());
  await Promise.all(workers);

  return results;
}
