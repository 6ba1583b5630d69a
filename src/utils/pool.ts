/**
 * Fixed-size worker pool over an in-memory list of tasks
 */

/**
 * Runs `worker` over every item with at most `concurrency` calls in flight.
 * Items are handed out in order; the returned promise rejects with the first
 * error a worker throws, after which no further items are started.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (concurrency < 1) {
    throw new Error(`Concurrency must be at least 1 (got ${concurrency})`);
  }

  let next = 0;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const laneCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));
}

/**
 * Split a list into consecutive chunks of at most `size` elements
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
