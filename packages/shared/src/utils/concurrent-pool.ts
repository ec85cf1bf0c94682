/**
 * Options for ConcurrentPool.run
 */
export interface ConcurrentPoolOptions<R> {
  /**
   * Fired after each item completes
   */
  onItemComplete?: (result: R, index: number) => void;

  /**
   * Stops workers from taking new items once aborted; the run then rejects
   * with the signal's reason
   */
  abortSignal?: AbortSignal;
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers active; when a worker finishes it immediately picks
 * up the next item. With a concurrency of 1 items run strictly in order.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param processFn - Async function to process each item
   * @param options - Completion callback and abort signal
   * @returns Results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<R> = {},
  ): Promise<R[]> {
    const { onItemComplete, abortSignal } = options;
    abortSignal?.throwIfAborted();

    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !abortSignal?.aborted) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
        onItemComplete?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );
    await Promise.all(workers);

    abortSignal?.throwIfAborted();
    return results;
  }
}
