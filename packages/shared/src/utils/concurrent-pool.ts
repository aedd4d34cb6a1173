/**
 * ConcurrentPool - Bounded worker pool with a join barrier and cancellation.
 *
 * Unlike batch processing where all items in a batch must complete before
 * the next batch starts, the pool keeps N workers active at all times.
 * When a worker finishes, it immediately picks up the next available item.
 *
 * The first rejected task cancels the run: no further items are started,
 * the shared AbortSignal handed to in-flight tasks is aborted, and once every
 * in-flight task has settled the first error is rethrown.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Spawns up to `concurrency` workers that pull items from a shared queue.
   * Results maintain the original item order regardless of completion order.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param processFn - Async function to process each item; receives the run's abort signal
   * @param onItemComplete - Optional callback fired after each item completes
   * @param parentSignal - Optional external signal that cancels the run
   * @returns Results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
    parentSignal?: AbortSignal,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    const controller = new AbortController();
    let failure: { error: unknown } | undefined;
    let nextIndex = 0;

    const onParentAbort = (): void => controller.abort(parentSignal?.reason);
    if (parentSignal?.aborted) {
      onParentAbort();
    } else {
      parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !controller.signal.aborted) {
        const index = nextIndex++;
        try {
          results[index] = await processFn(
            items[index],
            index,
            controller.signal,
          );
        } catch (error) {
          if (!failure) {
            failure = { error };
            controller.abort(error);
          }
          return;
        }
        onItemComplete?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );

    try {
      await Promise.all(workers);
    } finally {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }

    if (failure) {
      throw failure.error;
    }
    if (parentSignal?.aborted) {
      throw parentSignal.reason;
    }
    return results;
  }
}
