export interface PoolRunResult<R> {
  /** Indexed like the input; undefined where the item was never dispatched. */
  results: Array<R | undefined>;
  dispatched: number;
  cancelled: boolean;
}

/**
 * Fixed number of workers pulling items off a shared cursor. Each item is
 * processed start to finish by one worker. Once `signal` aborts, no new item
 * is dispatched; items already running are left to finish.
 *
 * `work` should not reject: per-item failures are values, not exceptions.
 * If it does, dispatch stops and the rejection propagates once running items settle.
 */
export class WorkerPool {
  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  async run<T, R>(
    items: readonly T[],
    work: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
  ): Promise<PoolRunResult<R>> {
    const results = new Array<R | undefined>(items.length).fill(undefined);
    let cursor = 0;
    let dispatched = 0;
    let failed = false;

    const worker = async () => {
      while (cursor < items.length && !signal?.aborted && !failed) {
        const index = cursor++;
        dispatched++;
        try {
          results[index] = await work(items[index], index);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const workerCount = Math.min(this.concurrency, items.length);
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
    }

    return {
      results,
      dispatched,
      cancelled: Boolean(signal?.aborted) && dispatched < items.length,
    };
  }
}
