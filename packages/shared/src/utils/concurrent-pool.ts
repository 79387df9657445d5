import { Semaphore } from './semaphore';

/**
 * ConcurrentPool - run an async function over a list with at most N calls in
 * flight.
 *
 * Every item gets its own promise gated by a shared semaphore, so a slow item
 * never holds back the ones queued behind a fast one. Results keep input order.
 */
export class ConcurrentPool {
  /**
   * @param items - Items to process
   * @param concurrency - Maximum number of calls in flight
   * @param processFn - Async function applied to each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @returns Results in input order
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    if (items.length === 0) {
      return [];
    }

    const semaphore = new Semaphore(
      Math.max(1, Math.min(concurrency, items.length)),
    );

    return Promise.all(
      items.map((item, index) =>
        semaphore.use(async () => {
          const result = await processFn(item, index);
          onItemComplete?.(result, index);
          return result;
        }),
      ),
    );
  }
}
