/**
 * Blocking Pool
 *
 * Vector index calls are synchronous. Each one is queued here and run on its
 * own macrotask, with at most `concurrency` admitted at a time, so requests
 * waiting on the classifier or the filesystem keep moving between index calls.
 */

import pLimit from "p-limit";

export class BlockingPool {
  private limit: ReturnType<typeof pLimit>;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.limit = pLimit(concurrency);
  }

  run<T>(task: () => T): Promise<T> {
    return this.limit(() => new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(task());
        } catch (error) {
          reject(error);
        }
      });
    }));
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
