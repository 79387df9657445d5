/**
 * Semaphore - counting semaphore for bounding concurrent async work.
 *
 * Waiters are released in FIFO order. A permit is handed directly to the next
 * waiter on release, so `available` never over-counts while waiters exist.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Semaphore capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.permits = capacity;
  }

  /**
   * Number of permits currently free
   */
  get available(): number {
    return this.permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    if (this.permits >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.permits++;
  }

  /**
   * Run `fn` while holding a permit
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
