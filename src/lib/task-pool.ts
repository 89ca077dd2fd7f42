/**
 * Bounded task pool
 *
 * Starts at most `concurrency` tasks at once; the rest wait in FIFO order.
 * A concurrency of 0 runs every task immediately.
 */
export class TaskPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 0) {
      throw new RangeError(`TaskPool concurrency must be a non-negative integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /** Number of tasks currently running */
  get running(): number {
    return this.active;
  }

  /** Number of tasks waiting for a slot */
  get pending(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.concurrency === 0 || this.active < this.concurrency) {
      this.active += 1;
      return;
    }

    await new Promise<void>(resolve => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the slot straight to the next task; `active` stays the same
      next();
      return;
    }
    this.active -= 1;
  }
}
