/**
 * Concurrency Limiter — bounded pool with a FIFO wait queue.
 *
 * When the active count reaches the limit, further tasks wait in
 * submission order; a finishing task hands its slot straight to the
 * next waiter.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private waiters: Array<() => void> = [];
  private maxConcurrent: number;

  constructor(maxConcurrent: number) {
    this.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
  }

  get limit(): number {
    return this.maxConcurrent;
  }

  get activeCount(): number {
    return this.active;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Run a task once a slot is free.
   * The slot is released whether the task resolves or rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
  }
}
