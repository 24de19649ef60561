/**
 * FIFO mutual exclusion for async sections. Ownership passes directly from the
 * releasing task to the oldest waiter, so no caller can slip in between.
 */
export class AsyncLock {
  private is_locked = false;
  private waiters: Array<() => void> = [];

  async runExclusive<result_t>(params: { task: () => Promise<result_t> }): Promise<result_t> {
    await this.acquire();
    try {
      return await params.task();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.is_locked;
  }

  getQueueLength(): number {
    return this.waiters.length;
  }

  private async acquire(): Promise<void> {
    if (!this.is_locked) {
      this.is_locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next_waiter = this.waiters.shift();
    if (next_waiter) {
      next_waiter();
      return;
    }

    this.is_locked = false;
  }
}
