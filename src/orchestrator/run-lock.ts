/**
 * FIFO mutual exclusion for orchestration calls that mutate shared state.
 *
 * Each caller waits for the previous holder to settle, whether it resolved
 * or rejected, before running.
 */
export class RunLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * Whether a holder is running or waiting.
   */
  get isLocked(): boolean {
    return this.pending > 0;
  }
}
