/**
 * Single-writer exclusion for a goal graph. Callers queue in arrival order;
 * a failing task releases the lock like a successful one.
 */
export class GraphMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;

    await previous;
    try {
      return await task();
    } finally {
      this.waiting--;
      release();
    }
  }

  isLocked(): boolean {
    return this.waiting > 0;
  }
}
