/**
 * Single-writer / multi-reader lock built on promise chaining.
 *
 * Readers that arrive while no writer is queued share access. A writer waits
 * for every earlier reader and writer, and readers arriving after it wait for
 * the writer to finish.
 */
export class ReadWriteLock {
  private writeTail: Promise<void> = Promise.resolve();
  private activeReads: Promise<void>[] = [];

  async read<T>(task: () => T | Promise<T>): Promise<T> {
    const gate = this.writeTail;
    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.activeReads.push(done);

    try {
      await gate;
      return await task();
    } finally {
      release();
      this.activeReads = this.activeReads.filter((entry) => entry !== done);
    }
  }

  async write<T>(task: () => T | Promise<T>): Promise<T> {
    const previousWrite = this.writeTail;
    const pendingReads = [...this.activeReads];
    let release: () => void = () => {};
    this.writeTail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previousWrite;
      await Promise.all(pendingReads);
      return await task();
    } finally {
      release();
    }
  }
}
