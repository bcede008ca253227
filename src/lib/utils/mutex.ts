/**
 * Promise-chain mutual exclusion lock
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every previously queued holder has released the lock.
   * The lock is released when `fn` settles, whether it resolves or throws.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
