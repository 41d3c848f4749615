/**
 * In-process lock serializing access to a single SQLite connection
 * Statements of one transaction never interleave with another caller's statements
 */

export class SerialLock {
  #tail: Promise<void> = Promise.resolve();

  /**
   * Execute a function with the lock held
   * Callers queue in arrival order; the lock is released even when fn throws
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.#tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.#tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
