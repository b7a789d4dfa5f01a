/**
 * In-process mutex serializing access to one engine file or one registry
 */

export class Mutex {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  /**
   * Number of callers holding or waiting for the lock
   */
  get pending(): number {
    return this.#pending;
  }

  isLocked(): boolean {
    return this.#pending > 0;
  }

  /**
   * Execute a function with the lock held
   * Callers run in the order they asked for the lock; the lock is released
   * whether fn resolves or rejects.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const previous = this.#tail;
    this.#tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.#pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.#pending--;
      release();
    }
  }
}
