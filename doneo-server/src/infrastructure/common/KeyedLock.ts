/**
 * In-process mutex per key. Work queued under the same key runs one at a
 * time in arrival order; different keys do not wait on each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const prev = this.tails.get(key) ?? Promise.resolve();
    const tail = prev.then(() => next);
    this.tails.set(key, tail);

    await prev;

    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
