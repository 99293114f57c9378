/**
 * Serializes async work per key. Callers for the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedLock<K = string> {
  private tails: Map<K, Promise<void>> = new Map();

  async run<T>(key: K, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
