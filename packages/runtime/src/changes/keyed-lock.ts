// Per-key mutual exclusion
//
// Work for one key runs one at a time in the order it was submitted; work for
// different keys runs concurrently. Tails of the per-key queues are kept in a
// map and dropped once a key goes idle.

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Queue for `key`. The place in the queue is taken synchronously, at call
   * time; the returned promise resolves with the release function once every
   * earlier holder has released.
   */
  acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    return previous.then(() => () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
  }

  /**
   * Run `fn` while holding the lock for `key`
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Number of keys with work queued or running
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
