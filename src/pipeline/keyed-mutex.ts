class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }
}

/**
 * One FIFO lock per key. Work on the same key runs one at a time in
 * arrival order; work on different keys runs concurrently.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await task();
    } finally {
      release();
      if (mutex.idle) {
        this.locks.delete(key);
      }
    }
  }

  /** Keys currently held or waited on. */
  get size(): number {
    return this.locks.size;
  }
}
