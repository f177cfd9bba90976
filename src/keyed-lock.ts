type LockEntry = {
  tail: Promise<void>;
  holders: number;
};

/**
 * Per-key mutual exclusion. Tasks sharing a key run one at a time in the
 * order `run` was called; tasks on different keys never wait on each other.
 */
export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const entry = this.entries.get(key) ?? { tail: Promise.resolve(), holders: 0 };
    const prior = entry.tail;

    let release = (): void => {};
    const done = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    entry.tail = prior.then(() => done);
    entry.holders += 1;
    this.entries.set(key, entry);

    try {
      await prior;
      return await task();
    } finally {
      release();
      entry.holders -= 1;
      if (entry.holders === 0 && this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    }
  }

  /** Keys with a running or queued task. */
  get size(): number {
    return this.entries.size;
  }
}
