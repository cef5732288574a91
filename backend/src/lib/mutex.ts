/**
 * Promise-chain mutex: callers run strictly one after another, and a
 * rejected run does not poison the chain for the next caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return await run;
  }
}

/**
 * One mutex per key. Entries are dropped once no caller holds or awaits them.
 */
export class KeyedMutex {
  private locks = new Map<string, { mutex: Mutex; users: number }>();

  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.locks.set(key, entry);
    }
    entry.users++;
    const held = entry;

    try {
      return await held.mutex.runExclusive(fn);
    } finally {
      held.users--;
      if (held.users === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  /** Whether any caller currently holds or awaits the key */
  public isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  public get size(): number {
    return this.locks.size;
  }
}
