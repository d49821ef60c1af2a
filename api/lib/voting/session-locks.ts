/**
 * Per-key mutual exclusion.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys never wait on each other. A rejected task releases the
 * key like a resolved one.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isHeld(key: string): boolean {
    return this.tails.has(key);
  }
}
