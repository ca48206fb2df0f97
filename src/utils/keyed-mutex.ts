/**
 * @fileoverview Per-key mutual exclusion.
 *
 * Work submitted under the same key runs strictly one at a time, in
 * submission order; different keys run concurrently. Keys are forgotten as
 * soon as their queue drains, so the map only holds busy dialogs.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier task for `key` has settled.
   * A failing task does not block the ones queued behind it.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with running or queued tasks. */
  get size(): number {
    return this.tails.size;
  }
}
