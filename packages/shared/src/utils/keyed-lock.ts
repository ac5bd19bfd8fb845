/**
 * Per-key mutual exclusion built on promise chains.
 *
 * `runExclusive` takes its place in the key's queue synchronously, at call
 * time, so callers that enter in arrival order also run in arrival order.
 * Different keys never wait on each other.
 */
export class PerKeyLock<TKey> {
  private readonly chains = new Map<TKey, Promise<void>>();

  async runExclusive<T>(key: TKey, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const next = new Promise<void>((r) => {
      release = r;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }

  get activeCount(): number {
    return this.chains.size;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.chains.values()]);
  }
}
