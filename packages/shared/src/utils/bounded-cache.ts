/**
 * Small insertion-ordered cache: when full, the oldest key is discarded.
 * Re-setting an existing key moves it to the newest position.
 */
export class BoundedCache<K, V> {
  private entries = new Map<K, V>();

  constructor(public readonly maxSize: number) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
