/**
 * Fixed-capacity ordered collection. Appending past capacity evicts the oldest
 * entry. Iteration is oldest → newest.
 */
export class RingBuffer<T> implements Iterable<T> {
  private items: T[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(...values: T[]): void {
    this.items.push(...values);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  /** Last `count` entries, oldest first. */
  latest(count: number = this.capacity): T[] {
    if (count <= 0) return [];
    return this.items.slice(-count);
  }

  last(): T | undefined {
    return this.items[this.items.length - 1];
  }

  findLast(predicate: (value: T) => boolean): T | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (predicate(this.items[i])) return this.items[i];
    }
    return undefined;
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
