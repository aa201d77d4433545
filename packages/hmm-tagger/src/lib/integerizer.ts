/**
 * Bidirectional mapping between symbols and dense indices 0..size-1.
 * Indices are assigned in insertion order and never change.
 */
export class Integerizer<T> implements Iterable<T> {
  private readonly items: T[] = [];
  private readonly index = new Map<T, number>();

  constructor(items: Iterable<T> = []) {
    for (const item of items) this.add(item);
  }

  get size(): number {
    return this.items.length;
  }

  /** Index of the symbol, or undefined when it was never added. */
  indexOf(item: T): number | undefined {
    return this.index.get(item);
  }

  get(i: number): T | undefined {
    return this.items[i];
  }

  /** Adds the symbol if missing and returns its index. */
  add(item: T): number {
    const existing = this.index.get(item);
    if (existing !== undefined) return existing;
    this.items.push(item);
    this.index.set(item, this.items.length - 1);
    return this.items.length - 1;
  }

  /** Same symbols at the same indices. */
  equals(other: Integerizer<T>): boolean {
    if (this === other) return true;
    if (this.size !== other.size) return false;
    return this.items.every((item, i) => other.get(i) === item);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
