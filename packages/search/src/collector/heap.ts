/**
 * Binary heap with a fixed capacity that keeps the `capacity` best items.
 * `compare(a, b) < 0` means `a` ranks ahead of `b`; the root is always the
 * worst item held, so eviction is O(log n).
 */
export class BoundedHeap<T> {
  private items: T[] = [];
  readonly capacity: number;

  constructor(
    capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Adds `item`. When full, `item` replaces the worst held item only if it
   * ranks strictly ahead of it. Returns the evicted item, `item` itself when
   * rejected, or `undefined` when nothing left the heap.
   */
  push(item: T): T | undefined {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.bubbleUp(this.items.length - 1);
      return undefined;
    }
    const worst = this.items[0];
    if (worst === undefined || this.compare(item, worst) >= 0) {
      return item;
    }
    this.items[0] = item;
    this.bubbleDown(0);
    return worst;
  }

  toSortedArray(): T[] {
    return [...this.items].sort(this.compare);
  }

  /** True when `a` should sit above `b`, i.e. `a` ranks behind `b`. */
  private above(a: T, b: T): boolean {
    return this.compare(a, b) > 0;
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = Math.floor((i - 1) / 2);
      if (!this.above(this.items[i], this.items[parent])) break;
      [this.items[parent], this.items[i]] = [this.items[i], this.items[parent]];
      i = parent;
    }
  }

  private bubbleDown(i: number): void {
    while (true) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let worst = i;

      if (left < this.items.length && this.above(this.items[left], this.items[worst])) {
        worst = left;
      }
      if (right < this.items.length && this.above(this.items[right], this.items[worst])) {
        worst = right;
      }

      if (worst === i) break;
      [this.items[i], this.items[worst]] = [this.items[worst], this.items[i]];
      i = worst;
    }
  }
}
