/**
 * FIFO ring buffer with an optional capacity. Pushing onto a full buffer
 * overwrites the oldest entry; without a capacity it grows like an array.
 * Iteration and `toArray()` always run oldest → newest.
 */
export class RingBuffer<T> {
  private slots: T[] = [];
  private head = 0;
  readonly capacity: number | undefined;

  constructor(capacity?: number) {
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get length(): number {
    return this.slots.length;
  }

  /** Append an item. Returns the evicted item, if any. */
  push(item: T): T | undefined {
    if (this.capacity === undefined || this.slots.length < this.capacity) {
      // Only reached while the buffer has never wrapped, so head is 0
      this.slots.push(item);
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.slots.length;
    return evicted;
  }

  /** Item at logical position i (0 = oldest). */
  at(i: number): T | undefined {
    if (!Number.isInteger(i) || i < 0 || i >= this.slots.length) return undefined;
    return this.slots[(this.head + i) % this.slots.length];
  }

  last(): T | undefined {
    return this.at(this.slots.length - 1);
  }

  toArray(): T[] {
    return [...this.slots.slice(this.head), ...this.slots.slice(0, this.head)];
  }

  /**
   * Copy into a buffer of a new capacity, keeping the most recent items.
   */
  resize(capacity: number | undefined): { buffer: RingBuffer<T>; dropped: T[] } {
    const buffer = new RingBuffer<T>(capacity);
    const items = this.toArray();
    const start = capacity === undefined ? 0 : Math.max(0, items.length - capacity);
    for (let i = start; i < items.length; i++) buffer.push(items[i]);
    return { buffer, dropped: items.slice(0, start) };
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.toArray()[Symbol.iterator]();
  }
}
