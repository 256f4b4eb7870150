/**
 * Fixed-capacity ring buffer of ID-carrying items.
 *
 * When full, pushing overwrites the oldest item. Items are expected to be
 * pushed in increasing `id` order, which makes cursor reads (`since`) a
 * simple scan from the oldest slot.
 */

export class RingBuffer<T extends { id: number }> {
  private readonly items: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  /** Number of items currently held. */
  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const index = (this.head + this.count) % this.capacity;
    this.items[index] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** All items, oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  /** Items with `id > afterId`, oldest first. */
  since(afterId: number): T[] {
    return this.toArray().filter((item) => item.id > afterId);
  }
}
