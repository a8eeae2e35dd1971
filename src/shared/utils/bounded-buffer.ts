import { ValidationException } from '../../utils/exceptions';

/**
 * Fixed-capacity ring buffer.
 *
 * Pushing onto a full buffer silently evicts the oldest entry (FIFO).
 * `pop()` removes from the newest end, which is what undo history needs.
 */
export class BoundedBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private length = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationException(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Append an item. Returns the evicted oldest item when the buffer was full.
   */
  push(item: T): T | undefined {
    if (this.length < this.capacity) {
      this.slots[(this.start + this.length) % this.capacity] = item;
      this.length++;
      return undefined;
    }

    const evicted = this.slots[this.start];
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /**
   * Remove and return the newest item.
   */
  pop(): T | undefined {
    if (this.length === 0) return undefined;
    const index = (this.start + this.length - 1) % this.capacity;
    const item = this.slots[index];
    this.slots[index] = undefined;
    this.length--;
    return item;
  }

  peekLast(): T | undefined {
    if (this.length === 0) return undefined;
    return this.slots[(this.start + this.length - 1) % this.capacity];
  }

  /**
   * Chronological copy, oldest first.
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.length = 0;
  }
}
