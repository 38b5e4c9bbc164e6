/**
 * Fixed-capacity ring; pushing onto a full buffer overwrites the oldest item.
 */
export class CircularBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private size = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`CircularBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Appends `item` and returns the item it displaced, if the buffer was full.
   */
  push(item: T): T | undefined {
    const evicted = this.size === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) {
      this.size++;
    }
    return evicted;
  }

  /**
   * Items from oldest to newest.
   */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const item = this.buffer[(this.head - this.size + i + this.capacity) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  last(): T | undefined {
    if (this.size === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  getSize(): number {
    return this.size;
  }

  getCapacity(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.size = 0;
  }
}
