/** Default window for per-monitor score history */
export const HISTORY_CAPACITY = 100;

/**
 * HistoryBuffer — bounded sliding window backed by a ring.
 *
 * Once full, each push evicts the oldest entry (FIFO) and returns it.
 * `toArray()` lists entries oldest → newest.
 */
export class HistoryBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private size = 0;

  constructor(readonly capacity: number = HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('HistoryBuffer capacity must be a positive integer');
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  push(item: T): T | undefined {
    if (this.size < this.capacity) {
      this.slots[(this.start + this.size) % this.capacity] = item;
      this.size++;
      return undefined;
    }

    const evicted = this.slots[this.start];
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  latest(): T | undefined {
    if (this.size === 0) return undefined;
    return this.slots[(this.start + this.size - 1) % this.capacity];
  }

  get length(): number {
    return this.size;
  }

  get isFull(): boolean {
    return this.size === this.capacity;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.size = 0;
  }
}
