/**
 * Fixed-capacity FIFO buffer backed by a ring array.
 * Appending to a full buffer overwrites the oldest entry.
 */

export interface ReadonlyRollingBuffer<T> {
  len(): number;
  getCapacity(): number;
  lastN(n: number): T[];
  latest(): T | null;
}

export class RollingBuffer<T> implements ReadonlyRollingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private readonly capacity: number;
  private head = 0; // index of the oldest entry
  private length = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RollingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity);
  }

  append(item: T): void {
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = item;
      this.length++;
      return;
    }

    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  /**
   * Most recent `n` entries in arrival order; fewer when the buffer holds less
   */
  lastN(n: number): T[] {
    const count = Math.max(0, Math.min(Math.floor(n), this.length));
    const result: T[] = [];
    const start = this.length - count;

    for (let offset = start; offset < this.length; offset++) {
      const item = this.slots[(this.head + offset) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }

    return result;
  }

  latest(): T | null {
    if (this.length === 0) {
      return null;
    }
    return this.slots[(this.head + this.length - 1) % this.capacity] ?? null;
  }

  len(): number {
    return this.length;
  }

  getCapacity(): number {
    return this.capacity;
  }
}
