import { ensure, isPositiveInteger } from '../errors';

/**
 * Fixed-capacity circular store. Grows until full, then every push overwrites
 * the oldest slot. `push` returns the slot it wrote so callers can keep
 * side tables (priorities) aligned with the buffer.
 */
export class RingBuffer<T> {
  private readonly data: T[];
  private readonly cap: number;
  private cursor = 0;

  constructor(capacity: number) {
    ensure(isPositiveInteger(capacity), `RingBuffer capacity must be a positive integer, got ${capacity}`);
    this.cap = capacity;
    this.data = [];
  }

  /** Wrap existing items; the buffer starts full and the next push overwrites slot 0. */
  static from<T>(items: readonly T[]): RingBuffer<T> {
    ensure(items.length > 0, 'RingBuffer.from needs at least one item');
    const buf = new RingBuffer<T>(items.length);
    buf.data.push(...items);
    return buf;
  }

  get length(): number {
    return this.data.length;
  }

  get capacity(): number {
    return this.cap;
  }

  push(item: T): number {
    const ix = this.cursor;
    if (ix >= this.data.length) {
      this.data.push(item);
    } else {
      this.data[ix] = item;
    }
    this.cursor = (ix + 1) % this.cap;
    return ix;
  }

  at(index: number): T {
    ensure(
      Number.isInteger(index) && index >= 0 && index < this.data.length,
      `RingBuffer index ${index} out of range [0, ${this.data.length})`,
    );
    return this.data[index];
  }

  /** Occupied slots in slot order (not insertion order once wrapped). */
  view(): readonly T[] {
    return this.data.slice();
  }
}
