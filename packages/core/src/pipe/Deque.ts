/**
 * Fixed-capacity ring buffer.
 *
 * `push` on a full buffer evicts and returns the oldest entry instead of
 * growing.
 */
export class Deque<T> {
  private readonly a: (T | undefined)[];
  private h = 0;
  private n = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Deque capacity must be a positive integer, got ${capacity}`);
    }
    this.a = new Array<T | undefined>(capacity);
  }

  /** Appends `v`; returns the evicted oldest entry when the buffer was full. */
  push(v: T): T | undefined {
    if (this.n < this.capacity) {
      this.a[(this.h + this.n) % this.capacity] = v;
      this.n++;
      return undefined;
    }
    const evicted = this.a[this.h];
    this.a[this.h] = v;
    this.h = (this.h + 1) % this.capacity;
    return evicted;
  }

  shift(): T | undefined {
    if (this.n === 0) return undefined;
    const v = this.a[this.h];
    this.a[this.h] = undefined;
    this.h = (this.h + 1) % this.capacity;
    this.n--;
    return v;
  }

  get length() { return this.n; }
  get isFull() { return this.n === this.capacity; }

  kill() {
    this.a.fill(undefined);
    this.h = 0;
    this.n = 0;
  }
}
