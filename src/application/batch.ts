/**
 * Count- and age-bounded accumulation of items, owned by a single
 * consumer loop. Items keep arrival order.
 */
export class Batch<T> {
  private items: T[] = [];
  private oldestAt: number | null = null;

  constructor(
    readonly maxCount: number,
    readonly maxAgeMs: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(maxCount) || maxCount < 1) {
      throw new RangeError(`maxCount must be a positive integer, got ${maxCount}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Slots left before the count trigger fires. */
  get remaining(): number {
    return this.maxCount - this.items.length;
  }

  add(item: T): void {
    if (this.items.length >= this.maxCount) {
      throw new RangeError(`Batch is full (${this.maxCount} items)`);
    }
    if (this.oldestAt === null) this.oldestAt = this.now();
    this.items.push(item);
  }

  isFull(): boolean {
    return this.items.length >= this.maxCount;
  }

  /** True once the oldest item has waited `maxAgeMs` or longer. */
  isDue(): boolean {
    return this.oldestAt !== null && this.now() - this.oldestAt >= this.maxAgeMs;
  }

  /** Milliseconds until the age trigger fires; null while empty. */
  msUntilDue(): number | null {
    if (this.oldestAt === null) return null;
    return Math.max(0, this.oldestAt + this.maxAgeMs - this.now());
  }

  /** Hands the accumulated items to the caller and starts a fresh window. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    this.oldestAt = null;
    return drained;
  }
}
