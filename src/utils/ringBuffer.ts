/**
 * Fixed-capacity circular buffer. Appends overwrite the oldest entry once full;
 * reads return a chronologically ordered copy (oldest first).
 */
export class RingBuffer<T> {
  private readonly items: T[] = [];
  private writeIndex = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  public get isFull(): boolean {
    return this.items.length === this.capacity;
  }

  public push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
    } else {
      this.items[this.writeIndex] = item;
    }
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
  }

  public toArray(): T[] {
    if (!this.isFull) {
      return this.items.slice();
    }
    return [...this.items.slice(this.writeIndex), ...this.items.slice(0, this.writeIndex)];
  }

  /**
   * Oldest-first copy left-padded with `fill` to the full capacity.
   */
  public toPaddedArray(fill: T): T[] {
    const values = this.toArray();
    const padding: T[] = new Array<T>(this.capacity - values.length).fill(fill);
    return [...padding, ...values];
  }

  public clear(): void {
    this.items.length = 0;
    this.writeIndex = 0;
  }
}

/**
 * Mean of the last `size` samples.
 */
export class RollingAverage {
  private readonly samples: RingBuffer<number>;
  private sum = 0;

  constructor(size: number) {
    this.samples = new RingBuffer<number>(Math.max(1, size));
  }

  public add(value: number): void {
    if (this.samples.isFull) {
      const [oldest] = this.samples.toArray();
      this.sum -= oldest;
    }
    this.samples.push(value);
    this.sum += value;
  }

  public getAverage(): number | null {
    return this.samples.size === 0 ? null : this.sum / this.samples.size;
  }
}
