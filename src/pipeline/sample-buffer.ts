/**
 * Fixed-capacity sample regions reused across streams.
 * A stream borrows one region per buffer from the pool on create and returns it on release,
 * so sustained load does not allocate per frame.
 */

export class SampleBuffer {
  private readonly data: Int16Array;
  private used = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`SampleBuffer: capacity must be a positive integer (got ${capacity})`);
    }
    this.data = new Int16Array(capacity);
  }

  get length(): number {
    return this.used;
  }

  get free(): number {
    return this.capacity - this.used;
  }

  isFull(): boolean {
    return this.used === this.capacity;
  }

  /**
   * Copy up to `count` samples from `src` starting at `offset`.
   * Returns how many were copied (bounded by remaining capacity).
   */
  append(src: Int16Array, offset = 0, count = src.length - offset): number {
    const n = Math.max(0, Math.min(count, this.free, src.length - offset));
    if (n > 0) {
      this.data.set(src.subarray(offset, offset + n), this.used);
      this.used += n;
    }
    return n;
  }

  /** Copy of the first `count` samples; the rest shift to the front. */
  take(count: number): Int16Array {
    const n = Math.max(0, Math.min(count, this.used));
    const out = this.data.slice(0, n);
    this.data.copyWithin(0, n, this.used);
    this.used -= n;
    return out;
  }

  /** Copy of everything held, then cleared. */
  drain(): Int16Array {
    return this.take(this.used);
  }

  /** Read-only view of the held samples (invalidated by the next mutation). */
  view(): Int16Array {
    return this.data.subarray(0, this.used);
  }

  clear(): void {
    this.used = 0;
  }
}

/** Free lists keyed by capacity. */
export class SampleBufferPool {
  private readonly free = new Map<number, SampleBuffer[]>();

  acquire(capacity: number): SampleBuffer {
    const list = this.free.get(capacity);
    const reused = list?.pop();
    if (reused) return reused;
    return new SampleBuffer(capacity);
  }

  release(buffer: SampleBuffer): void {
    buffer.clear();
    const list = this.free.get(buffer.capacity);
    if (list) list.push(buffer);
    else this.free.set(buffer.capacity, [buffer]);
  }

  /** Number of idle regions of the given capacity. */
  idleCount(capacity: number): number {
    return this.free.get(capacity)?.length ?? 0;
  }
}
