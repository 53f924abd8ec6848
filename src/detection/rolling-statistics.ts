/**
 * Rolling Statistics Store
 *
 * Two bounded windows over recent observations:
 *
 * - `TimeWindow` keeps timestamps inside a trailing interval and answers
 *   count-in-interval queries. Stale entries are evicted lazily on access.
 * - `CountWindow` is a ring buffer of the last N values with a running
 *   Welford mean and variance, updated incrementally on add and on eviction.
 */

// ============================================================================
// Time-bounded window
// ============================================================================

/**
 * Timestamps are expected in non-decreasing order, which the feed
 * guarantees per key.
 */
export class TimeWindow {
  private timestamps: number[] = [];
  private head = 0;

  constructor(private readonly durationMs: number) {
    if (!(durationMs > 0)) {
      throw new RangeError(`Window duration must be positive, got ${durationMs}`);
    }
  }

  /**
   * Append a timestamp and return the count inside the window ending at it
   */
  record(timestamp: number): number {
    this.timestamps.push(timestamp);
    return this.countInWindow(timestamp);
  }

  /**
   * Entries with `timestamp > now - duration`
   */
  countInWindow(now: number): number {
    this.evict(now);
    return this.timestamps.length - this.head;
  }

  isEmpty(now: number): boolean {
    return this.countInWindow(now) === 0;
  }

  private evict(now: number): void {
    const cutoff = now - this.durationMs;
    while (this.head < this.timestamps.length) {
      const oldest = this.timestamps[this.head];
      if (oldest === undefined || oldest > cutoff) break;
      this.head++;
    }

    // Compact once the evicted prefix dominates the array
    if (this.head > 32 && this.head * 2 > this.timestamps.length) {
      this.timestamps = this.timestamps.slice(this.head);
      this.head = 0;
    }
  }
}

// ============================================================================
// Count-bounded window
// ============================================================================

export interface WindowStatistics {
  count: number;
  mean: number;
  /** Population variance */
  variance: number;
  stdDev: number;
}

/**
 * Ring buffer of the most recent `capacity` values with incremental mean and
 * population variance
 */
export class CountWindow {
  private readonly buffer: number[];
  private head = 0;
  private size = 0;
  private runningMean = 0;
  private m2 = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  /**
   * Add a value, evicting the oldest one when full
   */
  add(value: number): void {
    if (this.size === this.capacity) {
      const evicted = this.buffer[this.head] ?? 0;
      this.remove(evicted);
    }

    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;

    this.size++;
    const delta = value - this.runningMean;
    this.runningMean += delta / this.size;
    this.m2 += delta * (value - this.runningMean);
  }

  statistics(): WindowStatistics {
    if (this.size === 0) {
      return { count: 0, mean: 0, variance: 0, stdDev: 0 };
    }
    const variance = this.m2 / this.size;
    return {
      count: this.size,
      mean: this.runningMean,
      variance,
      stdDev: Math.sqrt(variance),
    };
  }

  private remove(value: number): void {
    if (this.size <= 1) {
      this.size = 0;
      this.runningMean = 0;
      this.m2 = 0;
      return;
    }

    const previousMean = (this.size * this.runningMean - value) / (this.size - 1);
    this.m2 -= (value - previousMean) * (value - this.runningMean);
    this.runningMean = previousMean;
    this.size--;

    // Rounding can push M2 slightly below zero
    if (this.m2 < 0) {
      this.m2 = 0;
    }
  }
}
