/**
 * Velocity Tracker
 *
 * Counts transactions per client inside a trailing time window measured on
 * transaction event time.
 */

import { TimeWindow } from "./rolling-statistics";

export interface VelocityTrackerConfig {
  /** Trailing window length in seconds (default: 60) */
  windowSeconds?: number;
}

export class VelocityTracker {
  private readonly windows: Map<string, TimeWindow> = new Map();
  private readonly windowMs: number;

  constructor(config: VelocityTrackerConfig = {}) {
    this.windowMs = (config.windowSeconds ?? 60) * 1000;
  }

  /**
   * Record a transaction and return the client's count within the window
   * ending at `timestamp`, including this one
   */
  record(clientId: string, timestamp: Date | number): number {
    const time = typeof timestamp === "number" ? timestamp : timestamp.getTime();
    let window = this.windows.get(clientId);
    if (!window) {
      window = new TimeWindow(this.windowMs);
      this.windows.set(clientId, window);
    }
    return window.record(time);
  }

  getTrackedClientCount(): number {
    return this.windows.size;
  }

  /**
   * Drop clients whose windows have emptied as of `now`. The engine calls
   * this once per cycle with the newest event time it has seen.
   */
  prune(now: Date | number): number {
    const time = typeof now === "number" ? now : now.getTime();
    let removed = 0;
    for (const [clientId, window] of this.windows) {
      if (window.isEmpty(time)) {
        this.windows.delete(clientId);
        removed++;
      }
    }
    return removed;
  }
}

export function createVelocityTracker(config?: VelocityTrackerConfig): VelocityTracker {
  return new VelocityTracker(config);
}
