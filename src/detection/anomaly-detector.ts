/**
 * Anomaly Detector
 *
 * Scores each transaction value against the recent distribution of values
 * for its symbol. The baseline is a count-bounded window with running
 * Welford statistics, so scoring costs O(1) per transaction.
 */

import { CountWindow } from "./rolling-statistics";

// ============================================================================
// Types
// ============================================================================

export interface AnomalyDetectorConfig {
  /** Values kept per symbol (default: 100) */
  windowSize?: number;
  /** Prior observations required before scoring (default: 5) */
  minSamples?: number;
  /** Absolute standardized deviation that triggers (default: 3.0) */
  stdDevThreshold?: number;
}

export type AnomalyScore =
  | { kind: "insufficient-data"; sampleCount: number }
  | { kind: "zero-variance"; sampleCount: number; mean: number }
  | { kind: "scored"; sampleCount: number; mean: number; stdDev: number; score: number };

/** Relative spread below which a baseline is treated as constant */
const ZERO_VARIANCE_TOLERANCE = 1e-9;

// ============================================================================
// AnomalyDetector
// ============================================================================

export class AnomalyDetector {
  private readonly windows: Map<string, CountWindow> = new Map();
  private readonly windowSize: number;
  private readonly minSamples: number;
  private readonly stdDevThreshold: number;

  constructor(config: AnomalyDetectorConfig = {}) {
    this.windowSize = config.windowSize ?? 100;
    this.minSamples = config.minSamples ?? 5;
    this.stdDevThreshold = config.stdDevThreshold ?? 3.0;
  }

  getThreshold(): number {
    return this.stdDevThreshold;
  }

  /**
   * Standardized deviation of `value` from the symbol's current baseline.
   * Does not modify the baseline.
   */
  score(symbol: string, value: number): AnomalyScore {
    const window = this.windows.get(symbol);
    const stats = window?.statistics();
    const sampleCount = stats?.count ?? 0;

    if (!stats || sampleCount < this.minSamples) {
      return { kind: "insufficient-data", sampleCount };
    }

    if (stats.stdDev <= ZERO_VARIANCE_TOLERANCE * Math.max(1, Math.abs(stats.mean))) {
      return { kind: "zero-variance", sampleCount, mean: stats.mean };
    }

    return {
      kind: "scored",
      sampleCount,
      mean: stats.mean,
      stdDev: stats.stdDev,
      score: (value - stats.mean) / stats.stdDev,
    };
  }

  /**
   * Add a value to the symbol's baseline
   */
  observe(symbol: string, value: number): void {
    let window = this.windows.get(symbol);
    if (!window) {
      window = new CountWindow(this.windowSize);
      this.windows.set(symbol, window);
    }
    window.add(value);
  }

  /**
   * Score against the prior baseline, then observe the value
   */
  scoreAndObserve(symbol: string, value: number): AnomalyScore {
    const result = this.score(symbol, value);
    this.observe(symbol, value);
    return result;
  }

  isAnomalous(result: AnomalyScore): boolean {
    return result.kind === "scored" && Math.abs(result.score) > this.stdDevThreshold;
  }

  getSampleCount(symbol: string): number {
    return this.windows.get(symbol)?.statistics().count ?? 0;
  }

  getTrackedSymbolCount(): number {
    return this.windows.size;
  }
}

export function createAnomalyDetector(config?: AnomalyDetectorConfig): AnomalyDetector {
  return new AnomalyDetector(config);
}
