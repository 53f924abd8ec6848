import { describe, it, expect } from "vitest";
import { AnomalyDetector } from "../../src/detection/anomaly-detector";

function withBaseline(values: number[], config = {}): AnomalyDetector {
  const detector = new AnomalyDetector(config);
  for (const value of values) detector.observe("AAPL", value);
  return detector;
}

describe("AnomalyDetector", () => {
  it("should not score before the minimum sample count", () => {
    const detector = withBaseline([100, 100, 100, 100]);
    const result = detector.score("AAPL", 1_000_000);

    expect(result).toEqual({ kind: "insufficient-data", sampleCount: 4 });
    expect(detector.isAnomalous(result)).toBe(false);
  });

  it("should not score unknown symbols", () => {
    expect(new AnomalyDetector().score("MSFT", 10)).toEqual({ kind: "insufficient-data", sampleCount: 0 });
  });

  it("should treat a constant baseline as zero variance", () => {
    const detector = withBaseline([250, 250, 250, 250, 250]);
    const result = detector.score("AAPL", 10_000);

    expect(result).toEqual({ kind: "zero-variance", sampleCount: 5, mean: 250 });
    expect(detector.isAnomalous(result)).toBe(false);
  });

  it("should score a value far outside the baseline", () => {
    const detector = withBaseline([95, 105, 95, 105, 95, 105, 95, 105, 95, 105]);
    const result = detector.score("AAPL", 1000);

    expect(result.kind).toBe("scored");
    if (result.kind === "scored") {
      expect(result.sampleCount).toBe(10);
      expect(result.mean).toBeCloseTo(100, 9);
      expect(result.stdDev).toBeCloseTo(5, 9);
      expect(result.score).toBeCloseTo(180, 6);
    }
    expect(detector.isAnomalous(result)).toBe(true);
  });

  it("should flag large negative deviations too", () => {
    const detector = withBaseline([95, 105, 95, 105, 95, 105]);
    const result = detector.score("AAPL", 70);
    expect(result.kind === "scored" ? result.score : Number.NaN).toBeCloseTo(-6, 9);
    expect(detector.isAnomalous(result)).toBe(true);
  });

  it("should compare the absolute score against the threshold", () => {
    const detector = withBaseline([95, 105, 95, 105, 95, 105]);
    expect(detector.isAnomalous(detector.score("AAPL", 114))).toBe(false);
    expect(detector.isAnomalous(detector.score("AAPL", 116))).toBe(true);
  });

  it("should leave the baseline untouched when scoring", () => {
    const detector = withBaseline([1, 2, 3, 4, 5]);
    detector.score("AAPL", 100);
    expect(detector.getSampleCount("AAPL")).toBe(5);
  });

  it("should score against the prior baseline in scoreAndObserve", () => {
    const detector = withBaseline([95, 105, 95, 105]);
    const first = detector.scoreAndObserve("AAPL", 95);
    expect(first.kind).toBe("insufficient-data");
    expect(detector.getSampleCount("AAPL")).toBe(5);

    const second = detector.scoreAndObserve("AAPL", 105);
    expect(second.kind).toBe("scored");
  });

  it("should bound the baseline to the window size", () => {
    const detector = withBaseline([1, 2, 3, 4, 5, 6, 7, 8], { windowSize: 5, minSamples: 2 });
    expect(detector.getSampleCount("AAPL")).toBe(5);
    const result = detector.score("AAPL", 6);
    expect(result.kind === "scored" ? result.mean : Number.NaN).toBeCloseTo(6, 9);
  });

  it("should honour a custom threshold", () => {
    const detector = withBaseline([95, 105, 95, 105, 95, 105], { stdDevThreshold: 1.5 });
    expect(detector.getThreshold()).toBe(1.5);
    expect(detector.isAnomalous(detector.score("AAPL", 107))).toBe(false);
    expect(detector.isAnomalous(detector.score("AAPL", 108))).toBe(true);
  });
});
