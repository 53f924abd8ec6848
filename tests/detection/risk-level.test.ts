import { describe, it, expect } from "vitest";
import { classifyRiskLevel, isAlertingTransition, isHighRisk } from "../../src/detection/risk-level";
import { RiskLevel } from "../../src/types/risk";

const bands = { medium: 0.5, high: 0.8, critical: 1.0 };

describe("classifyRiskLevel", () => {
  it.each([
    [0, RiskLevel.LOW],
    [499_999, RiskLevel.LOW],
    [500_000, RiskLevel.MEDIUM],
    [799_999, RiskLevel.MEDIUM],
    [800_000, RiskLevel.HIGH],
    [999_999, RiskLevel.HIGH],
    [1_000_000, RiskLevel.CRITICAL],
    [1_200_000, RiskLevel.CRITICAL],
  ])("exposure %d against 1,000,000 is %s", (exposure, level) => {
    expect(classifyRiskLevel(exposure, 1_000_000, bands)).toBe(level);
  });

  it("should honour custom bands", () => {
    expect(classifyRiskLevel(300, 1_000, { medium: 0.2, high: 0.3, critical: 0.9 })).toBe(RiskLevel.HIGH);
  });
});

describe("isAlertingTransition", () => {
  it("should fire on upward moves into HIGH or CRITICAL", () => {
    expect(isAlertingTransition(RiskLevel.LOW, RiskLevel.HIGH)).toBe(true);
    expect(isAlertingTransition(RiskLevel.MEDIUM, RiskLevel.CRITICAL)).toBe(true);
    expect(isAlertingTransition(RiskLevel.HIGH, RiskLevel.CRITICAL)).toBe(true);
  });

  it("should not fire when staying, falling or landing below HIGH", () => {
    expect(isAlertingTransition(RiskLevel.HIGH, RiskLevel.HIGH)).toBe(false);
    expect(isAlertingTransition(RiskLevel.CRITICAL, RiskLevel.HIGH)).toBe(false);
    expect(isAlertingTransition(RiskLevel.LOW, RiskLevel.MEDIUM)).toBe(false);
  });
});

describe("isHighRisk", () => {
  it("should accept HIGH and CRITICAL only", () => {
    expect(isHighRisk(RiskLevel.HIGH)).toBe(true);
    expect(isHighRisk(RiskLevel.CRITICAL)).toBe(true);
    expect(isHighRisk(RiskLevel.MEDIUM)).toBe(false);
  });
});
