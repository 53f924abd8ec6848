/**
 * Risk level policy shared by client and symbol aggregates.
 */

import type { RiskBands } from "../../config/env";
import { RiskLevel, RISK_LEVEL_RANK } from "../types/risk";

/**
 * Classify an exposure against its threshold.
 *
 * With `r = exposure / threshold`: LOW below `bands.medium`, MEDIUM below
 * `bands.high`, HIGH below `bands.critical`, CRITICAL otherwise.
 */
export function classifyRiskLevel(exposure: number, threshold: number, bands: RiskBands): RiskLevel {
  const ratio = exposure / threshold;

  if (ratio >= bands.critical) return RiskLevel.CRITICAL;
  if (ratio >= bands.high) return RiskLevel.HIGH;
  if (ratio >= bands.medium) return RiskLevel.MEDIUM;
  return RiskLevel.LOW;
}

/**
 * True for an upward move that lands in HIGH or CRITICAL
 */
export function isAlertingTransition(previous: RiskLevel, next: RiskLevel): boolean {
  if (RISK_LEVEL_RANK[next] <= RISK_LEVEL_RANK[previous]) {
    return false;
  }
  return next === RiskLevel.HIGH || next === RiskLevel.CRITICAL;
}

export function isHighRisk(level: RiskLevel): boolean {
  return level === RiskLevel.HIGH || level === RiskLevel.CRITICAL;
}
