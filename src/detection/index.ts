/**
 * Detection Module
 *
 * Exposure aggregation, rolling statistics, velocity and anomaly tracking,
 * rule evaluation and alert deduplication.
 */

export { TimeWindow, CountWindow } from "./rolling-statistics";
export type { WindowStatistics } from "./rolling-statistics";

export { classifyRiskLevel, isAlertingTransition, isHighRisk } from "./risk-level";

export { ExposureAggregator, createExposureAggregator } from "./exposure-aggregator";
export type {
  ExposureAggregatorConfig,
  ReplayLedger,
  ClientExposureState,
  SymbolExposureState,
  LevelChange,
  ExposureUpdate,
  AggregatorState,
  DirtyExposures,
  ExposureTotals,
} from "./exposure-aggregator";

export { VelocityTracker, createVelocityTracker } from "./velocity-tracker";
export type { VelocityTrackerConfig } from "./velocity-tracker";

export { AnomalyDetector, createAnomalyDetector } from "./anomaly-detector";
export type { AnomalyDetectorConfig, AnomalyScore } from "./anomaly-detector";

export { AlertDeduplicator, createAlertDeduplicator } from "./alert-deduplicator";
export type { AlertDeduplicatorConfig, DedupDecision, DeduplicatorStats } from "./alert-deduplicator";

export {
  RuleEvaluator,
  createRuleEvaluator,
  RULE_ORDER,
  RULE_EVALUATOR_ENTITY_ID,
  ruleFailureEntityId,
  exposureSeverity,
  velocitySeverity,
  anomalySeverity,
  alertIdFor,
} from "./rule-evaluator";
export type { RuleFamily, EvaluationContext, RuleEvaluatorDeps, TransactionOutcome } from "./rule-evaluator";
