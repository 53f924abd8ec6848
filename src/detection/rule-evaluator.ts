/**
 * Rule Evaluator
 *
 * Fans a transaction out to the exposure aggregator, the velocity tracker and
 * the anomaly detector, evaluates the four rule families in a fixed order
 * (client exposure, symbol exposure, velocity, anomaly) and passes the
 * candidates through deduplication.
 *
 * A rule family that throws produces a RULE_EVALUATION_FAILURE alert for the
 * SYSTEM entity in place of its own result.
 */

import type { RiskThresholds } from "../../config/env";
import {
  AlertSeverity,
  AlertType,
  EntityType,
  RiskLevel,
  type Alert,
  type Transaction,
} from "../types/risk";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";
import { formatFixed, formatUsd } from "../utils/format";
import type { AlertDeduplicator } from "./alert-deduplicator";
import type { AnomalyDetector, AnomalyScore } from "./anomaly-detector";
import type { ExposureAggregator, ExposureUpdate } from "./exposure-aggregator";
import type { VelocityTracker } from "./velocity-tracker";

// ============================================================================
// Types
// ============================================================================

export type RuleFamily = "client-exposure" | "symbol-exposure" | "velocity" | "anomaly";

export const RULE_ORDER: readonly RuleFamily[] = ["client-exposure", "symbol-exposure", "velocity", "anomaly"];

/** Entity id prefix for alerts about the evaluator itself */
export const RULE_EVALUATOR_ENTITY_ID = "RULE_EVALUATOR";

/** Entity id for failures of one rule family */
export function ruleFailureEntityId(family: RuleFamily): string {
  return `${RULE_EVALUATOR_ENTITY_ID}:${family}`;
}

/**
 * Everything the rule families look at for one transaction
 */
export interface EvaluationContext {
  transaction: Transaction;
  exposure: ExposureUpdate;
  /** Lazily computed so a tracker failure is attributed to its rule */
  velocityCount: () => number;
  anomaly: () => AnomalyScore;
}

export interface RuleEvaluatorDeps {
  aggregator: ExposureAggregator;
  velocityTracker: VelocityTracker;
  anomalyDetector: AnomalyDetector;
  deduplicator: AlertDeduplicator;
  thresholds: Pick<
    RiskThresholds,
    "clientExposureThreshold" | "symbolExposureThreshold" | "velocityThreshold" | "velocityWindowSeconds"
  >;
  logger?: Logger;
}

export interface TransactionOutcome {
  transactionId: number;
  /** Already applied earlier; nothing was evaluated */
  duplicate: boolean;
  /** Alerts that passed deduplication, in rule order */
  alerts: Alert[];
  /** Candidates dropped by deduplication */
  suppressed: Alert[];
  /** Rule families that threw */
  failedRules: RuleFamily[];
}

// ============================================================================
// Severity policy
// ============================================================================

export function exposureSeverity(level: RiskLevel): AlertSeverity {
  switch (level) {
    case RiskLevel.CRITICAL:
      return AlertSeverity.CRITICAL;
    case RiskLevel.HIGH:
      return AlertSeverity.HIGH;
    case RiskLevel.MEDIUM:
      return AlertSeverity.MEDIUM;
    default:
      return AlertSeverity.LOW;
  }
}

export function velocitySeverity(count: number, threshold: number): AlertSeverity {
  return count <= 2 * threshold ? AlertSeverity.MEDIUM : AlertSeverity.HIGH;
}

export function anomalySeverity(score: number): AlertSeverity {
  return Math.abs(score) < 5 ? AlertSeverity.HIGH : AlertSeverity.CRITICAL;
}

/**
 * Alert ids are derived from the triggering transaction so that persisting
 * the same alert twice is a no-op
 */
export function alertIdFor(alertType: AlertType, entityId: string, transactionId: number): string {
  return `${alertType}:${entityId}:${transactionId}`;
}

// ============================================================================
// RuleEvaluator
// ============================================================================

export class RuleEvaluator {
  private readonly logger: Logger;

  constructor(private readonly deps: RuleEvaluatorDeps) {
    this.logger = deps.logger ?? createServiceLogger("RuleEvaluator");
  }

  /**
   * Apply a transaction to all trackers, evaluate the rules and deduplicate.
   * The caller holds the locks of the transaction's client and symbol.
   */
  processTransaction(tx: Transaction): TransactionOutcome {
    const exposure = this.deps.aggregator.apply(tx);

    if (exposure.duplicate) {
      this.logger.debug("Skipping already applied transaction", { transactionId: tx.id });
      return { transactionId: tx.id, duplicate: true, alerts: [], suppressed: [], failedRules: [] };
    }

    const context: EvaluationContext = {
      transaction: tx,
      exposure,
      velocityCount: () => this.deps.velocityTracker.record(tx.clientId, tx.timestamp),
      anomaly: () => this.deps.anomalyDetector.scoreAndObserve(tx.symbol, tx.totalValue),
    };

    const { candidates, failedRules } = this.evaluate(context);
    const alerts: Alert[] = [];
    const suppressed: Alert[] = [];

    for (const candidate of candidates) {
      const decision = this.deps.deduplicator.admit(candidate);
      if (decision.action === "emit") {
        if (decision.escalation) {
          this.logger.info("Escalating alert", {
            alertType: candidate.alertType,
            entityId: candidate.entityId,
            from: decision.previousSeverity,
            to: candidate.severity,
          });
        }
        alerts.push(candidate);
      } else {
        suppressed.push(candidate);
      }
    }

    return { transactionId: tx.id, duplicate: false, alerts, suppressed, failedRules };
  }

  /** Candidate alerts for one transaction, before deduplication */
  private evaluate(context: EvaluationContext): { candidates: Alert[]; failedRules: RuleFamily[] } {
    const candidates: Alert[] = [];
    const failedRules: RuleFamily[] = [];

    for (const family of RULE_ORDER) {
      try {
        const alert = this.runRule(family, context);
        if (alert) candidates.push(alert);
      } catch (error) {
        failedRules.push(family);
        this.logger.error("Rule evaluation failed", {
          rule: family,
          transactionId: context.transaction.id,
          ...errorContext(error),
        });
        candidates.push(this.ruleFailureAlert(family, context.transaction, error));
      }
    }

    return { candidates, failedRules };
  }

  private runRule(family: RuleFamily, context: EvaluationContext): Alert | null {
    switch (family) {
      case "client-exposure":
        return this.clientExposureRule(context);
      case "symbol-exposure":
        return this.symbolExposureRule(context);
      case "velocity":
        return this.velocityRule(context);
      case "anomaly":
        return this.anomalyRule(context);
    }
  }

  private clientExposureRule({ transaction: tx, exposure }: EvaluationContext): Alert | null {
    const change = exposure.client;
    if (!change.applied || !change.alerting) return null;

    const threshold = this.deps.thresholds.clientExposureThreshold;
    return this.buildAlert(tx, {
      alertType: AlertType.HIGH_CLIENT_EXPOSURE,
      severity: exposureSeverity(change.newLevel),
      entityType: EntityType.CLIENT,
      entityId: tx.clientId,
      message: `Client ${tx.clientId} exposure ${formatUsd(change.totalExposure)} reached ${change.newLevel} against threshold ${formatUsd(threshold)}`,
      thresholdValue: threshold,
      currentValue: change.totalExposure,
    });
  }

  private symbolExposureRule({ transaction: tx, exposure }: EvaluationContext): Alert | null {
    const change = exposure.symbol;
    if (!change.applied || !change.alerting) return null;

    const threshold = this.deps.thresholds.symbolExposureThreshold;
    return this.buildAlert(tx, {
      alertType: AlertType.HIGH_SYMBOL_EXPOSURE,
      severity: exposureSeverity(change.newLevel),
      entityType: EntityType.SYMBOL,
      entityId: tx.symbol,
      message: `Symbol ${tx.symbol} exposure ${formatUsd(change.totalExposure)} reached ${change.newLevel} against threshold ${formatUsd(threshold)}`,
      thresholdValue: threshold,
      currentValue: change.totalExposure,
    });
  }

  private velocityRule({ transaction: tx, exposure, velocityCount }: EvaluationContext): Alert | null {
    // A client that already saw this transaction must not count it again
    if (!exposure.client.applied) return null;

    const count = velocityCount();
    const { velocityThreshold, velocityWindowSeconds } = this.deps.thresholds;
    if (count <= velocityThreshold) return null;

    return this.buildAlert(tx, {
      alertType: AlertType.HIGH_TRANSACTION_VELOCITY,
      severity: velocitySeverity(count, velocityThreshold),
      entityType: EntityType.CLIENT,
      entityId: tx.clientId,
      message: `Client ${tx.clientId} has ${count} transactions in last ${velocityWindowSeconds}s (threshold: ${velocityThreshold})`,
      thresholdValue: velocityThreshold,
      currentValue: count,
    });
  }

  private anomalyRule({ transaction: tx, exposure, anomaly }: EvaluationContext): Alert | null {
    if (!exposure.symbol.applied) return null;

    const result = anomaly();
    if (result.kind !== "scored" || !this.deps.anomalyDetector.isAnomalous(result)) return null;

    const k = this.deps.anomalyDetector.getThreshold();
    const bound = result.score > 0 ? result.mean + k * result.stdDev : result.mean - k * result.stdDev;

    return this.buildAlert(tx, {
      alertType: AlertType.ANOMALY_DETECTED,
      severity: anomalySeverity(result.score),
      entityType: EntityType.SYMBOL,
      entityId: tx.symbol,
      message: `Anomalous transaction value ${formatUsd(tx.totalValue)} for ${tx.symbol} (z-score: ${formatFixed(result.score)}, mean: ${formatUsd(result.mean)}, std: ${formatUsd(result.stdDev)})`,
      thresholdValue: bound,
      currentValue: tx.totalValue,
    });
  }

  private ruleFailureAlert(family: RuleFamily, tx: Transaction, error: unknown): Alert {
    const reason = error instanceof Error ? error.message : String(error);
    return this.buildAlert(tx, {
      alertType: AlertType.RULE_EVALUATION_FAILURE,
      severity: AlertSeverity.CRITICAL,
      entityType: EntityType.SYSTEM,
      entityId: ruleFailureEntityId(family),
      message: `Rule ${family} failed for transaction ${tx.id}: ${reason}`,
      thresholdValue: null,
      currentValue: null,
    });
  }

  private buildAlert(
    tx: Transaction,
    fields: Pick<
      Alert,
      "alertType" | "severity" | "entityType" | "entityId" | "message" | "thresholdValue" | "currentValue"
    >
  ): Alert {
    return {
      id: alertIdFor(fields.alertType, fields.entityId, tx.id),
      timestamp: tx.timestamp,
      ...fields,
      acknowledged: false,
    };
  }
}

export function createRuleEvaluator(deps: RuleEvaluatorDeps): RuleEvaluator {
  return new RuleEvaluator(deps);
}
