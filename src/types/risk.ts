/**
 * Core record types shared by the detection modules, the persistence layer
 * and the notification channels.
 */

// ============================================================================
// Enums
// ============================================================================

export enum TransactionSide {
  BUY = "BUY",
  SELL = "SELL",
}

/**
 * Ordinal classification of exposure against its threshold
 */
export enum RiskLevel {
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
  CRITICAL = "CRITICAL",
}

export enum AlertSeverity {
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
  CRITICAL = "CRITICAL",
}

export enum AlertType {
  HIGH_CLIENT_EXPOSURE = "HIGH_CLIENT_EXPOSURE",
  HIGH_SYMBOL_EXPOSURE = "HIGH_SYMBOL_EXPOSURE",
  HIGH_TRANSACTION_VELOCITY = "HIGH_TRANSACTION_VELOCITY",
  ANOMALY_DETECTED = "ANOMALY_DETECTED",
  /** A rule family threw while evaluating a transaction */
  RULE_EVALUATION_FAILURE = "RULE_EVALUATION_FAILURE",
}

export enum EntityType {
  CLIENT = "CLIENT",
  SYMBOL = "SYMBOL",
  SYSTEM = "SYSTEM",
}

/** Severity order used for escalation checks */
export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  [AlertSeverity.LOW]: 1,
  [AlertSeverity.MEDIUM]: 2,
  [AlertSeverity.HIGH]: 3,
  [AlertSeverity.CRITICAL]: 4,
};

export const RISK_LEVEL_RANK: Record<RiskLevel, number> = {
  [RiskLevel.LOW]: 1,
  [RiskLevel.MEDIUM]: 2,
  [RiskLevel.HIGH]: 3,
  [RiskLevel.CRITICAL]: 4,
};

const ALERT_SEVERITIES = new Set<string>(Object.values(AlertSeverity));
const ALERT_TYPES = new Set<string>(Object.values(AlertType));
const ENTITY_TYPES = new Set<string>(Object.values(EntityType));
const RISK_LEVELS = new Set<string>(Object.values(RiskLevel));

export function isAlertSeverity(value: string): value is AlertSeverity {
  return ALERT_SEVERITIES.has(value);
}

export function isAlertType(value: string): value is AlertType {
  return ALERT_TYPES.has(value);
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.has(value);
}

export function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.has(value);
}

// ============================================================================
// Records
// ============================================================================

/**
 * An immutable brokerage transaction as read from the feed
 */
export interface Transaction {
  readonly id: number;
  readonly timestamp: Date;
  readonly clientId: string;
  readonly symbol: string;
  readonly side: TransactionSide;
  readonly quantity: number;
  readonly price: number;
  /** quantity * price */
  readonly totalValue: number;
  readonly brokerId: string;
  readonly market: string;
}

/**
 * Strictly increasing position in the transaction feed.
 * Ordered by timestamp, then transaction id.
 */
export interface FeedMarker {
  /** Epoch milliseconds */
  timestamp: number;
  transactionId: number;
}

export const INITIAL_MARKER: FeedMarker = { timestamp: 0, transactionId: 0 };

export interface ClientExposure {
  clientId: string;
  totalExposure: number;
  positionCount: number;
  riskLevel: RiskLevel;
  lastUpdated: Date;
}

export interface SymbolExposure {
  symbol: string;
  totalExposure: number;
  transactionCount: number;
  riskLevel: RiskLevel;
  lastUpdated: Date;
}

export interface Alert {
  id: string;
  /** Event time of the triggering transaction */
  timestamp: Date;
  alertType: AlertType;
  severity: AlertSeverity;
  entityType: EntityType;
  entityId: string;
  message: string;
  thresholdValue: number | null;
  currentValue: number | null;
  acknowledged: boolean;
  acknowledgedAt?: Date | null;
  acknowledgedBy?: string | null;
}

export interface RiskMetricsSnapshot {
  timestamp: Date;
  totalTransactions: number;
  totalExposure: number;
  activeClients: number;
  activeSymbols: number;
  highRiskClients: number;
  highRiskSymbols: number;
  alertsGenerated: number;
}

// ============================================================================
// Marker helpers
// ============================================================================

export function markerOf(transaction: Pick<Transaction, "id" | "timestamp">): FeedMarker {
  return { timestamp: transaction.timestamp.getTime(), transactionId: transaction.id };
}

/**
 * Negative when `a` precedes `b`, zero when equal, positive otherwise
 */
export function compareMarkers(a: FeedMarker, b: FeedMarker): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp;
  }
  return a.transactionId - b.transactionId;
}

export function maxMarker(a: FeedMarker, b: FeedMarker): FeedMarker {
  return compareMarkers(a, b) >= 0 ? a : b;
}
