/**
 * Alert Database Service
 *
 * Persistence and queries for the alert log. Inserts are idempotent on the
 * alert id.
 */

import {
  AlertSeverity,
  AlertType,
  EntityType,
  isAlertSeverity,
  isAlertType,
  isEntityType,
  type Alert,
} from "../types/risk";
import type { Queryable } from "./client";
import { toDate, toEnumValue, toNullableNumber, type NumericColumn } from "./mappers";

// ============================================================================
// Types
// ============================================================================

interface AlertRow {
  alert_id: string;
  timestamp: Date;
  alert_type: string;
  severity: string;
  entity_type: string;
  entity_id: string;
  message: string;
  threshold_value: NumericColumn | null;
  current_value: NumericColumn | null;
  acknowledged: boolean;
  acknowledged_at: Date | null;
  acknowledged_by: string | null;
}

/**
 * Filters for alert queries
 */
export interface AlertFilters {
  acknowledged?: boolean;
  severity?: AlertSeverity;
  entityType?: EntityType;
  alertType?: AlertType;
  entityId?: string;
  /** Inclusive lower bound on the alert timestamp */
  since?: Date;
  /** Exclusive upper bound on the alert timestamp */
  until?: Date;
}

export interface AlertSummary {
  total: number;
  unacknowledged: number;
  /** Unacknowledged alerts per severity */
  bySeverity: Partial<Record<AlertSeverity, number>>;
  /** Unacknowledged alerts per type */
  byType: Partial<Record<AlertType, number>>;
}

// ============================================================================
// Row mapping
// ============================================================================

/**
 * @throws DataIntegrityError when a stored enum column holds an unknown value
 */
export function toAlert(row: AlertRow): Alert {
  return {
    id: row.alert_id,
    timestamp: toDate(row.timestamp),
    alertType: toEnumValue(row.alert_type, isAlertType, "alert_type"),
    severity: toEnumValue(row.severity, isAlertSeverity, "severity"),
    entityType: toEnumValue(row.entity_type, isEntityType, "entity_type"),
    entityId: row.entity_id,
    message: row.message,
    thresholdValue: toNullableNumber(row.threshold_value),
    currentValue: toNullableNumber(row.current_value),
    acknowledged: row.acknowledged,
    acknowledgedAt: row.acknowledged_at,
    acknowledgedBy: row.acknowledged_by,
  };
}

/**
 * Build a WHERE clause and its parameters from filters
 */
export function buildAlertWhere(filters: AlertFilters): { clause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  const add = (sql: string, value: unknown): void => {
    params.push(value);
    conditions.push(`${sql} $${params.length}`);
  };

  if (filters.acknowledged !== undefined) add("acknowledged =", filters.acknowledged);
  if (filters.severity !== undefined) add("severity =", filters.severity);
  if (filters.entityType !== undefined) add("entity_type =", filters.entityType);
  if (filters.alertType !== undefined) add("alert_type =", filters.alertType);
  if (filters.entityId !== undefined) add("entity_id =", filters.entityId);
  if (filters.since !== undefined) add("timestamp >=", filters.since);
  if (filters.until !== undefined) add("timestamp <", filters.until);

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

// ============================================================================
// AlertRepository
// ============================================================================

export class AlertRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Insert an alert. Returns false when an alert with the same id exists.
   */
  async insert(alert: Alert): Promise<boolean> {
    const result = await this.db.query(
      `INSERT INTO alerts
         (alert_id, timestamp, alert_type, severity, entity_type, entity_id,
          message, threshold_value, current_value, acknowledged)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (alert_id) DO NOTHING`,
      [
        alert.id,
        alert.timestamp,
        alert.alertType,
        alert.severity,
        alert.entityType,
        alert.entityId,
        alert.message,
        alert.thresholdValue,
        alert.currentValue,
        alert.acknowledged,
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findById(id: string): Promise<Alert | null> {
    const result = await this.db.query<AlertRow>("SELECT * FROM alerts WHERE alert_id = $1", [id]);
    const row = result.rows[0];
    return row ? toAlert(row) : null;
  }

  /**
   * Alerts matching the filters, newest first
   */
  async findMany(filters: AlertFilters = {}, limit = 50): Promise<Alert[]> {
    const { clause, params } = buildAlertWhere(filters);
    const result = await this.db.query<AlertRow>(
      `SELECT * FROM alerts ${clause} ORDER BY timestamp DESC LIMIT $${params.length + 1}`,
      [...params, limit]
    );
    return result.rows.map(toAlert);
  }

  async count(filters: AlertFilters = {}): Promise<number> {
    const { clause, params } = buildAlertWhere(filters);
    const result = await this.db.query<{ count: string }>(`SELECT COUNT(*) AS count FROM alerts ${clause}`, params);
    return Number(result.rows[0]?.count ?? 0);
  }

  /**
   * Acknowledge one alert. Returns false when it does not exist or was
   * already acknowledged.
   */
  async acknowledge(id: string, acknowledgedBy = "system"): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE alerts
       SET acknowledged = TRUE, acknowledged_at = NOW(), acknowledged_by = $2
       WHERE alert_id = $1 AND acknowledged = FALSE`,
      [id, acknowledgedBy]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async acknowledgeMany(ids: string[], acknowledgedBy = "system"): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.db.query(
      `UPDATE alerts
       SET acknowledged = TRUE, acknowledged_at = NOW(), acknowledged_by = $2
       WHERE alert_id = ANY($1) AND acknowledged = FALSE`,
      [ids, acknowledgedBy]
    );
    return result.rowCount ?? 0;
  }

  async summary(): Promise<AlertSummary> {
    const totals = await this.db.query<{ total: string; unacknowledged: string }>(
      `SELECT COUNT(*) AS total,
              COUNT(*) FILTER (WHERE acknowledged = FALSE) AS unacknowledged
       FROM alerts`
    );
    const bySeverity = await this.db.query<{ severity: string; count: string }>(
      `SELECT severity, COUNT(*) AS count FROM alerts
       WHERE acknowledged = FALSE GROUP BY severity`
    );
    const byType = await this.db.query<{ alert_type: string; count: string }>(
      `SELECT alert_type, COUNT(*) AS count FROM alerts
       WHERE acknowledged = FALSE GROUP BY alert_type`
    );

    const summary: AlertSummary = {
      total: Number(totals.rows[0]?.total ?? 0),
      unacknowledged: Number(totals.rows[0]?.unacknowledged ?? 0),
      bySeverity: {},
      byType: {},
    };

    for (const row of bySeverity.rows) {
      if (isAlertSeverity(row.severity)) summary.bySeverity[row.severity] = Number(row.count);
    }
    for (const row of byType.rows) {
      if (isAlertType(row.alert_type)) summary.byType[row.alert_type] = Number(row.count);
    }

    return summary;
  }

  /**
   * Delete acknowledged alerts older than `days` days
   */
  async deleteOldAcknowledged(days: number): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM alerts
       WHERE acknowledged = TRUE AND timestamp < NOW() - ($1 * INTERVAL '1 day')`,
      [days]
    );
    return result.rowCount ?? 0;
  }
}

export function createAlertRepository(db: Queryable): AlertRepository {
  return new AlertRepository(db);
}
