/**
 * Risk metrics snapshot series
 */

import type { RiskMetricsSnapshot } from "../types/risk";
import type { Queryable } from "./client";
import { toDate, toNumber, type NumericColumn } from "./mappers";

interface RiskMetricsRow {
  timestamp: Date;
  total_transactions: number;
  total_exposure: NumericColumn;
  active_clients: number;
  active_symbols: number;
  high_risk_clients: number;
  high_risk_symbols: number;
  alerts_generated: number;
}

function toSnapshot(row: RiskMetricsRow): RiskMetricsSnapshot {
  return {
    timestamp: toDate(row.timestamp),
    totalTransactions: row.total_transactions,
    totalExposure: toNumber(row.total_exposure),
    activeClients: row.active_clients,
    activeSymbols: row.active_symbols,
    highRiskClients: row.high_risk_clients,
    highRiskSymbols: row.high_risk_symbols,
    alertsGenerated: row.alerts_generated,
  };
}

export class MetricsRepository {
  constructor(private readonly db: Queryable) {}

  async insert(snapshot: RiskMetricsSnapshot): Promise<void> {
    await this.db.query(
      `INSERT INTO risk_metrics
         (timestamp, total_transactions, total_exposure, active_clients, active_symbols,
          high_risk_clients, high_risk_symbols, alerts_generated)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        snapshot.timestamp,
        snapshot.totalTransactions,
        snapshot.totalExposure,
        snapshot.activeClients,
        snapshot.activeSymbols,
        snapshot.highRiskClients,
        snapshot.highRiskSymbols,
        snapshot.alertsGenerated,
      ]
    );
  }

  /**
   * Snapshots in `[since, until)`, oldest first
   */
  async findRange(since: Date, until: Date = new Date(), limit = 1000): Promise<RiskMetricsSnapshot[]> {
    const result = await this.db.query<RiskMetricsRow>(
      `SELECT * FROM risk_metrics
       WHERE timestamp >= $1 AND timestamp < $2
       ORDER BY timestamp ASC
       LIMIT $3`,
      [since, until, limit]
    );
    return result.rows.map(toSnapshot);
  }

  async latest(): Promise<RiskMetricsSnapshot | null> {
    const result = await this.db.query<RiskMetricsRow>("SELECT * FROM risk_metrics ORDER BY timestamp DESC LIMIT 1");
    const row = result.rows[0];
    return row ? toSnapshot(row) : null;
  }
}

export function createMetricsRepository(db: Queryable): MetricsRepository {
  return new MetricsRepository(db);
}
