/**
 * Risk Read Model
 *
 * Read-only queries for the dashboard and the alert management CLI. Nothing
 * here touches engine state; everything goes through the store.
 */

import type { AlertFilters, AlertSummary } from "../db/alerts";
import type { RiskReadStore } from "../db/risk-store";
import type { Alert, ClientExposure, RiskMetricsSnapshot, SymbolExposure } from "../types/risk";
import { createServiceLogger, type Logger } from "../utils/logger";

export interface RiskReadModelConfig {
  store: RiskReadStore;
  /** Upper bound on any list query (default: 500) */
  maxLimit?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface RiskOverview {
  latest: RiskMetricsSnapshot | null;
  topClients: ClientExposure[];
  topSymbols: SymbolExposure[];
  alerts: AlertSummary;
}

const DEFAULT_LIST_LIMIT = 50;
const MS_PER_HOUR = 60 * 60 * 1000;

export class RiskReadModel {
  private readonly store: RiskReadStore;
  private readonly maxLimit: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: RiskReadModelConfig) {
    this.store = config.store;
    this.maxLimit = config.maxLimit ?? 500;
    this.logger = config.logger ?? createServiceLogger("RiskReadModel");
    this.now = config.now ?? (() => new Date());
  }

  /** Clients ordered by exposure, highest first */
  getClientExposures(limit = DEFAULT_LIST_LIMIT): Promise<ClientExposure[]> {
    return this.store.listClientExposures(this.clampLimit(limit));
  }

  /** Symbols ordered by exposure, highest first */
  getSymbolExposures(limit = DEFAULT_LIST_LIMIT): Promise<SymbolExposure[]> {
    return this.store.listSymbolExposures(this.clampLimit(limit));
  }

  /**
   * Alert log, newest first
   */
  getAlerts(filters: AlertFilters = {}, limit = DEFAULT_LIST_LIMIT): Promise<Alert[]> {
    if (filters.since && filters.until && filters.since.getTime() >= filters.until.getTime()) {
      return Promise.resolve([]);
    }
    return this.store.findAlerts(filters, this.clampLimit(limit));
  }

  getAlert(id: string): Promise<Alert | null> {
    return this.store.findAlertById(id);
  }

  countAlerts(filters: AlertFilters = {}): Promise<number> {
    return this.store.countAlerts(filters);
  }

  getAlertSummary(): Promise<AlertSummary> {
    return this.store.alertSummary();
  }

  /**
   * Snapshots in [since, until), oldest first
   */
  getSnapshotSeries(since: Date, until?: Date, limit = this.maxLimit): Promise<RiskMetricsSnapshot[]> {
    return this.store.findMetrics(since, until, this.clampLimit(limit));
  }

  /** Snapshots from the last `hours` hours */
  getRecentSnapshots(hours = 1): Promise<RiskMetricsSnapshot[]> {
    const since = new Date(this.now().getTime() - hours * MS_PER_HOUR);
    return this.getSnapshotSeries(since);
  }

  getLatestSnapshot(): Promise<RiskMetricsSnapshot | null> {
    return this.store.latestMetrics();
  }

  /**
   * Everything the dashboard header needs in one call
   */
  async getOverview(topN = 10): Promise<RiskOverview> {
    const [latest, topClients, topSymbols, alerts] = await Promise.all([
      this.store.latestMetrics(),
      this.store.listClientExposures(this.clampLimit(topN)),
      this.store.listSymbolExposures(this.clampLimit(topN)),
      this.store.alertSummary(),
    ]);
    return { latest, topClients, topSymbols, alerts };
  }

  // ==========================================================================
  // Alert management
  // ==========================================================================

  /**
   * Resolves false when no unacknowledged alert has that id
   */
  async acknowledgeAlert(id: string, acknowledgedBy = "system"): Promise<boolean> {
    const updated = await this.store.acknowledgeAlert(id, acknowledgedBy);
    if (updated) {
      this.logger.info("Alert acknowledged", { alertId: id, acknowledgedBy });
    }
    return updated;
  }

  async acknowledgeAlerts(ids: string[], acknowledgedBy = "system"): Promise<number> {
    const unique = Array.from(new Set(ids));
    if (unique.length === 0) return 0;
    const count = await this.store.acknowledgeAlerts(unique, acknowledgedBy);
    this.logger.info("Alerts acknowledged", { requested: unique.length, acknowledged: count, acknowledgedBy });
    return count;
  }

  /**
   * Delete acknowledged alerts older than `days` days
   *
   * @throws RangeError when days is not a positive integer
   */
  async cleanupAcknowledged(days = 30): Promise<number> {
    if (!Number.isInteger(days) || days < 1) {
      throw new RangeError(`days must be a positive integer, got ${days}`);
    }
    const deleted = await this.store.deleteOldAcknowledgedAlerts(days);
    this.logger.info("Old acknowledged alerts deleted", { days, deleted });
    return deleted;
  }

  private clampLimit(limit: number): number {
    if (!Number.isFinite(limit) || limit < 1) return 1;
    return Math.min(Math.floor(limit), this.maxLimit);
  }
}

export function createRiskReadModel(config: RiskReadModelConfig): RiskReadModel {
  return new RiskReadModel(config);
}
