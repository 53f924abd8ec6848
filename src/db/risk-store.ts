/**
 * Persistence interfaces consumed by the engine and the read model, and their
 * PostgreSQL implementation over the repositories.
 */

import type { RiskThresholds } from "../../config/env";
import type { AggregatorState, DirtyExposures } from "../detection/exposure-aggregator";
import type { Alert, ClientExposure, FeedMarker, RiskMetricsSnapshot, SymbolExposure } from "../types/risk";
import { AlertRepository, type AlertFilters, type AlertSummary } from "./alerts";
import { CheckpointRepository } from "./checkpoints";
import type { DatabaseClient } from "./client";
import { ExposureRepository } from "./exposures";
import { MetricsRepository } from "./metrics";
import { ThresholdRepository } from "./thresholds";
import { TransactionRepository, type TransactionRow } from "./transactions";

// ============================================================================
// Interfaces
// ============================================================================

/**
 * What the pipeline reads and writes
 */
export interface RiskStore {
  readTransactionsSince(marker: FeedMarker, limit: number): Promise<TransactionRow[]>;
  insertAlert(alert: Alert): Promise<boolean>;
  insertMetricsSnapshot(snapshot: RiskMetricsSnapshot): Promise<void>;
  readThresholdsConfig(): Promise<Partial<RiskThresholds>>;
  readCheckpoint(): Promise<FeedMarker | null>;
  loadExposures(): Promise<AggregatorState>;
  upsertExposures(exposures: DirtyExposures): Promise<void>;
  /** Upsert exposures and move the checkpoint in one transaction */
  commitBatch(exposures: DirtyExposures, marker: FeedMarker): Promise<void>;
}

/**
 * Queries and acknowledgement actions for dashboards and operators
 */
export interface RiskReadStore {
  listClientExposures(limit?: number): Promise<ClientExposure[]>;
  listSymbolExposures(limit?: number): Promise<SymbolExposure[]>;
  findAlerts(filters?: AlertFilters, limit?: number): Promise<Alert[]>;
  findAlertById(id: string): Promise<Alert | null>;
  countAlerts(filters?: AlertFilters): Promise<number>;
  alertSummary(): Promise<AlertSummary>;
  findMetrics(since: Date, until?: Date, limit?: number): Promise<RiskMetricsSnapshot[]>;
  latestMetrics(): Promise<RiskMetricsSnapshot | null>;
  acknowledgeAlert(id: string, acknowledgedBy?: string): Promise<boolean>;
  acknowledgeAlerts(ids: string[], acknowledgedBy?: string): Promise<number>;
  deleteOldAcknowledgedAlerts(days: number): Promise<number>;
}

// ============================================================================
// PostgreSQL implementation
// ============================================================================

export class PostgresRiskStore implements RiskStore, RiskReadStore {
  private readonly transactions: TransactionRepository;
  private readonly exposures: ExposureRepository;
  private readonly alerts: AlertRepository;
  private readonly metrics: MetricsRepository;
  private readonly thresholds: ThresholdRepository;
  private readonly checkpoints: CheckpointRepository;

  constructor(
    private readonly db: DatabaseClient,
    private readonly engineId?: string
  ) {
    this.transactions = new TransactionRepository(db);
    this.exposures = new ExposureRepository(db);
    this.alerts = new AlertRepository(db);
    this.metrics = new MetricsRepository(db);
    this.thresholds = new ThresholdRepository(db);
    this.checkpoints = new CheckpointRepository(db, engineId);
  }

  readTransactionsSince(marker: FeedMarker, limit: number): Promise<TransactionRow[]> {
    return this.transactions.readSince(marker, limit);
  }

  insertAlert(alert: Alert): Promise<boolean> {
    return this.alerts.insert(alert);
  }

  insertMetricsSnapshot(snapshot: RiskMetricsSnapshot): Promise<void> {
    return this.metrics.insert(snapshot);
  }

  readThresholdsConfig(): Promise<Partial<RiskThresholds>> {
    return this.thresholds.read();
  }

  readCheckpoint(): Promise<FeedMarker | null> {
    return this.checkpoints.read();
  }

  loadExposures(): Promise<AggregatorState> {
    return this.exposures.loadAll();
  }

  async upsertExposures(exposures: DirtyExposures): Promise<void> {
    await this.db.transaction(async (tx) => {
      await writeExposures(new ExposureRepository(tx), exposures);
    });
  }

  async commitBatch(exposures: DirtyExposures, marker: FeedMarker): Promise<void> {
    await this.db.transaction(async (tx) => {
      await writeExposures(new ExposureRepository(tx), exposures);
      await new CheckpointRepository(tx, this.engineId).write(marker);
    });
  }

  listClientExposures(limit?: number): Promise<ClientExposure[]> {
    return this.exposures.listClients(limit);
  }

  listSymbolExposures(limit?: number): Promise<SymbolExposure[]> {
    return this.exposures.listSymbols(limit);
  }

  findAlerts(filters?: AlertFilters, limit?: number): Promise<Alert[]> {
    return this.alerts.findMany(filters, limit);
  }

  findAlertById(id: string): Promise<Alert | null> {
    return this.alerts.findById(id);
  }

  countAlerts(filters?: AlertFilters): Promise<number> {
    return this.alerts.count(filters);
  }

  alertSummary(): Promise<AlertSummary> {
    return this.alerts.summary();
  }

  findMetrics(since: Date, until?: Date, limit?: number): Promise<RiskMetricsSnapshot[]> {
    return this.metrics.findRange(since, until, limit);
  }

  latestMetrics(): Promise<RiskMetricsSnapshot | null> {
    return this.metrics.latest();
  }

  acknowledgeAlert(id: string, acknowledgedBy?: string): Promise<boolean> {
    return this.alerts.acknowledge(id, acknowledgedBy);
  }

  acknowledgeAlerts(ids: string[], acknowledgedBy?: string): Promise<number> {
    return this.alerts.acknowledgeMany(ids, acknowledgedBy);
  }

  deleteOldAcknowledgedAlerts(days: number): Promise<number> {
    return this.alerts.deleteOldAcknowledged(days);
  }
}

async function writeExposures(repository: ExposureRepository, exposures: DirtyExposures): Promise<void> {
  for (const client of exposures.clients) {
    await repository.upsertClient(client);
  }
  for (const symbol of exposures.symbols) {
    await repository.upsertSymbol(symbol);
  }
}

export function createPostgresRiskStore(db: DatabaseClient, engineId?: string): PostgresRiskStore {
  return new PostgresRiskStore(db, engineId);
}
