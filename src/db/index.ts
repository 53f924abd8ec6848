/**
 * Database Module
 */

export { createDatabaseClient } from "./client";
export type { DatabaseClient, DatabaseClientOptions, Queryable, QueryResultLike, HealthCheckResult } from "./client";

export { TransactionRepository, createTransactionRepository } from "./transactions";
export type { TransactionRow, NewTransaction } from "./transactions";

export { ExposureRepository, createExposureRepository } from "./exposures";

export { AlertRepository, createAlertRepository, buildAlertWhere, toAlert } from "./alerts";
export type { AlertFilters, AlertSummary } from "./alerts";

export { MetricsRepository, createMetricsRepository } from "./metrics";
export { ThresholdRepository, createThresholdRepository } from "./thresholds";
export { CheckpointRepository, createCheckpointRepository, DEFAULT_ENGINE_ID } from "./checkpoints";

export { PostgresRiskStore, createPostgresRiskStore } from "./risk-store";
export type { RiskStore, RiskReadStore } from "./risk-store";
