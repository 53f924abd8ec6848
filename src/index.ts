/**
 * Brokerage Risk Engine
 * Library entry point
 */

export const APP_NAME = "Brokerage Risk Engine";
export const VERSION = "1.0.0";

export * from "./types/risk";
export * from "./detection";
export * from "./services";
export * from "./notifications";
export {
  RiskEngineError,
  TransientIOError,
  ConfigError,
  NotificationDeliveryError,
  DataIntegrityError,
  isRetryableError,
} from "./utils/errors";
export { createDatabaseClient, PostgresRiskStore, createPostgresRiskStore } from "./db";
export type { DatabaseClient, RiskStore, RiskReadStore, AlertFilters, AlertSummary } from "./db";
export { buildRiskEngineConfig } from "../config/env";
export type { RiskEngineConfig, RiskThresholds, RiskBands } from "../config/env";
