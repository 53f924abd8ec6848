/**
 * Services Module
 *
 * The risk pipeline, its collaborators and the read model.
 */

export { TransactionFeed, createTransactionFeed, validateTransactionRow } from "./transaction-feed";
export type { FeedPollResult, TransactionFeedConfig } from "./transaction-feed";

export { AlertSink, createAlertSink } from "./alert-sink";
export type { AlertSinkConfig, AlertSinkStats } from "./alert-sink";

export { MetricsSnapshotter, createMetricsSnapshotter } from "./metrics-snapshotter";
export type { MetricsSnapshotterConfig, SnapshotterStats } from "./metrics-snapshotter";

export { RiskEngine, createRiskEngine, lockKeysFor } from "./risk-engine";
export type { EngineConfig, RiskEngineDeps, BatchResult, CycleResult, EngineStats } from "./risk-engine";

export { RiskReadModel, createRiskReadModel } from "./risk-read-model";
export type { RiskReadModelConfig, RiskOverview } from "./risk-read-model";

export {
  RiskApplication,
  createRiskApplication,
  loadRiskEngineConfig,
  registerShutdownHandlers,
} from "./startup";
export type { ApplicationOptions } from "./startup";
