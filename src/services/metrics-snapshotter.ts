/**
 * Metrics Snapshotter
 *
 * On a fixed interval, rolls up the aggregator state in one synchronous read
 * pass and stores a RiskMetricsSnapshot. It never mutates engine state and a
 * failed write is only logged.
 */

import { EventEmitter } from "events";
import type { RiskStore } from "../db/risk-store";
import type { ExposureTotals } from "../detection/exposure-aggregator";
import type { RiskMetricsSnapshot } from "../types/risk";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";

export interface MetricsSnapshotterConfig {
  store: Pick<RiskStore, "insertMetricsSnapshot">;
  /** Aggregate rollup source, read synchronously */
  totals: () => ExposureTotals;
  /** Alerts emitted by this run */
  alertsGenerated: () => number;
  /** Interval in milliseconds (default: 10000) */
  intervalMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface SnapshotterStats {
  snapshotsWritten: number;
  failures: number;
  lastSnapshotAt: Date | null;
}

export class MetricsSnapshotter extends EventEmitter {
  private readonly store: Pick<RiskStore, "insertMetricsSnapshot">;
  private readonly totals: () => ExposureTotals;
  private readonly alertsGenerated: () => number;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<RiskMetricsSnapshot | null> | null = null;
  private stats: SnapshotterStats = { snapshotsWritten: 0, failures: 0, lastSnapshotAt: null };

  constructor(config: MetricsSnapshotterConfig) {
    super();
    this.store = config.store;
    this.totals = config.totals;
    this.alertsGenerated = config.alertsGenerated;
    this.intervalMs = config.intervalMs ?? 10000;
    this.logger = config.logger ?? createServiceLogger("MetricsSnapshotter");
    this.now = config.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      this.logger.warn("Snapshotter already running");
      return;
    }

    this.timer = setInterval(() => {
      if (this.inFlight) {
        this.logger.debug("Skipping snapshot, previous write still running");
        return;
      }
      void this.takeSnapshot();
    }, this.intervalMs);

    this.logger.info("Snapshotter started", { intervalMs: this.intervalMs });
    this.emit("started");
  }

  /**
   * Stop the timer and wait for a write in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info("Snapshotter stopped");
      this.emit("stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Build the snapshot from current state without writing it
   */
  buildSnapshot(): RiskMetricsSnapshot {
    const totals = this.totals();
    return {
      timestamp: this.now(),
      totalTransactions: totals.totalTransactions,
      totalExposure: totals.totalExposure,
      activeClients: totals.activeClients,
      activeSymbols: totals.activeSymbols,
      highRiskClients: totals.highRiskClients,
      highRiskSymbols: totals.highRiskSymbols,
      alertsGenerated: this.alertsGenerated(),
    };
  }

  /**
   * Build and store one snapshot. Resolves null when the write failed.
   */
  takeSnapshot(): Promise<RiskMetricsSnapshot | null> {
    const snapshot = this.buildSnapshot();
    const write = this.write(snapshot).finally(() => {
      if (this.inFlight === write) this.inFlight = null;
    });
    this.inFlight = write;
    return write;
  }

  getStats(): SnapshotterStats {
    return { ...this.stats };
  }

  private async write(snapshot: RiskMetricsSnapshot): Promise<RiskMetricsSnapshot | null> {
    try {
      await this.store.insertMetricsSnapshot(snapshot);
    } catch (error) {
      this.stats.failures++;
      this.logger.error("Failed to write metrics snapshot", errorContext(error));
      return null;
    }

    this.stats.snapshotsWritten++;
    this.stats.lastSnapshotAt = snapshot.timestamp;
    this.logger.debug("Metrics snapshot written", {
      totalTransactions: snapshot.totalTransactions,
      totalExposure: snapshot.totalExposure,
      alertsGenerated: snapshot.alertsGenerated,
    });
    this.emit("snapshot:created", snapshot);
    return snapshot;
  }
}

export function createMetricsSnapshotter(config: MetricsSnapshotterConfig): MetricsSnapshotter {
  return new MetricsSnapshotter(config);
}
