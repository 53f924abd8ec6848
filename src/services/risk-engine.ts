/**
 * Risk Engine
 *
 * Drives the detection pipeline: polls the transaction feed, processes each
 * batch with bounded concurrency under per-entity locks, persists alerts and
 * commits exposures together with the feed cursor once the batch is done.
 *
 * The in-memory cursor moves as soon as a batch has been applied. The stored
 * checkpoint only moves when every alert of the batch is stored and the
 * exposures are written, in one database transaction. A failed commit is
 * retried at the start of the next cycle.
 */

import { EventEmitter } from "events";
import type { RiskEngineConfig } from "../../config/env";
import type { RiskStore } from "../db/risk-store";
import { AlertDeduplicator, type DeduplicatorStats } from "../detection/alert-deduplicator";
import { AnomalyDetector } from "../detection/anomaly-detector";
import { ExposureAggregator, type ExposureTotals } from "../detection/exposure-aggregator";
import { RuleEvaluator, type TransactionOutcome } from "../detection/rule-evaluator";
import { VelocityTracker } from "../detection/velocity-tracker";
import type { NotificationDispatcher } from "../notifications/dispatcher";
import { INITIAL_MARKER, compareMarkers, type Alert, type FeedMarker, type RiskMetricsSnapshot, type Transaction } from "../types/risk";
import { TransientIOError } from "../utils/errors";
import { KeyedLock } from "../utils/keyed-lock";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";
import { backoffDelay, retryWithBackoff } from "../utils/retry";
import { AlertSink } from "./alert-sink";
import { MetricsSnapshotter } from "./metrics-snapshotter";
import { TransactionFeed } from "./transaction-feed";

// ============================================================================
// Types
// ============================================================================

export type EngineConfig = Pick<
  RiskEngineConfig,
  | "thresholds"
  | "riskBands"
  | "anomalyWindowSize"
  | "anomalyMinSamples"
  | "alertCooldownMs"
  | "pollIntervalMs"
  | "pollBackoffMaxMs"
  | "snapshotIntervalMs"
  | "feedBatchSize"
  | "maxConcurrency"
>;

export interface RiskEngineDeps {
  config: EngineConfig;
  store: RiskStore;
  dispatcher?: NotificationDispatcher;
  logger?: Logger;
  /** Replace detection components, mainly for tests */
  components?: {
    velocityTracker?: VelocityTracker;
    anomalyDetector?: AnomalyDetector;
  };
}

export interface BatchResult {
  processed: number;
  duplicates: number;
  alerts: Alert[];
  suppressed: number;
  ruleFailures: number;
}

export interface CycleResult extends BatchResult {
  read: number;
  rejected: number;
  marker: FeedMarker;
  committed: boolean;
  durationMs: number;
}

export interface EngineStats {
  isRunning: boolean;
  cyclesCompleted: number;
  cyclesFailed: number;
  consecutiveFailures: number;
  transactionsProcessed: number;
  transactionsRejected: number;
  duplicatesSkipped: number;
  alertsEmitted: number;
  /** Clients with a live velocity window */
  trackedClients: number;
  /** Symbols with an anomaly baseline */
  trackedSymbols: number;
  deduplication: DeduplicatorStats;
  cursor: FeedMarker;
  committedCursor: FeedMarker;
  lastError: string | null;
}

/** Commit attempts before the cycle reports a failure */
const COMMIT_ATTEMPTS = 3;
const COMMIT_RETRY_DELAY_MS = 200;

// ============================================================================
// RiskEngine
// ============================================================================

export class RiskEngine extends EventEmitter {
  readonly aggregator: ExposureAggregator;
  readonly velocityTracker: VelocityTracker;
  readonly anomalyDetector: AnomalyDetector;
  readonly deduplicator: AlertDeduplicator;
  readonly evaluator: RuleEvaluator;
  readonly feed: TransactionFeed;
  readonly sink: AlertSink;
  readonly snapshotter: MetricsSnapshotter;

  private readonly config: EngineConfig;
  private readonly store: RiskStore;
  private readonly logger: Logger;
  private readonly locks = new KeyedLock();

  private initialized = false;
  private isRunning = false;
  private shouldStop = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private cursor: FeedMarker = { ...INITIAL_MARKER };
  private committedCursor: FeedMarker = { ...INITIAL_MARKER };

  private stats: Omit<
    EngineStats,
    "isRunning" | "trackedClients" | "trackedSymbols" | "deduplication" | "cursor" | "committedCursor"
  > = {
    cyclesCompleted: 0,
    cyclesFailed: 0,
    consecutiveFailures: 0,
    transactionsProcessed: 0,
    transactionsRejected: 0,
    duplicatesSkipped: 0,
    alertsEmitted: 0,
    lastError: null,
  };

  constructor(deps: RiskEngineDeps) {
    super();
    this.config = deps.config;
    this.store = deps.store;
    this.logger = deps.logger ?? createServiceLogger("RiskEngine");

    const { thresholds } = deps.config;

    this.aggregator = new ExposureAggregator({
      clientExposureThreshold: thresholds.clientExposureThreshold,
      symbolExposureThreshold: thresholds.symbolExposureThreshold,
      riskBands: deps.config.riskBands,
    });
    this.velocityTracker =
      deps.components?.velocityTracker ?? new VelocityTracker({ windowSeconds: thresholds.velocityWindowSeconds });
    this.anomalyDetector =
      deps.components?.anomalyDetector ??
      new AnomalyDetector({
        windowSize: deps.config.anomalyWindowSize,
        minSamples: deps.config.anomalyMinSamples,
        stdDevThreshold: thresholds.anomalyStdDevThreshold,
      });
    this.deduplicator = new AlertDeduplicator({ cooldownMs: deps.config.alertCooldownMs });
    this.evaluator = new RuleEvaluator({
      aggregator: this.aggregator,
      velocityTracker: this.velocityTracker,
      anomalyDetector: this.anomalyDetector,
      deduplicator: this.deduplicator,
      thresholds,
      logger: this.logger.child({ component: "RuleEvaluator" }),
    });
    this.feed = new TransactionFeed({
      store: this.store,
      batchSize: deps.config.feedBatchSize,
      logger: this.logger.child({ component: "TransactionFeed" }),
    });
    this.sink = new AlertSink({
      store: this.store,
      dispatcher: deps.dispatcher,
      logger: this.logger.child({ component: "AlertSink" }),
    });
    this.snapshotter = new MetricsSnapshotter({
      store: this.store,
      totals: () => this.aggregator.totals(),
      alertsGenerated: () => this.sink.getPersistedCount(),
      intervalMs: deps.config.snapshotIntervalMs,
      logger: this.logger.child({ component: "MetricsSnapshotter" }),
    });
    this.snapshotter.on("snapshot:created", (snapshot: RiskMetricsSnapshot) => {
      this.emit("snapshot:created", snapshot);
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Restore exposures and the feed cursor from the store. Rolling windows
   * start empty.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    let checkpoint: FeedMarker | null;
    try {
      const state = await this.store.loadExposures();
      this.aggregator.hydrate(state);
      checkpoint = await this.store.readCheckpoint();
    } catch (error) {
      throw new TransientIOError("hydrate", error);
    }

    this.cursor = checkpoint ?? { ...INITIAL_MARKER };
    this.committedCursor = { ...this.cursor };
    this.aggregator.compact(this.cursor);
    this.initialized = true;

    const totals = this.aggregator.totals();
    this.logger.info("Engine state restored", {
      clients: totals.activeClients,
      symbols: totals.activeSymbols,
      cursorTimestamp: new Date(this.cursor.timestamp).toISOString(),
      cursorTransactionId: this.cursor.transactionId,
    });
  }

  /**
   * Start polling and snapshotting. Resolves once the loop is running.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn("Engine already running");
      return;
    }

    await this.initialize();

    this.isRunning = true;
    this.shouldStop = false;
    this.snapshotter.start();
    this.loop = this.runLoop();

    this.logger.info("Risk engine started", {
      pollIntervalMs: this.config.pollIntervalMs,
      batchSize: this.config.feedBatchSize,
      maxConcurrency: this.config.maxConcurrency,
    });
    this.emit("started");
  }

  /**
   * Stop accepting batches, finish the one in flight, flush notifications,
   * store the checkpoint and stop the snapshotter
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.debug("Engine not running");
      return;
    }

    this.logger.info("Stopping risk engine...");
    this.shouldStop = true;
    this.wake?.();

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }

    try {
      await this.sink.retryPending();
      await this.commit();
    } catch (error) {
      this.logger.error("Final checkpoint failed; uncommitted transactions will be replayed", errorContext(error));
    }

    await this.sink.flush();
    await this.snapshotter.stop();

    this.isRunning = false;
    this.logger.info("Risk engine stopped", {
      cursorTransactionId: this.committedCursor.transactionId,
    });
    this.emit("stopped");
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  /**
   * One poll, process and commit pass
   */
  async runCycle(): Promise<CycleResult> {
    const startTime = Date.now();
    await this.initialize();

    if (this.sink.hasPending()) {
      const stored = await this.sink.retryPending();
      for (const alert of stored) this.onAlertStored(alert);
    }
    if (this.hasUncommittedWork()) {
      await this.commit();
    }

    const poll = await this.feed.poll(this.cursor);
    this.stats.transactionsRejected += poll.rejected.length;

    const batch = await this.processBatch(poll.transactions);
    if (compareMarkers(poll.marker, this.cursor) > 0) {
      this.cursor = poll.marker;
    }

    const newest = poll.transactions[poll.transactions.length - 1];
    if (newest) {
      const idle = this.velocityTracker.prune(newest.timestamp);
      if (idle > 0) this.logger.debug("Dropped idle velocity windows", { clients: idle });
    }

    const committed = await this.commit();

    return {
      ...batch,
      read: poll.transactions.length + poll.rejected.length,
      rejected: poll.rejected.length,
      marker: { ...this.cursor },
      committed,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Apply transactions with at most `maxConcurrency` in flight. Each one
   * holds its client and symbol locks while it updates engine state, so
   * updates to one entity apply in feed order.
   */
  async processBatch(transactions: readonly Transaction[]): Promise<BatchResult> {
    const result: BatchResult = { processed: 0, duplicates: 0, alerts: [], suppressed: 0, ruleFailures: 0 };
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < transactions.length) {
        const tx = transactions[next++];
        if (!tx) continue;

        const outcome = await this.locks.withLock(lockKeysFor(tx), () => this.evaluator.processTransaction(tx));
        this.recordOutcome(outcome, result);
        await this.emitAlerts(outcome.alerts);
      }
    };

    const workerCount = Math.min(this.config.maxConcurrency, transactions.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    this.stats.transactionsProcessed += result.processed;
    this.stats.duplicatesSkipped += result.duplicates;
    return result;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getCursor(): FeedMarker {
    return { ...this.cursor };
  }

  getCommittedCursor(): FeedMarker {
    return { ...this.committedCursor };
  }

  getTotals(): ExposureTotals {
    return this.aggregator.totals();
  }

  getStats(): EngineStats {
    return {
      isRunning: this.isRunning,
      ...this.stats,
      trackedClients: this.velocityTracker.getTrackedClientCount(),
      trackedSymbols: this.anomalyDetector.getTrackedSymbolCount(),
      deduplication: this.deduplicator.getStats(),
      cursor: this.getCursor(),
      committedCursor: this.getCommittedCursor(),
    };
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private async runLoop(): Promise<void> {
    while (!this.shouldStop) {
      let delay = this.config.pollIntervalMs;

      try {
        const result = await this.runCycle();
        this.stats.cyclesCompleted++;
        this.stats.consecutiveFailures = 0;
        this.emit("cycle:complete", result);

        // A full batch means the feed has more waiting
        if (result.read >= this.config.feedBatchSize) {
          delay = 0;
        }
      } catch (error) {
        this.stats.cyclesFailed++;
        this.stats.consecutiveFailures++;
        this.stats.lastError = error instanceof Error ? error.message : String(error);
        delay = backoffDelay(
          this.stats.consecutiveFailures - 1,
          this.config.pollIntervalMs,
          this.config.pollBackoffMaxMs
        );
        this.logger.error("Cycle failed, backing off", {
          consecutiveFailures: this.stats.consecutiveFailures,
          delayMs: delay,
          ...errorContext(error),
        });
        this.emit("cycle:error", error);
      }

      if (!this.shouldStop) {
        await this.sleepUntilWoken(delay);
      }
    }
  }

  private recordOutcome(outcome: TransactionOutcome, result: BatchResult): void {
    if (outcome.duplicate) {
      result.duplicates++;
      return;
    }
    result.processed++;
    result.alerts.push(...outcome.alerts);
    result.suppressed += outcome.suppressed.length;
    result.ruleFailures += outcome.failedRules.length;
  }

  /**
   * Store and notify. An alert that cannot be stored stays in the sink's
   * outbox and blocks the next commit until it is stored.
   */
  private async emitAlerts(alerts: Alert[]): Promise<void> {
    for (const alert of alerts) {
      try {
        if (await this.sink.emit(alert)) {
          this.onAlertStored(alert);
        }
      } catch (error) {
        this.logger.warn("Alert queued for retry", { alertId: alert.id, ...errorContext(error) });
      }
    }
  }

  private onAlertStored(alert: Alert): void {
    this.stats.alertsEmitted++;
    this.emit("alert:created", alert);
  }

  private hasUncommittedWork(): boolean {
    return compareMarkers(this.cursor, this.committedCursor) > 0 || this.aggregator.getDirtyCount() > 0;
  }

  /**
   * Write dirty exposures and the cursor in one transaction. Returns false
   * when alerts are still waiting to be stored.
   *
   * @throws TransientIOError when the store keeps failing
   */
  private async commit(): Promise<boolean> {
    if (this.sink.hasPending()) {
      this.logger.warn("Checkpoint deferred until pending alerts are stored", {
        pending: this.sink.getStats().pending,
      });
      return false;
    }
    if (!this.hasUncommittedWork()) {
      return true;
    }

    const dirty = this.aggregator.collectDirty();
    const marker = { ...this.cursor };

    try {
      await retryWithBackoff(() => this.store.commitBatch(dirty, marker), {
        maxAttempts: COMMIT_ATTEMPTS,
        baseDelayMs: COMMIT_RETRY_DELAY_MS,
      });
    } catch (error) {
      throw new TransientIOError("commitBatch", error);
    }

    this.aggregator.clearDirty(dirty);
    this.aggregator.compact(marker);
    this.committedCursor = marker;
    this.logger.debug("Checkpoint committed", {
      clients: dirty.clients.length,
      symbols: dirty.symbols.length,
      transactionId: marker.transactionId,
    });
    return true;
  }

  private sleepUntilWoken(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}

export function lockKeysFor(tx: Pick<Transaction, "clientId" | "symbol">): string[] {
  return [`client:${tx.clientId}`, `symbol:${tx.symbol}`];
}

export function createRiskEngine(deps: RiskEngineDeps): RiskEngine {
  return new RiskEngine(deps);
}
