/**
 * Alert Sink
 *
 * Persists alerts and hands them to the notification dispatcher. The stored
 * alert is the source of truth; delivery is fire-and-forget.
 *
 * Alerts that could not be stored after retrying are kept in an outbox and
 * retried by `retryPending()` before the engine commits its next batch.
 */

import type { RiskStore } from "../db/risk-store";
import type { NotificationDispatcher } from "../notifications/dispatcher";
import type { Alert } from "../types/risk";
import { TransientIOError } from "../utils/errors";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";
import { retryWithBackoff } from "../utils/retry";

export interface AlertSinkConfig {
  store: Pick<RiskStore, "insertAlert">;
  dispatcher?: Pick<NotificationDispatcher, "dispatch" | "flush">;
  /** Insert attempts per alert (default: 3) */
  maxAttempts?: number;
  /** Delay before the second insert attempt (default: 200) */
  retryDelayMs?: number;
  logger?: Logger;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface AlertSinkStats {
  persisted: number;
  alreadyStored: number;
  pending: number;
}

export class AlertSink {
  private readonly store: Pick<RiskStore, "insertAlert">;
  private readonly dispatcher?: Pick<NotificationDispatcher, "dispatch" | "flush">;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly outbox: Map<string, Alert> = new Map();
  private persisted = 0;
  private alreadyStored = 0;

  constructor(config: AlertSinkConfig) {
    this.store = config.store;
    this.dispatcher = config.dispatcher;
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 200;
    this.logger = config.logger ?? createServiceLogger("AlertSink");
    this.sleep = config.sleep;
  }

  /**
   * Persist then notify. Resolves true when the alert was newly stored.
   *
   * @throws TransientIOError when the alert could not be stored; it stays in
   *   the outbox
   */
  async emit(alert: Alert): Promise<boolean> {
    this.outbox.set(alert.id, alert);
    return this.persist(alert);
  }

  /**
   * Retry alerts left in the outbox, oldest first. Returns the alerts that
   * were newly stored.
   *
   * @throws TransientIOError on the first alert that still cannot be stored
   */
  async retryPending(): Promise<Alert[]> {
    const stored: Alert[] = [];
    for (const alert of Array.from(this.outbox.values())) {
      if (await this.persist(alert)) stored.push(alert);
    }
    return stored;
  }

  hasPending(): boolean {
    return this.outbox.size > 0;
  }

  /**
   * Wait for outstanding notification deliveries
   */
  async flush(): Promise<void> {
    await this.dispatcher?.flush();
  }

  /** Alerts newly stored by this process */
  getPersistedCount(): number {
    return this.persisted;
  }

  getStats(): AlertSinkStats {
    return { persisted: this.persisted, alreadyStored: this.alreadyStored, pending: this.outbox.size };
  }

  private async persist(alert: Alert): Promise<boolean> {
    let inserted: boolean;
    try {
      inserted = await retryWithBackoff(() => this.store.insertAlert(alert), {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Retrying alert insert", { alertId: alert.id, attempt, delayMs, ...errorContext(error) });
        },
      });
    } catch (error) {
      this.logger.error("Failed to persist alert", { alertId: alert.id, ...errorContext(error) });
      throw new TransientIOError("insertAlert", error);
    }

    this.outbox.delete(alert.id);

    if (!inserted) {
      // Stored by an earlier run; it was notified then
      this.alreadyStored++;
      this.logger.debug("Alert already stored", { alertId: alert.id });
      return false;
    }

    this.persisted++;
    this.logger.info("Alert created", {
      alertId: alert.id,
      alertType: alert.alertType,
      severity: alert.severity,
      entityId: alert.entityId,
    });
    this.dispatcher?.dispatch(alert);
    return true;
  }
}

export function createAlertSink(config: AlertSinkConfig): AlertSink {
  return new AlertSink(config);
}
