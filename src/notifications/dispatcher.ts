/**
 * Notification Dispatcher
 *
 * Fans each alert out to every configured channel without blocking the
 * caller. Channels are independent: each one is retried with exponential
 * backoff on its own, and a channel that keeps failing is logged and dropped
 * for that alert.
 */

import { EventEmitter } from "events";
import type { Alert } from "../types/risk";
import { NotificationDeliveryError } from "../utils/errors";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";
import { retryWithBackoff } from "../utils/retry";
import type { DeliveryResult, NotificationChannel } from "./types";

export interface NotificationDispatcherConfig {
  channels: NotificationChannel[];
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry, doubled each time (default: 1000) */
  retryDelayMs?: number;
  logger?: Logger;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface DispatcherStats {
  dispatched: number;
  delivered: number;
  failed: number;
  pending: number;
}

export interface DeliveryFailedEvent {
  alertId: string;
  channel: string;
  error: NotificationDeliveryError;
  attempts: number;
}

export class NotificationDispatcher extends EventEmitter {
  private readonly channels: NotificationChannel[];
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly pending: Set<Promise<void>> = new Set();
  private stats = { dispatched: 0, delivered: 0, failed: 0 };

  constructor(config: NotificationDispatcherConfig) {
    super();
    this.channels = [...config.channels];
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.logger = config.logger ?? createServiceLogger("NotificationDispatcher");
    this.sleep = config.sleep;
  }

  getChannelNames(): string[] {
    return this.channels.map((channel) => channel.name);
  }

  /**
   * Start delivery to every channel and return immediately
   */
  dispatch(alert: Alert): void {
    this.stats.dispatched++;

    for (const channel of this.channels) {
      const delivery = this.deliverWithRetry(channel, alert).finally(() => {
        this.pending.delete(delivery);
      });
      this.pending.add(delivery);
    }
  }

  /**
   * Wait for every in-flight delivery to finish
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  getStats(): DispatcherStats {
    return { ...this.stats, pending: this.pending.size };
  }

  private async deliverWithRetry(channel: NotificationChannel, alert: Alert): Promise<void> {
    let attempts = 0;

    try {
      const result = await retryWithBackoff<DeliveryResult>(
        async (attempt) => {
          attempts = attempt;
          const outcome = await channel.deliver(alert);
          if (!outcome.success) {
            throw outcome.error;
          }
          return outcome;
        },
        {
          maxAttempts: this.maxRetries + 1,
          baseDelayMs: this.retryDelayMs,
          shouldRetry: (error) => !(error instanceof NotificationDeliveryError) || error.retryable,
          onRetry: (error, attempt, delayMs) => {
            this.logger.debug("Retrying notification", {
              channel: channel.name,
              alertId: alert.id,
              attempt,
              delayMs,
              ...errorContext(error),
            });
          },
          sleep: this.sleep,
        }
      );

      this.stats.delivered++;
      this.emit("delivered", { alertId: alert.id, channel: channel.name, result });
    } catch (error) {
      const deliveryError =
        error instanceof NotificationDeliveryError
          ? error
          : new NotificationDeliveryError(channel.name, error instanceof Error ? error.message : String(error), {
              cause: error,
            });

      this.stats.failed++;
      this.logger.warn("Notification dropped", {
        channel: channel.name,
        alertId: alert.id,
        attempts,
        statusCode: deliveryError.statusCode,
        ...errorContext(deliveryError),
      });

      const event: DeliveryFailedEvent = { alertId: alert.id, channel: channel.name, error: deliveryError, attempts };
      this.emit("failed", event);
    }
  }
}

export function createNotificationDispatcher(config: NotificationDispatcherConfig): NotificationDispatcher {
  return new NotificationDispatcher(config);
}
