/**
 * Chat webhook channel
 *
 * Posts Slack-compatible attachment payloads to an incoming webhook URL.
 * 5xx, 429, timeouts and network errors are reported as retryable.
 */

import type { Alert } from "../../types/risk";
import { NotificationDeliveryError } from "../../utils/errors";
import { buildSlackPayload } from "../formatter";
import type { DeliveryResult, NotificationChannel } from "../types";

export interface WebhookChannelConfig {
  webhookUrl: string;
  /** Request timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Injectable for tests */
  fetchImpl?: typeof fetch;
}

export class WebhookChannel implements NotificationChannel {
  readonly name = "webhook";
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: WebhookChannelConfig) {
    this.webhookUrl = config.webhookUrl;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchImpl = config.fetchImpl ?? globalThis.fetch;
  }

  async deliver(alert: Alert): Promise<DeliveryResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildSlackPayload(alert)),
        signal: controller.signal,
      });

      if (!response.ok) {
        return this.failure(`Webhook responded ${response.status} ${response.statusText}`, {
          statusCode: response.status,
          retryable: response.status >= 500 || response.status === 429,
        });
      }

      return { success: true, channel: this.name, deliveredAt: new Date() };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return this.failure(`Request timeout after ${this.timeoutMs}ms`, { retryable: true, cause: error });
      }
      return this.failure(`Request failed: ${error instanceof Error ? error.message : String(error)}`, {
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private failure(
    message: string,
    options: { statusCode?: number; retryable: boolean; cause?: unknown }
  ): DeliveryResult {
    return {
      success: false,
      channel: this.name,
      error: new NotificationDeliveryError(this.name, message, options),
    };
  }
}

export function createWebhookChannel(config: WebhookChannelConfig): WebhookChannel {
  return new WebhookChannel(config);
}
