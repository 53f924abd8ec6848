/**
 * Notifications Module
 */

import type { NotificationConfig } from "../../config/env";
import { createEmailChannel } from "./email/client";
import type { NotificationChannel } from "./types";
import { createWebhookChannel } from "./webhook/client";

export type { DeliveryResult, NotificationChannel } from "./types";
export {
  SEVERITY_COLORS,
  formatAlertTitle,
  formatAlertText,
  formatAlertHtml,
  formatMetric,
  buildSlackPayload,
  escapeHtml,
} from "./formatter";
export type { SlackPayload, SlackAttachmentField } from "./formatter";
export { WebhookChannel, createWebhookChannel } from "./webhook/client";
export type { WebhookChannelConfig } from "./webhook/client";
export { EmailChannel, createEmailChannel, createResendSender } from "./email/client";
export type { EmailChannelConfig, EmailPayload, EmailSender, EmailSendResponse } from "./email/client";
export { NotificationDispatcher, createNotificationDispatcher } from "./dispatcher";
export type { NotificationDispatcherConfig, DispatcherStats, DeliveryFailedEvent } from "./dispatcher";

/**
 * Channels enabled by the configuration. The email channel needs an API key,
 * a sender address and at least one recipient.
 */
export function createChannelsFromConfig(config: NotificationConfig): NotificationChannel[] {
  const channels: NotificationChannel[] = [];

  if (config.slackWebhookUrl) {
    channels.push(createWebhookChannel({ webhookUrl: config.slackWebhookUrl, timeoutMs: config.timeoutMs }));
  }

  if (config.resendApiKey && config.emailFrom && config.emailTo.length > 0) {
    channels.push(
      createEmailChannel({ apiKey: config.resendApiKey, from: config.emailFrom, to: config.emailTo })
    );
  }

  return channels;
}
