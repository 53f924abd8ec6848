/**
 * Email channel
 *
 * Sends plain-text and HTML alert messages through Resend.
 */

import { Resend } from "resend";
import type { Alert } from "../../types/risk";
import { NotificationDeliveryError } from "../../utils/errors";
import { formatAlertHtml, formatAlertText } from "../formatter";
import type { DeliveryResult, NotificationChannel } from "../types";

export interface EmailPayload {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface EmailSendResponse {
  data: { id: string } | null;
  error: { message: string; name?: string } | null;
}

/**
 * The part of the Resend client this channel uses
 */
export interface EmailSender {
  send(payload: EmailPayload): Promise<EmailSendResponse>;
}

export interface EmailChannelConfig {
  from: string;
  to: string[];
  /** Required unless `sender` is given */
  apiKey?: string;
  /** Injectable for tests */
  sender?: EmailSender;
}

/**
 * Wrap a Resend client as an `EmailSender`
 */
export function createResendSender(apiKey: string): EmailSender {
  const resend = new Resend(apiKey);
  return {
    send: (payload) => resend.emails.send(payload),
  };
}

const NON_RETRYABLE_ERRORS = new Set(["validation_error", "missing_required_field", "invalid_from_address"]);

export class EmailChannel implements NotificationChannel {
  readonly name = "email";
  private readonly from: string;
  private readonly to: string[];
  private readonly sender: EmailSender;

  constructor(config: EmailChannelConfig) {
    if (config.to.length === 0) {
      throw new RangeError("Email channel needs at least one recipient");
    }
    if (!config.sender && !config.apiKey) {
      throw new RangeError("Email channel needs an API key or a sender");
    }

    this.from = config.from;
    this.to = [...config.to];
    this.sender = config.sender ?? createResendSender(config.apiKey ?? "");
  }

  async deliver(alert: Alert): Promise<DeliveryResult> {
    const payload: EmailPayload = {
      from: this.from,
      to: this.to,
      subject: `Risk Alert: ${alert.alertType} - ${alert.severity}`,
      text: formatAlertText(alert),
      html: formatAlertHtml(alert),
    };

    try {
      const response = await this.sender.send(payload);

      if (response.error) {
        const retryable = !NON_RETRYABLE_ERRORS.has(response.error.name ?? "");
        return {
          success: false,
          channel: this.name,
          error: new NotificationDeliveryError(this.name, response.error.message, { retryable }),
        };
      }

      return {
        success: true,
        channel: this.name,
        deliveredAt: new Date(),
        providerId: response.data?.id,
      };
    } catch (error) {
      return {
        success: false,
        channel: this.name,
        error: new NotificationDeliveryError(
          this.name,
          `Failed to send email: ${error instanceof Error ? error.message : String(error)}`,
          { retryable: true, cause: error }
        ),
      };
    }
  }
}

export function createEmailChannel(config: EmailChannelConfig): EmailChannel {
  return new EmailChannel(config);
}
