/**
 * Notification channel contract
 */

import type { Alert } from "../types/risk";
import type { NotificationDeliveryError } from "../utils/errors";

export type DeliveryResult =
  | { success: true; channel: string; deliveredAt: Date; providerId?: string }
  | { success: false; channel: string; error: NotificationDeliveryError };

/**
 * One delivery target. `deliver` reports failures in its result and does not
 * throw.
 */
export interface NotificationChannel {
  readonly name: string;
  deliver(alert: Alert): Promise<DeliveryResult>;
}
