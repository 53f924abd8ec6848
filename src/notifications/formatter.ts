/**
 * Alert message formatting shared by the notification channels
 */

import { AlertSeverity, type Alert } from "../types/risk";
import { formatUsd } from "../utils/format";

/** Attachment colour per severity */
export const SEVERITY_COLORS: Record<AlertSeverity, string> = {
  [AlertSeverity.LOW]: "#36a64f",
  [AlertSeverity.MEDIUM]: "#ff9900",
  [AlertSeverity.HIGH]: "#ff6600",
  [AlertSeverity.CRITICAL]: "#ff0000",
};

export function formatAlertTitle(alert: Alert): string {
  return `${alert.alertType} - ${alert.severity}`;
}

export function formatMetric(value: number | null): string {
  return value === null ? "n/a" : formatUsd(value);
}

/**
 * Plain-text body used by email and console output
 */
export function formatAlertText(alert: Alert): string {
  return [
    `RISK ALERT - ${alert.severity}`,
    "",
    `Type: ${alert.alertType}`,
    `Entity: ${alert.entityType} - ${alert.entityId}`,
    `Time: ${alert.timestamp.toISOString()}`,
    "",
    alert.message,
    "",
    `Threshold: ${formatMetric(alert.thresholdValue)}`,
    `Current Value: ${formatMetric(alert.currentValue)}`,
  ].join("\n");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatAlertHtml(alert: Alert): string {
  const color = SEVERITY_COLORS[alert.severity];
  const rows: Array<[string, string]> = [
    ["Type", alert.alertType],
    ["Entity", `${alert.entityType} - ${alert.entityId}`],
    ["Time", alert.timestamp.toISOString()],
    ["Threshold", formatMetric(alert.thresholdValue)],
    ["Current Value", formatMetric(alert.currentValue)],
  ];

  const tableRows = rows
    .map(([label, value]) => `<tr><td><strong>${escapeHtml(label)}</strong></td><td>${escapeHtml(value)}</td></tr>`)
    .join("");

  return [
    `<h2 style="color:${color}">Risk Alert - ${escapeHtml(alert.severity)}</h2>`,
    `<p>${escapeHtml(alert.message)}</p>`,
    `<table>${tableRows}</table>`,
  ].join("");
}

export interface SlackAttachmentField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackPayload {
  text: string;
  attachments: Array<{
    color: string;
    title: string;
    text: string;
    fields: SlackAttachmentField[];
    ts: number;
  }>;
}

/**
 * Slack-compatible incoming webhook payload
 */
export function buildSlackPayload(alert: Alert): SlackPayload {
  return {
    text: `Risk alert: ${alert.alertType}`,
    attachments: [
      {
        color: SEVERITY_COLORS[alert.severity],
        title: formatAlertTitle(alert),
        text: alert.message,
        fields: [
          { title: "Entity", value: `${alert.entityType}: ${alert.entityId}`, short: true },
          { title: "Severity", value: alert.severity, short: true },
          { title: "Threshold", value: formatMetric(alert.thresholdValue), short: true },
          { title: "Current Value", value: formatMetric(alert.currentValue), short: true },
        ],
        ts: Math.floor(alert.timestamp.getTime() / 1000),
      },
    ],
  };
}
