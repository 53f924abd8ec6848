/**
 * Alert management commands: summary, list, ack and cleanup.
 */

import type { RiskReadModel } from "../services/risk-read-model";
import { isAlertSeverity, type Alert } from "../types/risk";

export type Printer = (line: string) => void;

export const ALERT_MANAGER_USAGE = [
  "Alert Manager CLI",
  "",
  "Usage:",
  "  alert-manager summary              Show alert summary",
  "  alert-manager list [severity]      List unacknowledged alerts",
  "  alert-manager ack <id> [user]      Acknowledge an alert",
  "  alert-manager cleanup [days]       Delete acknowledged alerts older than days (default 30)",
];

const SEPARATOR = "-".repeat(60);

export function formatAlertEntry(alert: Alert): string[] {
  return [
    `ID: ${alert.id}`,
    `Time: ${alert.timestamp.toISOString()}`,
    `Severity: ${alert.severity}`,
    `Type: ${alert.alertType}`,
    `Message: ${alert.message}`,
    SEPARATOR,
  ];
}

/**
 * Run one command. Resolves the process exit code.
 */
export async function runAlertCommand(
  args: readonly string[],
  readModel: Pick<RiskReadModel, "getAlertSummary" | "getAlerts" | "acknowledgeAlert" | "cleanupAcknowledged">,
  print: Printer
): Promise<number> {
  const [command, ...rest] = args;

  switch (command) {
    case "summary": {
      const summary = await readModel.getAlertSummary();
      print("=== Alert Summary ===");
      print(`Total Alerts: ${summary.total}`);
      print(`Unacknowledged: ${summary.unacknowledged}`);
      print("By Severity:");
      for (const [severity, count] of Object.entries(summary.bySeverity)) {
        print(`  ${severity}: ${count}`);
      }
      print("By Type:");
      for (const [alertType, count] of Object.entries(summary.byType)) {
        print(`  ${alertType}: ${count}`);
      }
      return 0;
    }

    case "list": {
      const severityArg = rest[0]?.toUpperCase();
      const severity = severityArg === undefined ? undefined : isAlertSeverity(severityArg) ? severityArg : null;
      if (severity === null) {
        print(`Unknown severity: ${rest[0]}`);
        return 1;
      }
      const alerts = await readModel.getAlerts({ acknowledged: false, severity }, 100);
      print(severity ? `=== Unacknowledged Alerts (${severity}) ===` : "=== Unacknowledged Alerts ===");
      for (const alert of alerts) {
        for (const line of formatAlertEntry(alert)) print(line);
      }
      return 0;
    }

    case "ack": {
      const [alertId, user = "system"] = rest;
      if (!alertId) {
        print("Usage: alert-manager ack <id> [user]");
        return 1;
      }
      if (await readModel.acknowledgeAlert(alertId, user)) {
        print(`Alert ${alertId} acknowledged by ${user}`);
        return 0;
      }
      print(`No unacknowledged alert with id ${alertId}`);
      return 1;
    }

    case "cleanup": {
      const days = rest[0] === undefined ? 30 : Number(rest[0]);
      if (!Number.isInteger(days) || days < 1) {
        print(`Invalid number of days: ${rest[0]}`);
        return 1;
      }
      const deleted = await readModel.cleanupAcknowledged(days);
      print(`Deleted ${deleted} acknowledged alerts older than ${days} days`);
      return 0;
    }

    default:
      if (command !== undefined) print(`Unknown command: ${command}`);
      for (const line of ALERT_MANAGER_USAGE) print(line);
      return 1;
  }
}
