/**
 * Alert deduplication with severity escalation.
 *
 * Keyed by `(alertType, entityId)`. A candidate arriving less than the
 * cooldown after the last emitted alert of its key is suppressed unless its
 * severity is strictly higher. Time is the alert's own timestamp, which is
 * the event time of the triggering transaction.
 */

import { SEVERITY_RANK, type Alert, type AlertSeverity, type AlertType } from "../types/risk";

export interface AlertDeduplicatorConfig {
  /** Cooldown in milliseconds (default: 5 minutes) */
  cooldownMs?: number;
  /** Prune expired keys once the cache grows past this size (default: 10000) */
  pruneThreshold?: number;
}

export type DedupDecision =
  | { action: "emit"; escalation: false }
  | { action: "emit"; escalation: true; previousSeverity: AlertSeverity }
  | { action: "suppress"; previousSeverity: AlertSeverity; lastEmittedAt: number };

interface LastEmitted {
  timestamp: number;
  severity: AlertSeverity;
}

export interface DeduplicatorStats {
  admitted: number;
  escalated: number;
  suppressed: number;
  cachedKeys: number;
}

export class AlertDeduplicator {
  private readonly cache: Map<string, LastEmitted> = new Map();
  private readonly cooldownMs: number;
  private readonly pruneThreshold: number;
  private admitted = 0;
  private escalated = 0;
  private suppressed = 0;

  constructor(config: AlertDeduplicatorConfig = {}) {
    this.cooldownMs = config.cooldownMs ?? 5 * 60 * 1000;
    this.pruneThreshold = config.pruneThreshold ?? 10000;
  }

  static keyOf(alertType: AlertType, entityId: string): string {
    return `${alertType}:${entityId}`;
  }

  /**
   * Decide whether a candidate is emitted. Emitted candidates become the new
   * reference for their key.
   */
  admit(candidate: Pick<Alert, "alertType" | "entityId" | "severity" | "timestamp">): DedupDecision {
    const key = AlertDeduplicator.keyOf(candidate.alertType, candidate.entityId);
    const now = candidate.timestamp.getTime();
    const last = this.cache.get(key);

    if (last && now - last.timestamp < this.cooldownMs) {
      if (SEVERITY_RANK[candidate.severity] <= SEVERITY_RANK[last.severity]) {
        this.suppressed++;
        return { action: "suppress", previousSeverity: last.severity, lastEmittedAt: last.timestamp };
      }

      this.cache.set(key, { timestamp: now, severity: candidate.severity });
      this.admitted++;
      this.escalated++;
      return { action: "emit", escalation: true, previousSeverity: last.severity };
    }

    this.cache.set(key, { timestamp: now, severity: candidate.severity });
    this.admitted++;

    if (this.cache.size > this.pruneThreshold) {
      this.prune(now);
    }

    return { action: "emit", escalation: false };
  }

  /**
   * Remove keys whose cooldown has expired as of `now`
   */
  prune(now: number): number {
    const cutoff = now - this.cooldownMs;
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (entry.timestamp <= cutoff) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getStats(): DeduplicatorStats {
    return {
      admitted: this.admitted,
      escalated: this.escalated,
      suppressed: this.suppressed,
      cachedKeys: this.cache.size,
    };
  }
}

export function createAlertDeduplicator(config?: AlertDeduplicatorConfig): AlertDeduplicator {
  return new AlertDeduplicator(config);
}
