import { describe, it, expect } from "vitest";
import { AlertRepository, buildAlertWhere, toAlert } from "../../src/db/alerts";
import { AlertSeverity, AlertType, EntityType, type Alert } from "../../src/types/risk";
import { DataIntegrityError } from "../../src/utils/errors";
import { createFakeDatabase } from "../fakes/fake-database";

function alertRow(
  overrides: { alert_type?: string; severity?: string; threshold_value?: string | null; current_value?: string | null } = {}
) {
  return {
    alert_id: "HIGH_CLIENT_EXPOSURE:C1:5",
    timestamp: new Date("2024-01-15T14:30:00Z"),
    alert_type: "HIGH_CLIENT_EXPOSURE",
    severity: "CRITICAL",
    entity_type: "CLIENT",
    entity_id: "C1",
    message: "Client C1 exposure above threshold",
    threshold_value: "1000000.00",
    current_value: "1200000.00",
    acknowledged: false,
    acknowledged_at: null,
    acknowledged_by: null,
    ...overrides,
  };
}

const sampleAlert: Alert = {
  id: "HIGH_SYMBOL_EXPOSURE:AAPL:3",
  timestamp: new Date("2024-01-15T14:30:00Z"),
  alertType: AlertType.HIGH_SYMBOL_EXPOSURE,
  severity: AlertSeverity.HIGH,
  entityType: EntityType.SYMBOL,
  entityId: "AAPL",
  message: "Symbol AAPL exposure above threshold",
  thresholdValue: 500000,
  currentValue: 450000,
  acknowledged: false,
};

describe("Alert persistence", () => {
  describe("buildAlertWhere", () => {
    it("should return an empty clause without filters", () => {
      expect(buildAlertWhere({})).toEqual({ clause: "", params: [] });
    });

    it("should number parameters in filter order", () => {
      const since = new Date("2024-01-01T00:00:00Z");
      expect(
        buildAlertWhere({ acknowledged: false, severity: AlertSeverity.HIGH, entityId: "C1", since })
      ).toEqual({
        clause: "WHERE acknowledged = $1 AND severity = $2 AND entity_id = $3 AND timestamp >= $4",
        params: [false, "HIGH", "C1", since],
      });
    });

    it("should use an exclusive upper bound", () => {
      const until = new Date("2024-02-01T00:00:00Z");
      expect(buildAlertWhere({ alertType: AlertType.ANOMALY_DETECTED, until })).toEqual({
        clause: "WHERE alert_type = $1 AND timestamp < $2",
        params: ["ANOMALY_DETECTED", until],
      });
    });
  });

  describe("toAlert", () => {
    it("should parse numeric columns", () => {
      const alert = toAlert(alertRow());
      expect(alert.thresholdValue).toBe(1_000_000);
      expect(alert.currentValue).toBe(1_200_000);
      expect(alert.alertType).toBe(AlertType.HIGH_CLIENT_EXPOSURE);
      expect(alert.severity).toBe(AlertSeverity.CRITICAL);
      expect(alert.entityType).toBe(EntityType.CLIENT);
    });

    it("should keep null thresholds", () => {
      const alert = toAlert(alertRow({ threshold_value: null, current_value: null }));
      expect(alert.thresholdValue).toBeNull();
      expect(alert.currentValue).toBeNull();
    });

    it("should reject an alert type it does not know", () => {
      expect(() => toAlert(alertRow({ alert_type: "MARGIN_CALL" }))).toThrow(DataIntegrityError);
      expect(() => toAlert(alertRow({ alert_type: "MARGIN_CALL" }))).toThrow(
        "Stored alert_type has unknown value MARGIN_CALL"
      );
    });

    it("should reject a severity it does not know", () => {
      expect(() => toAlert(alertRow({ severity: "URGENT" }))).toThrow("Stored severity has unknown value URGENT");
    });
  });

  describe("AlertRepository", () => {
    it("should report a new insert", async () => {
      const fake = createFakeDatabase();
      fake.respond([], 1);

      expect(await new AlertRepository(fake.db).insert(sampleAlert)).toBe(true);
      expect(fake.queries[0]?.sql).toContain("ON CONFLICT (alert_id) DO NOTHING");
      expect(fake.queries[0]?.params).toEqual([
        "HIGH_SYMBOL_EXPOSURE:AAPL:3",
        sampleAlert.timestamp,
        "HIGH_SYMBOL_EXPOSURE",
        "HIGH",
        "SYMBOL",
        "AAPL",
        "Symbol AAPL exposure above threshold",
        500000,
        450000,
        false,
      ]);
    });

    it("should report an existing id as not inserted", async () => {
      const fake = createFakeDatabase();
      fake.respond([], 0);
      expect(await new AlertRepository(fake.db).insert(sampleAlert)).toBe(false);
    });

    it("should append the limit after the filter parameters", async () => {
      const fake = createFakeDatabase();
      fake.respond([alertRow()]);

      const alerts = await new AlertRepository(fake.db).findMany({ severity: AlertSeverity.CRITICAL }, 20);

      expect(alerts).toHaveLength(1);
      expect(alerts[0]?.id).toBe("HIGH_CLIENT_EXPOSURE:C1:5");
      expect(fake.queries[0]?.sql).toBe(
        "SELECT * FROM alerts WHERE severity = $1 ORDER BY timestamp DESC LIMIT $2"
      );
      expect(fake.queries[0]?.params).toEqual(["CRITICAL", 20]);
    });

    it("should return null for an unknown id", async () => {
      const fake = createFakeDatabase();
      expect(await new AlertRepository(fake.db).findById("missing")).toBeNull();
    });

    it("should acknowledge only unacknowledged alerts", async () => {
      const fake = createFakeDatabase();
      fake.respond([], 1);
      fake.respond([], 0);
      const repository = new AlertRepository(fake.db);

      expect(await repository.acknowledge("a1", "analyst")).toBe(true);
      expect(await repository.acknowledge("a1", "analyst")).toBe(false);
      expect(fake.queries[0]?.sql).toContain("WHERE alert_id = $1 AND acknowledged = FALSE");
      expect(fake.queries[0]?.params).toEqual(["a1", "analyst"]);
    });

    it("should skip the query when acknowledging no ids", async () => {
      const fake = createFakeDatabase();
      expect(await new AlertRepository(fake.db).acknowledgeMany([])).toBe(0);
      expect(fake.queries).toHaveLength(0);
    });

    it("should build the summary from three queries", async () => {
      const fake = createFakeDatabase();
      fake.respond([{ total: "12", unacknowledged: "5" }]);
      fake.respond([
        { severity: "HIGH", count: "3" },
        { severity: "CRITICAL", count: "2" },
      ]);
      fake.respond([
        { alert_type: "HIGH_CLIENT_EXPOSURE", count: "4" },
        { alert_type: "UNKNOWN_TYPE", count: "1" },
      ]);

      expect(await new AlertRepository(fake.db).summary()).toEqual({
        total: 12,
        unacknowledged: 5,
        bySeverity: { HIGH: 3, CRITICAL: 2 },
        byType: { HIGH_CLIENT_EXPOSURE: 4 },
      });
    });

    it("should delete by age in days", async () => {
      const fake = createFakeDatabase();
      fake.respond([], 7);
      expect(await new AlertRepository(fake.db).deleteOldAcknowledged(30)).toBe(7);
      expect(fake.queries[0]?.params).toEqual([30]);
    });
  });
});
