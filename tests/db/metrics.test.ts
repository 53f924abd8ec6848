import { describe, it, expect } from "vitest";
import { MetricsRepository } from "../../src/db/metrics";
import type { RiskMetricsSnapshot } from "../../src/types/risk";
import { createFakeDatabase } from "../fakes/fake-database";

const snapshot: RiskMetricsSnapshot = {
  timestamp: new Date("2024-01-15T14:30:10Z"),
  totalTransactions: 40,
  totalExposure: 1_500_000,
  activeClients: 5,
  activeSymbols: 3,
  highRiskClients: 1,
  highRiskSymbols: 0,
  alertsGenerated: 2,
};

describe("MetricsRepository", () => {
  it("should insert every snapshot field", async () => {
    const fake = createFakeDatabase();
    await new MetricsRepository(fake.db).insert(snapshot);
    expect(fake.queries[0]?.params).toEqual([snapshot.timestamp, 40, 1_500_000, 5, 3, 1, 0, 2]);
  });

  it("should query a half-open range oldest first", async () => {
    const fake = createFakeDatabase();
    fake.respond([
      {
        timestamp: snapshot.timestamp,
        total_transactions: 40,
        total_exposure: "1500000.00",
        active_clients: 5,
        active_symbols: 3,
        high_risk_clients: 1,
        high_risk_symbols: 0,
        alerts_generated: 2,
      },
    ]);
    const since = new Date("2024-01-15T14:00:00Z");
    const until = new Date("2024-01-15T15:00:00Z");

    const series = await new MetricsRepository(fake.db).findRange(since, until, 10);

    expect(series).toEqual([snapshot]);
    expect(fake.queries[0]?.sql).toContain("WHERE timestamp >= $1 AND timestamp < $2 ORDER BY timestamp ASC LIMIT $3");
    expect(fake.queries[0]?.params).toEqual([since, until, 10]);
  });

  it("should return null when there is no snapshot", async () => {
    const fake = createFakeDatabase();
    expect(await new MetricsRepository(fake.db).latest()).toBeNull();
  });
});
