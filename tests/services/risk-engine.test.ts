import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildRiskEngineConfig, type EnvSource } from "../../config/env";
import { VelocityTracker } from "../../src/detection/velocity-tracker";
import { NotificationDispatcher } from "../../src/notifications/dispatcher";
import { RiskEngine, lockKeysFor } from "../../src/services/risk-engine";
import { AlertSeverity, AlertType, EntityType, type Alert } from "../../src/types/risk";
import { TransientIOError } from "../../src/utils/errors";
import { createSilentLogger } from "../../src/utils/logger";
import { InMemoryRiskStore } from "../fakes/in-memory-store";
import { BASE_TIME, makeRow, makeTransaction, resetTransactionIds } from "../fixtures/transactions";

function createEngine(
  env: EnvSource = {},
  store = new InMemoryRiskStore(),
  components?: ConstructorParameters<typeof RiskEngine>[0]["components"]
) {
  const dispatcher = new NotificationDispatcher({ channels: [], logger: createSilentLogger() });
  const engine = new RiskEngine({
    config: buildRiskEngineConfig(env),
    store,
    dispatcher,
    logger: createSilentLogger(),
    components,
  });
  const created: Alert[] = [];
  engine.on("alert:created", (alert: Alert) => created.push(alert));
  return { engine, store, created };
}

describe("RiskEngine", () => {
  beforeEach(() => {
    resetTransactionIds();
  });

  it("should lock the client and the symbol of a transaction", () => {
    expect(lockKeysFor({ clientId: "C1", symbol: "AAPL" })).toEqual(["client:C1", "symbol:AAPL"]);
  });

  describe("runCycle", () => {
    it("should do nothing on an empty feed", async () => {
      const { engine, store } = createEngine();

      const result = await engine.runCycle();

      expect(result).toMatchObject({ read: 0, processed: 0, committed: true, marker: { timestamp: 0, transactionId: 0 } });
      expect(store.commits).toBe(0);
    });

    it("should apply a batch and commit exposures with the checkpoint", async () => {
      const { engine, store } = createEngine();
      for (let i = 0; i < 3; i++) store.addTransaction(makeTransaction());

      const result = await engine.runCycle();

      expect(result).toMatchObject({ read: 3, processed: 3, duplicates: 0, rejected: 0, committed: true });
      expect(result.alerts).toEqual([]);
      expect(result.marker).toEqual({ timestamp: BASE_TIME + 3000, transactionId: 3 });
      expect(store.checkpoint).toEqual({ timestamp: BASE_TIME + 3000, transactionId: 3 });
      expect(store.clientRows.get("C1")?.totalExposure).toBe(3000);
      expect(store.symbolRows.get("AAPL")?.transactionCount).toBe(3);
    });

    it("should persist the replay ledger and compact it after the commit", async () => {
      const { engine, store } = createEngine();
      store.addTransaction(makeTransaction());
      store.addTransaction(makeTransaction());

      await engine.runCycle();

      expect(store.clientRows.get("C1")?.ledger.applied).toEqual([
        { timestamp: BASE_TIME + 1000, transactionId: 1 },
        { timestamp: BASE_TIME + 2000, transactionId: 2 },
      ]);
      expect(engine.aggregator.readState().clients[0]?.ledger).toEqual({
        floor: { timestamp: BASE_TIME + 2000, transactionId: 2 },
        applied: [],
      });
    });

    it("should drop velocity windows that went idle during the cycle", async () => {
      const { engine, store } = createEngine();
      store.addTransaction(makeTransaction({ clientId: "C1" }));
      store.addTransaction(makeTransaction({ clientId: "C2" }));
      await engine.runCycle();
      expect(engine.getStats().trackedClients).toBe(2);

      store.addTransaction(makeTransaction({ id: 3, clientId: "C2", timestamp: new Date(BASE_TIME + 90_000) }));
      await engine.runCycle();

      expect(engine.getStats()).toMatchObject({
        trackedClients: 1,
        trackedSymbols: 1,
        deduplication: { admitted: 0, escalated: 0, suppressed: 0, cachedKeys: 0 },
      });
      expect(engine.velocityTracker.record("C2", BASE_TIME + 90_000)).toBe(2);
    });

    it("should raise a critical client exposure alert", async () => {
      const { engine, store, created } = createEngine();
      store.addTransaction(makeTransaction({ quantity: 10_000, price: 120 }));

      await engine.runCycle();

      const clientAlerts = created.filter((a) => a.alertType === AlertType.HIGH_CLIENT_EXPOSURE);
      expect(clientAlerts).toHaveLength(1);
      expect(clientAlerts[0]).toEqual({
        id: "HIGH_CLIENT_EXPOSURE:C1:1",
        timestamp: new Date(BASE_TIME + 1000),
        alertType: AlertType.HIGH_CLIENT_EXPOSURE,
        severity: AlertSeverity.CRITICAL,
        entityType: EntityType.CLIENT,
        entityId: "C1",
        message: "Client C1 exposure $1,200,000.00 reached CRITICAL against threshold $1,000,000.00",
        thresholdValue: 1_000_000,
        currentValue: 1_200_000,
        acknowledged: false,
      });
      expect(store.alerts.has("HIGH_CLIENT_EXPOSURE:C1:1")).toBe(true);
      expect(store.alerts.has("HIGH_SYMBOL_EXPOSURE:AAPL:1")).toBe(true);
    });

    it("should skip rejected rows and still move the cursor", async () => {
      const { engine, store } = createEngine();
      store.addTransaction(makeTransaction());
      store.transactions.push(makeRow({ transaction_id: 2, timestamp: new Date(BASE_TIME + 2000), side: "HOLD" }));

      const result = await engine.runCycle();

      expect(result).toMatchObject({ read: 2, rejected: 1, processed: 1 });
      expect(engine.getCursor()).toEqual({ timestamp: BASE_TIME + 2000, transactionId: 2 });
      expect(engine.getStats().transactionsRejected).toBe(1);
    });

    it("should surface feed failures without moving the cursor", async () => {
      const { engine, store } = createEngine();
      store.failNext("readTransactionsSince");

      const cycle = engine.runCycle();

      await expect(cycle).rejects.toBeInstanceOf(TransientIOError);
      await expect(cycle).rejects.toThrow("readTransactionsSince failed: readTransactionsSince unavailable");
      expect(engine.getCursor()).toEqual({ timestamp: 0, transactionId: 0 });
    });

    it("should defer the checkpoint until every alert is stored", async () => {
      const { engine, store, created } = createEngine();
      store.addTransaction(makeTransaction({ quantity: 10_000, price: 120 }));
      store.failNext("insertAlert", 3);

      const first = await engine.runCycle();

      expect(first.committed).toBe(false);
      expect(store.checkpoint).toBeNull();
      expect(created.map((a) => a.id)).toEqual(["HIGH_SYMBOL_EXPOSURE:AAPL:1"]);

      const second = await engine.runCycle();

      expect(second.committed).toBe(true);
      expect(store.checkpoint).toEqual({ timestamp: BASE_TIME + 1000, transactionId: 1 });
      expect(created.map((a) => a.id)).toEqual(["HIGH_SYMBOL_EXPOSURE:AAPL:1", "HIGH_CLIENT_EXPOSURE:C1:1"]);
    });
  });

  describe("processBatch", () => {
    it("should not count a replayed transaction twice", async () => {
      const { engine } = createEngine();
      const tx = makeTransaction();

      await engine.processBatch([tx]);
      const replay = await engine.processBatch([tx]);

      expect(replay).toMatchObject({ processed: 0, duplicates: 1 });
      expect(engine.aggregator.snapshot(EntityType.CLIENT, "C1")?.totalExposure).toBe(1000);
    });

    it("should alert on velocity and escalate within the cooldown", async () => {
      const { engine } = createEngine({ TRANSACTION_VELOCITY_THRESHOLD: "3" });
      const batch = Array.from({ length: 7 }, () => makeTransaction());

      const result = await engine.processBatch(batch);

      const velocity = result.alerts
        .filter((a) => a.alertType === AlertType.HIGH_TRANSACTION_VELOCITY)
        .sort((a, b) => a.id.localeCompare(b.id));
      expect(velocity.map((a) => [a.id, a.severity])).toEqual([
        ["HIGH_TRANSACTION_VELOCITY:C1:4", AlertSeverity.MEDIUM],
        ["HIGH_TRANSACTION_VELOCITY:C1:7", AlertSeverity.HIGH],
      ]);
      expect(velocity[0]?.message).toBe("Client C1 has 4 transactions in last 60s (threshold: 3)");
      expect(velocity[0]?.currentValue).toBe(4);
      expect(velocity[0]?.thresholdValue).toBe(3);
      expect(result.suppressed).toBe(2);
    });

    it("should flag a value far outside the symbol baseline", async () => {
      const { engine } = createEngine();
      const quantities = [100, 110, 90, 105, 95];
      const baseline = quantities.map((quantity, i) => makeTransaction({ clientId: `C${i}`, symbol: "MSFT", quantity }));
      const outlier = makeTransaction({ clientId: "C9", symbol: "MSFT", quantity: 200 });

      const result = await engine.processBatch([...baseline, outlier]);

      expect(result.alerts).toHaveLength(1);
      const anomaly = result.alerts[0];
      expect(anomaly?.id).toBe("ANOMALY_DETECTED:MSFT:6");
      expect(anomaly?.severity).toBe(AlertSeverity.CRITICAL);
      expect(anomaly?.entityType).toBe(EntityType.SYMBOL);
      expect(anomaly?.currentValue).toBe(2000);
      expect(anomaly?.thresholdValue).toBeCloseTo(1000 + 3 * Math.sqrt(5000), 6);
    });

    it("should report a failing rule as a system alert", async () => {
      const velocityTracker = new VelocityTracker();
      vi.spyOn(velocityTracker, "record").mockImplementation(() => {
        throw new Error("window corrupted");
      });
      const { engine } = createEngine({}, new InMemoryRiskStore(), { velocityTracker });

      const result = await engine.processBatch([makeTransaction()]);

      expect(result.ruleFailures).toBe(1);
      expect(result.alerts).toEqual([
        {
          id: "RULE_EVALUATION_FAILURE:RULE_EVALUATOR:velocity:1",
          timestamp: new Date(BASE_TIME + 1000),
          alertType: AlertType.RULE_EVALUATION_FAILURE,
          severity: AlertSeverity.CRITICAL,
          entityType: EntityType.SYSTEM,
          entityId: "RULE_EVALUATOR:velocity",
          message: "Rule velocity failed for transaction 1: window corrupted",
          thresholdValue: null,
          currentValue: null,
          acknowledged: false,
        },
      ]);
      expect(engine.aggregator.snapshot(EntityType.CLIENT, "C1")?.totalExposure).toBe(1000);
    });
  });

  describe("restart", () => {
    it("should restore exposures and the cursor", async () => {
      const store = new InMemoryRiskStore();
      const first = createEngine({}, store).engine;
      store.addTransaction(makeTransaction());
      store.addTransaction(makeTransaction());
      await first.runCycle();

      const second = createEngine({}, store).engine;
      const result = await second.runCycle();

      expect(result.read).toBe(0);
      expect(second.getCursor()).toEqual({ timestamp: BASE_TIME + 2000, transactionId: 2 });
      expect(second.aggregator.snapshot(EntityType.CLIENT, "C1")?.totalExposure).toBe(2000);
    });

    it("should skip redelivered transactions when the checkpoint is behind", async () => {
      const store = new InMemoryRiskStore();
      store.addTransaction(makeTransaction());
      store.addTransaction(makeTransaction());
      await createEngine({}, store).engine.runCycle();
      store.checkpoint = null;

      const second = createEngine({}, store).engine;
      const result = await second.runCycle();

      expect(result).toMatchObject({ read: 2, processed: 0, duplicates: 2 });
      expect(second.aggregator.snapshot(EntityType.CLIENT, "C1")?.totalExposure).toBe(2000);
      expect(store.checkpoint).toEqual({ timestamp: BASE_TIME + 2000, transactionId: 2 });
    });

    it("should fail startup when state cannot be loaded", async () => {
      const { engine, store } = createEngine();
      store.failNext("loadExposures");

      await expect(engine.initialize()).rejects.toThrow("hydrate failed: loadExposures unavailable");
    });
  });

  describe("lifecycle", () => {
    it("should poll until stopped and store the checkpoint", async () => {
      const { engine, store } = createEngine();
      store.addTransaction(makeTransaction());

      await engine.start();
      expect(engine.getStats().isRunning).toBe(true);
      await vi.waitFor(() => expect(engine.getStats().cyclesCompleted).toBeGreaterThanOrEqual(1));
      await engine.stop();

      expect(engine.getStats().isRunning).toBe(false);
      expect(store.checkpoint).toEqual({ timestamp: BASE_TIME + 1000, transactionId: 1 });
      expect(engine.snapshotter.isRunning()).toBe(false);
    });
  });
});
