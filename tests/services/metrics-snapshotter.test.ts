import { describe, it, expect, vi, afterEach } from "vitest";
import { MetricsSnapshotter } from "../../src/services/metrics-snapshotter";
import { createSilentLogger } from "../../src/utils/logger";
import { InMemoryRiskStore } from "../fakes/in-memory-store";

const NOW = new Date("2024-01-15T14:30:10Z");

const totals = {
  totalTransactions: 12,
  totalExposure: 345_000,
  activeClients: 4,
  activeSymbols: 3,
  highRiskClients: 1,
  highRiskSymbols: 0,
};

function setup(store = new InMemoryRiskStore()) {
  const snapshotter = new MetricsSnapshotter({
    store,
    totals: () => totals,
    alertsGenerated: () => 2,
    intervalMs: 1000,
    logger: createSilentLogger(),
    now: () => NOW,
  });
  return { store, snapshotter };
}

describe("MetricsSnapshotter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should build a snapshot from the rollup", () => {
    expect(setup().snapshotter.buildSnapshot()).toEqual({ timestamp: NOW, ...totals, alertsGenerated: 2 });
  });

  it("should store the snapshot and emit it", async () => {
    const { store, snapshotter } = setup();
    const emitted = vi.fn();
    snapshotter.on("snapshot:created", emitted);

    const snapshot = await snapshotter.takeSnapshot();

    expect(store.snapshots).toEqual([snapshot]);
    expect(emitted).toHaveBeenCalledWith(snapshot);
    expect(snapshotter.getStats()).toEqual({ snapshotsWritten: 1, failures: 0, lastSnapshotAt: NOW });
  });

  it("should count a failed write without throwing", async () => {
    const store = new InMemoryRiskStore();
    store.failNext("insertMetricsSnapshot");
    const { snapshotter } = setup(store);

    expect(await snapshotter.takeSnapshot()).toBeNull();
    expect(snapshotter.getStats().failures).toBe(1);
  });

  it("should write on every interval until stopped", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const { store, snapshotter } = setup();
    const tick = async (): Promise<void> => {
      vi.advanceTimersByTime(1000);
      await new Promise((resolve) => setTimeout(resolve, 0));
    };

    snapshotter.start();
    expect(snapshotter.isRunning()).toBe(true);
    await tick();
    await tick();
    await tick();
    await snapshotter.stop();
    await tick();

    expect(store.snapshots).toHaveLength(3);
    expect(snapshotter.isRunning()).toBe(false);
  });
});
