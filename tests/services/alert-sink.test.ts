import { describe, it, expect, vi } from "vitest";
import { AlertSink } from "../../src/services/alert-sink";
import { TransientIOError } from "../../src/utils/errors";
import { createSilentLogger } from "../../src/utils/logger";
import { makeAlert } from "../fixtures/alerts";
import { InMemoryRiskStore } from "../fakes/in-memory-store";

function setup() {
  const store = new InMemoryRiskStore();
  const dispatcher = { dispatch: vi.fn(), flush: vi.fn().mockResolvedValue(undefined) };
  const sleep = vi.fn().mockResolvedValue(undefined);
  const sink = new AlertSink({ store, dispatcher, logger: createSilentLogger(), sleep });
  return { store, dispatcher, sleep, sink };
}

describe("AlertSink", () => {
  it("should store then dispatch a new alert", async () => {
    const { store, dispatcher, sink } = setup();
    const alert = makeAlert();

    expect(await sink.emit(alert)).toBe(true);

    expect(store.alerts.get(alert.id)).toEqual(alert);
    expect(dispatcher.dispatch).toHaveBeenCalledWith(alert);
    expect(sink.getStats()).toEqual({ persisted: 1, alreadyStored: 0, pending: 0 });
  });

  it("should not notify an alert stored by an earlier run", async () => {
    const { dispatcher, sink } = setup();
    await sink.emit(makeAlert());
    dispatcher.dispatch.mockClear();

    expect(await sink.emit(makeAlert())).toBe(false);

    expect(dispatcher.dispatch).not.toHaveBeenCalled();
    expect(sink.getStats()).toEqual({ persisted: 1, alreadyStored: 1, pending: 0 });
  });

  it("should retry inserts with backoff", async () => {
    const { store, sink, sleep } = setup();
    store.failNext("insertAlert", 2);

    expect(await sink.emit(makeAlert())).toBe(true);
    expect(sleep.mock.calls).toEqual([[200], [400]]);
  });

  it("should keep an alert in the outbox when storing keeps failing", async () => {
    const { store, dispatcher, sink } = setup();
    store.failNext("insertAlert", 3);

    await expect(sink.emit(makeAlert())).rejects.toBeInstanceOf(TransientIOError);

    expect(sink.hasPending()).toBe(true);
    expect(dispatcher.dispatch).not.toHaveBeenCalled();

    const stored = await sink.retryPending();
    expect(stored.map((a) => a.id)).toEqual(["HIGH_CLIENT_EXPOSURE:C1:5"]);
    expect(sink.hasPending()).toBe(false);
    expect(dispatcher.dispatch).toHaveBeenCalledTimes(1);
  });

  it("should flush the dispatcher", async () => {
    const { dispatcher, sink } = setup();
    await sink.flush();
    expect(dispatcher.flush).toHaveBeenCalledTimes(1);
  });
});
