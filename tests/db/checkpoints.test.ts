import { describe, it, expect } from "vitest";
import { CheckpointRepository, DEFAULT_ENGINE_ID } from "../../src/db/checkpoints";
import { createFakeDatabase } from "../fakes/fake-database";

describe("CheckpointRepository", () => {
  it("should return null before the first checkpoint", async () => {
    const fake = createFakeDatabase();
    expect(await new CheckpointRepository(fake.db).read()).toBeNull();
    expect(fake.queries[0]?.params).toEqual([DEFAULT_ENGINE_ID]);
  });

  it("should read the stored marker", async () => {
    const fake = createFakeDatabase();
    const at = new Date("2024-01-15T14:30:00.123Z");
    fake.respond([{ last_event_at: at, last_transaction_id: 88 }]);

    expect(await new CheckpointRepository(fake.db, "engine-b").read()).toEqual({
      timestamp: at.getTime(),
      transactionId: 88,
    });
    expect(fake.queries[0]?.params).toEqual(["engine-b"]);
  });

  it("should upsert the marker for its engine", async () => {
    const fake = createFakeDatabase();
    await new CheckpointRepository(fake.db).write({ timestamp: 1_000, transactionId: 3 });

    expect(fake.queries[0]?.sql).toContain("ON CONFLICT (engine_id) DO UPDATE SET");
    expect(fake.queries[0]?.params).toEqual(["risk-engine", new Date(1_000), 3]);
  });
});
