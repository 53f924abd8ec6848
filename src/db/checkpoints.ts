/**
 * Feed cursor checkpoints
 */

import type { FeedMarker } from "../types/risk";
import type { Queryable } from "./client";
import { toDate } from "./mappers";

export const DEFAULT_ENGINE_ID = "risk-engine";

interface CheckpointRow {
  last_event_at: Date;
  last_transaction_id: number;
}

export class CheckpointRepository {
  constructor(
    private readonly db: Queryable,
    private readonly engineId: string = DEFAULT_ENGINE_ID
  ) {}

  async read(): Promise<FeedMarker | null> {
    const result = await this.db.query<CheckpointRow>(
      "SELECT last_event_at, last_transaction_id FROM engine_checkpoints WHERE engine_id = $1",
      [this.engineId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return { timestamp: toDate(row.last_event_at).getTime(), transactionId: row.last_transaction_id };
  }

  async write(marker: FeedMarker): Promise<void> {
    await this.db.query(
      `INSERT INTO engine_checkpoints (engine_id, last_event_at, last_transaction_id, updated_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (engine_id) DO UPDATE SET
         last_event_at = EXCLUDED.last_event_at,
         last_transaction_id = EXCLUDED.last_transaction_id,
         updated_at = NOW()`,
      [this.engineId, new Date(marker.timestamp), marker.transactionId]
    );
  }
}

export function createCheckpointRepository(db: Queryable, engineId?: string): CheckpointRepository {
  return new CheckpointRepository(db, engineId);
}
