/**
 * Transaction feed queries.
 *
 * Rows are read in `(timestamp, transaction_id)` order after a feed marker.
 * Timestamps are compared at millisecond precision, the precision of the
 * marker, so a row is never returned twice.
 */

import type { FeedMarker } from "../types/risk";
import type { Queryable } from "./client";
import type { NumericColumn } from "./mappers";

/**
 * A transactions row as stored. Validation happens in the feed adapter.
 */
export interface TransactionRow {
  transaction_id: number | null;
  timestamp: Date | null;
  client_id: string | null;
  symbol: string | null;
  side: string | null;
  quantity: NumericColumn | null;
  price: NumericColumn | null;
  total_value: NumericColumn | null;
  broker_id: string | null;
  market: string | null;
}

export interface NewTransaction {
  timestamp: Date;
  clientId: string;
  symbol: string;
  side: "BUY" | "SELL";
  quantity: number;
  price: number;
  brokerId: string;
  market: string;
}

const SELECT_SINCE = `
  SELECT transaction_id, timestamp, client_id, symbol, side,
         quantity, price, total_value, broker_id, market
  FROM transactions
  WHERE timestamp >= $1
    AND (date_trunc('milliseconds', timestamp), transaction_id) > ($1, $2)
  ORDER BY date_trunc('milliseconds', timestamp), transaction_id
  LIMIT $3
`;

export class TransactionRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Up to `limit` rows strictly after `marker`
   */
  async readSince(marker: FeedMarker, limit: number): Promise<TransactionRow[]> {
    const result = await this.db.query<TransactionRow>(SELECT_SINCE, [
      new Date(marker.timestamp),
      marker.transactionId,
      limit,
    ]);
    return result.rows;
  }

  /**
   * Insert one transaction and return its id
   */
  async insert(tx: NewTransaction): Promise<number> {
    const result = await this.db.query<{ transaction_id: number }>(
      `INSERT INTO transactions
         (timestamp, client_id, symbol, side, quantity, price, total_value, broker_id, market)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING transaction_id`,
      [tx.timestamp, tx.clientId, tx.symbol, tx.side, tx.quantity, tx.price, tx.quantity * tx.price, tx.brokerId, tx.market]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error("Insert into transactions returned no id");
    }
    return row.transaction_id;
  }

  async count(): Promise<number> {
    const result = await this.db.query<{ count: string }>("SELECT COUNT(*) AS count FROM transactions");
    return Number(result.rows[0]?.count ?? 0);
  }
}

export function createTransactionRepository(db: Queryable): TransactionRepository {
  return new TransactionRepository(db);
}
