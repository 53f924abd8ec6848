/**
 * Transaction Feed Adapter
 *
 * Pulls transactions after a feed marker, validates each row and advances
 * the marker past every row read. Malformed rows are logged and skipped.
 * A read failure leaves the marker where it was.
 */

import type { RiskStore } from "../db/risk-store";
import type { TransactionRow } from "../db/transactions";
import { toNumber } from "../db/mappers";
import {
  TransactionSide,
  compareMarkers,
  type FeedMarker,
  type Transaction,
} from "../types/risk";
import { DataIntegrityError, TransientIOError } from "../utils/errors";
import { createServiceLogger, type Logger } from "../utils/logger";

export interface FeedPollResult {
  transactions: Transaction[];
  rejected: DataIntegrityError[];
  /** Position of the last row read, or the input marker when none were */
  marker: FeedMarker;
}

export interface TransactionFeedConfig {
  store: Pick<RiskStore, "readTransactionsSince">;
  /** Maximum rows per poll (default: 500) */
  batchSize?: number;
  logger?: Logger;
}

/** Tolerance between total_value and quantity * price */
const TOTAL_VALUE_TOLERANCE = 0.01;

/**
 * Turn a stored row into a transaction, or throw DataIntegrityError
 */
export function validateTransactionRow(row: TransactionRow): Transaction {
  const id = row.transaction_id;
  const fields: Record<string, unknown> = {
    clientId: row.client_id,
    symbol: row.symbol,
    side: row.side,
    quantity: row.quantity,
    price: row.price,
  };

  if (id === null || !Number.isInteger(id)) {
    throw new DataIntegrityError("Transaction is missing its id", null, fields);
  }
  if (row.timestamp === null || Number.isNaN(row.timestamp.getTime())) {
    throw new DataIntegrityError(`Transaction ${id} has no valid timestamp`, id, fields);
  }
  if (!row.client_id) {
    throw new DataIntegrityError(`Transaction ${id} has no client id`, id, fields);
  }
  if (!row.symbol) {
    throw new DataIntegrityError(`Transaction ${id} has no symbol`, id, fields);
  }

  const side = row.side === TransactionSide.BUY || row.side === TransactionSide.SELL ? row.side : null;
  if (side === null) {
    throw new DataIntegrityError(`Transaction ${id} has unknown side ${String(row.side)}`, id, fields);
  }

  const quantity = row.quantity === null ? Number.NaN : toNumber(row.quantity);
  const price = row.price === null ? Number.NaN : toNumber(row.price);
  if (!(quantity > 0)) {
    throw new DataIntegrityError(`Transaction ${id} has non-positive quantity ${String(row.quantity)}`, id, fields);
  }
  if (!(price > 0)) {
    throw new DataIntegrityError(`Transaction ${id} has non-positive price ${String(row.price)}`, id, fields);
  }

  const computed = quantity * price;
  const totalValue = row.total_value === null ? computed : toNumber(row.total_value);
  if (!Number.isFinite(totalValue) || Math.abs(totalValue - computed) > TOTAL_VALUE_TOLERANCE) {
    throw new DataIntegrityError(
      `Transaction ${id} total value ${String(row.total_value)} does not match quantity * price`,
      id,
      { ...fields, totalValue: row.total_value }
    );
  }

  return {
    id,
    timestamp: row.timestamp,
    clientId: row.client_id,
    symbol: row.symbol,
    side,
    quantity,
    price,
    totalValue,
    brokerId: row.broker_id ?? "",
    market: row.market ?? "",
  };
}

export class TransactionFeed {
  private readonly store: Pick<RiskStore, "readTransactionsSince">;
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(config: TransactionFeedConfig) {
    this.store = config.store;
    this.batchSize = config.batchSize ?? 500;
    this.logger = config.logger ?? createServiceLogger("TransactionFeed");
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  /**
   * Read the next batch after `since`
   *
   * @throws TransientIOError when the store cannot be read
   */
  async poll(since: FeedMarker): Promise<FeedPollResult> {
    let rows: TransactionRow[];
    try {
      rows = await this.store.readTransactionsSince(since, this.batchSize);
    } catch (error) {
      throw new TransientIOError("readTransactionsSince", error);
    }

    const transactions: Transaction[] = [];
    const rejected: DataIntegrityError[] = [];
    let marker = since;

    for (const row of rows) {
      const rowMarker = markerOfRow(row);
      if (rowMarker && compareMarkers(rowMarker, marker) > 0) {
        marker = rowMarker;
      }

      try {
        transactions.push(validateTransactionRow(row));
      } catch (error) {
        if (!(error instanceof DataIntegrityError)) throw error;
        rejected.push(error);
        this.logger.warn("Skipping malformed transaction", {
          transactionId: error.transactionId,
          reason: error.message,
          ...error.fields,
        });
      }
    }

    return { transactions, rejected, marker };
  }
}

function markerOfRow(row: TransactionRow): FeedMarker | null {
  if (row.transaction_id === null || row.timestamp === null) return null;
  const timestamp = row.timestamp.getTime();
  if (Number.isNaN(timestamp)) return null;
  return { timestamp, transactionId: row.transaction_id };
}

export function createTransactionFeed(config: TransactionFeedConfig): TransactionFeed {
  return new TransactionFeed(config);
}
