/**
 * Client and symbol exposure persistence.
 *
 * Rows also carry each aggregate's replay ledger: the floor marker and the
 * transactions counted above it, so redelivered transactions are recognized
 * after a restart.
 */

import type {
  AggregatorState,
  ClientExposureState,
  ReplayLedger,
  SymbolExposureState,
} from "../detection/exposure-aggregator";
import { isRiskLevel, type ClientExposure, type SymbolExposure } from "../types/risk";
import type { Queryable } from "./client";
import { toDate, toEnumValue, toMarkerList, toNumber, type NumericColumn } from "./mappers";

interface LedgerColumns {
  floor_event_at: Date;
  floor_transaction_id: number;
  applied_markers: unknown;
}

interface ClientExposureRow extends LedgerColumns {
  client_id: string;
  total_exposure: NumericColumn;
  position_count: number;
  risk_level: string;
  last_updated: Date;
}

interface SymbolExposureRow extends LedgerColumns {
  symbol: string;
  total_exposure: NumericColumn;
  transaction_count: number;
  risk_level: string;
  last_updated: Date;
}

const UPSERT_CLIENT = `
  INSERT INTO client_exposures
    (client_id, total_exposure, position_count, risk_level, last_updated, floor_event_at, floor_transaction_id, applied_markers)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (client_id) DO UPDATE SET
    total_exposure = EXCLUDED.total_exposure,
    position_count = EXCLUDED.position_count,
    risk_level = EXCLUDED.risk_level,
    last_updated = EXCLUDED.last_updated,
    floor_event_at = EXCLUDED.floor_event_at,
    floor_transaction_id = EXCLUDED.floor_transaction_id,
    applied_markers = EXCLUDED.applied_markers
`;

const UPSERT_SYMBOL = `
  INSERT INTO symbol_exposures
    (symbol, total_exposure, transaction_count, risk_level, last_updated, floor_event_at, floor_transaction_id, applied_markers)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (symbol) DO UPDATE SET
    total_exposure = EXCLUDED.total_exposure,
    transaction_count = EXCLUDED.transaction_count,
    risk_level = EXCLUDED.risk_level,
    last_updated = EXCLUDED.last_updated,
    floor_event_at = EXCLUDED.floor_event_at,
    floor_transaction_id = EXCLUDED.floor_transaction_id,
    applied_markers = EXCLUDED.applied_markers
`;

function toLedger(row: LedgerColumns): ReplayLedger {
  return {
    floor: { timestamp: toDate(row.floor_event_at).getTime(), transactionId: row.floor_transaction_id },
    applied: toMarkerList(row.applied_markers, "applied_markers"),
  };
}

function ledgerParams(ledger: ReplayLedger): unknown[] {
  return [new Date(ledger.floor.timestamp), ledger.floor.transactionId, JSON.stringify(ledger.applied)];
}

function toClientState(row: ClientExposureRow): ClientExposureState {
  return {
    clientId: row.client_id,
    totalExposure: toNumber(row.total_exposure),
    positionCount: row.position_count,
    riskLevel: toEnumValue(row.risk_level, isRiskLevel, "risk_level"),
    lastUpdated: toDate(row.last_updated),
    ledger: toLedger(row),
  };
}

function toSymbolState(row: SymbolExposureRow): SymbolExposureState {
  return {
    symbol: row.symbol,
    totalExposure: toNumber(row.total_exposure),
    transactionCount: row.transaction_count,
    riskLevel: toEnumValue(row.risk_level, isRiskLevel, "risk_level"),
    lastUpdated: toDate(row.last_updated),
    ledger: toLedger(row),
  };
}

export class ExposureRepository {
  constructor(private readonly db: Queryable) {}

  async loadAll(): Promise<AggregatorState> {
    const clients = await this.db.query<ClientExposureRow>("SELECT * FROM client_exposures");
    const symbols = await this.db.query<SymbolExposureRow>("SELECT * FROM symbol_exposures");
    return {
      clients: clients.rows.map(toClientState),
      symbols: symbols.rows.map(toSymbolState),
    };
  }

  async upsertClient(state: ClientExposureState): Promise<void> {
    await this.db.query(UPSERT_CLIENT, [
      state.clientId,
      state.totalExposure,
      state.positionCount,
      state.riskLevel,
      state.lastUpdated,
      ...ledgerParams(state.ledger),
    ]);
  }

  async upsertSymbol(state: SymbolExposureState): Promise<void> {
    await this.db.query(UPSERT_SYMBOL, [
      state.symbol,
      state.totalExposure,
      state.transactionCount,
      state.riskLevel,
      state.lastUpdated,
      ...ledgerParams(state.ledger),
    ]);
  }

  /**
   * Client exposures ordered by exposure, largest first
   */
  async listClients(limit = 100): Promise<ClientExposure[]> {
    const result = await this.db.query<ClientExposureRow>(
      "SELECT * FROM client_exposures ORDER BY total_exposure DESC LIMIT $1",
      [limit]
    );
    return result.rows.map((row) => {
      const { ledger: _ledger, ...exposure } = toClientState(row);
      return exposure;
    });
  }

  async listSymbols(limit = 100): Promise<SymbolExposure[]> {
    const result = await this.db.query<SymbolExposureRow>(
      "SELECT * FROM symbol_exposures ORDER BY total_exposure DESC LIMIT $1",
      [limit]
    );
    return result.rows.map((row) => {
      const { ledger: _ledger, ...exposure } = toSymbolState(row);
      return exposure;
    });
  }
}

export function createExposureRepository(db: Queryable): ExposureRepository {
  return new ExposureRepository(db);
}
