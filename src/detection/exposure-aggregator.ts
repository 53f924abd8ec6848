/**
 * Exposure Aggregator
 *
 * Owns the per-client and per-symbol running exposure totals. Totals are only
 * ever updated incrementally from applied transactions; the hydration path
 * restores state persisted by a previous run.
 *
 * Each aggregate keeps a replay ledger: a floor marker at or below which every
 * feed transaction has been counted, and the markers of the transactions
 * counted above it. A transaction at or below the floor, or whose id is in
 * the list, has no effect on that aggregate, so totals do not depend on the
 * order transactions are applied in. `compact` raises the floor to a
 * committed checkpoint and drops the markers it covers.
 */

import type { RiskBands } from "../../config/env";
import {
  EntityType,
  RiskLevel,
  compareMarkers,
  markerOf,
  INITIAL_MARKER,
  type ClientExposure,
  type FeedMarker,
  type SymbolExposure,
  type Transaction,
} from "../types/risk";
import { classifyRiskLevel, isAlertingTransition, isHighRisk } from "./risk-level";

// ============================================================================
// Types
// ============================================================================

export interface ExposureAggregatorConfig {
  clientExposureThreshold: number;
  symbolExposureThreshold: number;
  riskBands: RiskBands;
}

/** Transactions already counted by one aggregate */
export interface ReplayLedger {
  /** Every feed transaction at or before this marker is counted */
  floor: FeedMarker;
  /** Transactions after the floor that are counted, in application order */
  applied: FeedMarker[];
}

export interface ClientExposureState extends ClientExposure {
  ledger: ReplayLedger;
}

export interface SymbolExposureState extends SymbolExposure {
  ledger: ReplayLedger;
}

export interface LevelChange {
  previousLevel: RiskLevel;
  newLevel: RiskLevel;
  totalExposure: number;
  /** Upward transition into HIGH or CRITICAL */
  alerting: boolean;
  /** False when this aggregate had already seen the transaction */
  applied: boolean;
}

export interface ExposureUpdate {
  /** Both aggregates had already seen the transaction */
  duplicate: boolean;
  client: LevelChange;
  symbol: LevelChange;
}

export interface AggregatorState {
  clients: ClientExposureState[];
  symbols: SymbolExposureState[];
}

export interface DirtyExposures {
  clients: ClientExposureState[];
  symbols: SymbolExposureState[];
}

export interface ExposureTotals {
  totalTransactions: number;
  totalExposure: number;
  activeClients: number;
  activeSymbols: number;
  highRiskClients: number;
  highRiskSymbols: number;
}

// ============================================================================
// ExposureAggregator
// ============================================================================

export class ExposureAggregator {
  private readonly clients: Map<string, ClientExposureState> = new Map();
  private readonly symbols: Map<string, SymbolExposureState> = new Map();
  private readonly dirtyClients: Set<string> = new Set();
  private readonly dirtySymbols: Set<string> = new Set();

  constructor(private readonly config: ExposureAggregatorConfig) {}

  /**
   * Add a transaction to its client and symbol aggregates
   */
  apply(tx: Transaction): ExposureUpdate {
    const marker = markerOf(tx);

    const client = this.getOrCreateClient(tx.clientId);
    const clientChange = this.applyTo(client, tx, marker, this.config.clientExposureThreshold);
    if (clientChange.applied) {
      client.positionCount++;
      this.dirtyClients.add(tx.clientId);
    }

    const symbol = this.getOrCreateSymbol(tx.symbol);
    const symbolChange = this.applyTo(symbol, tx, marker, this.config.symbolExposureThreshold);
    if (symbolChange.applied) {
      symbol.transactionCount++;
      this.dirtySymbols.add(tx.symbol);
    }

    return {
      duplicate: !clientChange.applied && !symbolChange.applied,
      client: clientChange,
      symbol: symbolChange,
    };
  }

  /**
   * Read-only copy of one aggregate, or null when the entity is unknown
   */
  snapshot(entityType: EntityType.CLIENT, entityId: string): ClientExposure | null;
  snapshot(entityType: EntityType.SYMBOL, entityId: string): SymbolExposure | null;
  snapshot(entityType: EntityType, entityId: string): ClientExposure | SymbolExposure | null;
  snapshot(entityType: EntityType, entityId: string): ClientExposure | SymbolExposure | null {
    if (entityType === EntityType.CLIENT) {
      const state = this.clients.get(entityId);
      return state ? toClientExposure(state) : null;
    }
    if (entityType === EntityType.SYMBOL) {
      const state = this.symbols.get(entityId);
      return state ? toSymbolExposure(state) : null;
    }
    return null;
  }

  /**
   * Copy of every aggregate, taken in one synchronous pass
   */
  readState(): AggregatorState {
    return {
      clients: Array.from(this.clients.values(), (state) => ({ ...state, ledger: copyLedger(state.ledger) })),
      symbols: Array.from(this.symbols.values(), (state) => ({ ...state, ledger: copyLedger(state.ledger) })),
    };
  }

  /**
   * Rollup used by the metrics snapshot, taken in one synchronous pass
   */
  totals(): ExposureTotals {
    let totalTransactions = 0;
    let totalExposure = 0;
    let highRiskClients = 0;
    let highRiskSymbols = 0;

    for (const client of this.clients.values()) {
      totalTransactions += client.positionCount;
      totalExposure += client.totalExposure;
      if (isHighRisk(client.riskLevel)) highRiskClients++;
    }
    for (const symbol of this.symbols.values()) {
      if (isHighRisk(symbol.riskLevel)) highRiskSymbols++;
    }

    return {
      totalTransactions,
      totalExposure,
      activeClients: this.clients.size,
      activeSymbols: this.symbols.size,
      highRiskClients,
      highRiskSymbols,
    };
  }

  /**
   * Restore aggregates persisted by an earlier run. Risk levels are
   * recomputed against the current thresholds.
   */
  hydrate(state: AggregatorState): void {
    for (const client of state.clients) {
      this.clients.set(client.clientId, {
        ...client,
        riskLevel: classifyRiskLevel(client.totalExposure, this.config.clientExposureThreshold, this.config.riskBands),
        ledger: copyLedger(client.ledger),
      });
    }
    for (const symbol of state.symbols) {
      this.symbols.set(symbol.symbol, {
        ...symbol,
        riskLevel: classifyRiskLevel(symbol.totalExposure, this.config.symbolExposureThreshold, this.config.riskBands),
        ledger: copyLedger(symbol.ledger),
      });
    }
  }

  /**
   * Aggregates changed since the last `clearDirty`
   */
  collectDirty(): DirtyExposures {
    const clients: ClientExposureState[] = [];
    const symbols: SymbolExposureState[] = [];

    for (const id of this.dirtyClients) {
      const state = this.clients.get(id);
      if (state) clients.push({ ...state, ledger: copyLedger(state.ledger) });
    }
    for (const id of this.dirtySymbols) {
      const state = this.symbols.get(id);
      if (state) symbols.push({ ...state, ledger: copyLedger(state.ledger) });
    }

    return { clients, symbols };
  }

  /**
   * Forget dirty flags for aggregates that were persisted
   */
  clearDirty(persisted: DirtyExposures): void {
    for (const client of persisted.clients) this.dirtyClients.delete(client.clientId);
    for (const symbol of persisted.symbols) this.dirtySymbols.delete(symbol.symbol);
  }

  /**
   * Raise every ledger floor to a committed checkpoint and drop the markers
   * at or below it
   */
  compact(checkpoint: FeedMarker): void {
    for (const state of this.clients.values()) compactLedger(state.ledger, checkpoint);
    for (const state of this.symbols.values()) compactLedger(state.ledger, checkpoint);
  }

  getDirtyCount(): number {
    return this.dirtyClients.size + this.dirtySymbols.size;
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private getOrCreateClient(clientId: string): ClientExposureState {
    let state = this.clients.get(clientId);
    if (!state) {
      state = {
        clientId,
        totalExposure: 0,
        positionCount: 0,
        riskLevel: RiskLevel.LOW,
        lastUpdated: new Date(0),
        ledger: emptyLedger(),
      };
      this.clients.set(clientId, state);
    }
    return state;
  }

  private getOrCreateSymbol(symbol: string): SymbolExposureState {
    let state = this.symbols.get(symbol);
    if (!state) {
      state = {
        symbol,
        totalExposure: 0,
        transactionCount: 0,
        riskLevel: RiskLevel.LOW,
        lastUpdated: new Date(0),
        ledger: emptyLedger(),
      };
      this.symbols.set(symbol, state);
    }
    return state;
  }

  private applyTo(
    state: ClientExposureState | SymbolExposureState,
    tx: Transaction,
    marker: FeedMarker,
    threshold: number
  ): LevelChange {
    const previousLevel = state.riskLevel;

    if (hasCounted(state.ledger, marker)) {
      return {
        previousLevel,
        newLevel: previousLevel,
        totalExposure: state.totalExposure,
        alerting: false,
        applied: false,
      };
    }

    state.totalExposure += tx.totalValue;
    state.riskLevel = classifyRiskLevel(state.totalExposure, threshold, this.config.riskBands);
    if (tx.timestamp.getTime() >= state.lastUpdated.getTime()) {
      state.lastUpdated = tx.timestamp;
    }
    state.ledger.applied.push(marker);

    return {
      previousLevel,
      newLevel: state.riskLevel,
      totalExposure: state.totalExposure,
      alerting: isAlertingTransition(previousLevel, state.riskLevel),
      applied: true,
    };
  }
}

function emptyLedger(): ReplayLedger {
  return { floor: { ...INITIAL_MARKER }, applied: [] };
}

function copyLedger(ledger: ReplayLedger): ReplayLedger {
  return { floor: { ...ledger.floor }, applied: ledger.applied.map((marker) => ({ ...marker })) };
}

function hasCounted(ledger: ReplayLedger, marker: FeedMarker): boolean {
  if (compareMarkers(marker, ledger.floor) <= 0) return true;
  return ledger.applied.some((applied) => applied.transactionId === marker.transactionId);
}

function compactLedger(ledger: ReplayLedger, checkpoint: FeedMarker): void {
  if (compareMarkers(checkpoint, ledger.floor) <= 0) return;
  ledger.floor = { ...checkpoint };
  ledger.applied = ledger.applied.filter((marker) => compareMarkers(marker, checkpoint) > 0);
}

function toClientExposure(state: ClientExposureState): ClientExposure {
  return {
    clientId: state.clientId,
    totalExposure: state.totalExposure,
    positionCount: state.positionCount,
    riskLevel: state.riskLevel,
    lastUpdated: new Date(state.lastUpdated.getTime()),
  };
}

function toSymbolExposure(state: SymbolExposureState): SymbolExposure {
  return {
    symbol: state.symbol,
    totalExposure: state.totalExposure,
    transactionCount: state.transactionCount,
    riskLevel: state.riskLevel,
    lastUpdated: new Date(state.lastUpdated.getTime()),
  };
}

/**
 * Create a new ExposureAggregator instance
 */
export function createExposureAggregator(config: ExposureAggregatorConfig): ExposureAggregator {
  return new ExposureAggregator(config);
}
