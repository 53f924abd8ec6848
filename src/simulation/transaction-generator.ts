/**
 * Synthetic transaction generator for local runs.
 *
 * Mostly ordinary orders, with occasional bursts (spike seconds) and
 * occasional outsized orders that the anomaly rule should catch.
 */

import type { NewTransaction } from "../db/transactions";

export interface SymbolPriceRange {
  symbol: string;
  minPrice: number;
  maxPrice: number;
}

export interface IntRange {
  min: number;
  max: number;
}

export interface SimulationProfile {
  symbols: SymbolPriceRange[];
  clientCount: number;
  brokers: string[];
  markets: string[];
  normalPerSecond: number;
  spikePerSecond: number;
  spikeProbability: number;
  anomalyProbability: number;
  normalQuantity: IntRange;
  anomalyQuantity: IntRange;
}

export type TransactionKind = "NORMAL" | "SPIKE" | "ANOMALY";

export interface GeneratedTransaction {
  kind: TransactionKind;
  transaction: NewTransaction;
}

/** Returns a number in [0, 1) */
export type RandomSource = () => number;

export function clientIdFor(index: number): string {
  return `CLIENT_${String(index).padStart(3, "0")}`;
}

export class TransactionGenerator {
  private readonly profile: SimulationProfile;
  private readonly random: RandomSource;
  private readonly clients: string[];

  constructor(profile: SimulationProfile, random: RandomSource = Math.random) {
    if (profile.symbols.length === 0 || profile.brokers.length === 0 || profile.markets.length === 0) {
      throw new RangeError("Simulation profile needs at least one symbol, broker and market");
    }
    if (profile.clientCount < 1) {
      throw new RangeError("Simulation profile needs at least one client");
    }
    this.profile = profile;
    this.random = random;
    this.clients = Array.from({ length: profile.clientCount }, (_, i) => clientIdFor(i + 1));
  }

  /**
   * One second of traffic
   */
  nextSecond(now: Date = new Date()): GeneratedTransaction[] {
    const spike = this.random() < this.profile.spikeProbability;
    const rate = spike ? this.profile.spikePerSecond : this.profile.normalPerSecond;
    const generated: GeneratedTransaction[] = [];

    for (let i = 0; i < rate; i++) {
      const anomaly = this.random() < this.profile.anomalyProbability;
      generated.push({
        kind: anomaly ? "ANOMALY" : spike ? "SPIKE" : "NORMAL",
        transaction: this.generate(anomaly, now),
      });
    }
    return generated;
  }

  generate(anomaly: boolean, timestamp: Date = new Date()): NewTransaction {
    const range = this.pick(this.profile.symbols);
    const price = Math.round((range.minPrice + this.random() * (range.maxPrice - range.minPrice)) * 100) / 100;
    const quantity = this.randomInt(anomaly ? this.profile.anomalyQuantity : this.profile.normalQuantity);

    return {
      timestamp,
      clientId: this.pick(this.clients),
      symbol: range.symbol,
      side: this.random() < 0.5 ? "BUY" : "SELL",
      quantity,
      price,
      brokerId: this.pick(this.profile.brokers),
      market: this.pick(this.profile.markets),
    };
  }

  private randomInt(range: IntRange): number {
    return range.min + Math.floor(this.random() * (range.max - range.min + 1));
  }

  private pick<T>(items: readonly T[]): T {
    const index = Math.min(Math.floor(this.random() * items.length), items.length - 1);
    const item = items[index];
    if (item === undefined) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return item;
  }
}

export function createTransactionGenerator(profile: SimulationProfile, random?: RandomSource): TransactionGenerator {
  return new TransactionGenerator(profile, random);
}
