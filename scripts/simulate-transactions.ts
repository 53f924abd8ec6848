/**
 * Transaction Simulator
 *
 * Writes synthetic transactions into the transactions table so the engine
 * has something to watch.
 *
 * Usage:
 *   npm run simulate
 *   npm run simulate -- 120     (stop after 120 seconds)
 */

import { buildRiskEngineConfig } from "../config/env";
import { createDatabaseClient } from "../src/db/client";
import { createTransactionRepository } from "../src/db/transactions";
import { createTransactionGenerator, type SimulationProfile } from "../src/simulation/transaction-generator";
import { formatUsd } from "../src/utils/format";
import { createServiceLogger, errorContext } from "../src/utils/logger";
import { sleep } from "../src/utils/retry";
import simulation from "./data/simulation.json";

const logger = createServiceLogger("Simulator");
const STATS_EVERY_SECONDS = 10;

async function main(): Promise<void> {
  const durationArg = process.argv[2];
  const maxSeconds = durationArg ? Number(durationArg) : Number.POSITIVE_INFINITY;
  if (Number.isNaN(maxSeconds) || maxSeconds <= 0) {
    console.error(`Invalid duration: ${durationArg}`);
    process.exit(1);
  }

  const config = buildRiskEngineConfig();
  const db = createDatabaseClient(config.database, { applicationName: "risk-simulator" });
  const transactions = createTransactionRepository(db);
  const profile: SimulationProfile = simulation;
  const generator = createTransactionGenerator(profile);

  let running = true;
  process.on("SIGINT", () => {
    console.log("\nStopping simulator...");
    running = false;
  });

  console.log("Starting transaction simulator...");
  console.log(`Normal rate: ${profile.normalPerSecond} TPS, Spike rate: ${profile.spikePerSecond} TPS`);
  console.log(`Symbols: ${profile.symbols.length}, Clients: ${profile.clientCount}`);

  const startedAt = Date.now();
  let written = 0;
  let seconds = 0;

  try {
    while (running && seconds < maxSeconds) {
      for (const { kind, transaction } of generator.nextSecond()) {
        try {
          const id = await transactions.insert(transaction);
          written++;
          console.log(
            `[${kind}] TX#${id}: ${transaction.clientId} ${transaction.side} ${transaction.quantity} ` +
              `${transaction.symbol} @ ${formatUsd(transaction.price)} = ${formatUsd(transaction.quantity * transaction.price)}`
          );
        } catch (error) {
          logger.error("Failed to insert transaction", errorContext(error));
        }
      }

      seconds++;
      if (seconds % STATS_EVERY_SECONDS === 0) {
        const elapsed = (Date.now() - startedAt) / 1000;
        console.log(`\n--- ${written} transactions, avg ${(written / elapsed).toFixed(2)} TPS, ${elapsed.toFixed(0)}s ---\n`);
      }
      await sleep(1000);
    }
  } finally {
    await db.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal("Simulator failed", errorContext(error));
  process.exit(1);
});
