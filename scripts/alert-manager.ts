/**
 * Alert management CLI
 *
 * Usage:
 *   npm run alerts -- summary
 *   npm run alerts -- list HIGH
 *   npm run alerts -- ack HIGH_CLIENT_EXPOSURE:C1:42 alice
 *   npm run alerts -- cleanup 30
 */

import { buildRiskEngineConfig } from "../config/env";
import { runAlertCommand } from "../src/cli/alert-commands";
import { createDatabaseClient } from "../src/db/client";
import { createPostgresRiskStore } from "../src/db/risk-store";
import { createRiskReadModel } from "../src/services/risk-read-model";
import { ConfigError } from "../src/utils/errors";
import { createServiceLogger, errorContext } from "../src/utils/logger";

const logger = createServiceLogger("AlertManager");

async function main(): Promise<number> {
  const config = buildRiskEngineConfig();
  const db = createDatabaseClient(config.database, { applicationName: "risk-alert-manager" });
  try {
    const readModel = createRiskReadModel({ store: createPostgresRiskStore(db) });
    return await runAlertCommand(process.argv.slice(2), readModel, (line) => console.log(line));
  } finally {
    await db.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.fatal("Invalid configuration", { problems: error.problems });
    } else {
      logger.fatal("Alert manager failed", errorContext(error));
    }
    process.exit(1);
  });
