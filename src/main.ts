/**
 * Process entry point: start the risk engine and run until signalled.
 */

import { ConfigError } from "./utils/errors";
import { createServiceLogger, errorContext } from "./utils/logger";
import { createRiskApplication, registerShutdownHandlers } from "./services/startup";

const logger = createServiceLogger("Main");

async function main(): Promise<void> {
  const app = createRiskApplication();

  app.on("alert:created", (alert: { id: string }) => {
    logger.debug("Alert event", { alertId: alert.id });
  });

  try {
    await app.start();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal("Invalid configuration", { problems: error.problems });
    } else {
      logger.fatal("Startup failed", errorContext(error));
    }
    await app.stop().catch((stopError: unknown) => {
      logger.error("Cleanup after failed startup also failed", errorContext(stopError));
    });
    process.exit(1);
  }

  registerShutdownHandlers(app, logger);
}

main().catch((error: unknown) => {
  logger.fatal("Unhandled error", errorContext(error));
  process.exit(1);
});
