/**
 * Application Startup
 *
 * Builds the configuration, the database pool, the notification channels and
 * the engine, and tears them down in reverse order.
 *
 * Startup order:
 * 1. Environment configuration (fatal ConfigError on invalid values)
 * 2. Database pool and health check
 * 3. Threshold overrides from the store, re-validated
 * 4. Notification dispatcher
 * 5. Risk engine (hydrates state, starts polling and snapshotting)
 */

import { EventEmitter } from "events";
import { buildRiskEngineConfig, logConfig, type EnvSource, type RiskEngineConfig } from "../../config/env";
import { createDatabaseClient, type DatabaseClient } from "../db/client";
import { PostgresRiskStore, type RiskStore } from "../db/risk-store";
import { createChannelsFromConfig } from "../notifications";
import { NotificationDispatcher } from "../notifications/dispatcher";
import type { NotificationChannel } from "../notifications/types";
import { TransientIOError } from "../utils/errors";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";
import { RiskEngine } from "./risk-engine";

// ============================================================================
// Configuration
// ============================================================================

/**
 * Environment configuration overlaid with the thresholds row of the store.
 * An unreadable thresholds table leaves the environment values in place.
 *
 * @throws ConfigError when the environment or the overrides are invalid
 */
export async function loadRiskEngineConfig(
  source: EnvSource,
  store: Pick<RiskStore, "readThresholdsConfig">,
  logger: Logger = createServiceLogger("Config")
): Promise<RiskEngineConfig> {
  const base = buildRiskEngineConfig(source);

  let overrides: Awaited<ReturnType<typeof store.readThresholdsConfig>> = {};
  try {
    overrides = await store.readThresholdsConfig();
  } catch (error) {
    logger.warn("Could not read stored thresholds, using environment values", errorContext(error));
    return base;
  }

  if (Object.keys(overrides).length === 0) {
    return base;
  }

  logger.info("Applying stored threshold overrides", { overrides });
  return buildRiskEngineConfig(source, overrides);
}

// ============================================================================
// Application
// ============================================================================

export interface ApplicationOptions {
  env?: EnvSource;
  logger?: Logger;
  /** Replace the configured channels */
  channels?: NotificationChannel[];
}

export class RiskApplication extends EventEmitter {
  private readonly env: EnvSource;
  private readonly logger: Logger;
  private readonly channelOverride?: NotificationChannel[];

  private db: DatabaseClient | null = null;
  private engine: RiskEngine | null = null;
  private dispatcher: NotificationDispatcher | null = null;
  private isStopping = false;

  constructor(options: ApplicationOptions = {}) {
    super();
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createServiceLogger("Startup");
    this.channelOverride = options.channels;
  }

  getEngine(): RiskEngine | null {
    return this.engine;
  }

  /**
   * @throws ConfigError for invalid configuration
   * @throws TransientIOError when the database is unreachable
   */
  async start(): Promise<RiskEngine> {
    const startTime = Date.now();

    const envConfig = buildRiskEngineConfig(this.env);
    const db = createDatabaseClient(envConfig.database, { logger: this.logger.child({ component: "Database" }) });
    this.db = db;

    const health = await db.healthCheck();
    if (!health.healthy) {
      throw new TransientIOError("database health check", new Error(health.error ?? "unhealthy"));
    }
    this.logger.info("Database connected", { responseTimeMs: health.responseTimeMs });

    const store = new PostgresRiskStore(db);
    const config = await loadRiskEngineConfig(this.env, store, this.logger);
    logConfig(config, this.logger);

    const channels = this.channelOverride ?? createChannelsFromConfig(config.notifications);
    this.dispatcher = new NotificationDispatcher({
      channels,
      maxRetries: config.notifications.maxRetries,
      retryDelayMs: config.notifications.retryDelayMs,
      logger: this.logger.child({ component: "NotificationDispatcher" }),
    });
    this.logger.info("Notification channels ready", { channels: this.dispatcher.getChannelNames() });

    const engine = new RiskEngine({ config, store, dispatcher: this.dispatcher });
    this.engine = engine;
    engine.on("alert:created", (alert) => this.emit("alert:created", alert));
    engine.on("snapshot:created", (snapshot) => this.emit("snapshot:created", snapshot));

    await engine.start();

    this.logger.info("Startup complete", { timeMs: Date.now() - startTime });
    this.emit("started");
    return engine;
  }

  /**
   * Stop the engine, then close the pool
   */
  async stop(): Promise<void> {
    if (this.isStopping) return;
    this.isStopping = true;
    const startTime = Date.now();
    this.emit("shutdown:start");

    try {
      if (this.engine) {
        await this.engine.stop();
      }
    } finally {
      if (this.db) {
        await this.db.close();
        this.db = null;
      }
      this.isStopping = false;
    }

    const shutdownTimeMs = Date.now() - startTime;
    this.logger.info("Shutdown complete", { timeMs: shutdownTimeMs });
    this.emit("shutdown:complete", { timeMs: shutdownTimeMs });
  }
}

/**
 * Stop the application on SIGINT or SIGTERM, then exit
 */
export function registerShutdownHandlers(
  app: Pick<RiskApplication, "stop">,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, initiating graceful shutdown...`);
    try {
      await app.stop();
      logger.info("Graceful shutdown complete");
      exit(0);
    } catch (error) {
      logger.error("Error during shutdown", errorContext(error));
      exit(1);
    }
  };

  const onSigint = (): void => {
    void shutdown("SIGINT");
  };
  const onSigterm = (): void => {
    void shutdown("SIGTERM");
  };

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);
  logger.debug("Graceful shutdown handlers registered");

  return () => {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };
}

export function createRiskApplication(options?: ApplicationOptions): RiskApplication {
  return new RiskApplication(options);
}
