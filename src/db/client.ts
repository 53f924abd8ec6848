/**
 * PostgreSQL client with connection pooling.
 *
 * Wraps a `pg` Pool behind a small `DatabaseClient` interface so repositories
 * can be exercised against an in-process fake.
 */

import { Pool, type PoolClient, type QueryResultRow } from "pg";
import type { DatabaseConfig } from "../../config/env";
import { createServiceLogger, errorContext, type Logger } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export interface QueryResultLike<T> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Anything that can run a parameterized query: the pool or a client inside a
 * transaction
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResultLike<T>>;
}

export interface HealthCheckResult {
  healthy: boolean;
  responseTimeMs: number;
  error?: string;
  timestamp: Date;
}

export interface DatabaseClient extends Queryable {
  /** Run `work` inside BEGIN/COMMIT, rolling back when it throws */
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  healthCheck(): Promise<HealthCheckResult>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export interface DatabaseClientOptions {
  applicationName?: string;
  idleTimeoutMs?: number;
  logger?: Logger;
}

// ============================================================================
// Pool-backed client
// ============================================================================

export function createDatabaseClient(config: DatabaseConfig, options: DatabaseClientOptions = {}): DatabaseClient {
  const log = options.logger ?? createServiceLogger("Database");
  let pool: Pool | null = null;
  let connected = false;

  const ensurePool = (): Pool => {
    if (pool) return pool;

    const created = new Pool({
      connectionString: config.url,
      max: config.poolSize,
      idleTimeoutMillis: options.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectTimeoutMs,
      statement_timeout: config.poolTimeoutMs,
      application_name: options.applicationName ?? "risk-engine",
    });

    created.on("connect", () => {
      connected = true;
      log.debug("Database client connected");
    });

    created.on("error", (error) => {
      connected = false;
      log.error("Idle database client error", errorContext(error));
    });

    pool = created;
    return created;
  };

  const runQuery = async <T extends QueryResultRow>(
    target: Pool | PoolClient,
    sql: string,
    params?: unknown[]
  ): Promise<QueryResultLike<T>> => {
    try {
      const result = await target.query<T>(sql, params);
      connected = true;
      return { rows: result.rows, rowCount: result.rowCount };
    } catch (error) {
      connected = false;
      throw error;
    }
  };

  return {
    query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResultLike<T>> {
      return runQuery<T>(ensurePool(), sql, params);
    },

    async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await ensurePool().connect();
      const scoped: Queryable = {
        query: <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) =>
          runQuery<R>(client, sql, params),
      };

      try {
        await client.query("BEGIN");
        const result = await work(scoped);
        await client.query("COMMIT");
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          log.error("Rollback failed", errorContext(rollbackError));
        }
        throw error;
      } finally {
        client.release();
      }
    },

    async healthCheck(): Promise<HealthCheckResult> {
      const startTime = Date.now();
      try {
        await runQuery(ensurePool(), "SELECT 1");
        return { healthy: true, responseTimeMs: Date.now() - startTime, timestamp: new Date() };
      } catch (error) {
        return {
          healthy: false,
          responseTimeMs: Date.now() - startTime,
          error: error instanceof Error ? error.message : String(error),
          timestamp: new Date(),
        };
      }
    },

    isConnected(): boolean {
      return connected && pool !== null && pool.totalCount > 0;
    },

    async close(): Promise<void> {
      if (pool) {
        const closing = pool;
        pool = null;
        connected = false;
        await closing.end();
        log.info("Database pool closed");
      }
    },
  };
}
