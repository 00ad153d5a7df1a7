import { Pool } from "pg";
import type { DatabaseConfig } from "../config";
import type { Logger } from "../security/logger";

export function createDatabasePool(config: DatabaseConfig, logger?: Logger): Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    application_name: "blog-publishing",
    max: config.poolSize,
    statement_timeout: config.statementTimeoutMs,
    ssl: config.ssl ? { rejectUnauthorized: config.sslRejectUnauthorized } : undefined
  });

  // An idle client dropped by the server emits here; without a listener the process exits.
  pool.on("error", (error) => {
    logger?.error("database_pool_error", { error });
  });

  return pool;
}
