/**
 * PostgreSQL connection pool for the pgvector passage store.
 */
import type { VectorStoreConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { Pool } from "pg";

type PgVectorConfig = Extract<VectorStoreConfig, { provider: "pgvector" }>;

export function createPool(config: PgVectorConfig): Pool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", { message: err.message });
  });

  return pool;
}
