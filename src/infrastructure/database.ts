import pg from "pg";
import { config } from "../config/index.js";
import { logger } from "./logger.js";

let poolInstance: pg.Pool | null = null;

export function getDatabasePool(): pg.Pool {
  if (poolInstance) return poolInstance;

  poolInstance = new pg.Pool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    connectionTimeoutMillis: 10_000,
    idleTimeoutMillis: 30_000,
  });

  // Idle clients can error when the server drops them; the pool replaces them
  poolInstance.on("error", (err) => {
    logger.error({ err }, "Postgres pool error");
  });

  return poolInstance;
}
