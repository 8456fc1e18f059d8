import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Pool } from "pg";
import type { Logger } from "./logger.js";

// Same relative depth from src/infrastructure and dist/infrastructure
const schemaPath = fileURLToPath(new URL("../../sql/schema.sql", import.meta.url));

export async function runMigrations(pool: Pool, logger: Logger): Promise<void> {
  const sql = await readFile(schemaPath, "utf8");
  await pool.query(sql);
  logger.info({ schemaPath }, "Database schema applied");
}
