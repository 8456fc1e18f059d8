/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from "zod";
import "dotenv/config";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  // Tags log lines and names the Redis connection
  SERVICE_NAME: z.string().min(1).default("rhythm-room-server"),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Storage
  STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: z.string().default("postgres://localhost:5432/rhythm_rooms"),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  RUN_MIGRATIONS: booleanFlag.default("true"),
  // Upper bound on waiting for a room row lock before a join gives up
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),

  // Redis
  REDIS_HOST: z.string().default("127.0.0.1"),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(0),
  REDIS_TLS: booleanFlag.default(""),

  // Auth
  CREDENTIAL_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  // Limits
  RATE_LIMIT_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(240),

  // Room cleanup
  ROOM_INACTIVITY_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60_000),
  ROOM_AUTO_CLOSE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === "development";
