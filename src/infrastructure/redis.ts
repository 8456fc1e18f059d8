import { Redis } from "ioredis";
import { config } from "../config/index.js";
import { logger } from "./logger.js";

let redisInstance: Redis | null = null;

/** Shared client for the credential cache and the rate limiter */
export function getRedisClient(): Redis {
  if (redisInstance) return redisInstance;

  redisInstance = new Redis({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    db: config.REDIS_DB,
    connectionName: config.SERVICE_NAME,
    ...(config.REDIS_PASSWORD && { password: config.REDIS_PASSWORD }),
    ...(config.REDIS_TLS && { tls: { rejectUnauthorized: true } }),
    connectTimeout: 10_000,
    commandTimeout: 5_000,
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 100, 3000),
  });

  const target = { host: config.REDIS_HOST, port: config.REDIS_PORT, db: config.REDIS_DB };

  redisInstance.on("error", (err) => {
    logger.error({ err, ...target }, "Redis connection error");
  });

  redisInstance.on("ready", () => {
    logger.info(target, "Redis ready");
  });

  redisInstance.on("reconnecting", (delayMs: number) => {
    logger.warn({ ...target, delayMs }, "Redis reconnecting");
  });

  redisInstance.on("end", () => {
    logger.info(target, "Redis connection closed");
  });

  return redisInstance;
}
