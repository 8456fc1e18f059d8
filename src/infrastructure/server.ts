import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { Redis } from "ioredis";
import { config } from "../config/index.js";
import { createAppContext, type AppContext } from "../context.js";
import { registerAllDomains } from "../domains/index.js";
import { AutoCloseJob, AutoCloseService } from "../domains/room/auto-close/index.js";
import { MemoryRoomStore } from "../domains/room/room.store.memory.js";
import { PgRoomStore } from "../domains/room/room.store.pg.js";
import type { RoomStore } from "../domains/room/room.store.js";
import { MemoryUserRepository } from "../domains/user/user.repository.memory.js";
import { PgUserRepository } from "../domains/user/user.repository.js";
import type { IdentityStore } from "../domains/user/user.types.js";
import { RateLimiter } from "../utils/rateLimiter.js";
import { getDatabasePool } from "./database.js";
import { createHealthRoutes } from "./health.js";
import { logger } from "./logger.js";
import { createMetricsRoutes } from "./metrics.js";
import { runMigrations } from "./migrate.js";
import { getRedisClient } from "./redis.js";

export interface BuildServerOptions {
  /** Fastify request logging; defaults to the shared pino instance */
  loggerInstance?: FastifyBaseLogger;
}

/**
 * Fastify instance with health, metrics and every domain's routes.
 * Nothing is listening yet.
 */
export async function buildServer(
  context: AppContext,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.loggerInstance ?? logger;
  const fastify = Fastify({ loggerInstance });

  // Register health check
  await fastify.register(createHealthRoutes(context.store, context.redis));

  // Register metrics
  await fastify.register(createMetricsRoutes());

  registerAllDomains(fastify, context);

  return fastify;
}

export interface BootstrapResult {
  server: FastifyInstance;
  context: AppContext;
  redis: Redis;
  store: RoomStore;
  autoCloseJob: AutoCloseJob;
}

async function createStores(): Promise<{ store: RoomStore; identityStore: IdentityStore }> {
  if (config.STORE_DRIVER === "memory") {
    logger.warn("Using in-memory stores; rooms and users are lost on restart");
    return {
      store: new MemoryRoomStore({ lockTimeoutMs: config.LOCK_TIMEOUT_MS }),
      identityStore: new MemoryUserRepository(),
    };
  }

  const pool = getDatabasePool();
  if (config.RUN_MIGRATIONS) {
    await runMigrations(pool, logger);
  }

  return {
    store: new PgRoomStore(pool, config.LOCK_TIMEOUT_MS, logger),
    identityStore: new PgUserRepository(pool),
  };
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  const redis = getRedisClient();
  const { store, identityStore } = await createStores();

  const context = createAppContext({
    store,
    identityStore,
    credentialCache: redis,
    rateLimiter: new RateLimiter(redis),
    redis,
  });

  const autoCloseJob = new AutoCloseJob(
    new AutoCloseService(store, config.ROOM_INACTIVITY_TIMEOUT_MS),
    (roomId, idleBefore) => context.lifecycle.dissolveIfIdle(roomId, idleBefore),
    config.ROOM_AUTO_CLOSE_POLL_INTERVAL_MS,
  );

  const server = await buildServer(context);

  return { server, context, redis, store, autoCloseJob };
}
