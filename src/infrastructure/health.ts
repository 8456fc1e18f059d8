import type { FastifyPluginAsync } from "fastify";
import type { Redis } from "ioredis";
import type { RoomStore } from "../domains/room/room.store.js";

export const createHealthRoutes = (
  store: RoomStore,
  redis: Pick<Redis, "status">,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      // redis.status is enough here, the client reconnects on its own
      const redisOk = redis.status === "ready";

      const storeOk = await store.ping();

      const status = redisOk && storeOk ? "ok" : "degraded";

      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        store: storeOk ? "up" : "down",
        redis: redis.status,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};
