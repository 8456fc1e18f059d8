import type { FastifyInstance } from "fastify";
import type { AppContext } from "../../context.js";
import {
  createRoomSchema,
  endRoomSchema,
  joinRoomSchema,
  listRoomsSchema,
  roomRefSchema,
} from "../../http/schemas.js";
import { createRoute } from "../../shared/handler.utils.js";
import { NotRoomHostError, RoomNotFoundError } from "../../shared/errors.js";

const RATE_LIMITED = { rateLimited: true } as const;

export const createRoomRoute = createRoute(
  "room:create",
  createRoomSchema,
  async ({ trackId, difficulty }, { credential }, { lifecycle }) => ({
    roomId: await lifecycle.create(credential, trackId, difficulty),
  }),
  RATE_LIMITED,
);

export const listRoomsRoute = createRoute(
  "room:list",
  listRoomsSchema,
  async ({ trackId }, { credential }, { credentials, queries }) => {
    await credentials.resolve(credential);
    return { rooms: await queries.list(trackId) };
  },
  RATE_LIMITED,
);

export const joinRoomRoute = createRoute(
  "room:join",
  joinRoomSchema,
  async ({ roomId, difficulty }, { credential }, { admission }) => ({
    outcome: await admission.join(credential, roomId, difficulty),
  }),
  RATE_LIMITED,
);

export const waitRoomRoute = createRoute(
  "room:wait",
  roomRefSchema,
  async ({ roomId }, { credential }, { queries }) => queries.wait(credential, roomId),
  RATE_LIMITED,
);

/**
 * Only the host may start. A missing room is reported as 404 before the
 * host check so the caller can tell the two apart.
 */
export const startRoomRoute = createRoute(
  "room:start",
  roomRefSchema,
  async ({ roomId }, { credential }, { credentials, lifecycle, queries }) => {
    const user = await credentials.resolve(credential);

    const membership = await queries.membershipOf(roomId, user.userId);
    if (!membership?.isHost) {
      if (!(await queries.roomExists(roomId))) throw new RoomNotFoundError(roomId);
      throw new NotRoomHostError(roomId);
    }

    await lifecycle.start(roomId);
    return {};
  },
  RATE_LIMITED,
);

export const endRoomRoute = createRoute(
  "room:end",
  endRoomSchema,
  async ({ roomId, score, judgeCounts }, { credential }, { lifecycle }) => {
    await lifecycle.submitResult(credential, roomId, { judgeCounts, score });
    return {};
  },
  RATE_LIMITED,
);

export const roomResultRoute = createRoute(
  "room:result",
  roomRefSchema,
  async ({ roomId }, { credential }, { credentials, queries }) => {
    await credentials.resolve(credential);
    return queries.aggregateResult(roomId);
  },
  RATE_LIMITED,
);

export const leaveRoomRoute = createRoute(
  "room:leave",
  roomRefSchema,
  async ({ roomId }, { credential }, { lifecycle }) => ({
    outcome: await lifecycle.leave(credential, roomId),
  }),
  RATE_LIMITED,
);

export const registerRoomRoutes = (fastify: FastifyInstance, context: AppContext) => {
  fastify.post("/room/create", createRoomRoute(context));
  fastify.post("/room/list", listRoomsRoute(context));
  fastify.post("/room/join", joinRoomRoute(context));
  fastify.post("/room/wait", waitRoomRoute(context));
  fastify.post("/room/start", startRoomRoute(context));
  fastify.post("/room/end", endRoomRoute(context));
  fastify.post("/room/result", roomResultRoute(context));
  fastify.post("/room/leave", leaveRoomRoute(context));
};
