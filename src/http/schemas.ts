import { z } from "zod";
import {
  DIFFICULTIES,
  JUDGMENT_TIERS,
  TRACK_ID_ANY,
} from "../domains/room/room.types.js";

// Reusable validators
// Ids, scores and counts are stored as Postgres integer (int4)
const INT4_MAX = 2_147_483_647;
const int4 = z.number().int().max(INT4_MAX);
const roomIdSchema = int4.positive();
const difficultySchema = z.enum(DIFFICULTIES);

// ─────────────────────────────────────────────────────────────────
// User
// ─────────────────────────────────────────────────────────────────

export const userProfileSchema = z.object({
  name: z.string().trim().min(1).max(64),
  cosmeticId: int4.nonnegative(),
});

// ─────────────────────────────────────────────────────────────────
// Room
// ─────────────────────────────────────────────────────────────────

export const createRoomSchema = z.object({
  trackId: int4.positive(),
  difficulty: difficultySchema,
});

/** trackId 0 (or omitted) lists rooms for every track */
export const listRoomsSchema = z.object({
  trackId: int4.nonnegative().default(TRACK_ID_ANY),
});

export const joinRoomSchema = z.object({
  roomId: roomIdSchema,
  difficulty: difficultySchema,
});

/** wait, start, result and leave only name the room */
export const roomRefSchema = z.object({
  roomId: roomIdSchema,
});

/**
 * Play result; judgeCounts has one entry per judgment tier, best first
 */
export const endRoomSchema = z.object({
  roomId: roomIdSchema,
  score: int4.nonnegative(),
  judgeCounts: z.array(int4.nonnegative()).length(JUDGMENT_TIERS.length),
});

export const emptySchema = z.object({}).passthrough();
