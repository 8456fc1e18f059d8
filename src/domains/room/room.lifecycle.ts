/**
 * Room Lifecycle Manager
 * Owns Open → Playing → Dissolved transitions and capacity bookkeeping.
 *
 * Dissolution removes the room row (memberships cascade); every reader
 * treats a missing row as Dissolved. It happens when the host leaves, when
 * the last member leaves, or when the idle-room job finds no recent activity.
 */
import { logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import {
  AlreadySeatedError,
  NotSeatedError,
  RoomNotFoundError,
  RoomNotPlayingError,
} from "../../shared/errors.js";
import type { CredentialResolver } from "../user/credential.resolver.js";
import { commit, rollback, type RoomStore } from "./room.store.js";
import {
  MAX_ROOM_USER_COUNT,
  type Difficulty,
  type DissolveReason,
  type LeaveOutcome,
  type PlayResult,
  type RoomId,
  type TrackId,
} from "./room.types.js";

interface LeaveResult {
  outcome: LeaveOutcome;
  // Set when the leave removed the room
  reason: DissolveReason | null;
}

export class RoomLifecycleManager {
  constructor(
    private readonly store: RoomStore,
    private readonly credentials: CredentialResolver,
  ) {}

  async create(
    credential: string | null,
    trackId: TrackId,
    difficulty: Difficulty,
  ): Promise<RoomId> {
    const user = await this.credentials.resolve(credential);

    const roomId = await this.store.transaction(async (tx) => {
      // Serialized with the same user's joins and creates
      await tx.lockUserForUpdate(user.userId);
      if ((await tx.countMembershipsForUser(user.userId)) > 0) {
        throw new AlreadySeatedError(user.userId);
      }

      const roomId = await tx.createRoom({ trackId, capacity: MAX_ROOM_USER_COUNT });
      await tx.insertMembership({ roomId, userId: user.userId, difficulty, isHost: true });
      await tx.incrementFilled(roomId);
      return commit(roomId);
    });

    metrics.roomsCreated.inc();
    logger.info({ roomId, trackId, userId: user.userId }, "Room created");
    return roomId;
  }

  /**
   * Idempotent. Host authorization is the caller's job.
   */
  async start(roomId: RoomId): Promise<void> {
    const updated = await this.store.transaction(async (tx) =>
      commit(await tx.setStatus(roomId, "Playing")),
    );
    if (!updated) throw new RoomNotFoundError(roomId);

    logger.info({ roomId }, "Room started");
  }

  async leave(credential: string | null, roomId: RoomId): Promise<LeaveOutcome> {
    const user = await this.credentials.resolve(credential);

    const { outcome, reason } = await this.store.transaction<LeaveResult>(async (tx) => {
      const room = await tx.lockRoomForUpdate(roomId);
      if (!room) return rollback({ outcome: "Dissolved", reason: null });

      const membership = await tx.findMembership(roomId, user.userId);
      if (!membership) return rollback({ outcome: "NotSeated", reason: null });

      if (membership.isHost || room.filledCount <= 1) {
        await tx.deleteRoom(roomId);
        return commit({
          outcome: "Dissolved",
          reason: membership.isHost ? "host_left" : "last_member_left",
        });
      }

      await tx.deleteMembership(roomId, user.userId);
      await tx.decrementFilled(roomId);
      return commit({ outcome: "Left", reason: null });
    });

    metrics.leaveOutcomes.inc({ outcome });
    if (reason) {
      metrics.roomsDissolved.inc({ reason });
      logger.info({ roomId, userId: user.userId, reason }, "Room dissolved");
    } else {
      logger.debug({ roomId, userId: user.userId, outcome }, "Leave processed");
    }
    return outcome;
  }

  /**
   * Dissolve a room that has seen no activity since `idleBefore`.
   * Idleness is re-checked under the row lock so a room that just got a
   * join or result is left alone.
   */
  async dissolveIfIdle(roomId: RoomId, idleBefore: number): Promise<boolean> {
    const dissolved = await this.store.transaction<boolean>(async (tx) => {
      const room = await tx.lockRoomForUpdate(roomId);
      if (!room || room.lastActivityAt >= idleBefore) return rollback(false);

      await tx.deleteRoom(roomId);
      return commit(true);
    });

    if (dissolved) {
      const reason: DissolveReason = "inactivity";
      metrics.roomsDissolved.inc({ reason });
    }
    return dissolved;
  }

  /**
   * Attach the caller's result. Serialized with joins and leaves by the row lock;
   * a resubmission overwrites the earlier result.
   */
  async submitResult(
    credential: string | null,
    roomId: RoomId,
    result: PlayResult,
  ): Promise<void> {
    const user = await this.credentials.resolve(credential);

    await this.store.transaction(async (tx) => {
      const room = await tx.lockRoomForUpdate(roomId);
      if (!room) throw new RoomNotFoundError(roomId);
      if (room.status !== "Playing") throw new RoomNotPlayingError(roomId);

      const saved = await tx.setResult(roomId, user.userId, result);
      if (!saved) throw new NotSeatedError(roomId, user.userId);
      return commit(undefined);
    });

    metrics.resultsSubmitted.inc();
    logger.debug({ roomId, userId: user.userId, score: result.score }, "Result submitted");
  }
}
