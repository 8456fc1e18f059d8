/**
 * Room Auto-Close Service
 * Finds rooms whose last activity is older than the inactivity timeout
 */
import { logger } from "../../../infrastructure/logger.js";
import { commit, type RoomStore } from "../room.store.js";
import type { RoomId } from "../room.types.js";

export interface IdleRoomScan {
  idleBefore: number;
  roomIds: RoomId[];
}

export class AutoCloseService {
  constructor(
    private readonly store: RoomStore,
    private readonly inactivityTimeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Rooms with no join, start, leave or result since the cutoff.
   * Returns an empty scan when the store cannot be read; the next poll retries.
   */
  async getIdleRooms(): Promise<IdleRoomScan> {
    const idleBefore = this.now() - this.inactivityTimeoutMs;
    try {
      const roomIds = await this.store.transaction(
        async (tx) => commit(await tx.listIdleRoomIds(idleBefore)),
        { readOnly: true },
      );
      return { idleBefore, roomIds };
    } catch (err) {
      logger.error({ err }, "Failed to scan for idle rooms");
      return { idleBefore, roomIds: [] };
    }
  }
}
