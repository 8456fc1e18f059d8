/**
 * Room Auto-Close Job
 * Background job that periodically dissolves rooms nobody touched in a while
 */
import { logger } from "../../../infrastructure/logger.js";
import type { RoomId } from "../room.types.js";
import type { AutoCloseService } from "./auto-close.service.js";

export type DissolveIdleRoom = (roomId: RoomId, idleBefore: number) => Promise<boolean>;

export class AutoCloseJob {
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;

  constructor(
    private readonly autoCloseService: AutoCloseService,
    private readonly dissolveIdleRoom: DissolveIdleRoom,
    private readonly pollIntervalMs: number,
  ) {}

  /**
   * Start the background job
   */
  start(): void {
    if (this.timer) {
      logger.warn("Auto-close job already running");
      return;
    }

    this.timer = setInterval(() => void this.closeIdleRooms(), this.pollIntervalMs);
    // The job alone should not keep the process alive
    this.timer.unref();

    logger.info({ pollIntervalMs: this.pollIntervalMs }, "Room auto-close job started");
  }

  /**
   * Stop the background job gracefully
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Room auto-close job stopped");
    }
  }

  /**
   * One sweep; returns how many rooms were dissolved
   */
  async closeIdleRooms(): Promise<number> {
    // Prevent concurrent runs
    if (this.isRunning) {
      return 0;
    }

    this.isRunning = true;
    let closed = 0;

    try {
      const { idleBefore, roomIds } = await this.autoCloseService.getIdleRooms();

      if (roomIds.length > 0) {
        logger.info({ count: roomIds.length, roomIds }, "Found idle rooms to close");
      }

      for (const roomId of roomIds) {
        try {
          if (await this.dissolveIdleRoom(roomId, idleBefore)) {
            closed += 1;
            logger.info({ roomId }, "Closed idle room");
          }
        } catch (err) {
          logger.error({ err, roomId }, "Failed to close idle room");
        }
      }
    } finally {
      this.isRunning = false;
    }

    return closed;
  }
}
