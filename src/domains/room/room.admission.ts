/**
 * Admission Protocol - concurrency-safe room join
 *
 * Lock, check, write and commit happen inside one transaction. The capacity
 * check runs only after the room row lock is held, and the lock is kept until
 * commit, so concurrent joiners for the same room are admitted one at a time
 * and can never both take the last seat.
 */
import { logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import type { CredentialResolver } from "../user/credential.resolver.js";
import {
  LockTimeoutError,
  commit,
  rollback,
  type RoomStore,
  type RoomTransaction,
  type TransactionOutcome,
} from "./room.store.js";
import {
  canAdmit,
  type Difficulty,
  type JoinOutcome,
  type RoomId,
  type UserId,
} from "./room.types.js";

export class RoomAdmission {
  constructor(
    private readonly store: RoomStore,
    private readonly credentials: CredentialResolver,
  ) {}

  /**
   * Domain outcomes come back as values; only an unknown credential
   * (InvalidCredentialError) or an infrastructure failure is thrown.
   */
  async join(
    credential: string | null,
    roomId: RoomId,
    difficulty: Difficulty,
  ): Promise<JoinOutcome> {
    const user = await this.credentials.resolve(credential);

    let outcome: JoinOutcome;
    try {
      outcome = await this.store.transaction<JoinOutcome>((tx) =>
        this.admit(tx, roomId, user.userId, difficulty),
      );
    } catch (err) {
      if (!(err instanceof LockTimeoutError)) throw err;
      metrics.lockTimeouts.inc();
      logger.warn({ roomId, userId: user.userId }, "Join gave up waiting for room lock");
      outcome = "OtherError";
    }

    metrics.joinOutcomes.inc({ outcome });
    logger.debug({ roomId, userId: user.userId, outcome }, "Join processed");
    return outcome;
  }

  private async admit(
    tx: RoomTransaction,
    roomId: RoomId,
    userId: UserId,
    difficulty: Difficulty,
  ): Promise<TransactionOutcome<JoinOutcome>> {
    // 1. Lock; a missing row means the room was dissolved
    const room = await tx.lockRoomForUpdate(roomId);
    if (!room) return rollback("Disbanded");

    // 2. Capacity and lifecycle check under the held lock
    if (!canAdmit(room)) return rollback("RoomFull");

    // 3. Seat the user; the user lock makes the post-check see any seat
    //    committed by a concurrent join or create of the same user
    await tx.lockUserForUpdate(userId);
    const inserted = await tx.insertMembership({ roomId, userId, difficulty, isHost: false });
    if (!inserted) {
      logger.warn({ roomId, userId }, "User is already seated in this room");
      return rollback("OtherError");
    }
    await tx.incrementFilled(roomId);

    // 4. The user must now hold exactly one seat system-wide
    const seats = await tx.countMembershipsForUser(userId);
    if (seats !== 1) {
      logger.error({ roomId, userId, seats }, "Join would seat user in more than one room");
      return rollback("OtherError");
    }

    return commit("Ok");
  }
}
