/**
 * Room Repository contract
 *
 * All reads and writes happen through a RoomTransaction handed out by
 * RoomStore.transaction(): begin on entry, commit or roll back on exit,
 * connection and row locks released on every path.
 */
import type {
  Membership,
  NewMembership,
  PlayResult,
  Room,
  RoomId,
  RoomStatus,
  TrackId,
  UserId,
} from "./room.types.js";

export interface RoomTransaction {
  /** Inserts a room with filledCount 0 and status Open */
  createRoom(input: { trackId: TrackId; capacity: number }): Promise<RoomId>;

  /** Returns false when (roomId, userId) is already seated */
  insertMembership(membership: NewMembership): Promise<boolean>;

  /**
   * Exclusive row lock held until the transaction ends.
   * Throws LockTimeoutError when the lock cannot be taken in time.
   */
  lockRoomForUpdate(roomId: RoomId): Promise<Room | null>;

  /**
   * Exclusive lock on the user's row, held until the transaction ends.
   * Serializes seat changes of one user across rooms; same timeout rules
   * as lockRoomForUpdate.
   */
  lockUserForUpdate(userId: UserId): Promise<void>;

  readRoom(roomId: RoomId): Promise<Room | null>;

  /** Open rooms with a free seat, optionally for one track, by roomId */
  listOpenRooms(trackId: TrackId | null): Promise<Room[]>;

  /** Memberships in insertion order (host first) */
  listMemberships(roomId: RoomId): Promise<Membership[]>;

  findMembership(roomId: RoomId, userId: UserId): Promise<Membership | null>;

  countMembershipsForUser(userId: UserId): Promise<number>;

  setStatus(roomId: RoomId, status: RoomStatus): Promise<boolean>;

  incrementFilled(roomId: RoomId): Promise<void>;

  decrementFilled(roomId: RoomId): Promise<void>;

  deleteMembership(roomId: RoomId, userId: UserId): Promise<boolean>;

  setResult(roomId: RoomId, userId: UserId, result: PlayResult): Promise<boolean>;

  /** Removes the room row; its memberships go with it */
  deleteRoom(roomId: RoomId): Promise<boolean>;

  /** Rooms whose last activity is older than `idleBefore` (epoch ms) */
  listIdleRoomIds(idleBefore: number): Promise<RoomId[]>;
}

export type TransactionOutcome<T> =
  | { action: "commit"; value: T }
  | { action: "rollback"; value: T };

export const commit = <T>(value: T): TransactionOutcome<T> => ({
  action: "commit",
  value,
});

export const rollback = <T>(value: T): TransactionOutcome<T> => ({
  action: "rollback",
  value,
});

export interface TransactionOptions {
  readOnly?: boolean;
}

export type TransactionWork<T> = (
  tx: RoomTransaction,
) => Promise<TransactionOutcome<T>>;

export interface RoomStore {
  transaction<T>(work: TransactionWork<T>, options?: TransactionOptions): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/** Raised when a row lock could not be acquired within the lock timeout */
export class LockTimeoutError extends Error {
  constructor(readonly roomId: RoomId | null = null) {
    super(
      roomId === null
        ? "Timed out waiting for a row lock"
        : `Timed out waiting for lock on room ${roomId}`,
    );
    this.name = "LockTimeoutError";
  }
}
