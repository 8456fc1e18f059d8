/**
 * Postgres-backed Room Repository
 *
 * One pooled connection per transaction. `lock_timeout` bounds how long a
 * `SELECT ... FOR UPDATE` may wait; expiry surfaces as LockTimeoutError.
 */
import type { Pool, PoolClient } from "pg";
import type { Logger } from "../../infrastructure/logger.js";
import {
  LockTimeoutError,
  type RoomStore,
  type RoomTransaction,
  type TransactionOptions,
  type TransactionWork,
} from "./room.store.js";
import {
  DIFFICULTIES,
  type Difficulty,
  type Membership,
  type NewMembership,
  type PlayResult,
  type Room,
  type RoomId,
  type RoomStatus,
  type TrackId,
  type UserId,
} from "./room.types.js";

// SQLSTATE lock_not_available, raised when lock_timeout expires
const LOCK_NOT_AVAILABLE = "55P03";

type RoomRow = {
  room_id: number;
  track_id: number;
  capacity: number;
  filled_count: number;
  status: string;
  last_activity_at: Date;
};

type MembershipRow = {
  room_id: number;
  user_id: number;
  difficulty: string;
  is_host: boolean;
  score: number | null;
  judge_counts: number[] | null;
};

const ROOM_COLUMNS = "room_id, track_id, capacity, filled_count, status, last_activity_at";
const MEMBERSHIP_COLUMNS = "room_id, user_id, difficulty, is_host, score, judge_counts";

function readStatus(value: string): RoomStatus {
  if (value === "Open" || value === "Playing") return value;
  throw new Error(`Unknown room status: ${value}`);
}

function readDifficulty(value: string): Difficulty {
  const match = DIFFICULTIES.find((difficulty) => difficulty === value);
  if (!match) throw new Error(`Unknown difficulty: ${value}`);
  return match;
}

export function mapRoomRow(row: RoomRow): Room {
  return {
    roomId: row.room_id,
    trackId: row.track_id,
    capacity: row.capacity,
    filledCount: row.filled_count,
    status: readStatus(row.status),
    lastActivityAt: row.last_activity_at.getTime(),
  };
}

export function mapMembershipRow(row: MembershipRow): Membership {
  return {
    roomId: row.room_id,
    userId: row.user_id,
    difficulty: readDifficulty(row.difficulty),
    isHost: row.is_host,
    result:
      row.score !== null && row.judge_counts !== null
        ? { score: row.score, judgeCounts: row.judge_counts }
        : null,
  };
}

function isLockTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === LOCK_NOT_AVAILABLE
  );
}

/**
 * Activity stamps are written from the application clock, the same clock the
 * idle scan measures its cutoff with, so database clock skew cannot shift
 * which rooms count as idle.
 */
class PgRoomTransaction implements RoomTransaction {
  constructor(
    private readonly client: PoolClient,
    private readonly now: () => number,
  ) {}

  private stamp(): Date {
    return new Date(this.now());
  }

  async createRoom(input: { trackId: TrackId; capacity: number }): Promise<RoomId> {
    const result = await this.client.query<{ room_id: number }>(
      `
        insert into rooms (track_id, capacity, filled_count, status, last_activity_at)
        values ($1, $2, 0, 'Open', $3)
        returning room_id
      `,
      [input.trackId, input.capacity, this.stamp()],
    );
    const roomId = result.rows[0]?.room_id;
    if (roomId === undefined) throw new Error("ROOM_INSERT_FAILED");
    return roomId;
  }

  async insertMembership(membership: NewMembership): Promise<boolean> {
    const result = await this.client.query(
      `
        insert into room_memberships (room_id, user_id, difficulty, is_host)
        values ($1, $2, $3, $4)
        on conflict (room_id, user_id) do nothing
      `,
      [membership.roomId, membership.userId, membership.difficulty, membership.isHost],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async lockRoomForUpdate(roomId: RoomId): Promise<Room | null> {
    try {
      const result = await this.client.query<RoomRow>(
        `select ${ROOM_COLUMNS} from rooms where room_id = $1 for update`,
        [roomId],
      );
      const row = result.rows[0];
      return row ? mapRoomRow(row) : null;
    } catch (error) {
      if (isLockTimeout(error)) throw new LockTimeoutError(roomId);
      throw error;
    }
  }

  async lockUserForUpdate(userId: UserId): Promise<void> {
    try {
      await this.client.query("select 1 from users where user_id = $1 for update", [userId]);
    } catch (error) {
      if (isLockTimeout(error)) throw new LockTimeoutError();
      throw error;
    }
  }

  async readRoom(roomId: RoomId): Promise<Room | null> {
    const result = await this.client.query<RoomRow>(
      `select ${ROOM_COLUMNS} from rooms where room_id = $1`,
      [roomId],
    );
    const row = result.rows[0];
    return row ? mapRoomRow(row) : null;
  }

  async listOpenRooms(trackId: TrackId | null): Promise<Room[]> {
    const result = await this.client.query<RoomRow>(
      `
        select ${ROOM_COLUMNS}
        from rooms
        where status = 'Open'
          and filled_count < capacity
          and ($1::integer is null or track_id = $1)
        order by room_id asc
      `,
      [trackId],
    );
    return result.rows.map(mapRoomRow);
  }

  async listMemberships(roomId: RoomId): Promise<Membership[]> {
    const result = await this.client.query<MembershipRow>(
      `
        select ${MEMBERSHIP_COLUMNS}
        from room_memberships
        where room_id = $1
        order by seq asc
      `,
      [roomId],
    );
    return result.rows.map(mapMembershipRow);
  }

  async findMembership(roomId: RoomId, userId: UserId): Promise<Membership | null> {
    const result = await this.client.query<MembershipRow>(
      `
        select ${MEMBERSHIP_COLUMNS}
        from room_memberships
        where room_id = $1 and user_id = $2
      `,
      [roomId, userId],
    );
    const row = result.rows[0];
    return row ? mapMembershipRow(row) : null;
  }

  async countMembershipsForUser(userId: UserId): Promise<number> {
    const result = await this.client.query<{ count: number }>(
      "select count(*)::int as count from room_memberships where user_id = $1",
      [userId],
    );
    return result.rows[0]?.count ?? 0;
  }

  async setStatus(roomId: RoomId, status: RoomStatus): Promise<boolean> {
    const result = await this.client.query(
      "update rooms set status = $2, last_activity_at = $3 where room_id = $1",
      [roomId, status, this.stamp()],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async incrementFilled(roomId: RoomId): Promise<void> {
    await this.client.query(
      "update rooms set filled_count = filled_count + 1, last_activity_at = $2 where room_id = $1",
      [roomId, this.stamp()],
    );
  }

  async decrementFilled(roomId: RoomId): Promise<void> {
    await this.client.query(
      "update rooms set filled_count = filled_count - 1, last_activity_at = $2 where room_id = $1",
      [roomId, this.stamp()],
    );
  }

  async deleteMembership(roomId: RoomId, userId: UserId): Promise<boolean> {
    const result = await this.client.query(
      "delete from room_memberships where room_id = $1 and user_id = $2",
      [roomId, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async setResult(roomId: RoomId, userId: UserId, result: PlayResult): Promise<boolean> {
    const updated = await this.client.query(
      `
        update room_memberships
        set score = $3, judge_counts = $4::integer[], submitted_at = now()
        where room_id = $1 and user_id = $2
      `,
      [roomId, userId, result.score, result.judgeCounts],
    );
    if ((updated.rowCount ?? 0) === 0) return false;

    await this.client.query("update rooms set last_activity_at = $2 where room_id = $1", [
      roomId,
      this.stamp(),
    ]);
    return true;
  }

  async deleteRoom(roomId: RoomId): Promise<boolean> {
    const result = await this.client.query("delete from rooms where room_id = $1", [roomId]);
    return (result.rowCount ?? 0) > 0;
  }

  async listIdleRoomIds(idleBefore: number): Promise<RoomId[]> {
    const result = await this.client.query<{ room_id: number }>(
      "select room_id from rooms where last_activity_at < $1 order by room_id asc",
      [new Date(idleBefore)],
    );
    return result.rows.map((row) => row.room_id);
  }
}

export class PgRoomStore implements RoomStore {
  constructor(
    private readonly pool: Pool,
    private readonly lockTimeoutMs: number,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async transaction<T>(work: TransactionWork<T>, options: TransactionOptions = {}): Promise<T> {
    const client = await this.pool.connect();
    let inTransaction = false;

    try {
      // Read-only work gets one snapshot across all of its statements
      await client.query(
        options.readOnly ? "begin isolation level repeatable read, read only" : "begin",
      );
      inTransaction = true;
      // `set local` takes no bind parameters; the value is a validated integer
      await client.query(`set local lock_timeout = ${Math.trunc(this.lockTimeoutMs)}`);

      const outcome = await work(new PgRoomTransaction(client, this.now));

      await client.query(outcome.action === "commit" ? "commit" : "rollback");
      inTransaction = false;
      return outcome.value;
    } catch (error) {
      if (inTransaction) {
        try {
          await client.query("rollback");
        } catch (rollbackError) {
          this.logger.error({ err: rollbackError }, "Rollback failed");
        }
      }
      // Plain UPDATE/DELETE can hit lock_timeout too
      if (isLockTimeout(error)) throw new LockTimeoutError();
      throw error;
    } finally {
      client.release();
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("select 1");
      return true;
    } catch (err) {
      this.logger.error({ err }, "Database ping failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
