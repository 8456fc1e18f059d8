/**
 * In-process Room Repository
 *
 * Writes are staged per transaction and applied in one synchronous step on
 * commit, so other transactions never observe a partial write. Room and user
 * rows are guarded by exclusive locks that are held until the owning
 * transaction ends, mirroring `SELECT ... FOR UPDATE` (plain UPDATE/DELETE of a
 * room row takes the same lock, as it does in Postgres).
 */
import {
  LockTimeoutError,
  type RoomStore,
  type RoomTransaction,
  type TransactionOptions,
  type TransactionWork,
} from "./room.store.js";
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

export interface MemoryState {
  rooms: Map<RoomId, Room>;
  memberships: Membership[];
}

export type WriteOp =
  | { kind: "insertRoom"; room: Room }
  | { kind: "setStatus"; roomId: RoomId; status: RoomStatus; at: number }
  | { kind: "adjustFilled"; roomId: RoomId; delta: number; at: number }
  | { kind: "deleteRoom"; roomId: RoomId }
  | { kind: "insertMembership"; membership: Membership }
  | { kind: "deleteMembership"; roomId: RoomId; userId: UserId }
  | { kind: "setResult"; roomId: RoomId; userId: UserId; result: PlayResult; at: number };

const isMember = (m: Membership, roomId: RoomId, userId: UserId) =>
  m.roomId === roomId && m.userId === userId;

function applyOp(state: MemoryState, op: WriteOp): void {
  switch (op.kind) {
    case "insertRoom":
      state.rooms.set(op.room.roomId, { ...op.room });
      return;
    case "setStatus": {
      const room = state.rooms.get(op.roomId);
      if (room) state.rooms.set(op.roomId, { ...room, status: op.status, lastActivityAt: op.at });
      return;
    }
    case "adjustFilled": {
      const room = state.rooms.get(op.roomId);
      if (room) {
        state.rooms.set(op.roomId, {
          ...room,
          filledCount: room.filledCount + op.delta,
          lastActivityAt: op.at,
        });
      }
      return;
    }
    case "deleteRoom":
      state.rooms.delete(op.roomId);
      state.memberships = state.memberships.filter((m) => m.roomId !== op.roomId);
      return;
    case "insertMembership":
      if (!state.rooms.has(op.membership.roomId)) return;
      if (state.memberships.some((m) => isMember(m, op.membership.roomId, op.membership.userId))) {
        return;
      }
      state.memberships.push({ ...op.membership });
      return;
    case "deleteMembership":
      state.memberships = state.memberships.filter((m) => !isMember(m, op.roomId, op.userId));
      return;
    case "setResult": {
      state.memberships = state.memberships.map((m) =>
        isMember(m, op.roomId, op.userId) ? { ...m, result: op.result } : m,
      );
      const room = state.rooms.get(op.roomId);
      if (room) state.rooms.set(op.roomId, { ...room, lastActivityAt: op.at });
      return;
    }
  }
}

function cloneState(state: MemoryState): MemoryState {
  return {
    rooms: new Map(state.rooms),
    memberships: [...state.memberships],
  };
}

interface LockWaiter {
  txId: number;
  grant: () => void;
}

/** Exclusive per-row locks handed over to waiters in FIFO order */
class RowLocks {
  private readonly holders = new Map<number, number>();
  private readonly waiters = new Map<number, LockWaiter[]>();

  constructor(private readonly timeoutError: (rowId: number) => Error) {}

  acquire(rowId: number, txId: number, timeoutMs: number): Promise<void> {
    const holder = this.holders.get(rowId);
    if (holder === undefined) {
      this.holders.set(rowId, txId);
      return Promise.resolve();
    }
    if (holder === txId) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const waiter: LockWaiter = {
        txId,
        grant: () => {
          clearTimeout(timer);
          resolve();
        },
      };
      const timer = setTimeout(() => {
        const queue = this.waiters.get(rowId) ?? [];
        this.waiters.set(
          rowId,
          queue.filter((w) => w !== waiter),
        );
        reject(this.timeoutError(rowId));
      }, timeoutMs);

      const queue = this.waiters.get(rowId) ?? [];
      queue.push(waiter);
      this.waiters.set(rowId, queue);
    });
  }

  release(rowId: number, txId: number): void {
    if (this.holders.get(rowId) !== txId) return;

    const queue = this.waiters.get(rowId) ?? [];
    const next = queue.shift();
    if (queue.length === 0) this.waiters.delete(rowId);

    if (!next) {
      this.holders.delete(rowId);
      return;
    }
    this.holders.set(rowId, next.txId);
    next.grant();
  }

  heldCount(): number {
    return this.holders.size;
  }
}

export interface MemoryRoomStoreOptions {
  lockTimeoutMs: number;
  now?: () => number;
}

export class MemoryRoomStore implements RoomStore {
  private state: MemoryState = { rooms: new Map(), memberships: [] };
  private readonly roomLocks = new RowLocks((roomId) => new LockTimeoutError(roomId));
  private readonly userLocks = new RowLocks(() => new LockTimeoutError());
  private nextRoomId = 1;
  private nextTxId = 1;
  readonly now: () => number;

  constructor(readonly options: MemoryRoomStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  async transaction<T>(work: TransactionWork<T>, options: TransactionOptions = {}): Promise<T> {
    const tx = new MemoryRoomTransaction(this, this.nextTxId++, options.readOnly ?? false);
    try {
      const outcome = await work(tx);
      if (outcome.action === "commit") {
        tx.commit();
      }
      return outcome.value;
    } finally {
      tx.close();
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  /** Number of room and user rows currently locked by open transactions */
  lockedRowCount(): number {
    return this.roomLocks.heldCount() + this.userLocks.heldCount();
  }

  /** @internal */
  allocateRoomId(): RoomId {
    return this.nextRoomId++;
  }

  /** @internal */
  snapshot(): MemoryState {
    return cloneState(this.state);
  }

  /** @internal */
  apply(ops: readonly WriteOp[]): void {
    const next = cloneState(this.state);
    for (const op of ops) applyOp(next, op);
    this.state = next;
  }

  /** @internal */
  lock(roomId: RoomId, txId: number): Promise<void> {
    return this.roomLocks.acquire(roomId, txId, this.options.lockTimeoutMs);
  }

  /** @internal */
  unlock(roomId: RoomId, txId: number): void {
    this.roomLocks.release(roomId, txId);
  }

  /** @internal */
  lockUser(userId: UserId, txId: number): Promise<void> {
    return this.userLocks.acquire(userId, txId, this.options.lockTimeoutMs);
  }

  /** @internal */
  unlockUser(userId: UserId, txId: number): void {
    this.userLocks.release(userId, txId);
  }
}

class MemoryRoomTransaction implements RoomTransaction {
  private readonly ops: WriteOp[] = [];
  private readonly lockedRooms = new Set<RoomId>();
  private readonly lockedUsers = new Set<UserId>();
  private closed = false;

  constructor(
    private readonly store: MemoryRoomStore,
    private readonly txId: number,
    private readonly readOnly: boolean,
  ) {}

  commit(): void {
    this.assertOpen();
    this.store.apply(this.ops);
    this.ops.length = 0;
  }

  close(): void {
    this.closed = true;
    this.ops.length = 0;
    for (const roomId of this.lockedRooms) {
      this.store.unlock(roomId, this.txId);
    }
    this.lockedRooms.clear();
    for (const userId of this.lockedUsers) {
      this.store.unlockUser(userId, this.txId);
    }
    this.lockedUsers.clear();
  }

  async createRoom(input: { trackId: TrackId; capacity: number }): Promise<RoomId> {
    this.assertWritable();
    const roomId = this.store.allocateRoomId();
    this.ops.push({
      kind: "insertRoom",
      room: {
        roomId,
        trackId: input.trackId,
        capacity: input.capacity,
        filledCount: 0,
        status: "Open",
        lastActivityAt: this.store.now(),
      },
    });
    // A new row is invisible to others until commit, but the creator owns it
    await this.lockRow(roomId);
    return roomId;
  }

  async insertMembership(membership: NewMembership): Promise<boolean> {
    this.assertWritable();
    const view = this.view();
    if (!view.rooms.has(membership.roomId)) {
      throw new Error(`Room ${membership.roomId} does not exist`);
    }
    if (view.memberships.some((m) => isMember(m, membership.roomId, membership.userId))) {
      return false;
    }
    this.ops.push({ kind: "insertMembership", membership: { ...membership, result: null } });
    return true;
  }

  async lockRoomForUpdate(roomId: RoomId): Promise<Room | null> {
    this.assertOpen();
    await this.lockRow(roomId);
    return this.view().rooms.get(roomId) ?? null;
  }

  async lockUserForUpdate(userId: UserId): Promise<void> {
    this.assertOpen();
    if (this.lockedUsers.has(userId)) return;
    await this.store.lockUser(userId, this.txId);
    if (this.closed) {
      this.store.unlockUser(userId, this.txId);
      throw new Error("Transaction is closed");
    }
    this.lockedUsers.add(userId);
  }

  async readRoom(roomId: RoomId): Promise<Room | null> {
    this.assertOpen();
    return this.view().rooms.get(roomId) ?? null;
  }

  async listOpenRooms(trackId: TrackId | null): Promise<Room[]> {
    this.assertOpen();
    return [...this.view().rooms.values()]
      .filter((room) => room.status === "Open" && room.filledCount < room.capacity)
      .filter((room) => trackId === null || room.trackId === trackId)
      .sort((a, b) => a.roomId - b.roomId);
  }

  async listMemberships(roomId: RoomId): Promise<Membership[]> {
    this.assertOpen();
    return this.view().memberships.filter((m) => m.roomId === roomId);
  }

  async findMembership(roomId: RoomId, userId: UserId): Promise<Membership | null> {
    this.assertOpen();
    return this.view().memberships.find((m) => isMember(m, roomId, userId)) ?? null;
  }

  async countMembershipsForUser(userId: UserId): Promise<number> {
    this.assertOpen();
    return this.view().memberships.filter((m) => m.userId === userId).length;
  }

  async setStatus(roomId: RoomId, status: RoomStatus): Promise<boolean> {
    this.assertWritable();
    await this.lockRow(roomId);
    if (!this.view().rooms.has(roomId)) return false;
    this.ops.push({ kind: "setStatus", roomId, status, at: this.store.now() });
    return true;
  }

  async incrementFilled(roomId: RoomId): Promise<void> {
    await this.adjustFilled(roomId, 1);
  }

  async decrementFilled(roomId: RoomId): Promise<void> {
    await this.adjustFilled(roomId, -1);
  }

  async deleteMembership(roomId: RoomId, userId: UserId): Promise<boolean> {
    this.assertWritable();
    if (!this.view().memberships.some((m) => isMember(m, roomId, userId))) return false;
    this.ops.push({ kind: "deleteMembership", roomId, userId });
    return true;
  }

  async setResult(roomId: RoomId, userId: UserId, result: PlayResult): Promise<boolean> {
    this.assertWritable();
    if (!this.view().memberships.some((m) => isMember(m, roomId, userId))) return false;
    this.ops.push({
      kind: "setResult",
      roomId,
      userId,
      result: { judgeCounts: [...result.judgeCounts], score: result.score },
      at: this.store.now(),
    });
    return true;
  }

  async deleteRoom(roomId: RoomId): Promise<boolean> {
    this.assertWritable();
    await this.lockRow(roomId);
    if (!this.view().rooms.has(roomId)) return false;
    this.ops.push({ kind: "deleteRoom", roomId });
    return true;
  }

  async listIdleRoomIds(idleBefore: number): Promise<RoomId[]> {
    this.assertOpen();
    return [...this.view().rooms.values()]
      .filter((room) => room.lastActivityAt < idleBefore)
      .map((room) => room.roomId)
      .sort((a, b) => a - b);
  }

  private async adjustFilled(roomId: RoomId, delta: number): Promise<void> {
    this.assertWritable();
    await this.lockRow(roomId);
    const room = this.view().rooms.get(roomId);
    if (!room) return;
    const filledCount = room.filledCount + delta;
    if (filledCount < 0 || filledCount > room.capacity) {
      throw new Error(`filledCount ${filledCount} out of range for room ${roomId}`);
    }
    this.ops.push({ kind: "adjustFilled", roomId, delta, at: this.store.now() });
  }

  private async lockRow(roomId: RoomId): Promise<void> {
    if (this.lockedRooms.has(roomId)) return;
    await this.store.lock(roomId, this.txId);
    if (this.closed) {
      // Transaction ended while queued for the lock
      this.store.unlock(roomId, this.txId);
      throw new Error("Transaction is closed");
    }
    this.lockedRooms.add(roomId);
  }

  private view(): MemoryState {
    const view = this.store.snapshot();
    for (const op of this.ops) applyOp(view, op);
    return view;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("Transaction is closed");
  }

  private assertWritable(): void {
    this.assertOpen();
    if (this.readOnly) throw new Error("Cannot write in a read-only transaction");
  }
}
