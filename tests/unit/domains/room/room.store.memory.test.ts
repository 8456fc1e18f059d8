import { describe, it, expect, beforeEach } from "vitest";
import { MemoryRoomStore } from "@src/domains/room/room.store.memory.js";
import { commit, rollback, LockTimeoutError } from "@src/domains/room/room.store.js";
import { createGate } from "../../support/fixtures.js";

describe("MemoryRoomStore", () => {
  let store: MemoryRoomStore;

  const createRoom = (trackId: number, capacity = 4) =>
    store.transaction(async (tx) => commit(await tx.createRoom({ trackId, capacity })));

  const readRoom = (roomId: number) =>
    store.transaction(async (tx) => commit(await tx.readRoom(roomId)), { readOnly: true });

  beforeEach(() => {
    store = new MemoryRoomStore({ lockTimeoutMs: 20, now: () => 5_000 });
  });

  // ─── Commit / rollback ────────────────────────────────────────

  describe("transaction", () => {
    it("applies staged writes on commit", async () => {
      const roomId = await createRoom(1001);

      expect(await readRoom(roomId)).toEqual({
        roomId: 1,
        trackId: 1001,
        capacity: 4,
        filledCount: 0,
        status: "Open",
        lastActivityAt: 5_000,
      });
    });

    it("discards staged writes on rollback", async () => {
      const roomId = await store.transaction(async (tx) =>
        rollback(await tx.createRoom({ trackId: 1001, capacity: 4 })),
      );

      expect(await readRoom(roomId)).toBeNull();
      expect(store.lockedRowCount()).toBe(0);
    });

    it("rolls back and releases locks when the work throws", async () => {
      const roomId = await createRoom(1001);

      await expect(
        store.transaction(async (tx) => {
          await tx.incrementFilled(roomId);
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");

      expect((await readRoom(roomId))?.filledCount).toBe(0);
      expect(store.lockedRowCount()).toBe(0);
    });

    it("hides uncommitted writes from other transactions", async () => {
      const roomId = await createRoom(1001);
      const { gate, open } = createGate();

      const writer = store.transaction(async (tx) => {
        await tx.incrementFilled(roomId);
        await gate;
        return commit(undefined);
      });

      expect((await readRoom(roomId))?.filledCount).toBe(0);

      open();
      await writer;
      expect((await readRoom(roomId))?.filledCount).toBe(1);
    });

    it("lets a transaction see its own staged writes", async () => {
      const roomId = await createRoom(1001);

      const filled = await store.transaction(async (tx) => {
        await tx.incrementFilled(roomId);
        await tx.incrementFilled(roomId);
        return rollback((await tx.readRoom(roomId))?.filledCount);
      });

      expect(filled).toBe(2);
    });

    it("rejects writes in a read-only transaction", async () => {
      await expect(
        store.transaction(
          async (tx) => commit(await tx.createRoom({ trackId: 1, capacity: 4 })),
          { readOnly: true },
        ),
      ).rejects.toThrow("Cannot write in a read-only transaction");
    });
  });

  // ─── Row locks ────────────────────────────────────────────────

  describe("lockRoomForUpdate", () => {
    it("times out while another transaction holds the row", async () => {
      const roomId = await createRoom(1001);
      const { gate, open } = createGate();

      const holder = store.transaction(async (tx) => {
        await tx.lockRoomForUpdate(roomId);
        await gate;
        return commit(undefined);
      });

      const waiter = store.transaction(async (tx) => commit(await tx.lockRoomForUpdate(roomId)));
      await expect(waiter).rejects.toBeInstanceOf(LockTimeoutError);

      open();
      await holder;
      expect(store.lockedRowCount()).toBe(0);
    });

    it("hands the lock over once the holder commits", async () => {
      const roomId = await createRoom(1001);
      const { gate, open } = createGate();

      const holder = store.transaction(async (tx) => {
        await tx.lockRoomForUpdate(roomId);
        await tx.incrementFilled(roomId);
        await gate;
        return commit(undefined);
      });

      const waiter = store.transaction(async (tx) =>
        commit((await tx.lockRoomForUpdate(roomId))?.filledCount),
      );

      open();
      await holder;
      // The waiter reads the row as committed by the holder
      expect(await waiter).toBe(1);
    });

    it("returns null for a missing room", async () => {
      const room = await store.transaction(async (tx) => commit(await tx.lockRoomForUpdate(42)));
      expect(room).toBeNull();
    });

    it("does not block plain reads", async () => {
      const roomId = await createRoom(1001);
      const { gate, open } = createGate();

      const holder = store.transaction(async (tx) => {
        await tx.lockRoomForUpdate(roomId);
        await gate;
        return commit(undefined);
      });

      expect((await readRoom(roomId))?.roomId).toBe(roomId);

      open();
      await holder;
    });
  });

  // ─── Queries ──────────────────────────────────────────────────

  describe("listOpenRooms", () => {
    it("lists open rooms with a free seat, filtered by track", async () => {
      const a = await createRoom(1001);
      const b = await createRoom(2002);
      const full = await createRoom(1001, 1);
      const playing = await createRoom(1001);

      await store.transaction(async (tx) => {
        await tx.incrementFilled(full);
        await tx.setStatus(playing, "Playing");
        return commit(undefined);
      });

      const list = (trackId: number | null) =>
        store.transaction(async (tx) => commit(await tx.listOpenRooms(trackId)), {
          readOnly: true,
        });

      expect((await list(null)).map((r) => r.roomId)).toEqual([a, b]);
      expect((await list(1001)).map((r) => r.roomId)).toEqual([a]);
      expect(await list(3003)).toEqual([]);
    });
  });

  describe("memberships", () => {
    it("refuses a duplicate seat and lists members in insertion order", async () => {
      const roomId = await createRoom(1001);

      const inserted = await store.transaction(async (tx) => {
        const first = await tx.insertMembership({ roomId, userId: 7, difficulty: "Hard", isHost: true });
        const second = await tx.insertMembership({ roomId, userId: 3, difficulty: "Normal", isHost: false });
        const duplicate = await tx.insertMembership({ roomId, userId: 7, difficulty: "Normal", isHost: false });
        return commit([first, second, duplicate]);
      });

      expect(inserted).toEqual([true, true, false]);

      const members = await store.transaction(async (tx) => commit(await tx.listMemberships(roomId)));
      expect(members.map((m) => m.userId)).toEqual([7, 3]);
      expect(members[0]).toEqual({ roomId, userId: 7, difficulty: "Hard", isHost: true, result: null });
    });

    it("removes memberships with their room", async () => {
      const roomId = await createRoom(1001);
      await store.transaction(async (tx) => {
        await tx.insertMembership({ roomId, userId: 7, difficulty: "Hard", isHost: true });
        return commit(undefined);
      });

      await store.transaction(async (tx) => commit(await tx.deleteRoom(roomId)));

      const seats = await store.transaction(async (tx) => commit(await tx.countMembershipsForUser(7)));
      expect(seats).toBe(0);
      expect(await readRoom(roomId)).toBeNull();
    });

    it("keeps filledCount within capacity", async () => {
      const roomId = await createRoom(1001, 1);

      await expect(
        store.transaction(async (tx) => {
          await tx.incrementFilled(roomId);
          await tx.incrementFilled(roomId);
          return commit(undefined);
        }),
      ).rejects.toThrow("filledCount 2 out of range for room 1");
    });
  });

  describe("listIdleRoomIds", () => {
    it("returns rooms whose last activity is before the cutoff", async () => {
      let clock = 1_000;
      store = new MemoryRoomStore({ lockTimeoutMs: 20, now: () => clock });

      const stale = await createRoom(1001);
      clock = 9_000;
      const fresh = await createRoom(1001);

      const idle = await store.transaction(async (tx) => commit(await tx.listIdleRoomIds(5_000)));
      expect(idle).toEqual([stale]);
      expect(idle).not.toContain(fresh);
    });
  });
});
