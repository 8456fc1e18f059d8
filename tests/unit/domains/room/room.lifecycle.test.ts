import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock logger
vi.mock("@src/infrastructure/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { commit } from "@src/domains/room/room.store.js";
import {
  AlreadySeatedError,
  NotSeatedError,
  RoomNotFoundError,
  RoomNotPlayingError,
} from "@src/shared/errors.js";
import { createRoomFixture } from "../../support/fixtures.js";

const JUDGE_COUNTS = [10, 5, 2, 1, 0];

describe("RoomLifecycleManager", () => {
  let clock: number;
  let fixture: ReturnType<typeof createRoomFixture>;

  const readRoom = (roomId: number) =>
    fixture.store.transaction(async (tx) => commit(await tx.readRoom(roomId)), {
      readOnly: true,
    });

  const memberships = (roomId: number) =>
    fixture.store.transaction(async (tx) => commit(await tx.listMemberships(roomId)), {
      readOnly: true,
    });

  beforeEach(() => {
    vi.clearAllMocks();
    clock = 1_000;
    fixture = createRoomFixture({ now: () => clock });
  });

  // ─── create ───────────────────────────────────────────────────

  describe("create", () => {
    it("opens a room with the creator seated as host", async () => {
      const host = await fixture.register("host");

      const roomId = await fixture.lifecycle.create(host, 1001, "Hard");

      expect(await readRoom(roomId)).toEqual({
        roomId,
        trackId: 1001,
        capacity: 4,
        filledCount: 1,
        status: "Open",
        lastActivityAt: 1_000,
      });
      expect(await memberships(roomId)).toEqual([
        { roomId, userId: 1, difficulty: "Hard", isHost: true, result: null },
      ]);
    });

    it("refuses a user who is already seated", async () => {
      const host = await fixture.register("host");
      await fixture.lifecycle.create(host, 1001, "Normal");

      await expect(fixture.lifecycle.create(host, 2002, "Normal")).rejects.toBeInstanceOf(
        AlreadySeatedError,
      );
      expect(await readRoom(2)).toBeNull();
    });
  });

  // ─── start ────────────────────────────────────────────────────

  describe("start", () => {
    it("moves an open room to Playing and is idempotent", async () => {
      const host = await fixture.register("host");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      await fixture.lifecycle.start(roomId);
      await fixture.lifecycle.start(roomId);

      expect((await readRoom(roomId))?.status).toBe("Playing");
    });

    it("throws RoomNotFoundError for a missing room", async () => {
      await expect(fixture.lifecycle.start(42)).rejects.toBeInstanceOf(RoomNotFoundError);
    });
  });

  // ─── leave ────────────────────────────────────────────────────

  describe("leave", () => {
    it("frees the seat of a guest", async () => {
      const host = await fixture.register("host");
      const guest = await fixture.register("guest");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");
      await fixture.admission.join(guest, roomId, "Normal");

      expect(await fixture.lifecycle.leave(guest, roomId)).toBe("Left");

      expect((await readRoom(roomId))?.filledCount).toBe(1);
      expect((await memberships(roomId)).map((m) => m.userId)).toEqual([1]);
    });

    it("dissolves the room when the host leaves", async () => {
      const host = await fixture.register("host");
      const guest = await fixture.register("guest");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");
      await fixture.admission.join(guest, roomId, "Normal");

      expect(await fixture.lifecycle.leave(host, roomId)).toBe("Dissolved");

      expect(await readRoom(roomId)).toBeNull();
      expect(await memberships(roomId)).toEqual([]);
      // The guest is free to create a room of their own
      await expect(fixture.lifecycle.create(guest, 1001, "Normal")).resolves.toBe(2);
    });

    it("reports NotSeated for a user outside the room", async () => {
      const host = await fixture.register("host");
      const stranger = await fixture.register("stranger");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      expect(await fixture.lifecycle.leave(stranger, roomId)).toBe("NotSeated");
      expect((await readRoom(roomId))?.filledCount).toBe(1);
    });

    it("reports Dissolved for a room that is already gone", async () => {
      const host = await fixture.register("host");

      expect(await fixture.lifecycle.leave(host, 42)).toBe("Dissolved");
    });
  });

  // ─── dissolveIfIdle ───────────────────────────────────────────

  describe("dissolveIfIdle", () => {
    it("keeps a room that saw activity since the cutoff", async () => {
      const host = await fixture.register("host");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      expect(await fixture.lifecycle.dissolveIfIdle(roomId, 1_000)).toBe(false);
      expect(await readRoom(roomId)).not.toBeNull();
    });

    it("removes a room idle since before the cutoff", async () => {
      const host = await fixture.register("host");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      expect(await fixture.lifecycle.dissolveIfIdle(roomId, 1_001)).toBe(true);
      expect(await readRoom(roomId)).toBeNull();
      expect(await fixture.lifecycle.dissolveIfIdle(roomId, 1_001)).toBe(false);
    });

    it("counts a join as activity", async () => {
      const host = await fixture.register("host");
      const guest = await fixture.register("guest");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      clock = 5_000;
      await fixture.admission.join(guest, roomId, "Normal");

      expect(await fixture.lifecycle.dissolveIfIdle(roomId, 2_000)).toBe(false);
    });
  });

  // ─── submitResult ─────────────────────────────────────────────

  describe("submitResult", () => {
    it("stores the result and overwrites a resubmission", async () => {
      const host = await fixture.register("host");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");
      await fixture.lifecycle.start(roomId);

      await fixture.lifecycle.submitResult(host, roomId, { judgeCounts: JUDGE_COUNTS, score: 900 });
      await fixture.lifecycle.submitResult(host, roomId, { judgeCounts: [1, 1, 1, 1, 1], score: 120 });

      const [membership] = await memberships(roomId);
      expect(membership?.result).toEqual({ judgeCounts: [1, 1, 1, 1, 1], score: 120 });
    });

    it("requires the room to be playing", async () => {
      const host = await fixture.register("host");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");

      await expect(
        fixture.lifecycle.submitResult(host, roomId, { judgeCounts: JUDGE_COUNTS, score: 900 }),
      ).rejects.toBeInstanceOf(RoomNotPlayingError);
    });

    it("requires the room to exist", async () => {
      const host = await fixture.register("host");

      await expect(
        fixture.lifecycle.submitResult(host, 42, { judgeCounts: JUDGE_COUNTS, score: 900 }),
      ).rejects.toBeInstanceOf(RoomNotFoundError);
    });

    it("requires the caller to be seated", async () => {
      const host = await fixture.register("host");
      const stranger = await fixture.register("stranger");
      const roomId = await fixture.lifecycle.create(host, 1001, "Normal");
      await fixture.lifecycle.start(roomId);

      await expect(
        fixture.lifecycle.submitResult(stranger, roomId, { judgeCounts: JUDGE_COUNTS, score: 900 }),
      ).rejects.toBeInstanceOf(NotSeatedError);
    });
  });
});
