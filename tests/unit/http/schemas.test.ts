import { describe, it, expect } from "vitest";
import {
  createRoomSchema,
  endRoomSchema,
  joinRoomSchema,
  listRoomsSchema,
  roomRefSchema,
  userProfileSchema,
} from "@src/http/schemas.js";

describe("userProfileSchema", () => {
  it("trims the name", () => {
    expect(userProfileSchema.parse({ name: "  Mina ", cosmeticId: 2 })).toEqual({
      name: "Mina",
      cosmeticId: 2,
    });
  });

  it("rejects a blank name or a negative cosmetic", () => {
    expect(userProfileSchema.safeParse({ name: "   ", cosmeticId: 2 }).success).toBe(false);
    expect(userProfileSchema.safeParse({ name: "Mina", cosmeticId: -1 }).success).toBe(false);
  });
});

describe("createRoomSchema", () => {
  it("accepts a track and difficulty", () => {
    expect(createRoomSchema.parse({ trackId: 1001, difficulty: "Hard" })).toEqual({
      trackId: 1001,
      difficulty: "Hard",
    });
  });

  it("rejects the any-track sentinel and unknown difficulties", () => {
    expect(createRoomSchema.safeParse({ trackId: 0, difficulty: "Hard" }).success).toBe(false);
    expect(createRoomSchema.safeParse({ trackId: 1001, difficulty: "Expert" }).success).toBe(false);
  });
});

describe("listRoomsSchema", () => {
  it("defaults to every track", () => {
    expect(listRoomsSchema.parse({})).toEqual({ trackId: 0 });
    expect(listRoomsSchema.parse({ trackId: 1001 })).toEqual({ trackId: 1001 });
  });
});

describe("joinRoomSchema / roomRefSchema", () => {
  it("requires a positive integer room id", () => {
    expect(joinRoomSchema.safeParse({ roomId: 3, difficulty: "Normal" }).success).toBe(true);
    expect(joinRoomSchema.safeParse({ roomId: "3", difficulty: "Normal" }).success).toBe(false);
    expect(roomRefSchema.safeParse({ roomId: 0 }).success).toBe(false);
    expect(roomRefSchema.safeParse({ roomId: 1.5 }).success).toBe(false);
  });
});

describe("endRoomSchema", () => {
  it("requires one count per judgment tier", () => {
    const base = { roomId: 3, score: 900 };

    expect(endRoomSchema.safeParse({ ...base, judgeCounts: [1, 2, 3, 4, 5] }).success).toBe(true);
    expect(endRoomSchema.safeParse({ ...base, judgeCounts: [1, 2, 3, 4] }).success).toBe(false);
    expect(endRoomSchema.safeParse({ ...base, judgeCounts: [1, 2, 3, 4, -5] }).success).toBe(false);
  });
});

describe("integer column bounds", () => {
  const INT4_MAX = 2_147_483_647;

  it("accepts values up to the int4 maximum", () => {
    expect(roomRefSchema.safeParse({ roomId: INT4_MAX }).success).toBe(true);
    expect(createRoomSchema.safeParse({ trackId: INT4_MAX, difficulty: "Normal" }).success).toBe(true);
    expect(listRoomsSchema.safeParse({ trackId: INT4_MAX }).success).toBe(true);
    expect(
      endRoomSchema.safeParse({ roomId: 1, score: INT4_MAX, judgeCounts: [INT4_MAX, 0, 0, 0, 0] })
        .success,
    ).toBe(true);
  });

  it("rejects values past the int4 maximum", () => {
    expect(joinRoomSchema.safeParse({ roomId: 3_000_000_000, difficulty: "Normal" }).success).toBe(
      false,
    );
    expect(roomRefSchema.safeParse({ roomId: INT4_MAX + 1 }).success).toBe(false);
    expect(createRoomSchema.safeParse({ trackId: INT4_MAX + 1, difficulty: "Normal" }).success).toBe(
      false,
    );
    expect(listRoomsSchema.safeParse({ trackId: INT4_MAX + 1 }).success).toBe(false);
    expect(endRoomSchema.safeParse({ roomId: 1, score: INT4_MAX + 1, judgeCounts: [0, 0, 0, 0, 0] }).success).toBe(false);
    expect(
      endRoomSchema.safeParse({ roomId: 1, score: 0, judgeCounts: [INT4_MAX + 1, 0, 0, 0, 0] }).success,
    ).toBe(false);
    expect(userProfileSchema.safeParse({ name: "Mina", cosmeticId: INT4_MAX + 1 }).success).toBe(false);
  });
});
