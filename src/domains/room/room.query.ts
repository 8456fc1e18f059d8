/**
 * Session Query Service - read-only views for listing, wait-polling and results
 */
import { RoomNotFoundError } from "../../shared/errors.js";
import type { CredentialResolver } from "../user/credential.resolver.js";
import type { IdentityStore } from "../user/user.types.js";
import { commit, type RoomStore } from "./room.store.js";
import {
  TRACK_ID_ANY,
  lifecycleStateOf,
  type AggregateResult,
  type Membership,
  type ResultEntry,
  type Room,
  type RoomId,
  type RoomLifecycleState,
  type RoomSummary,
  type TrackId,
  type UserId,
  type WaitResult,
  type WaitStatus,
} from "./room.types.js";

const READ_ONLY = { readOnly: true } as const;

export function waitStatusOf(state: RoomLifecycleState): WaitStatus {
  switch (state) {
    case "Open":
      return "Waiting";
    case "Playing":
      return "LiveStart";
    case "Dissolved":
      return "Dissolution";
  }
}

export function toRoomSummary(room: Room): RoomSummary {
  return {
    roomId: room.roomId,
    trackId: room.trackId,
    filledCount: room.filledCount,
    capacity: room.capacity,
  };
}

export class SessionQueryService {
  constructor(
    private readonly store: RoomStore,
    private readonly credentials: CredentialResolver,
    private readonly identityStore: IdentityStore,
  ) {}

  /** Open rooms with a free seat; TRACK_ID_ANY lists every track */
  async list(trackId: TrackId): Promise<RoomSummary[]> {
    const rooms = await this.store.transaction(
      async (tx) => commit(await tx.listOpenRooms(trackId === TRACK_ID_ANY ? null : trackId)),
      READ_ONLY,
    );
    return rooms.map(toRoomSummary);
  }

  /**
   * Polled frequently by waiting clients. A dissolved room is a normal
   * answer here, not an error.
   */
  async wait(credential: string | null, roomId: RoomId): Promise<WaitResult> {
    const user = await this.credentials.resolve(credential);

    const snapshot = await this.store.transaction<{
      room: Room;
      memberships: Membership[];
    } | null>(async (tx) => {
      const room = await tx.readRoom(roomId);
      if (!room) return commit(null);
      return commit({ room, memberships: await tx.listMemberships(roomId) });
    }, READ_ONLY);

    if (!snapshot) {
      return { status: waitStatusOf(lifecycleStateOf(null)), members: [] };
    }

    const profiles = await this.identityStore.findByIds(
      snapshot.memberships.map((m) => m.userId),
    );
    const profileById = new Map(profiles.map((profile) => [profile.userId, profile]));

    return {
      status: waitStatusOf(lifecycleStateOf(snapshot.room)),
      members: snapshot.memberships.map((membership) => {
        const profile = profileById.get(membership.userId);
        return {
          userId: membership.userId,
          name: profile?.name ?? "",
          cosmeticId: profile?.cosmeticId ?? 0,
          difficulty: membership.difficulty,
          isMe: membership.userId === user.userId,
          isHost: membership.isHost,
        };
      }),
    };
  }

  /**
   * Results are released only once every seated member has submitted;
   * entries follow seating order, host first.
   */
  async aggregateResult(roomId: RoomId): Promise<AggregateResult> {
    const memberships = await this.store.transaction(async (tx) => {
      const room = await tx.readRoom(roomId);
      if (!room) throw new RoomNotFoundError(roomId);
      return commit(await tx.listMemberships(roomId));
    }, READ_ONLY);

    const results: ResultEntry[] = [];
    for (const membership of memberships) {
      if (!membership.result) return { complete: false };
      results.push({
        userId: membership.userId,
        judgeCounts: membership.result.judgeCounts,
        score: membership.result.score,
      });
    }
    return { complete: true, results };
  }

  async membershipOf(roomId: RoomId, userId: UserId): Promise<Membership | null> {
    return this.store.transaction(
      async (tx) => commit(await tx.findMembership(roomId, userId)),
      READ_ONLY,
    );
  }

  async roomExists(roomId: RoomId): Promise<boolean> {
    return this.store.transaction(
      async (tx) => commit((await tx.readRoom(roomId)) !== null),
      READ_ONLY,
    );
  }
}
