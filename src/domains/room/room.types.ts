/**
 * Room domain types
 */

export type RoomId = number;
export type UserId = number;
export type TrackId = number;

/** Every room seats at most this many players */
export const MAX_ROOM_USER_COUNT = 4;

/** `list` sentinel meaning "rooms for any track" */
export const TRACK_ID_ANY = 0;

export const DIFFICULTIES = ["Normal", "Hard"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

/** Judgment tiers, best first; result counts are reported in this order */
export const JUDGMENT_TIERS = ["perfect", "great", "good", "bad", "miss"] as const;

/**
 * Persisted status. A dissolved room has no row at all, so "Dissolved"
 * only exists as an observation (see {@link RoomLifecycleState}).
 */
export type RoomStatus = "Open" | "Playing";
export type RoomLifecycleState = RoomStatus | "Dissolved";

export interface Room {
  roomId: RoomId;
  trackId: TrackId;
  capacity: number;
  filledCount: number;
  status: RoomStatus;
  lastActivityAt: number;
}

export interface PlayResult {
  judgeCounts: number[];
  score: number;
}

export interface Membership {
  roomId: RoomId;
  userId: UserId;
  difficulty: Difficulty;
  isHost: boolean;
  result: PlayResult | null;
}

export type NewMembership = Omit<Membership, "result">;

export function lifecycleStateOf(room: Room | null): RoomLifecycleState {
  return room ? room.status : "Dissolved";
}

export function canAdmit(room: Room): boolean {
  return room.status === "Open" && room.filledCount < room.capacity;
}

// ─────────────────────────────────────────────────────────────────
// Operation outcomes
// ─────────────────────────────────────────────────────────────────

export type JoinOutcome = "Ok" | "RoomFull" | "Disbanded" | "OtherError";

export type LeaveOutcome = "Left" | "Dissolved" | "NotSeated";

export type WaitStatus = "Waiting" | "LiveStart" | "Dissolution";

export type DissolveReason = "host_left" | "last_member_left" | "inactivity";

export interface RoomSummary {
  roomId: RoomId;
  trackId: TrackId;
  filledCount: number;
  capacity: number;
}

export interface RoomMember {
  userId: UserId;
  name: string;
  cosmeticId: number;
  difficulty: Difficulty;
  isMe: boolean;
  isHost: boolean;
}

export interface WaitResult {
  status: WaitStatus;
  members: RoomMember[];
}

export interface ResultEntry {
  userId: UserId;
  judgeCounts: number[];
  score: number;
}

export type AggregateResult =
  | { complete: true; results: ResultEntry[] }
  | { complete: false };
