/**
 * User domain types
 */
import type { UserId } from "../room/room.types.js";

export interface User {
  userId: UserId;
  name: string;
  cosmeticId: number;
}

export interface UserProfileInput {
  name: string;
  cosmeticId: number;
}

export interface RegisteredUser {
  user: User;
  token: string;
}

/**
 * Maps opaque credentials to users.
 * Registration and profile edits live here; rooms only ever read from it.
 */
export interface IdentityStore {
  createUser(input: UserProfileInput): Promise<RegisteredUser>;
  findByToken(token: string): Promise<User | null>;
  findByIds(userIds: readonly UserId[]): Promise<User[]>;
  updateUser(userId: UserId, input: UserProfileInput): Promise<User | null>;
}
