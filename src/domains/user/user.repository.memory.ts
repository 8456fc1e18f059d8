import { generateUserToken } from "../../shared/crypto.js";
import type { UserId } from "../room/room.types.js";
import type {
  IdentityStore,
  RegisteredUser,
  User,
  UserProfileInput,
} from "./user.types.js";

export class MemoryUserRepository implements IdentityStore {
  private readonly users = new Map<UserId, User>();
  private readonly tokens = new Map<string, UserId>();
  private nextUserId = 1;

  async createUser(input: UserProfileInput): Promise<RegisteredUser> {
    const user: User = {
      userId: this.nextUserId++,
      name: input.name,
      cosmeticId: input.cosmeticId,
    };
    const token = generateUserToken();
    this.users.set(user.userId, user);
    this.tokens.set(token, user.userId);
    return { user: { ...user }, token };
  }

  async findByToken(token: string): Promise<User | null> {
    const userId = this.tokens.get(token);
    if (userId === undefined) return null;
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async findByIds(userIds: readonly UserId[]): Promise<User[]> {
    return userIds.flatMap((userId) => {
      const user = this.users.get(userId);
      return user ? [{ ...user }] : [];
    });
  }

  async updateUser(userId: UserId, input: UserProfileInput): Promise<User | null> {
    const existing = this.users.get(userId);
    if (!existing) return null;
    const updated: User = { ...existing, name: input.name, cosmeticId: input.cosmeticId };
    this.users.set(userId, updated);
    return { ...updated };
  }
}
