/**
 * Postgres-backed identity store
 */
import type { Pool } from "pg";
import { generateUserToken } from "../../shared/crypto.js";
import type { UserId } from "../room/room.types.js";
import type {
  IdentityStore,
  RegisteredUser,
  User,
  UserProfileInput,
} from "./user.types.js";

type UserRow = {
  user_id: number;
  name: string;
  cosmetic_id: number;
};

const mapUserRow = (row: UserRow): User => ({
  userId: row.user_id,
  name: row.name,
  cosmeticId: row.cosmetic_id,
});

export class PgUserRepository implements IdentityStore {
  constructor(private readonly pool: Pool) {}

  async createUser(input: UserProfileInput): Promise<RegisteredUser> {
    // users.token is unique; a collision fails the insert
    const token = generateUserToken();
    const result = await this.pool.query<UserRow>(
      `
        insert into users (name, token, cosmetic_id)
        values ($1, $2, $3)
        returning user_id, name, cosmetic_id
      `,
      [input.name, token, input.cosmeticId],
    );

    const row = result.rows[0];
    if (!row) throw new Error("USER_INSERT_FAILED");
    return { user: mapUserRow(row), token };
  }

  async findByToken(token: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      "select user_id, name, cosmetic_id from users where token = $1 limit 1",
      [token],
    );
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }

  async findByIds(userIds: readonly UserId[]): Promise<User[]> {
    if (userIds.length === 0) return [];
    const result = await this.pool.query<UserRow>(
      "select user_id, name, cosmetic_id from users where user_id = any($1::integer[])",
      [[...userIds]],
    );
    return result.rows.map(mapUserRow);
  }

  async updateUser(userId: UserId, input: UserProfileInput): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `
        update users
        set name = $2, cosmetic_id = $3
        where user_id = $1
        returning user_id, name, cosmetic_id
      `,
      [userId, input.name, input.cosmeticId],
    );
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }
}
