import type { Redis } from "ioredis";
import { z } from "zod";
import type { Logger } from "../../infrastructure/logger.js";
import { hashToken } from "../../shared/crypto.js";
import { InvalidCredentialError } from "../../shared/errors.js";
import type { IdentityStore, User } from "./user.types.js";

const CACHE_PREFIX = "auth:token:";

const cachedUserSchema = z.object({
  userId: z.number().int(),
  name: z.string(),
  cosmeticId: z.number().int(),
});

export type CredentialCache = Pick<Redis, "get" | "setex" | "del">;

export const credentialCacheKey = (token: string) => `${CACHE_PREFIX}${hashToken(token)}`;

/**
 * Resolves bearer credentials to users.
 * Room polling resolves the caller on every request, so lookups go through
 * a Redis read-through cache; cache failures fall back to the store.
 */
export class CredentialResolver {
  constructor(
    private readonly identityStore: IdentityStore,
    private readonly cache: CredentialCache,
    private readonly cacheTtlSeconds: number,
    private readonly logger: Logger,
  ) {}

  /** Returns null when the credential does not belong to any user */
  async lookup(token: string): Promise<User | null> {
    const cacheKey = credentialCacheKey(token);

    // 1. Check cache
    try {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        const parsed = cachedUserSchema.safeParse(JSON.parse(cached));
        if (parsed.success) {
          this.logger.debug({ userId: parsed.data.userId }, "Credential resolved from cache");
          return parsed.data;
        }
        this.logger.warn("Discarding malformed credential cache entry");
      }
    } catch (err) {
      this.logger.error({ err }, "Redis error during credential cache check");
    }

    // 2. Resolve against the identity store
    const user = await this.identityStore.findByToken(token);
    if (!user) return null;

    // 3. Cache the resolved user
    try {
      await this.cache.setex(cacheKey, this.cacheTtlSeconds, JSON.stringify(user));
    } catch (err) {
      this.logger.error({ err }, "Failed to cache resolved credential");
    }

    return user;
  }

  /** Like lookup(), but an unknown credential is an InvalidCredentialError */
  async resolve(token: string | null): Promise<User> {
    if (!token) throw new InvalidCredentialError();
    const user = await this.lookup(token);
    if (!user) throw new InvalidCredentialError();
    return user;
  }

  /** Drop the cached user so the next lookup sees fresh profile data */
  async invalidate(token: string): Promise<void> {
    try {
      await this.cache.del(credentialCacheKey(token));
    } catch (err) {
      this.logger.error({ err }, "Failed to invalidate credential cache entry");
    }
  }
}
