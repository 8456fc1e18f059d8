import type { Redis } from "ioredis";

export interface RequestLimiter {
  isAllowed(key: string, limit: number, windowSeconds: number): Promise<boolean>;
}

export class RateLimiter implements RequestLimiter {
  private readonly PREFIX = "ratelimit:";

  constructor(private readonly redis: Pick<Redis, "multi">) {}

  /**
   * Fixed-window check: INCR the window counter and set its expiry on first use.
   * @param key Identifier (e.g. "api:<token hash>")
   * @param limit Max requests
   * @param windowSeconds Time window in seconds
   */
  async isAllowed(
    key: string,
    limit: number,
    windowSeconds: number,
  ): Promise<boolean> {
    const redisKey = `${this.PREFIX}${key}`;

    const multi = this.redis.multi();
    multi.incr(redisKey);
    multi.expire(redisKey, windowSeconds, "NX"); // Set expiry only if not set

    const results = await multi.exec();
    const first = results?.[0];
    if (!first) return false;

    // results[0] is [error, result]
    const [error, count] = first;
    if (error || typeof count !== "number") return false;
    return count <= limit;
  }
}
