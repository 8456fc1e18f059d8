/**
 * HTTP route utilities
 * Provides a createRoute wrapper for consistent validation, error handling, and metrics
 */
import type { FastifyReply, FastifyRequest } from "fastify";
import type { z } from "zod";
import { config } from "../config/index.js";
import type { AppContext } from "../context.js";
import { LockTimeoutError } from "../domains/room/room.store.js";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { generateCorrelationId, hashToken } from "./crypto.js";
import { DomainError, Errors } from "./errors.js";

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Per-request information handed to route handlers
 */
export interface RouteRequest {
  requestId: string;
  /** Bearer credential, null when the header is missing or malformed */
  credential: string | null;
  request: FastifyRequest;
}

/**
 * Handler function signature
 */
type RouteFn<TPayload, TResult> = (
  payload: TPayload,
  route: RouteRequest,
  context: AppContext,
) => Promise<TResult>;

export interface RouteOptions {
  /** Count the request against the caller's per-minute budget */
  rateLimited?: boolean;
}

export function readBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

/**
 * Maps a thrown error to the HTTP status and body the client sees
 */
export function toErrorResponse(err: unknown): { statusCode: number; error: string } {
  if (err instanceof DomainError) {
    return { statusCode: err.statusCode, error: err.message };
  }
  if (err instanceof LockTimeoutError) {
    return { statusCode: 503, error: Errors.ROOM_BUSY };
  }
  return { statusCode: 500, error: Errors.INTERNAL_ERROR };
}

/**
 * Create a wrapped route handler with:
 * - Zod schema validation of the JSON body
 * - Bearer credential extraction and optional rate limiting
 * - Centralized error handling
 * - Logging with correlation IDs and latency metrics
 *
 * @example
 * ```typescript
 * export const joinRoomRoute = createRoute(
 *   "room:join",
 *   joinRoomSchema,
 *   async (payload, { credential }, { admission }) => ({
 *     outcome: await admission.join(credential, payload.roomId, payload.difficulty),
 *   }),
 * );
 *
 * fastify.post("/room/join", joinRoomRoute(context));
 * ```
 */
export function createRoute<TPayload, TResult>(
  routeName: string,
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
  handler: RouteFn<TPayload, TResult>,
  options: RouteOptions = {},
) {
  return (context: AppContext) => {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      const startTime = Date.now();
      const requestId = generateCorrelationId();
      const credential = readBearerToken(request);
      reply.header("x-request-id", requestId);

      const finish = (statusCode: number) => {
        metrics.requestsTotal.inc({ route: routeName, status: String(statusCode) });
        metrics.requestLatency.observe({ route: routeName }, (Date.now() - startTime) / 1000);
      };

      // 1. Validate payload
      const parseResult = schema.safeParse(request.body ?? {});
      if (!parseResult.success) {
        logger.debug(
          { requestId, route: routeName, errors: parseResult.error.format() },
          "Validation failed",
        );
        finish(400);
        reply.code(400);
        return { error: Errors.INVALID_PAYLOAD };
      }

      try {
        // 2. Rate limit
        if (options.rateLimited && credential) {
          const allowed = await context.rateLimiter.isAllowed(
            `api:${hashToken(credential)}`,
            config.RATE_LIMIT_REQUESTS_PER_MINUTE,
            60,
          );
          if (!allowed) {
            logger.warn({ requestId, route: routeName }, "Rate limit exceeded");
            finish(429);
            reply.code(429);
            return { error: Errors.RATE_LIMITED };
          }
        }

        // 3. Execute handler
        const result = await handler(
          parseResult.data,
          { requestId, credential, request },
          context,
        );

        logger.debug(
          { requestId, route: routeName, durationMs: Date.now() - startTime },
          "Handler completed",
        );
        finish(200);
        return result;
      } catch (err) {
        const { statusCode, error } = toErrorResponse(err);
        const durationMs = Date.now() - startTime;

        if (statusCode >= 500) {
          logger.error({ err, requestId, route: routeName, durationMs }, "Handler exception");
        } else {
          logger.debug({ requestId, route: routeName, statusCode, error }, "Request rejected");
        }

        finish(statusCode);
        reply.code(statusCode);
        return { error };
      }
    };
  };
}
