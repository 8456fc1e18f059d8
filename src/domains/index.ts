/**
 * Domain Registry - Static registration for zero runtime overhead
 *
 * To add a domain: Import and add to domains array
 * To remove a domain: Remove import and entry from array
 */
import type { FastifyInstance } from "fastify";
import type { AppContext } from "../context.js";

// Domain registration function type
export type DomainRegistration = (fastify: FastifyInstance, ctx: AppContext) => void;

// Import domain routes
import { registerRoomRoutes } from "./room/room.routes.js";
import { registerUserRoutes } from "./user/user.routes.js";

/**
 * All registered domains
 */
export const domains: readonly DomainRegistration[] = [
  registerUserRoutes,
  registerRoomRoutes,
];

/**
 * Register all domain routes on the server
 */
export function registerAllDomains(fastify: FastifyInstance, ctx: AppContext): void {
  for (const register of domains) {
    register(fastify, ctx);
  }
}
