import type { Redis } from "ioredis";
import { config } from "./config/index.js";
import { logger } from "./infrastructure/logger.js";
import { RoomAdmission } from "./domains/room/room.admission.js";
import { RoomLifecycleManager } from "./domains/room/room.lifecycle.js";
import { SessionQueryService } from "./domains/room/room.query.js";
import type { RoomStore } from "./domains/room/room.store.js";
import {
  CredentialResolver,
  type CredentialCache,
} from "./domains/user/credential.resolver.js";
import type { IdentityStore } from "./domains/user/user.types.js";
import type { RequestLimiter } from "./utils/rateLimiter.js";

export interface AppContext {
  store: RoomStore;
  identityStore: IdentityStore;
  credentials: CredentialResolver;
  lifecycle: RoomLifecycleManager;
  admission: RoomAdmission;
  queries: SessionQueryService;
  rateLimiter: RequestLimiter;
  redis: Pick<Redis, "status">;
}

export interface AppDependencies {
  store: RoomStore;
  identityStore: IdentityStore;
  credentialCache: CredentialCache;
  rateLimiter: RequestLimiter;
  redis: Pick<Redis, "status">;
}

export function createAppContext(deps: AppDependencies): AppContext {
  const credentials = new CredentialResolver(
    deps.identityStore,
    deps.credentialCache,
    config.CREDENTIAL_CACHE_TTL_SECONDS,
    logger,
  );

  return {
    store: deps.store,
    identityStore: deps.identityStore,
    credentials,
    lifecycle: new RoomLifecycleManager(deps.store, credentials),
    admission: new RoomAdmission(deps.store, credentials),
    queries: new SessionQueryService(deps.store, credentials, deps.identityStore),
    rateLimiter: deps.rateLimiter,
    redis: deps.redis,
  };
}
