import { vi } from "vitest";
import { RoomAdmission } from "@src/domains/room/room.admission.js";
import { RoomLifecycleManager } from "@src/domains/room/room.lifecycle.js";
import { SessionQueryService } from "@src/domains/room/room.query.js";
import { MemoryRoomStore } from "@src/domains/room/room.store.memory.js";
import {
  CredentialResolver,
  type CredentialCache,
} from "@src/domains/user/credential.resolver.js";
import { MemoryUserRepository } from "@src/domains/user/user.repository.memory.js";
import type { Logger } from "@src/infrastructure/logger.js";

// Helper: Map-backed stand-in for the Redis calls the resolver makes
export function createFakeCache() {
  const entries = new Map<string, string>();
  return {
    entries,
    get: vi.fn(async (key: string) => entries.get(key) ?? null),
    setex: vi.fn(async (key: string, _ttl: number, value: string) => {
      entries.set(key, value);
      return "OK";
    }),
    del: vi.fn(async (key: string) => (entries.delete(key) ? 1 : 0)),
  };
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export interface RoomFixtureOptions {
  lockTimeoutMs?: number;
  now?: () => number;
}

/**
 * Room services wired to in-memory stores
 */
export function createRoomFixture(options: RoomFixtureOptions = {}) {
  const store = new MemoryRoomStore({
    lockTimeoutMs: options.lockTimeoutMs ?? 1000,
    now: options.now,
  });
  const identityStore = new MemoryUserRepository();
  const cache = createFakeCache();
  const credentials = new CredentialResolver(
    identityStore,
    cache as unknown as CredentialCache,
    300,
    createMockLogger() as unknown as Logger,
  );

  /** Registers a user and returns their credential */
  const register = async (name: string, cosmeticId = 0) => {
    const { token } = await identityStore.createUser({ name, cosmeticId });
    return token;
  };

  return {
    store,
    identityStore,
    cache,
    credentials,
    lifecycle: new RoomLifecycleManager(store, credentials),
    admission: new RoomAdmission(store, credentials),
    queries: new SessionQueryService(store, credentials, identityStore),
    register,
  };
}

/** A promise plus the function that settles it */
export function createGate() {
  let open: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { gate, open };
}
