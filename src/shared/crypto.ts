/**
 * Shared cryptographic utilities
 * Consolidates correlation ID generation, credential issuing and token hashing
 */
import { randomBytes, randomUUID, createHash } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing requests across logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}

/** Opaque bearer credential handed to a newly registered user */
export function generateUserToken(): string {
  return randomUUID();
}

/**
 * Create SHA-256 hash of a token for cache/rate-limit key generation
 * Raw credentials never appear in Redis keys or logs
 */
export const hashToken = (token: string): string =>
  createHash("sha256").update(token).digest("hex");
