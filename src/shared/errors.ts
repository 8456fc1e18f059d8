/**
 * Shared error message constants for consistent error responses
 */
export const Errors = {
  // General
  INVALID_PAYLOAD: "Invalid payload",
  INTERNAL_ERROR: "Internal server error",
  RATE_LIMITED: "Too many requests",

  // Auth
  INVALID_CREDENTIALS: "Invalid credentials",

  // Room
  ROOM_NOT_FOUND: "Room not found",
  ROOM_NOT_PLAYING: "Room has not started",
  ROOM_BUSY: "Room is busy, try again",
  NOT_ROOM_HOST: "Only the host can do that",

  // Membership
  ALREADY_SEATED: "You are already in a room",
  NOT_SEATED: "You are not in this room",
} as const;

export type ErrorCode = (typeof Errors)[keyof typeof Errors];

/**
 * Precondition failure surfaced to the API layer.
 * Expected domain outcomes (RoomFull, Disbanded, ...) are returned as values instead.
 */
export class DomainError extends Error {
  constructor(
    message: ErrorCode,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCredentialError extends DomainError {
  constructor() {
    super(Errors.INVALID_CREDENTIALS, 401);
  }
}

export class NotRoomHostError extends DomainError {
  constructor(readonly roomId: number) {
    super(Errors.NOT_ROOM_HOST, 403);
  }
}

export class RoomNotFoundError extends DomainError {
  constructor(readonly roomId: number) {
    super(Errors.ROOM_NOT_FOUND, 404);
  }
}

export class AlreadySeatedError extends DomainError {
  constructor(readonly userId: number) {
    super(Errors.ALREADY_SEATED, 409);
  }
}

export class RoomNotPlayingError extends DomainError {
  constructor(readonly roomId: number) {
    super(Errors.ROOM_NOT_PLAYING, 409);
  }
}

export class NotSeatedError extends DomainError {
  constructor(
    readonly roomId: number,
    readonly userId: number,
  ) {
    super(Errors.NOT_SEATED, 409);
  }
}
