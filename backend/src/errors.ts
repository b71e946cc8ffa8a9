/**
 * Local error taxonomy. None of these ever travel over the wire.
 */

export type PeerErrorCode =
  | 'FORMAT_ERROR'
  | 'INVALID_MESSAGE_FORMAT'
  | 'PAYLOAD_TOO_LARGE'
  | 'RECIPIENT_UNKNOWN'
  | 'GAME_NOT_FOUND'
  | 'INVALID_MOVE'
  | 'PERMISSION_DENIED'
  | 'GROUP_NOT_FOUND'
  | 'BAD_REQUEST';

export class PeerError extends Error {
  readonly code: PeerErrorCode;

  constructor(code: PeerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or incomplete wire text. */
export class FormatError extends PeerError {
  constructor(message: string) {
    super('FORMAT_ERROR', message);
  }
}

/** Decoded message lacks a mandatory envelope field. */
export class InvalidMessageFormat extends PeerError {
  constructor(message: string) {
    super('INVALID_MESSAGE_FORMAT', message);
  }
}

export class PayloadTooLarge extends PeerError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super('PAYLOAD_TOO_LARGE', `Payload of ${size} bytes exceeds ${limit} bytes`);
    this.size = size;
    this.limit = limit;
  }
}

export class RecipientUnknown extends PeerError {
  readonly userId: string;

  constructor(userId: string) {
    super('RECIPIENT_UNKNOWN', `Unknown recipient: ${userId}`);
    this.userId = userId;
  }
}

export class GameNotFound extends PeerError {
  constructor(gameId: string) {
    super('GAME_NOT_FOUND', `Game not found: ${gameId}`);
  }
}

export class InvalidMove extends PeerError {
  constructor(message: string) {
    super('INVALID_MOVE', message);
  }
}

export class PermissionDenied extends PeerError {
  constructor(message: string) {
    super('PERMISSION_DENIED', message);
  }
}

export class GroupNotFound extends PeerError {
  constructor(groupId: string) {
    super('GROUP_NOT_FOUND', `Group not found: ${groupId}`);
  }
}

/** Control-surface input that cannot be turned into an intent. */
export class BadRequest extends PeerError {
  constructor(message: string) {
    super('BAD_REQUEST', message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
