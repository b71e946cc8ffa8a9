/**
 * Message Builders & Accessors
 * Typed helpers over the open field map
 */

import { v4 as uuidv4 } from 'uuid';
import { GameOutcome, GameSymbol, MessageFields, MessageType } from './types';
import { InvalidMessageFormat } from './errors';
import { createToken, TokenScope } from './tokens';

export const MESSAGE_TYPES: readonly MessageType[] = [
  'POST',
  'DM',
  'PROFILE',
  'PEER_DISCOVERY',
  'PEER_LIST_REQUEST',
  'PEER_LIST_RESPONSE',
  'FOLLOW',
  'UNFOLLOW',
  'GROUP_CREATE',
  'GROUP_UPDATE',
  'GROUP_MESSAGE',
  'LIKE',
  'UNLIKE',
  'TICTACTOE_INVITE',
  'TICTACTOE_MOVE',
  'TICTACTOE_RESULT',
  'REVOKE',
];

const KNOWN_TYPES: ReadonlySet<string> = new Set<string>(MESSAGE_TYPES);

// Types that name their sender in USER_ID rather than FROM
const USER_ID_TYPES: ReadonlySet<string> = new Set(['PEER_DISCOVERY', 'POST', 'PROFILE']);

const RECIPIENT_TYPES: ReadonlySet<string> = new Set([
  'DM',
  'FOLLOW',
  'UNFOLLOW',
  'GROUP_MESSAGE',
  'LIKE',
  'UNLIKE',
  'TICTACTOE_INVITE',
  'TICTACTOE_MOVE',
  'TICTACTOE_RESULT',
]);

export function isMessageType(type: string): type is MessageType {
  return KNOWN_TYPES.has(type);
}

/** 64-bit hex id */
export function generateMessageId(): string {
  return uuidv4().replace(/-/g, '').slice(0, 16);
}

export function unixSeconds(nowMs = Date.now()): string {
  return String(Math.floor(nowMs / 1000));
}

// ════════════════════════════════════════════════════════════════════
// ACCESSORS
// ════════════════════════════════════════════════════════════════════

export function senderOf(fields: MessageFields): string | undefined {
  return USER_ID_TYPES.has(fields.TYPE) ? fields.USER_ID || fields.FROM : fields.FROM || fields.USER_ID;
}

export function optionalField(fields: MessageFields, key: string): string | undefined {
  const value = fields[key];
  return value === undefined || value === '' ? undefined : value;
}

export function requireField(fields: MessageFields, key: string): string {
  const value = optionalField(fields, key);
  if (value === undefined) {
    throw new InvalidMessageFormat(`${fields.TYPE ?? 'message'} missing ${key}`);
  }
  return value;
}

export function intField(fields: MessageFields, key: string): number | undefined {
  const value = optionalField(fields, key);
  if (value === undefined || !/^-?\d+$/.test(value)) return undefined;
  return Number(value);
}

export function listField(fields: MessageFields, key: string): string[] {
  return (fields[key] ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export interface Envelope {
  type: MessageType;
  sender: string;
  messageId: string;
  timestamp: number;
}

/**
 * Check the mandatory keys every message carries, plus TO for
 * recipient-addressed types.
 */
export function validateEnvelope(fields: MessageFields): Envelope {
  const type = requireField(fields, 'TYPE');
  if (!isMessageType(type)) {
    throw new InvalidMessageFormat(`Unknown TYPE: ${type}`);
  }

  const sender = senderOf(fields);
  if (!sender) {
    throw new InvalidMessageFormat(`${type} missing sender`);
  }
  const messageId = requireField(fields, 'MESSAGE_ID');
  const timestamp = intField(fields, 'TIMESTAMP');
  if (timestamp === undefined) {
    throw new InvalidMessageFormat(`${type} missing or invalid TIMESTAMP`);
  }
  if (RECIPIENT_TYPES.has(type)) {
    requireField(fields, 'TO');
  }
  return { type, sender, messageId, timestamp };
}

// ════════════════════════════════════════════════════════════════════
// BUILDERS
// ════════════════════════════════════════════════════════════════════

export interface AvatarPayload {
  mimeType: string;
  data: Buffer;
}

export interface PeerListEntry {
  userId: string;
  ip: string;
  port: number;
}

/**
 * Builds outbound messages for one local user.
 */
export class MessageFactory {
  constructor(
    readonly userId: string,
    private readonly tokenTtlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  private base(type: MessageType, senderKey: 'USER_ID' | 'FROM' = 'FROM'): MessageFields {
    return {
      TYPE: type,
      [senderKey]: this.userId,
      TIMESTAMP: unixSeconds(this.now()),
      MESSAGE_ID: generateMessageId(),
    };
  }

  private token(scope: TokenScope): string {
    return createToken(this.userId, scope, this.tokenTtlSeconds, this.now());
  }

  discovery(port: number): MessageFields {
    return { ...this.base('PEER_DISCOVERY', 'USER_ID'), PORT: String(port) };
  }

  peerListRequest(port: number): MessageFields {
    return { ...this.base('PEER_LIST_REQUEST'), PORT: String(port) };
  }

  peerListResponse(peers: PeerListEntry[]): MessageFields {
    return {
      ...this.base('PEER_LIST_RESPONSE'),
      PEERS: JSON.stringify(peers),
      COUNT: String(peers.length),
    };
  }

  post(content: string, ttlSeconds: number): MessageFields {
    return {
      ...this.base('POST', 'USER_ID'),
      CONTENT: content,
      TTL: String(ttlSeconds),
      TOKEN: this.token('broadcast'),
    };
  }

  dm(to: string, content: string): MessageFields {
    return { ...this.base('DM'), TO: to, CONTENT: content, TOKEN: this.token('chat') };
  }

  profile(displayName: string, status: string, avatar?: AvatarPayload): MessageFields {
    const fields: MessageFields = {
      ...this.base('PROFILE', 'USER_ID'),
      DISPLAY_NAME: displayName,
      STATUS: status,
      TOKEN: this.token('broadcast'),
    };
    if (avatar) {
      fields.AVATAR_TYPE = avatar.mimeType;
      fields.AVATAR_ENCODING = 'base64';
      fields.AVATAR_DATA = avatar.data.toString('base64');
    }
    return fields;
  }

  follow(to: string, type: 'FOLLOW' | 'UNFOLLOW'): MessageFields {
    return { ...this.base(type), TO: to, TOKEN: this.token('follow') };
  }

  groupCreate(groupId: string, name: string, members: Iterable<string>): MessageFields {
    return {
      ...this.base('GROUP_CREATE'),
      GROUP_ID: groupId,
      GROUP_NAME: name,
      MEMBERS: Array.from(members).join(','),
      TOKEN: this.token('group'),
    };
  }

  groupUpdate(groupId: string, add: string[], remove: string[]): MessageFields {
    return {
      ...this.base('GROUP_UPDATE'),
      GROUP_ID: groupId,
      ADD: add.join(','),
      REMOVE: remove.join(','),
      TOKEN: this.token('group'),
    };
  }

  groupMessage(groupId: string, to: string, content: string, messageId: string): MessageFields {
    return {
      ...this.base('GROUP_MESSAGE'),
      MESSAGE_ID: messageId,
      TO: to,
      GROUP_ID: groupId,
      CONTENT: content,
      TOKEN: this.token('group'),
    };
  }

  like(to: string, postId: string, type: 'LIKE' | 'UNLIKE'): MessageFields {
    return { ...this.base(type), TO: to, POST_ID: postId, TOKEN: this.token('broadcast') };
  }

  gameInvite(to: string, gameId: string, symbol: GameSymbol, position?: number): MessageFields {
    const fields: MessageFields = {
      ...this.base('TICTACTOE_INVITE'),
      TO: to,
      GAMEID: gameId,
      SYMBOL: symbol,
      TOKEN: this.token('game'),
    };
    if (position !== undefined) {
      fields.POSITION = String(position);
    }
    return fields;
  }

  gameMove(to: string, gameId: string, position: number, symbol: GameSymbol, turn: number): MessageFields {
    return {
      ...this.base('TICTACTOE_MOVE'),
      TO: to,
      GAMEID: gameId,
      POSITION: String(position),
      SYMBOL: symbol,
      TURN: String(turn),
      TOKEN: this.token('game'),
    };
  }

  gameResult(to: string, gameId: string, outcome: GameOutcome): MessageFields {
    const fields: MessageFields = {
      ...this.base('TICTACTOE_RESULT'),
      TO: to,
      GAMEID: gameId,
      RESULT: outcome.result,
      TOKEN: this.token('game'),
    };
    if (outcome.result === 'WIN') {
      fields.SYMBOL = outcome.symbol;
      fields.WINNING_LINE = outcome.line.join(',');
    }
    return fields;
  }

  revoke(token: string): MessageFields {
    return { ...this.base('REVOKE'), TOKEN: token };
  }
}
