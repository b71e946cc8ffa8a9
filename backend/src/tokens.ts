/**
 * Message Tokens
 * `user_id|expiry|scope` tokens with pluggable verification.
 * Verification is off unless a node is configured with ScopedTokenVerifier.
 */

import { MessageFields } from './types';

export type TokenScope = 'chat' | 'broadcast' | 'follow' | 'group' | 'game';

const TYPE_SCOPES: ReadonlyMap<string, TokenScope> = new Map<string, TokenScope>([
  ['POST', 'broadcast'],
  ['PROFILE', 'broadcast'],
  ['LIKE', 'broadcast'],
  ['UNLIKE', 'broadcast'],
  ['DM', 'chat'],
  ['FOLLOW', 'follow'],
  ['UNFOLLOW', 'follow'],
  ['GROUP_CREATE', 'group'],
  ['GROUP_UPDATE', 'group'],
  ['GROUP_MESSAGE', 'group'],
  ['TICTACTOE_INVITE', 'game'],
  ['TICTACTOE_MOVE', 'game'],
  ['TICTACTOE_RESULT', 'game'],
]);

export function scopeFor(type: string): TokenScope | undefined {
  return TYPE_SCOPES.get(type);
}

export function createToken(userId: string, scope: TokenScope, ttlSeconds: number, nowMs = Date.now()): string {
  const expiry = Math.floor(nowMs / 1000) + ttlSeconds;
  return `${userId}|${expiry}|${scope}`;
}

export interface ParsedToken {
  userId: string;
  expiry: number;
  scope: string;
}

export function parseToken(token: string): ParsedToken | undefined {
  const parts = token.split('|');
  if (parts.length !== 3) return undefined;
  const [userId, expiryText, scope] = parts;
  const expiry = Number(expiryText);
  if (!userId || !scope || !Number.isInteger(expiry)) return undefined;
  return { userId, expiry, scope };
}

export type TokenCheck = { ok: true } | { ok: false; reason: string };

export interface TokenVerifier {
  verify(fields: MessageFields, sender: string): TokenCheck;
  revoke(token: string): void;
}

/** Default: every message is accepted. */
export const acceptAllTokens: TokenVerifier = {
  verify: () => ({ ok: true }),
  revoke: () => undefined,
};

export class ScopedTokenVerifier implements TokenVerifier {
  private revoked: Set<string> = new Set();

  constructor(
    private readonly maxRevocations = 1000,
    private readonly now: () => number = Date.now
  ) {}

  verify(fields: MessageFields, sender: string): TokenCheck {
    const expectedScope = scopeFor(fields.TYPE);
    if (!expectedScope) return { ok: true };

    const token = fields.TOKEN;
    if (!token) return { ok: false, reason: 'missing token' };
    if (this.revoked.has(token)) return { ok: false, reason: 'token revoked' };

    const parsed = parseToken(token);
    if (!parsed) return { ok: false, reason: 'malformed token' };
    if (parsed.expiry < Math.floor(this.now() / 1000)) return { ok: false, reason: 'token expired' };
    if (parsed.userId !== sender) return { ok: false, reason: `token issued to ${parsed.userId}` };
    if (parsed.scope !== expectedScope) {
      return { ok: false, reason: `scope ${parsed.scope}, expected ${expectedScope}` };
    }
    return { ok: true };
  }

  revoke(token: string): void {
    this.revoked.add(token);
    // Sets iterate in insertion order; drop the oldest first.
    while (this.revoked.size > this.maxRevocations) {
      const oldest = this.revoked.values().next();
      if (oldest.done) break;
      this.revoked.delete(oldest.value);
    }
    console.log(`[Tokens] Revoked ${token.split('|')[0]} token (${this.revoked.size} held)`);
  }

  isRevoked(token: string): boolean {
    return this.revoked.has(token);
  }
}
