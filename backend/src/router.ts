/**
 * Message Router
 * Inbound dispatch by TYPE and the outbound intent API
 */

import {
  GameOutcome,
  GameSession,
  GameSymbol,
  Group,
  MessageFields,
  MessageType,
  NodeEvents,
  Peer,
  Post,
  Profile,
  SocketAddress,
} from './types';
import {
  AvatarPayload,
  Envelope,
  generateMessageId,
  intField,
  listField,
  MessageFactory,
  optionalField,
  requireField,
  validateEnvelope,
} from './messages';
import {
  describeError,
  InvalidMessageFormat,
  InvalidMove,
  PeerError,
  PermissionDenied,
  RecipientUnknown,
} from './errors';
import { acceptAllTokens, parseToken, TokenVerifier } from './tokens';
import { Outbound, PeerRegistry } from './peerRegistry';
import { GroupRegistry } from './groupRegistry';
import { DmStore } from './dmStore';
import { SocialGraph } from './socialGraph';
import { FeedStore } from './feedStore';
import { GameTable, MoveResult, opponentOf } from './gameTable';
import { EventHub } from './eventHub';
import { checkMove, isGameSymbol, WINNING_LINES } from './ticTacToe';

export interface RouterOptions {
  factory: MessageFactory;
  registry: PeerRegistry;
  outbound: Outbound;
  events: EventHub<NodeEvents>;
  tokens?: TokenVerifier;
  postTtlSeconds: number;
  verbose?: boolean;
  now?: () => number;
}

export interface FanOutResult {
  sent: number;
  skipped: string[];            // members/peers that could not be reached
}

function parseOutcome(fields: MessageFields): GameOutcome {
  const result = requireField(fields, 'RESULT');
  if (result === 'DRAW') return { result: 'DRAW' };
  if (result !== 'WIN') {
    throw new InvalidMessageFormat(`Unknown RESULT: ${result}`);
  }

  const symbol = fields.SYMBOL;
  if (!isGameSymbol(symbol)) {
    throw new InvalidMessageFormat('TICTACTOE_RESULT WIN without a valid SYMBOL');
  }
  const cells = listField(fields, 'WINNING_LINE').map(Number);
  const line = WINNING_LINES.find(l => l.every((cell, i) => cell === cells[i]));
  if (!line || cells.length !== 3) {
    throw new InvalidMessageFormat(`Invalid WINNING_LINE: ${fields.WINNING_LINE}`);
  }
  return { result: 'WIN', symbol, line };
}

export class Router {
  readonly groups: GroupRegistry;
  readonly dms: DmStore;
  readonly social: SocialGraph;
  readonly feed: FeedStore;
  readonly games: GameTable;

  private readonly factory: MessageFactory;
  private readonly registry: PeerRegistry;
  private readonly outbound: Outbound;
  private readonly events: EventHub<NodeEvents>;
  private readonly tokens: TokenVerifier;
  private readonly now: () => number;
  readonly userId: string;

  constructor(private readonly options: RouterOptions) {
    this.factory = options.factory;
    this.registry = options.registry;
    this.outbound = options.outbound;
    this.events = options.events;
    this.tokens = options.tokens ?? acceptAllTokens;
    this.now = options.now ?? Date.now;
    this.userId = options.factory.userId;

    this.groups = new GroupRegistry(1000, this.now);
    this.dms = new DmStore();
    this.social = new SocialGraph();
    this.feed = new FeedStore(1000, this.now);
    this.games = new GameTable(this.now);
  }

  // ════════════════════════════════════════════════════════════════════
  // INBOUND
  // ════════════════════════════════════════════════════════════════════

  /**
   * Handle one decoded message. Throws PeerError subclasses for messages
   * that fail validation; callers log and drop them.
   */
  async dispatch(fields: MessageFields, source: SocketAddress): Promise<void> {
    const envelope = validateEnvelope(fields);

    const check = this.tokens.verify(fields, envelope.sender);
    if (!check.ok) {
      console.warn(`[Router] Dropped ${envelope.type} from ${envelope.sender}: ${check.reason}`);
      return;
    }

    if (this.options.verbose) {
      console.log(`[Router] RECV ${envelope.type} from ${envelope.sender} (${source.address}:${source.port})`);
    }

    switch (envelope.type) {
      case 'PEER_DISCOVERY':
        await this.registry.handleDiscovery(fields, source);
        break;
      case 'PEER_LIST_REQUEST':
        await this.registry.handlePeerListRequest(fields, source);
        break;
      case 'PEER_LIST_RESPONSE':
        this.registry.handlePeerListResponse(fields);
        break;
      case 'POST':
        this.handlePost(fields, envelope);
        break;
      case 'DM':
        this.handleDm(fields, envelope);
        break;
      case 'PROFILE':
        this.handleProfile(fields, envelope);
        break;
      case 'FOLLOW':
      case 'UNFOLLOW':
        this.handleFollow(fields, envelope);
        break;
      case 'GROUP_CREATE':
        this.handleGroupCreate(fields, envelope);
        break;
      case 'GROUP_UPDATE':
        this.handleGroupUpdate(fields, envelope);
        break;
      case 'GROUP_MESSAGE':
        this.handleGroupMessage(fields, envelope);
        break;
      case 'LIKE':
      case 'UNLIKE':
        this.handleLike(fields, envelope);
        break;
      case 'TICTACTOE_INVITE':
        this.handleGameInvite(fields, envelope);
        break;
      case 'TICTACTOE_MOVE':
        this.handleGameMove(fields, envelope);
        break;
      case 'TICTACTOE_RESULT':
        this.handleGameResult(fields, envelope);
        break;
      case 'REVOKE':
        this.handleRevoke(fields, envelope);
        break;
    }
  }

  private isForMe(fields: MessageFields, envelope: Envelope): boolean {
    if (fields.TO === this.userId) return true;
    if (this.options.verbose) {
      console.log(`[Router] Ignored ${envelope.type} addressed to ${fields.TO}`);
    }
    return false;
  }

  private received(type: MessageType, from: string, fields: MessageFields): void {
    this.events.emit('message-received', { type, from, fields });
  }

  private handlePost(fields: MessageFields, envelope: Envelope): void {
    if (envelope.sender === this.userId) return;

    this.feed.add({
      id: envelope.messageId,
      author: envelope.sender,
      content: fields.CONTENT ?? '',
      timestamp: envelope.timestamp,
      ttl: intField(fields, 'TTL') ?? this.options.postTtlSeconds,
    });
    this.received('POST', envelope.sender, fields);
  }

  private handleDm(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    this.dms.append(this.userId, envelope.sender, 'in', fields.CONTENT ?? '', envelope.timestamp, envelope.messageId);
    this.received('DM', envelope.sender, fields);
  }

  private handleProfile(fields: MessageFields, envelope: Envelope): void {
    if (envelope.sender === this.userId) return;

    const avatarType = optionalField(fields, 'AVATAR_TYPE');
    const profile: Profile = {
      displayName: optionalField(fields, 'DISPLAY_NAME') ?? envelope.sender,
      status: fields.STATUS ?? '',
      hasAvatar: optionalField(fields, 'AVATAR_DATA') !== undefined,
      avatarType,
    };
    this.registry.updateProfile(envelope.sender, profile);
    this.received('PROFILE', envelope.sender, fields);
  }

  private handleFollow(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    if (envelope.type === 'FOLLOW') {
      this.social.follow(envelope.sender, this.userId);
    } else {
      this.social.unfollow(envelope.sender, this.userId);
    }
    this.received(envelope.type, envelope.sender, fields);
  }

  private handleGroupCreate(fields: MessageFields, envelope: Envelope): void {
    const groupId = requireField(fields, 'GROUP_ID');
    const members = listField(fields, 'MEMBERS');
    if (!members.includes(this.userId)) return;

    const group = this.groups.create(groupId, fields.GROUP_NAME || groupId, envelope.sender, members);
    const listed = new Set([envelope.sender, ...members]);
    const stale = Array.from(group.memberIds).filter(id => !listed.has(id));
    if (stale.length > 0 || !group.memberIds.has(this.userId)) {
      // Known group re-sent on being added back; take its member list.
      this.groups.updateMembers(groupId, envelope.sender, members, stale);
    }
    this.received('GROUP_CREATE', envelope.sender, fields);
  }

  private handleGroupUpdate(fields: MessageFields, envelope: Envelope): void {
    const groupId = requireField(fields, 'GROUP_ID');
    this.groups.updateMembers(groupId, envelope.sender, listField(fields, 'ADD'), listField(fields, 'REMOVE'));
    this.received('GROUP_UPDATE', envelope.sender, fields);
  }

  private handleGroupMessage(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    const groupId = requireField(fields, 'GROUP_ID');
    this.groups.append(groupId, {
      messageId: envelope.messageId,
      from: envelope.sender,
      content: fields.CONTENT ?? '',
      timestamp: envelope.timestamp,
    });
    this.received('GROUP_MESSAGE', envelope.sender, fields);
  }

  private handleLike(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    const postId = requireField(fields, 'POST_ID');
    if (envelope.type === 'LIKE') {
      this.social.like(postId, envelope.sender);
    } else {
      this.social.unlike(postId, envelope.sender);
    }
    this.received(envelope.type, envelope.sender, fields);
  }

  private handleGameInvite(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    const gameId = requireField(fields, 'GAMEID');
    const inviterSymbol = fields.SYMBOL || 'X';
    if (!isGameSymbol(inviterSymbol)) {
      throw new InvalidMessageFormat(`Invalid SYMBOL: ${inviterSymbol}`);
    }
    const position = intField(fields, 'POSITION');
    if (position !== undefined && inviterSymbol !== 'X') {
      throw new InvalidMove(`Only X may open ${gameId}`);
    }

    const session = this.games.accept(this.games.open({
      id: gameId,
      localUserId: this.userId,
      localSymbol: inviterSymbol === 'X' ? 'O' : 'X',
      opponentId: envelope.sender,
    }));

    if (position !== undefined) {
      try {
        this.games.move(session, 'X', position);
      } catch (e) {
        this.games.discard(session);
        throw e;
      }
    }
    this.events.emit('game-updated', session);
  }

  private handleGameMove(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    const gameId = requireField(fields, 'GAMEID');
    const symbol = fields.SYMBOL;
    const position = intField(fields, 'POSITION');
    if (!isGameSymbol(symbol) || position === undefined) {
      throw new InvalidMessageFormat(`TICTACTOE_MOVE for ${gameId} needs SYMBOL and POSITION`);
    }

    const session = this.games.require(gameId, envelope.sender);
    if (symbol === session.localSymbol) {
      throw new InvalidMove(`${envelope.sender} does not play ${symbol} in ${gameId}`);
    }

    const { outcome } = this.games.move(session, symbol, position);
    if (this.options.verbose && outcome) {
      console.log(`[Router] ${gameId} ended on ${envelope.sender}'s move`);
    }
    this.events.emit('game-updated', session);
  }

  private handleGameResult(fields: MessageFields, envelope: Envelope): void {
    if (!this.isForMe(fields, envelope)) return;

    const gameId = requireField(fields, 'GAMEID');
    const outcome = parseOutcome(fields);
    const session = this.games.get(gameId, envelope.sender);
    if (!session) {
      // Already completed locally from the final move.
      return;
    }
    this.games.complete(session, outcome);
    this.events.emit('game-updated', session);
  }

  private handleRevoke(fields: MessageFields, envelope: Envelope): void {
    const token = requireField(fields, 'TOKEN');
    if (parseToken(token)?.userId !== envelope.sender) {
      throw new PermissionDenied(`${envelope.sender} cannot revoke another user's token`);
    }
    this.tokens.revoke(token);
  }

  // ════════════════════════════════════════════════════════════════════
  // OUTBOUND HELPERS
  // ════════════════════════════════════════════════════════════════════

  private requirePeer(userId: string): Peer {
    const peer = this.registry.lookup(userId);
    if (!peer) throw new RecipientUnknown(userId);
    return peer;
  }

  private async sendTo(peer: Peer, fields: MessageFields): Promise<void> {
    await this.outbound.unicast(fields, { address: peer.ip, port: peer.port });
  }

  /**
   * Unicast to each recipient that is currently known. Local errors such
   * as PayloadTooLarge stop the fan-out; socket failures are logged per
   * recipient.
   */
  private async fanOut(recipients: Iterable<string>, build: (to: string) => MessageFields): Promise<FanOutResult> {
    const result: FanOutResult = { sent: 0, skipped: [] };

    for (const userId of recipients) {
      if (userId === this.userId) continue;
      const peer = this.registry.lookup(userId);
      if (!peer) {
        result.skipped.push(userId);
        continue;
      }
      try {
        await this.sendTo(peer, build(userId));
        result.sent++;
      } catch (e) {
        if (e instanceof PeerError) throw e;
        console.error(`[Router] Send to ${userId} failed:`, describeError(e));
        result.skipped.push(userId);
      }
    }
    return result;
  }

  // ════════════════════════════════════════════════════════════════════
  // INTENTS
  // ════════════════════════════════════════════════════════════════════

  async post(content: string, ttlSeconds = this.options.postTtlSeconds): Promise<{ post: Post } & FanOutResult> {
    const fields = this.factory.post(content, ttlSeconds);
    const recipients = this.registry.snapshot().map(p => p.userId);
    const result = await this.fanOut(recipients, () => fields);

    const post = this.feed.add({
      id: fields.MESSAGE_ID,
      author: this.userId,
      content,
      timestamp: Number(fields.TIMESTAMP),
      ttl: ttlSeconds,
    });
    console.log(`[Router] POST ${post.id} to ${result.sent} peers`);
    return { post, ...result };
  }

  /**
   * Direct message. Nothing is sent to a recipient the registry does not
   * know.
   */
  async sendDm(to: string, content: string) {
    const peer = this.requirePeer(to);
    const fields = this.factory.dm(to, content);
    await this.sendTo(peer, fields);
    return this.dms.append(this.userId, to, 'out', content, Number(fields.TIMESTAMP), fields.MESSAGE_ID);
  }

  async updateProfile(displayName: string, status: string, avatar?: AvatarPayload): Promise<Profile> {
    const fields = this.factory.profile(displayName, status, avatar);
    await this.outbound.broadcast(fields);

    const profile: Profile = {
      displayName,
      status,
      hasAvatar: avatar !== undefined,
      avatarType: avatar?.mimeType,
    };
    this.registry.updateProfile(this.userId, profile);
    return profile;
  }

  /** Returns false when the edge already existed; nothing is sent then. */
  async follow(to: string): Promise<boolean> {
    const peer = this.requirePeer(to);
    if (this.social.isFollowing(this.userId, to)) return false;

    await this.sendTo(peer, this.factory.follow(to, 'FOLLOW'));
    return this.social.follow(this.userId, to);
  }

  async unfollow(to: string): Promise<boolean> {
    const peer = this.requirePeer(to);
    if (!this.social.isFollowing(this.userId, to)) return false;

    await this.sendTo(peer, this.factory.follow(to, 'UNFOLLOW'));
    return this.social.unfollow(this.userId, to);
  }

  async createGroup(name: string, memberIds: string[], groupId = GroupRegistry.newGroupId()): Promise<{ group: Group } & FanOutResult> {
    const group = this.groups.create(groupId, name, this.userId, memberIds);
    const fields = this.factory.groupCreate(group.id, group.name, group.memberIds);
    const result = await this.fanOut(group.memberIds, () => fields);
    return { group, ...result };
  }

  /**
   * Creator-only membership change. Previous members get GROUP_UPDATE;
   * added members get GROUP_CREATE with the full member list.
   */
  async updateGroupMembers(groupId: string, add: string[], remove: string[]): Promise<FanOutResult> {
    const group = this.groups.require(groupId);
    const before = new Set(group.memberIds);
    const change = this.groups.updateMembers(groupId, this.userId, add, remove);

    const update = this.factory.groupUpdate(groupId, change.added, change.removed);
    const welcome = this.factory.groupCreate(groupId, group.name, group.memberIds);
    const added = new Set(change.added);
    return this.fanOut(new Set([...before, ...added]), to => (added.has(to) ? welcome : update));
  }

  async sendGroupMessage(groupId: string, content: string): Promise<FanOutResult> {
    const messageId = generateMessageId();
    const message = this.groups.append(groupId, {
      messageId,
      from: this.userId,
      content,
      timestamp: Math.floor(this.now() / 1000),
    });
    const members = this.groups.require(groupId).memberIds;
    return this.fanOut(members, to => this.factory.groupMessage(groupId, to, message.content, messageId));
  }

  /** Returns false when this user already liked the post. */
  async like(postId: string, author: string): Promise<boolean> {
    return this.toggleLike(postId, author, 'LIKE');
  }

  /** Returns false when this user had not liked the post. */
  async unlike(postId: string, author: string): Promise<boolean> {
    return this.toggleLike(postId, author, 'UNLIKE');
  }

  private async toggleLike(postId: string, author: string, type: 'LIKE' | 'UNLIKE'): Promise<boolean> {
    const peer = author === this.userId ? undefined : this.requirePeer(author);
    const liked = this.social.hasLiked(postId, this.userId);
    if (liked === (type === 'LIKE')) return false;

    if (peer) {
      await this.sendTo(peer, this.factory.like(author, postId, type));
    }
    return type === 'LIKE' ? this.social.like(postId, this.userId) : this.social.unlike(postId, this.userId);
  }

  /**
   * Start a game. X always opens; an inviter playing X may embed the
   * first move.
   */
  async inviteGame(to: string, symbol: GameSymbol = 'X', firstMove?: number): Promise<GameSession> {
    const peer = this.requirePeer(to);
    if (firstMove !== undefined && symbol !== 'X') {
      throw new InvalidMove('Only X may embed an opening move');
    }

    const gameId = this.games.allocateId();
    const session = this.games.accept(
      this.games.open({ id: gameId, localUserId: this.userId, localSymbol: symbol, opponentId: to })
    );

    try {
      if (firstMove !== undefined) {
        this.games.move(session, 'X', firstMove);
      }
      await this.sendTo(peer, this.factory.gameInvite(to, gameId, symbol, firstMove));
    } catch (e) {
      this.games.discard(session);
      throw e;
    }

    this.events.emit('game-updated', session);
    return session;
  }

  /**
   * Play a move. The board changes only once the opponent has been sent
   * the move. `opponentId` is needed when the same id is active with
   * several opponents.
   */
  async makeMove(gameId: string, position: number, opponentId?: string): Promise<MoveResult> {
    const session = this.games.require(gameId, opponentId);
    const opponent = opponentOf(session);
    const peer = this.requirePeer(opponent);

    checkMove(session, session.localSymbol, position);
    await this.sendTo(peer, this.factory.gameMove(opponent, gameId, position, session.localSymbol, session.moveCount + 1));
    const result = this.games.move(session, session.localSymbol, position);
    if (result.outcome) {
      try {
        await this.sendTo(peer, this.factory.gameResult(opponent, gameId, result.outcome));
      } catch (e) {
        // The opponent reaches the same outcome from the final move.
        console.error(`[Router] RESULT for ${gameId} to ${opponent} failed:`, describeError(e));
      }
    }

    this.events.emit('game-updated', session);
    return result;
  }

  async revokeToken(token: string): Promise<void> {
    this.tokens.revoke(token);
    await this.outbound.broadcast(this.factory.revoke(token));
  }

  /** Periodic cleanup of state with a lifetime. */
  housekeeping(): void {
    this.feed.purgeExpired();
  }
}
