import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Router } from './router';
import { Outbound, PeerRegistry } from './peerRegistry';
import { MessageFactory } from './messages';
import { EventHub } from './eventHub';
import { createToken, ScopedTokenVerifier } from './tokens';
import { GameSession, MessageFields, NodeEvents, SocketAddress } from './types';
import { BadRequest, GameNotFound, InvalidMove, PermissionDenied, RecipientUnknown } from './errors';

const ALICE = 'alice@10.0.0.1';
const BOB = 'bob@10.0.0.2';
const CAROL = 'carol@10.0.0.3';
const FROM_BOB: SocketAddress = { address: '10.0.0.2', port: 40001 };

interface Sent {
  fields: MessageFields;
  target: SocketAddress | 'broadcast';
}

describe('Router', () => {
  let sent: Sent[];
  let failSends: boolean;
  let registry: PeerRegistry;
  let events: EventHub<NodeEvents>;
  let router: Router;
  const bob = new MessageFactory(BOB, 3600);
  const carol = new MessageFactory(CAROL, 3600);

  function build(options: { tokens?: ScopedTokenVerifier } = {}): Router {
    const outbound: Outbound = {
      broadcast: async fields => {
        sent.push({ fields, target: 'broadcast' });
      },
      unicast: async (fields, target) => {
        if (failSends) throw new Error('EHOSTUNREACH');
        sent.push({ fields, target });
      },
    };
    const factory = new MessageFactory(ALICE, 3600);
    registry = new PeerRegistry({
      factory,
      outbound,
      localPort: () => 40000,
      discoveryIntervalMs: 1000,
      peerTimeoutMs: 60_000,
      sweepIntervalMs: 1000,
    });
    registry.upsert(BOB, '10.0.0.2', 40001);
    events = new EventHub<NodeEvents>();
    return new Router({ factory, registry, outbound, events, postTtlSeconds: 3600, tokens: options.tokens });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    sent = [];
    failSends = false;
    router = build();
  });

  describe('direct messages', () => {
    it('should send nothing to an unknown recipient', async () => {
      await expect(router.sendDm(CAROL, 'hi')).rejects.toThrow(RecipientUnknown);
      expect(sent).toEqual([]);
      expect(router.dms.thread(ALICE, CAROL)).toEqual([]);
    });

    it('should unicast to the recipient and record the outgoing entry', async () => {
      const entry = await router.sendDm(BOB, 'hi');

      expect(sent).toHaveLength(1);
      expect(sent[0].target).toEqual({ address: '10.0.0.2', port: 40001 });
      expect(sent[0].fields).toMatchObject({ TYPE: 'DM', FROM: ALICE, TO: BOB, CONTENT: 'hi' });
      expect(entry).toMatchObject({ direction: 'out', content: 'hi', messageId: sent[0].fields.MESSAGE_ID });
      expect(router.dms.thread(ALICE, BOB)).toEqual([entry]);
    });

    it('should store incoming DMs addressed to this node and emit an event', async () => {
      const received = vi.fn();
      events.on('message-received', received);

      await router.dispatch(bob.dm(ALICE, 'hello'), FROM_BOB);
      await router.dispatch(bob.dm(CAROL, 'not for alice'), FROM_BOB);

      expect(router.dms.thread(ALICE, BOB).map(e => [e.direction, e.content])).toEqual([['in', 'hello']]);
      expect(received).toHaveBeenCalledTimes(1);
      expect(received.mock.calls[0][0]).toMatchObject({ type: 'DM', from: BOB });
    });
  });

  describe('posts and likes', () => {
    it('should fan a post out to known peers and keep it locally', async () => {
      const { post, sent: count } = await router.post('first!', 60);
      expect(count).toBe(1);
      expect(sent[0].fields).toMatchObject({ TYPE: 'POST', USER_ID: ALICE, CONTENT: 'first!', TTL: '60' });
      expect(router.feed.get(post.id)).toMatchObject({ author: ALICE, content: 'first!', ttl: 60 });
    });

    it('should add peer posts to the feed', async () => {
      const fields = bob.post('from bob', 120);
      await router.dispatch(fields, FROM_BOB);
      expect(router.feed.get(fields.MESSAGE_ID)).toMatchObject({ author: BOB, content: 'from bob', ttl: 120 });
    });

    it('should send a like once and record likes from peers', async () => {
      expect(await router.like('p1', BOB)).toBe(true);
      expect(await router.like('p1', BOB)).toBe(false);
      expect(sent.map(s => s.fields.TYPE)).toEqual(['LIKE']);
      expect(sent[0].fields.POST_ID).toBe('p1');

      await router.dispatch(bob.like(ALICE, 'my-post', 'LIKE'), FROM_BOB);
      await router.dispatch(bob.like(ALICE, 'my-post', 'LIKE'), FROM_BOB);
      expect(router.social.likeCount('my-post')).toBe(1);
    });

    it('should like its own post without sending', async () => {
      expect(await router.like('p2', ALICE)).toBe(true);
      expect(sent).toEqual([]);
      expect(router.social.hasLiked('p2', ALICE)).toBe(true);
    });

    it('should not send an unlike for a post it never liked', async () => {
      expect(await router.unlike('p1', BOB)).toBe(false);
      expect(sent).toEqual([]);
    });
  });

  describe('follows and profiles', () => {
    it('should send FOLLOW once and record the edge', async () => {
      expect(await router.follow(BOB)).toBe(true);
      expect(await router.follow(BOB)).toBe(false);
      expect(sent.map(s => s.fields.TYPE)).toEqual(['FOLLOW']);
      expect(router.social.isFollowing(ALICE, BOB)).toBe(true);

      expect(await router.unfollow(BOB)).toBe(true);
      expect(sent.map(s => s.fields.TYPE)).toEqual(['FOLLOW', 'UNFOLLOW']);
    });

    it('should record followers from incoming FOLLOW', async () => {
      await router.dispatch(bob.follow(ALICE, 'FOLLOW'), FROM_BOB);
      expect(router.social.followersOf(ALICE)).toEqual([BOB]);
    });

    it('should attach received profiles to the peer', async () => {
      const fields = bob.profile('Bob', 'busy', { mimeType: 'image/png', data: Buffer.from('img') });
      await router.dispatch(fields, FROM_BOB);
      expect(registry.lookup(BOB)?.profile).toEqual({
        displayName: 'Bob',
        status: 'busy',
        hasAvatar: true,
        avatarType: 'image/png',
      });
    });

    it('should broadcast its own profile', async () => {
      await router.updateProfile('Alice', 'here');
      expect(sent).toHaveLength(1);
      expect(sent[0].target).toBe('broadcast');
      expect(registry.getProfile(ALICE)).toEqual({
        displayName: 'Alice',
        status: 'here',
        hasAvatar: false,
        avatarType: undefined,
      });
    });
  });

  describe('groups', () => {
    it('should create a group and skip members it cannot reach', async () => {
      const { group, sent: count, skipped } = await router.createGroup('Team', [BOB, CAROL], 'grp-1');
      expect(count).toBe(1);
      expect(skipped).toEqual([CAROL]);
      expect(sent[0].fields).toMatchObject({
        TYPE: 'GROUP_CREATE',
        GROUP_ID: 'grp-1',
        GROUP_NAME: 'Team',
        MEMBERS: `${ALICE},${BOB},${CAROL}`,
      });
      expect(group.creatorId).toBe(ALICE);
    });

    it('should join groups that list this node and ignore the rest', async () => {
      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE]), FROM_BOB);
      await router.dispatch(bob.groupCreate('grp-c', 'Other', [BOB, CAROL]), FROM_BOB);
      expect(router.groups.get('grp-b')?.creatorId).toBe(BOB);
      expect(router.groups.get('grp-c')).toBeUndefined();
    });

    it('should reject membership changes from anyone but the creator', async () => {
      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE]), FROM_BOB);
      await expect(router.dispatch(carol.groupUpdate('grp-b', [CAROL], []), FROM_BOB))
        .rejects.toThrow(PermissionDenied);
      expect(router.groups.isMember('grp-b', CAROL)).toBe(false);

      await router.dispatch(bob.groupUpdate('grp-b', [CAROL], []), FROM_BOB);
      expect(router.groups.isMember('grp-b', CAROL)).toBe(true);
    });

    it('should fan group messages out with one id and a TO per member', async () => {
      registry.upsert(CAROL, '10.0.0.3', 40003);
      await router.createGroup('Team', [BOB, CAROL], 'grp-1');
      sent = [];

      const result = await router.sendGroupMessage('grp-1', 'standup');
      expect(result).toEqual({ sent: 2, skipped: [] });
      expect(sent.map(s => s.fields.TO)).toEqual([BOB, CAROL]);
      expect(new Set(sent.map(s => s.fields.MESSAGE_ID)).size).toBe(1);
      expect(router.groups.messages('grp-1').map(m => m.content)).toEqual(['standup']);
    });

    it('should refuse to post in a group it is not part of', async () => {
      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE]), FROM_BOB);
      await router.dispatch(bob.groupUpdate('grp-b', [], [ALICE]), FROM_BOB);
      await expect(router.sendGroupMessage('grp-b', 'hi')).rejects.toThrow(PermissionDenied);
    });

    it('should send added members the whole group and the rest an update', async () => {
      registry.upsert(CAROL, '10.0.0.3', 40003);
      await router.createGroup('Team', [BOB], 'grp-1');
      sent = [];

      const result = await router.updateGroupMembers('grp-1', [CAROL], []);
      expect(result).toEqual({ sent: 2, skipped: [] });
      expect(sent.map(s => [s.target, s.fields.TYPE])).toEqual([
        [{ address: '10.0.0.2', port: 40001 }, 'GROUP_UPDATE'],
        [{ address: '10.0.0.3', port: 40003 }, 'GROUP_CREATE'],
      ]);
      expect(sent[0].fields).toMatchObject({ ADD: CAROL, REMOVE: '' });
      expect(sent[1].fields).toMatchObject({ GROUP_NAME: 'Team', MEMBERS: `${ALICE},${BOB},${CAROL}` });
    });

    it('should rejoin a known group when added back', async () => {
      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE, CAROL]), FROM_BOB);
      await router.dispatch(bob.groupUpdate('grp-b', [], [ALICE, CAROL]), FROM_BOB);
      expect(router.groups.isMember('grp-b', ALICE)).toBe(false);

      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE]), FROM_BOB);
      expect(Array.from(router.groups.require('grp-b').memberIds).sort()).toEqual([ALICE, BOB]);
      await router.dispatch(bob.groupMessage('grp-b', ALICE, 'welcome back', 'wb1'), FROM_BOB);
      expect(router.groups.messages('grp-b').map(m => m.content)).toEqual(['welcome back']);
    });

    it('should log incoming group messages', async () => {
      await router.dispatch(bob.groupCreate('grp-b', 'Bobs', [BOB, ALICE]), FROM_BOB);
      await router.dispatch(bob.groupMessage('grp-b', ALICE, 'hey all', 'abc'), FROM_BOB);
      expect(router.groups.messages('grp-b')).toMatchObject([{ messageId: 'abc', from: BOB, content: 'hey all' }]);
    });
  });

  describe('tic-tac-toe', () => {
    function sentOfType(type: string): MessageFields[] {
      return sent.map(s => s.fields).filter(f => f.TYPE === type);
    }

    it('should play a game through to a win', async () => {
      const updates: GameSession[] = [];
      events.on('game-updated', session => updates.push(session));

      const game = await router.inviteGame(BOB, 'X', 5);
      expect(game.id).toBe('g0');
      expect(game.board[4]).toBe('X');
      expect(game.turn).toBe('O');
      expect(sentOfType('TICTACTOE_INVITE')[0]).toMatchObject({ TO: BOB, GAMEID: 'g0', SYMBOL: 'X', POSITION: '5' });

      await router.dispatch(bob.gameMove(ALICE, 'g0', 1, 'O', 2), FROM_BOB);
      await router.makeMove('g0', 3);
      await router.dispatch(bob.gameMove(ALICE, 'g0', 9, 'O', 4), FROM_BOB);
      const { outcome } = await router.makeMove('g0', 7);

      expect(outcome).toEqual({ result: 'WIN', symbol: 'X', line: [2, 4, 6] });
      expect(game.state).toBe('COMPLETED');
      expect(router.games.get('g0')).toBeUndefined();
      expect(sentOfType('TICTACTOE_MOVE').map(f => [f.POSITION, f.TURN])).toEqual([['3', '3'], ['7', '5']]);
      expect(sentOfType('TICTACTOE_RESULT')[0]).toMatchObject({ RESULT: 'WIN', SYMBOL: 'X', WINNING_LINE: '2,4,6' });
      expect(updates).toHaveLength(5);
    });

    it('should accept an invite with an opening move', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g7', 'X', 5), FROM_BOB);
      const game = router.games.require('g7');
      expect(game).toMatchObject({ localSymbol: 'O', state: 'IN_PROGRESS', turn: 'O', moveCount: 1 });
      expect(game.players).toEqual({ X: BOB, O: ALICE });
      expect(game.board[4]).toBe('X');
    });

    it('should let the invitee open when the inviter plays O', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g8', 'O'), FROM_BOB);
      await router.makeMove('g8', 1);
      expect(router.games.require('g8').board[0]).toBe('X');
    });

    it('should reject moves out of turn without sending', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g7', 'X', 5), FROM_BOB);
      await expect(router.dispatch(bob.gameMove(ALICE, 'g7', 1, 'X', 2), FROM_BOB)).rejects.toThrow(InvalidMove);

      const before = [...router.games.require('g7').board];
      await expect(router.makeMove('g7', 5)).rejects.toThrow('Position 5 is already taken');
      expect(router.games.require('g7').board).toEqual(before);
      expect(sent).toEqual([]);
    });

    it('should reject moves from someone outside the game', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g7', 'X', 5), FROM_BOB);
      await expect(router.dispatch(carol.gameMove(ALICE, 'g7', 1, 'O', 2), FROM_BOB)).rejects.toThrow(GameNotFound);
      expect(router.games.require('g7').moveCount).toBe(1);
    });

    it('should keep games with the same id from different inviters apart', async () => {
      registry.upsert(CAROL, '10.0.0.3', 40003);
      await router.dispatch(bob.gameInvite(ALICE, 'g0', 'X', 5), FROM_BOB);
      await router.dispatch(carol.gameInvite(ALICE, 'g0', 'O'), FROM_BOB);

      expect(router.games.require('g0', BOB).players).toEqual({ X: BOB, O: ALICE });
      expect(router.games.require('g0', CAROL).players).toEqual({ X: ALICE, O: CAROL });
      await expect(router.makeMove('g0', 1)).rejects.toThrow(BadRequest);

      await router.makeMove('g0', 1, CAROL);
      expect(sent[0].fields).toMatchObject({ TYPE: 'TICTACTOE_MOVE', TO: CAROL, GAMEID: 'g0', POSITION: '1' });
      expect(router.games.require('g0', CAROL).board[0]).toBe('X');
      expect(router.games.require('g0', BOB).board[0]).toBeNull();

      await router.dispatch(bob.gameResult(ALICE, 'g0', { result: 'DRAW' }), FROM_BOB);
      expect(router.games.get('g0', BOB)).toBeUndefined();
      expect(router.games.get('g0')).toBe(router.games.get('g0', CAROL));
    });

    it('should leave the board unchanged when a move cannot be sent', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g8', 'O'), FROM_BOB);
      failSends = true;

      await expect(router.makeMove('g8', 1)).rejects.toThrow('EHOSTUNREACH');
      const game = router.games.require('g8');
      expect(game).toMatchObject({ turn: 'X', moveCount: 0, state: 'IN_PROGRESS' });
      expect(game.board[0]).toBeNull();

      failSends = false;
      await router.makeMove('g8', 1);
      expect(game.board[0]).toBe('X');
      expect(sent[0].fields).toMatchObject({ TYPE: 'TICTACTOE_MOVE', POSITION: '1', TURN: '1' });
    });

    it('should refuse an opening move from an O inviter', async () => {
      await expect(router.inviteGame(BOB, 'O', 5)).rejects.toThrow(InvalidMove);
      expect(router.games.list()).toEqual([]);
      expect(sent).toEqual([]);
    });

    it('should not start a game with an unknown peer', async () => {
      await expect(router.inviteGame(CAROL)).rejects.toThrow(RecipientUnknown);
      expect(router.games.list()).toEqual([]);
    });

    it('should complete a game from a peer result', async () => {
      await router.dispatch(bob.gameInvite(ALICE, 'g7', 'X', 5), FROM_BOB);
      await router.dispatch(bob.gameResult(ALICE, 'g7', { result: 'DRAW' }), FROM_BOB);
      expect(router.games.get('g7')).toBeUndefined();
    });
  });

  describe('tokens', () => {
    it('should drop messages whose token does not verify', async () => {
      router = build({ tokens: new ScopedTokenVerifier() });
      const forged = { ...bob.dm(ALICE, 'sneaky'), TOKEN: createToken(CAROL, 'chat', 60) };
      await router.dispatch(forged, FROM_BOB);
      await router.dispatch(bob.dm(ALICE, 'genuine'), FROM_BOB);
      expect(router.dms.thread(ALICE, BOB).map(e => e.content)).toEqual(['genuine']);
    });

    it('should honour revocations from the token owner only', async () => {
      const verifier = new ScopedTokenVerifier();
      router = build({ tokens: verifier });
      const dm = bob.dm(ALICE, 'once');

      await expect(router.dispatch(carol.revoke(dm.TOKEN), FROM_BOB)).rejects.toThrow(PermissionDenied);
      await router.dispatch(bob.revoke(dm.TOKEN), FROM_BOB);
      expect(verifier.isRevoked(dm.TOKEN)).toBe(true);

      await router.dispatch(dm, FROM_BOB);
      expect(router.dms.thread(ALICE, BOB)).toEqual([]);
    });

    it('should revoke its own token locally and announce it', async () => {
      const verifier = new ScopedTokenVerifier();
      router = build({ tokens: verifier });
      const token = createToken(ALICE, 'chat', 60);

      await router.revokeToken(token);
      expect(verifier.isRevoked(token)).toBe(true);
      expect(sent).toHaveLength(1);
      expect(sent[0].target).toBe('broadcast');
      expect(sent[0].fields).toMatchObject({ TYPE: 'REVOKE', FROM: ALICE, TOKEN: token });
    });
  });
});
