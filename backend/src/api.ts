/**
 * Control API
 * Local HTTP surface for driving one peer: peers, posts, DMs, profile,
 * follows, groups, likes and games
 */

import { Router, Request, Response } from 'express';
import { PeerNode } from './peerNode';
import { describeError, PeerError, PeerErrorCode, RecipientUnknown } from './errors';
import { asPayload, readInt, readOptionalInt, readOptionalString, readString, readStringList, readSymbol } from './payload';
import { readAvatar } from './intents';
import { gameView, groupView, postView } from './views';

const STATUS_BY_CODE: Record<PeerErrorCode, number> = {
  FORMAT_ERROR: 400,
  INVALID_MESSAGE_FORMAT: 400,
  BAD_REQUEST: 400,
  RECIPIENT_UNKNOWN: 404,
  GAME_NOT_FOUND: 404,
  GROUP_NOT_FOUND: 404,
  PERMISSION_DENIED: 403,
  INVALID_MOVE: 409,
  PAYLOAD_TOO_LARGE: 413,
};

export function statusFor(error: unknown): number {
  return error instanceof PeerError ? STATUS_BY_CODE[error.code] : 500;
}

type Handler = (req: Request, res: Response) => unknown;

/**
 * Express 4 does not catch rejected handlers; map every failure to a
 * status here.
 */
function handle(fn: Handler) {
  return (req: Request, res: Response) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch((e: unknown) => {
        const status = statusFor(e);
        if (status === 500) {
          console.error(`[API] ${req.method} ${req.path} failed:`, describeError(e));
        }
        res.status(status).json({
          error: describeError(e),
          code: e instanceof PeerError ? e.code : 'INTERNAL',
        });
      });
  };
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryLimit(req: Request, fallback: number): number {
  const value = parseInt(queryString(req, 'limit') ?? '', 10);
  return value > 0 ? value : fallback;
}

export function createApiRouter(node: PeerNode): Router {
  const apiRouter = Router();
  const router = node.router;

  // ════════════════════════════════════════════════════════════════════
  // PEERS
  // ════════════════════════════════════════════════════════════════════

  apiRouter.get('/peers', handle((_req, res) => {
    res.json(node.registry.snapshot());
  }));

  apiRouter.get('/peers/:userId', handle((req, res) => {
    const peer = node.registry.lookup(req.params.userId);
    if (!peer) throw new RecipientUnknown(req.params.userId);
    res.json(peer);
  }));

  // ════════════════════════════════════════════════════════════════════
  // POSTS & LIKES
  // ════════════════════════════════════════════════════════════════════

  /**
   * Publish a post to every known peer
   */
  apiRouter.post('/posts', handle(async (req, res) => {
    const body = asPayload(req.body);
    const result = await router.post(readString(body, 'content'), readOptionalInt(body, 'ttl'));
    res.status(201).json({ ...result, post: postView(result.post, router.social) });
  }));

  apiRouter.get('/posts', handle((req, res) => {
    const posts = router.feed.list(queryString(req, 'author'), queryLimit(req, 50));
    res.json(posts.map(p => postView(p, router.social)));
  }));

  apiRouter.post('/likes', handle(async (req, res) => {
    const body = asPayload(req.body);
    const changed = await router.like(readString(body, 'postId'), readString(body, 'author'));
    res.status(changed ? 201 : 200).json({ changed });
  }));

  apiRouter.delete('/likes', handle(async (req, res) => {
    const body = asPayload(req.body);
    const changed = await router.unlike(readString(body, 'postId'), readString(body, 'author'));
    res.json({ changed });
  }));

  // ════════════════════════════════════════════════════════════════════
  // DIRECT MESSAGES
  // ════════════════════════════════════════════════════════════════════

  apiRouter.post('/dms', handle(async (req, res) => {
    const body = asPayload(req.body);
    const entry = await router.sendDm(readString(body, 'to'), readString(body, 'content'));
    res.status(201).json(entry);
  }));

  apiRouter.get('/dms', handle((_req, res) => {
    res.json(router.dms.correspondents(node.userId));
  }));

  apiRouter.get('/dms/:userId', handle((req, res) => {
    res.json(router.dms.thread(node.userId, req.params.userId, queryLimit(req, 100)));
  }));

  // ════════════════════════════════════════════════════════════════════
  // PROFILE & FOLLOWS
  // ════════════════════════════════════════════════════════════════════

  apiRouter.post('/profile', handle(async (req, res) => {
    const body = asPayload(req.body);
    const profile = await router.updateProfile(
      readString(body, 'displayName'),
      readOptionalString(body, 'status') ?? '',
      readAvatar(body)
    );
    res.json(profile);
  }));

  apiRouter.post('/follow', handle(async (req, res) => {
    const changed = await router.follow(readString(asPayload(req.body), 'to'));
    res.status(changed ? 201 : 200).json({ changed });
  }));

  apiRouter.delete('/follow/:userId', handle(async (req, res) => {
    const changed = await router.unfollow(req.params.userId);
    res.json({ changed });
  }));

  apiRouter.get('/following', handle((_req, res) => {
    res.json({
      following: router.social.followeesOf(node.userId),
      followers: router.social.followersOf(node.userId),
    });
  }));

  // ════════════════════════════════════════════════════════════════════
  // GROUPS
  // ════════════════════════════════════════════════════════════════════

  apiRouter.post('/groups', handle(async (req, res) => {
    const body = asPayload(req.body);
    const { group, sent, skipped } = await router.createGroup(
      readString(body, 'name'),
      readStringList(body, 'members'),
      readOptionalString(body, 'groupId')
    );
    res.status(201).json({ group: groupView(group), sent, skipped });
  }));

  apiRouter.get('/groups', handle((_req, res) => {
    res.json(router.groups.listForUser(node.userId).map(groupView));
  }));

  apiRouter.get('/groups/:id', handle((req, res) => {
    res.json(groupView(router.groups.require(req.params.id)));
  }));

  apiRouter.patch('/groups/:id/members', handle(async (req, res) => {
    const body = asPayload(req.body);
    const result = await router.updateGroupMembers(
      req.params.id,
      readStringList(body, 'add'),
      readStringList(body, 'remove')
    );
    res.json({ group: groupView(router.groups.require(req.params.id)), ...result });
  }));

  apiRouter.get('/groups/:id/messages', handle((req, res) => {
    res.json(router.groups.messages(req.params.id, queryLimit(req, 100)));
  }));

  apiRouter.post('/groups/:id/messages', handle(async (req, res) => {
    const result = await router.sendGroupMessage(req.params.id, readString(asPayload(req.body), 'content'));
    res.status(201).json(result);
  }));

  // ════════════════════════════════════════════════════════════════════
  // GAMES
  // ════════════════════════════════════════════════════════════════════

  apiRouter.post('/games', handle(async (req, res) => {
    const body = asPayload(req.body);
    const session = await router.inviteGame(
      readString(body, 'to'),
      readSymbol(body, 'symbol'),
      readOptionalInt(body, 'position')
    );
    res.status(201).json(gameView(session));
  }));

  apiRouter.get('/games', handle((_req, res) => {
    res.json(router.games.list().map(gameView));
  }));

  apiRouter.get('/games/:id', handle((req, res) => {
    const opponent = typeof req.query.opponent === 'string' ? req.query.opponent : undefined;
    res.json(gameView(router.games.require(req.params.id, opponent)));
  }));

  apiRouter.post('/games/:id/moves', handle(async (req, res) => {
    const body = asPayload(req.body);
    const { session, outcome } = await router.makeMove(
      req.params.id,
      readInt(body, 'position'),
      readOptionalString(body, 'opponent')
    );
    res.json({ game: gameView(session), outcome });
  }));

  // ════════════════════════════════════════════════════════════════════
  // HEALTH
  // ════════════════════════════════════════════════════════════════════

  apiRouter.get('/health', handle((_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now(), ...node.status() });
  }));

  return apiRouter;
}
