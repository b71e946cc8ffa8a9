/**
 * Intents
 * Named user actions accepted by the bridge, mapped onto the router
 */

import { Router } from './router';
import { BadRequest } from './errors';
import { AvatarPayload } from './messages';
import {
  isPayload,
  Payload,
  readInt,
  readOptionalInt,
  readOptionalString,
  readString,
  readStringList,
  readSymbol,
} from './payload';
import { gameView, groupView } from './views';

export const INTENT_ACTIONS = [
  'post',
  'dm',
  'profile',
  'follow',
  'unfollow',
  'group.create',
  'group.update',
  'group.message',
  'like',
  'unlike',
  'invite',
  'move',
] as const;

export type IntentAction = typeof INTENT_ACTIONS[number];

export function isIntentAction(value: unknown): value is IntentAction {
  return INTENT_ACTIONS.some(action => action === value);
}

/** Optional `{ mimeType, data }` object, data base64-encoded */
export function readAvatar(payload: Payload): AvatarPayload | undefined {
  const avatar = payload.avatar;
  if (avatar === undefined || avatar === null) return undefined;
  if (!isPayload(avatar)) throw new BadRequest('avatar must be an object');
  return {
    mimeType: readString(avatar, 'mimeType'),
    data: Buffer.from(readString(avatar, 'data'), 'base64'),
  };
}

export async function performIntent(router: Router, action: IntentAction, payload: Payload): Promise<unknown> {
  switch (action) {
    case 'post': {
      const { post, sent, skipped } = await router.post(readString(payload, 'content'), readOptionalInt(payload, 'ttl'));
      return { post, sent, skipped };
    }
    case 'dm':
      return router.sendDm(readString(payload, 'to'), readString(payload, 'content'));
    case 'profile':
      return router.updateProfile(
        readString(payload, 'displayName'),
        readOptionalString(payload, 'status') ?? '',
        readAvatar(payload)
      );
    case 'follow':
      return { changed: await router.follow(readString(payload, 'to')) };
    case 'unfollow':
      return { changed: await router.unfollow(readString(payload, 'to')) };
    case 'group.create': {
      const { group, sent, skipped } = await router.createGroup(
        readString(payload, 'name'),
        readStringList(payload, 'members'),
        readOptionalString(payload, 'groupId')
      );
      return { group: groupView(group), sent, skipped };
    }
    case 'group.update':
      return router.updateGroupMembers(
        readString(payload, 'groupId'),
        readStringList(payload, 'add'),
        readStringList(payload, 'remove')
      );
    case 'group.message':
      return router.sendGroupMessage(readString(payload, 'groupId'), readString(payload, 'content'));
    case 'like':
      return { changed: await router.like(readString(payload, 'postId'), readString(payload, 'author')) };
    case 'unlike':
      return { changed: await router.unlike(readString(payload, 'postId'), readString(payload, 'author')) };
    case 'invite':
      return gameView(await router.inviteGame(
        readString(payload, 'to'),
        readSymbol(payload, 'symbol'),
        readOptionalInt(payload, 'position')
      ));
    case 'move': {
      const { session, outcome } = await router.makeMove(
        readString(payload, 'gameId'),
        readInt(payload, 'position'),
        readOptionalString(payload, 'opponent')
      );
      return { game: gameView(session), outcome };
    }
  }
}
