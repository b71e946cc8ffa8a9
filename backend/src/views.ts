/**
 * JSON shapes served by the control API and the bridge
 */

import { GameSession, Group, Post } from './types';
import { SocialGraph } from './socialGraph';
import { renderBoard } from './ticTacToe';

export interface GroupView {
  id: string;
  name: string;
  creatorId: string;
  createdAt: number;
  memberIds: string[];
  messageCount: number;
}

export function groupView(group: Group): GroupView {
  return {
    id: group.id,
    name: group.name,
    creatorId: group.creatorId,
    createdAt: group.createdAt,
    memberIds: Array.from(group.memberIds).sort(),
    messageCount: group.log.length,
  };
}

export interface PostView extends Post {
  likes: number;
}

export function postView(post: Post, social: SocialGraph): PostView {
  return { ...post, likes: social.likeCount(post.id) };
}

export interface GameView extends GameSession {
  rendered: string;
}

export function gameView(session: GameSession): GameView {
  return { ...session, board: [...session.board], rendered: renderBoard(session.board) };
}
