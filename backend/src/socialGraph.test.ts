import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SocialGraph } from './socialGraph';

const ALICE = 'alice@10.0.0.1';
const BOB = 'bob@10.0.0.2';
const CAROL = 'carol@10.0.0.3';

describe('SocialGraph', () => {
  let graph: SocialGraph;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    graph = new SocialGraph();
  });

  it('should keep follow edges directed and idempotent', () => {
    expect(graph.follow(ALICE, BOB)).toBe(true);
    expect(graph.follow(ALICE, BOB)).toBe(false);
    graph.follow(CAROL, BOB);

    expect(graph.isFollowing(ALICE, BOB)).toBe(true);
    expect(graph.isFollowing(BOB, ALICE)).toBe(false);
    expect(graph.followersOf(BOB)).toEqual([ALICE, CAROL]);
    expect(graph.followeesOf(ALICE)).toEqual([BOB]);

    expect(graph.unfollow(ALICE, BOB)).toBe(true);
    expect(graph.unfollow(ALICE, BOB)).toBe(false);
    expect(graph.followersOf(BOB)).toEqual([CAROL]);
  });

  it('should count each liker once', () => {
    expect(graph.like('post-1', BOB)).toBe(true);
    expect(graph.like('post-1', BOB)).toBe(false);
    graph.like('post-1', CAROL);

    expect(graph.likeCount('post-1')).toBe(2);
    expect(graph.likers('post-1')).toEqual([BOB, CAROL]);
    expect(graph.hasLiked('post-1', BOB)).toBe(true);
  });

  it('should ignore unlikes that change nothing', () => {
    expect(graph.unlike('post-1', BOB)).toBe(false);
    graph.like('post-1', BOB);
    expect(graph.unlike('post-1', BOB)).toBe(true);
    expect(graph.likeCount('post-1')).toBe(0);
  });
});
