/**
 * Social Graph
 * Directed follow edges and per-post like sets. Every mutation is
 * idempotent and reports whether anything changed.
 */

export class SocialGraph {
  private following: Map<string, Set<string>> = new Map();
  private likes: Map<string, Set<string>> = new Map();

  // ════════════════════════════════════════════════════════════════════
  // FOLLOW
  // ════════════════════════════════════════════════════════════════════

  follow(followerId: string, followeeId: string): boolean {
    let followees = this.following.get(followerId);
    if (!followees) {
      followees = new Set();
      this.following.set(followerId, followees);
    }
    if (followees.has(followeeId)) return false;
    followees.add(followeeId);
    console.log(`[SocialGraph] ${followerId} follows ${followeeId}`);
    return true;
  }

  unfollow(followerId: string, followeeId: string): boolean {
    const removed = this.following.get(followerId)?.delete(followeeId) ?? false;
    if (removed) {
      console.log(`[SocialGraph] ${followerId} unfollowed ${followeeId}`);
    }
    return removed;
  }

  isFollowing(followerId: string, followeeId: string): boolean {
    return this.following.get(followerId)?.has(followeeId) ?? false;
  }

  followeesOf(followerId: string): string[] {
    return Array.from(this.following.get(followerId) ?? []).sort();
  }

  followersOf(followeeId: string): string[] {
    const followers: string[] = [];
    for (const [followerId, followees] of this.following) {
      if (followees.has(followeeId)) followers.push(followerId);
    }
    return followers.sort();
  }

  // ════════════════════════════════════════════════════════════════════
  // LIKES
  // ════════════════════════════════════════════════════════════════════

  like(postId: string, userId: string): boolean {
    let likers = this.likes.get(postId);
    if (!likers) {
      likers = new Set();
      this.likes.set(postId, likers);
    }
    if (likers.has(userId)) return false;
    likers.add(userId);
    return true;
  }

  unlike(postId: string, userId: string): boolean {
    const likers = this.likes.get(postId);
    if (!likers || !likers.delete(userId)) return false;
    if (likers.size === 0) this.likes.delete(postId);
    return true;
  }

  likers(postId: string): string[] {
    return Array.from(this.likes.get(postId) ?? []).sort();
  }

  likeCount(postId: string): number {
    return this.likes.get(postId)?.size ?? 0;
  }

  hasLiked(postId: string, userId: string): boolean {
    return this.likes.get(postId)?.has(userId) ?? false;
  }
}
