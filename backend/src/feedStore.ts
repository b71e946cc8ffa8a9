/**
 * Feed Store
 * Posts by author, each living for its TTL
 */

import { Post } from './types';

export class FeedStore {
  private posts: Map<string, Post> = new Map();

  constructor(
    private readonly maxPosts = 1000,
    private readonly now: () => number = Date.now
  ) {}

  add(post: Omit<Post, 'receivedAt'>): Post {
    const stored: Post = { ...post, receivedAt: this.now() };
    this.posts.set(post.id, stored);

    // Map iteration order is insertion order: the first key is the oldest.
    if (this.posts.size > this.maxPosts) {
      const oldest = this.posts.keys().next();
      if (!oldest.done) this.posts.delete(oldest.value);
    }
    return stored;
  }

  get(postId: string): Post | undefined {
    return this.posts.get(postId);
  }

  /** Live posts, newest first */
  list(author?: string, limit = 50): Post[] {
    const now = this.now();
    return Array.from(this.posts.values())
      .filter(p => !author || p.author === author)
      .filter(p => p.receivedAt + p.ttl * 1000 > now)
      .sort((a, b) => b.timestamp - a.timestamp || b.receivedAt - a.receivedAt)
      .slice(0, limit);
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, post] of this.posts) {
      if (post.receivedAt + post.ttl * 1000 <= now) {
        this.posts.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[FeedStore] Purged ${removed} expired posts`);
    }
    return removed;
  }
}
