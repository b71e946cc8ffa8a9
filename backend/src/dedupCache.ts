/**
 * Recently seen (sender, MESSAGE_ID) pairs. A capacity of 0 turns
 * suppression off.
 */

export class DedupCache {
  private seen: Set<string> = new Set();

  constructor(private readonly capacity = 512) {}

  /**
   * Record the pair and report whether it was new.
   */
  remember(sender: string, messageId: string): boolean {
    if (this.capacity <= 0) return true;

    const key = `${sender}\n${messageId}`;
    if (this.seen.has(key)) return false;

    this.seen.add(key);
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
