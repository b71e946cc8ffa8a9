/**
 * DM Store
 * In-memory direct-message threads keyed by the unordered peer pair
 */

import { DmDirection, DmEntry } from './types';

export function threadKey(a: string, b: string): string {
  return a < b ? `${a}\n${b}` : `${b}\n${a}`;
}

export class DmStore {
  private threads: Map<string, DmEntry[]> = new Map();

  constructor(private readonly maxPerThread = 1000) {}

  append(
    localId: string,
    peerId: string,
    direction: DmDirection,
    content: string,
    timestamp: number,
    messageId: string
  ): DmEntry {
    const key = threadKey(localId, peerId);
    let thread = this.threads.get(key);
    if (!thread) {
      thread = [];
      this.threads.set(key, thread);
    }

    const entry: DmEntry = { messageId, direction, timestamp, content };
    thread.push(entry);

    // Prune old messages
    if (thread.length > this.maxPerThread) {
      thread.shift();
    }

    console.log(`[DmStore] ${direction === 'out' ? 'To' : 'From'} ${peerId}: ${messageId}`);
    return entry;
  }

  thread(localId: string, peerId: string, limit = 100): DmEntry[] {
    return (this.threads.get(threadKey(localId, peerId)) ?? []).slice(-limit);
  }

  /** Peers with at least one message exchanged with `localId` */
  correspondents(localId: string): string[] {
    const peers: string[] = [];
    for (const key of this.threads.keys()) {
      const [a, b] = key.split('\n');
      if (a === localId) peers.push(b);
      else if (b === localId) peers.push(a);
    }
    return peers.sort();
  }
}
