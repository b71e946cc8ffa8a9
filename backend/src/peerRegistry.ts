/**
 * Peer Registry
 * Discovery heartbeat, liveness tracking and peer-list exchange
 */

import { MessageFields, Peer, PeerChange, Profile, SocketAddress } from './types';
import { intField, MessageFactory, PeerListEntry, senderOf } from './messages';
import { describeError } from './errors';

/** How registry and router put messages on the wire */
export interface Outbound {
  broadcast(fields: MessageFields): Promise<void>;
  unicast(fields: MessageFields, target: SocketAddress): Promise<void>;
}

export interface PeerRegistryOptions {
  factory: MessageFactory;
  outbound: Outbound;
  localPort: () => number;
  discoveryIntervalMs: number;
  peerTimeoutMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

type ChangeListener = (change: PeerChange) => void;

/** Profiles held for users that are not (or no longer) in the table */
export const MAX_DETACHED_PROFILES = 256;

function isPeerListEntry(value: unknown): value is PeerListEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('userId' in value) || !('ip' in value) || !('port' in value)) return false;
  const { userId, ip, port } = value;
  return (
    typeof userId === 'string' &&
    typeof ip === 'string' &&
    typeof port === 'number' &&
    Number.isInteger(port) &&
    port > 0 &&
    port < 65536
  );
}

export class PeerRegistry {
  private peers: Map<string, Peer> = new Map();
  private profiles: Map<string, Profile> = new Map();
  private listeners: ChangeListener[] = [];
  private announceTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  readonly userId: string;

  constructor(private readonly options: PeerRegistryOptions) {
    this.now = options.now ?? Date.now;
    this.userId = options.factory.userId;
  }

  // ════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ════════════════════════════════════════════════════════════════════

  start(): void {
    if (this.announceTimer) return;

    void this.announce();
    void this.requestPeerList();

    this.announceTimer = setInterval(() => void this.announce(), this.options.discoveryIntervalMs);
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    console.log(
      `[PeerRegistry] Started as ${this.userId} ` +
      `(announce ${this.options.discoveryIntervalMs}ms, timeout ${this.options.peerTimeoutMs}ms)`
    );
  }

  stop(): void {
    if (this.announceTimer) clearInterval(this.announceTimer);
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.announceTimer = null;
    this.sweepTimer = null;
  }

  /**
   * Broadcast a PEER_DISCOVERY announcement. Failures are logged; the next
   * tick tries again.
   */
  async announce(): Promise<void> {
    try {
      await this.options.outbound.broadcast(this.options.factory.discovery(this.options.localPort()));
    } catch (e) {
      console.error('[PeerRegistry] Announce failed:', describeError(e));
    }
  }

  async requestPeerList(): Promise<void> {
    try {
      await this.options.outbound.broadcast(this.options.factory.peerListRequest(this.options.localPort()));
    } catch (e) {
      console.error('[PeerRegistry] Peer list request failed:', describeError(e));
    }
  }

  // ════════════════════════════════════════════════════════════════════
  // INBOUND
  // ════════════════════════════════════════════════════════════════════

  async handleDiscovery(fields: MessageFields, source: SocketAddress): Promise<void> {
    const userId = senderOf(fields);
    if (!userId || userId === this.userId) return;

    const port = intField(fields, 'PORT') ?? source.port;
    const { peer, isNew } = this.upsert(userId, source.address, port);

    // Only newcomers get a direct reply.
    if (isNew) {
      await this.options.outbound.unicast(
        this.options.factory.discovery(this.options.localPort()),
        { address: peer.ip, port: peer.port }
      );
    }
  }

  async handlePeerListRequest(fields: MessageFields, source: SocketAddress): Promise<void> {
    const requester = senderOf(fields);
    if (!requester || requester === this.userId) return;

    const entries: PeerListEntry[] = this.snapshot()
      .filter(p => p.userId !== requester)
      .map(p => ({ userId: p.userId, ip: p.ip, port: p.port }));
    const port = intField(fields, 'PORT') ?? source.port;

    await this.options.outbound.unicast(
      this.options.factory.peerListResponse(entries),
      { address: source.address, port }
    );
  }

  handlePeerListResponse(fields: MessageFields): number {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fields.PEERS ?? '[]');
    } catch (e) {
      console.warn(`[PeerRegistry] Unreadable peer list from ${senderOf(fields)}:`, describeError(e));
      return 0;
    }
    if (!Array.isArray(parsed)) return 0;

    let added = 0;
    for (const entry of parsed) {
      if (!isPeerListEntry(entry) || entry.userId === this.userId) continue;
      if (this.upsert(entry.userId, entry.ip, entry.port).isNew) added++;
    }
    return added;
  }

  // ════════════════════════════════════════════════════════════════════
  // TABLE
  // ════════════════════════════════════════════════════════════════════

  upsert(userId: string, ip: string, port: number): { peer: Peer; isNew: boolean } {
    const existing = this.peers.get(userId);
    const peer: Peer = {
      userId,
      ip,
      port,
      lastSeen: this.now(),
      profile: this.profiles.get(userId),
    };
    this.peers.set(userId, peer);

    if (!existing) {
      console.log(`[PeerRegistry] Joined: ${userId} at ${ip}:${port}`);
      this.emit({ kind: 'joined', peer });
    }
    return { peer, isNew: !existing };
  }

  /**
   * Record a profile; it sticks to the peer entry across heartbeats and is
   * kept for peers not yet discovered.
   */
  updateProfile(userId: string, profile: Profile): void {
    this.profiles.delete(userId);
    this.profiles.set(userId, profile);
    const peer = this.peers.get(userId);
    if (peer) {
      peer.profile = profile;
      this.emit({ kind: 'updated', peer });
    } else {
      this.trimDetachedProfiles();
    }
  }

  private trimDetachedProfiles(): void {
    const detached = Array.from(this.profiles.keys())
      .filter(userId => userId !== this.userId && !this.peers.has(userId));
    // Oldest first, in insertion order.
    for (const userId of detached.slice(0, Math.max(0, detached.length - MAX_DETACHED_PROFILES))) {
      this.profiles.delete(userId);
    }
  }

  getProfile(userId: string): Profile | undefined {
    return this.profiles.get(userId);
  }

  lookup(userId: string): Peer | undefined {
    return this.peers.get(userId);
  }

  snapshot(): Peer[] {
    return Array.from(this.peers.values())
      .map(p => ({ ...p }))
      .sort((a, b) => a.userId.localeCompare(b.userId));
  }

  /**
   * Evict peers silent for longer than the timeout.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [userId, peer] of this.peers) {
      if (now - peer.lastSeen > this.options.peerTimeoutMs) {
        this.peers.delete(userId);
        this.profiles.delete(userId);
        removed++;
        console.log(`[PeerRegistry] Left: ${userId} (silent ${now - peer.lastSeen}ms)`);
        this.emit({ kind: 'left', peer });
      }
    }
    return removed;
  }

  // ════════════════════════════════════════════════════════════════════
  // NOTIFICATIONS
  // ════════════════════════════════════════════════════════════════════

  onChange(listener: ChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private emit(change: PeerChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (e) {
        console.error('[PeerRegistry] Listener error:', describeError(e));
      }
    }
  }
}
