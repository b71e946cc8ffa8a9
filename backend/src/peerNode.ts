/**
 * Peer Node
 * Wires transports, registry and router into one running peer
 */

import { Datagram, NodeEvents, SocketAddress } from './types';
import { PeerConfig, userIdFor } from './config';
import { decodeMessage, encodeMessage } from './codec';
import { MessageFactory, senderOf } from './messages';
import { describeError, PeerError } from './errors';
import { acceptAllTokens, ScopedTokenVerifier, TokenVerifier } from './tokens';
import { Transport, UdpSocket, UdpTransport } from './transport';
import { Outbound, PeerRegistry } from './peerRegistry';
import { Router } from './router';
import { EventHub } from './eventHub';
import { DedupCache } from './dedupCache';

export interface NodeTransports {
  discovery: Transport;         // bound to the shared discovery port
  unicast: Transport;           // this peer's own port; also sends broadcasts
}

export interface PeerNodeOptions {
  config: PeerConfig;
  /** Pre-bound transports; UDP sockets are opened on start() otherwise */
  transports?: NodeTransports;
  /** Socket source for the UDP transports opened on start() */
  createSocket?: () => UdpSocket;
  tokens?: TokenVerifier;
  now?: () => number;
}

export interface NodeStatus {
  userId: string;
  unicast: SocketAddress;
  discoveryPort: number;
  peers: number;
  running: boolean;
}

export class PeerNode {
  readonly userId: string;
  readonly config: PeerConfig;
  readonly events = new EventHub<NodeEvents>();
  readonly registry: PeerRegistry;
  readonly router: Router;

  private readonly transports: NodeTransports;
  private readonly udp: UdpTransport[] = [];
  private readonly dedup: DedupCache;
  private loops: Promise<void>[] = [];
  private housekeepingTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: PeerNodeOptions) {
    this.config = options.config;
    this.userId = userIdFor(options.config);
    this.transports = options.transports ?? this.createUdpTransports(options.createSocket);
    this.dedup = new DedupCache(this.config.dedupCacheSize);

    const tokens = options.tokens
      ?? (this.config.tokenVerification ? new ScopedTokenVerifier(1000, options.now) : acceptAllTokens);
    const factory = new MessageFactory(this.userId, this.config.tokenTtlSeconds, options.now);

    const outbound: Outbound = {
      broadcast: fields => this.transports.unicast.sendBroadcast(encodeMessage(fields)),
      unicast: (fields, target) => this.transports.unicast.sendUnicast(encodeMessage(fields), target),
    };

    this.registry = new PeerRegistry({
      factory,
      outbound,
      localPort: () => this.transports.unicast.address().port,
      discoveryIntervalMs: this.config.discoveryIntervalMs,
      peerTimeoutMs: this.config.peerTimeoutMs,
      sweepIntervalMs: this.config.sweepIntervalMs,
      now: options.now,
    });

    this.router = new Router({
      factory,
      registry: this.registry,
      outbound,
      events: this.events,
      tokens,
      postTtlSeconds: this.config.postTtlSeconds,
      verbose: this.config.verbose,
      now: options.now,
    });

    this.registry.onChange(change => {
      if (change.kind === 'joined') this.events.emit('peer-joined', change.peer);
      if (change.kind === 'left') this.events.emit('peer-left', change.peer);
    });
  }

  private createUdpTransports(createSocket?: () => UdpSocket): NodeTransports {
    const discovery = new UdpTransport({
      port: this.config.discoveryPort,
      broadcastAddress: this.config.broadcastAddress,
      broadcastPort: this.config.discoveryPort,
      verbose: this.config.verbose,
      createSocket,
    });
    const unicast = new UdpTransport({
      port: this.config.unicastPort,
      broadcastAddress: this.config.broadcastAddress,
      broadcastPort: this.config.discoveryPort,
      verbose: this.config.verbose,
      createSocket,
    });
    this.udp.push(discovery, unicast);
    return { discovery, unicast };
  }

  // ════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ════════════════════════════════════════════════════════════════════

  async start(): Promise<void> {
    if (this.running) return;

    const opened: UdpTransport[] = [];
    try {
      for (const transport of this.udp) {
        await transport.open();
        opened.push(transport);
      }
    } catch (e) {
      console.error(`[PeerNode] ${this.userId} failed to bind:`, describeError(e));
      await Promise.all(opened.map(transport => transport.close()));
      throw e;
    }
    this.running = true;

    this.loops = [
      this.receiveLoop(this.transports.discovery, 'discovery'),
      this.receiveLoop(this.transports.unicast, 'unicast'),
    ];
    this.housekeepingTimer = setInterval(() => this.router.housekeeping(), this.config.sweepIntervalMs);
    this.registry.start();

    console.log(`[PeerNode] ${this.userId} up on port ${this.transports.unicast.address().port}`);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.registry.stop();
    if (this.housekeepingTimer) clearInterval(this.housekeepingTimer);
    this.housekeepingTimer = null;

    // Closing resolves any pending receive() with null, which ends the loops.
    await Promise.all([this.transports.discovery.close(), this.transports.unicast.close()]);
    await Promise.all(this.loops);
    this.loops = [];

    console.log(`[PeerNode] ${this.userId} stopped`);
  }

  status(): NodeStatus {
    return {
      userId: this.userId,
      unicast: this.transports.unicast.address(),
      discoveryPort: this.config.discoveryPort,
      peers: this.registry.snapshot().length,
      running: this.running,
    };
  }

  // ════════════════════════════════════════════════════════════════════
  // RECEIVE
  // ════════════════════════════════════════════════════════════════════

  private async receiveLoop(transport: Transport, label: string): Promise<void> {
    while (this.running && !transport.closed) {
      const datagram = await transport.receive(this.config.receiveTimeoutMs);
      if (datagram) {
        await this.handleDatagram(datagram, label);
      }
    }
  }

  /**
   * Decode and dispatch one datagram. Nothing thrown here may stop the
   * receive loop.
   */
  async handleDatagram(datagram: Datagram, label = 'unicast'): Promise<void> {
    const origin = `${datagram.source.address}:${datagram.source.port}`;
    try {
      const fields = decodeMessage(datagram.data);

      const sender = senderOf(fields);
      const messageId = fields.MESSAGE_ID;
      if (sender && messageId && !this.dedup.remember(sender, messageId)) {
        if (this.config.verbose) {
          console.log(`[PeerNode] Duplicate ${fields.TYPE} ${messageId} from ${sender}`);
        }
        return;
      }

      await this.router.dispatch(fields, datagram.source);
    } catch (e) {
      if (e instanceof PeerError) {
        console.warn(`[PeerNode] Dropped ${label} datagram from ${origin}: ${e.name}: ${e.message}`);
      } else {
        console.error(`[PeerNode] Error handling ${label} datagram from ${origin}:`, describeError(e));
      }
    }
  }
}
