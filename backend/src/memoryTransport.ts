/**
 * In-process network with the Transport contract, so several peers can
 * run inside one process without sockets.
 */

import { SocketAddress } from './types';
import { QueuedTransport } from './transport';

function keyOf(addr: SocketAddress): string {
  return `${addr.address}:${addr.port}`;
}

export interface SentDatagram {
  from: SocketAddress;
  to: SocketAddress | 'broadcast';
  data: Buffer;
}

export class MemoryNetwork {
  private endpoints: Map<string, MemoryTransport> = new Map();
  private nextEphemeralPort = 40000;
  readonly sent: SentDatagram[] = [];

  constructor(readonly discoveryPort = 50999) {}

  /** Bind an endpoint; port 0 picks the next free ephemeral port. */
  bind(address: string, port = 0): MemoryTransport {
    const bound: SocketAddress = { address, port: port || this.nextEphemeralPort++ };
    const key = keyOf(bound);
    if (this.endpoints.has(key)) {
      throw new Error(`Address in use: ${key}`);
    }
    const transport = new MemoryTransport(this, bound);
    this.endpoints.set(key, transport);
    return transport;
  }

  unbind(transport: MemoryTransport): void {
    this.endpoints.delete(keyOf(transport.address()));
  }

  deliver(from: SocketAddress, to: SocketAddress, data: Buffer): void {
    this.sent.push({ from, to, data });
    // Unknown destinations drop silently, like UDP.
    this.endpoints.get(keyOf(to))?.accept(data, from);
  }

  broadcast(from: SocketAddress, data: Buffer): void {
    this.sent.push({ from, to: 'broadcast', data });
    for (const endpoint of this.endpoints.values()) {
      if (endpoint.address().port === this.discoveryPort) {
        endpoint.accept(data, from);
      }
    }
  }

  /** Datagrams sent from `address`, optionally only unicast ones. */
  sentFrom(address: string, unicastOnly = false): SentDatagram[] {
    return this.sent.filter(d => d.from.address === address && (!unicastOnly || d.to !== 'broadcast'));
  }
}

export class MemoryTransport extends QueuedTransport {
  constructor(
    private readonly network: MemoryNetwork,
    private readonly bound: SocketAddress
  ) {
    super();
  }

  address(): SocketAddress {
    return this.bound;
  }

  accept(data: Buffer, source: SocketAddress): void {
    // Copy so receivers never share a buffer with the sender.
    this.enqueue({ data: Buffer.from(data), source: { ...source } });
  }

  async sendUnicast(data: Buffer, target: SocketAddress): Promise<void> {
    if (this.closed) throw new Error('Transport closed');
    this.network.deliver(this.bound, target, data);
  }

  async sendBroadcast(data: Buffer): Promise<void> {
    if (this.closed) throw new Error('Transport closed');
    this.network.broadcast(this.bound, data);
  }

  protected async release(): Promise<void> {
    this.network.unbind(this);
  }
}
