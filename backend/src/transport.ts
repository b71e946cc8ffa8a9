/**
 * UDP Transport
 * Unicast/broadcast send plus a bounded-wait receive queue
 */

import dgram from 'dgram';
import { Datagram, SocketAddress } from './types';

export interface Transport {
  /** Bound local address, available once `open()` resolves */
  address(): SocketAddress;
  sendUnicast(data: Buffer, target: SocketAddress): Promise<void>;
  sendBroadcast(data: Buffer): Promise<void>;
  /** Next datagram, or null after `timeoutMs` or once closed */
  receive(timeoutMs: number): Promise<Datagram | null>;
  close(): Promise<void>;
  readonly closed: boolean;
}

interface Waiter {
  resolve: (datagram: Datagram | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Shared receive side: inbound datagrams are queued until a caller asks
 * for one; a caller that arrives first waits up to its timeout.
 */
export abstract class QueuedTransport implements Transport {
  private queue: Datagram[] = [];
  private waiters: Waiter[] = [];
  private isClosed = false;

  constructor(private readonly maxQueued = 1024) {}

  get closed(): boolean {
    return this.isClosed;
  }

  abstract address(): SocketAddress;
  abstract sendUnicast(data: Buffer, target: SocketAddress): Promise<void>;
  abstract sendBroadcast(data: Buffer): Promise<void>;
  protected abstract release(): Promise<void>;

  protected enqueue(datagram: Datagram): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(datagram);
      return;
    }

    this.queue.push(datagram);
    if (this.queue.length > this.maxQueued) {
      this.queue.shift();
      console.warn(`[Transport] Receive queue full, dropped oldest datagram`);
    }
  }

  receive(timeoutMs: number): Promise<Datagram | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.isClosed) return Promise.resolve(null);

    return new Promise(resolve => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
    this.waiters = [];
    this.queue = [];

    await this.release();
  }
}

// ════════════════════════════════════════════════════════════════════
// NODE DGRAM
// ════════════════════════════════════════════════════════════════════

/** The slice of dgram.Socket the transport relies on */
export interface UdpSocket {
  bind(port: number, address: string, callback: () => void): unknown;
  close(callback: () => void): unknown;
  send(data: Buffer, port: number, address: string, callback: (err: Error | null) => void): void;
  setBroadcast(flag: boolean): void;
  address(): { address: string; port: number };
  on(event: 'message', listener: (data: Buffer, rinfo: dgram.RemoteInfo) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
}

export interface UdpTransportOptions {
  port: number;                 // 0 = ephemeral
  broadcastAddress: string;
  broadcastPort: number;
  bindAddress?: string;
  verbose?: boolean;
  createSocket?: () => UdpSocket;
}

export class UdpTransport extends QueuedTransport {
  private socket: UdpSocket;
  private bound: SocketAddress | null = null;

  constructor(private readonly options: UdpTransportOptions) {
    super();
    this.socket = options.createSocket
      ? options.createSocket()
      : dgram.createSocket({ type: 'udp4', reuseAddr: true });

    this.socket.on('message', (data: Buffer, rinfo: dgram.RemoteInfo) => {
      if (this.options.verbose) {
        console.log(`[UDP] ${data.length} bytes from ${rinfo.address}:${rinfo.port}`);
      }
      this.enqueue({ data, source: { address: rinfo.address, port: rinfo.port } });
    });

    // Transient socket errors (e.g. ECONNRESET on broadcast sockets) must
    // not take the receive loop down.
    this.socket.on('error', (err: Error) => {
      console.error(`[UDP] Socket error on port ${this.bound?.port ?? this.options.port}:`, err.message);
    });
  }

  open(): Promise<SocketAddress> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.socket.once('error', onError);
      this.socket.bind(this.options.port, this.options.bindAddress ?? '0.0.0.0', () => {
        this.socket.off('error', onError);
        this.socket.setBroadcast(true);
        const info = this.socket.address();
        this.bound = { address: info.address, port: info.port };
        console.log(`[UDP] Listening on ${info.address}:${info.port}`);
        resolve(this.bound);
      });
    });
  }

  address(): SocketAddress {
    if (!this.bound) {
      throw new Error('UdpTransport not open');
    }
    return this.bound;
  }

  sendUnicast(data: Buffer, target: SocketAddress): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, target.port, target.address, err => {
        if (err) {
          console.error(`[UDP] Send to ${target.address}:${target.port} failed:`, err.message);
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  sendBroadcast(data: Buffer): Promise<void> {
    return this.sendUnicast(data, {
      address: this.options.broadcastAddress,
      port: this.options.broadcastPort,
    });
  }

  protected release(): Promise<void> {
    return new Promise(resolve => {
      this.socket.close(() => {
        console.log(`[UDP] Closed port ${this.bound?.port ?? this.options.port}`);
        resolve();
      });
    });
  }
}
