import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { UdpSocket, UdpTransport } from './transport';

interface SentPacket {
  data: Buffer;
  port: number;
  address: string;
}

class FakeSocket extends EventEmitter implements UdpSocket {
  sent: SentPacket[] = [];
  broadcast = false;
  failSends = false;
  closed = false;
  private port = 0;

  bind(port: number, _address: string, callback: () => void): this {
    this.port = port || 41234;
    callback();
    return this;
  }

  close(callback: () => void): this {
    this.closed = true;
    callback();
    return this;
  }

  send(data: Buffer, port: number, address: string, callback: (err: Error | null) => void): void {
    if (this.failSends) {
      callback(new Error('EHOSTUNREACH'));
      return;
    }
    this.sent.push({ data, port, address });
    callback(null);
  }

  setBroadcast(flag: boolean): void {
    this.broadcast = flag;
  }

  address(): { address: string; port: number } {
    return { address: '0.0.0.0', port: this.port };
  }

  deliver(text: string, address = '10.0.0.2', port = 40001): void {
    const data = Buffer.from(text);
    this.emit('message', data, { address, family: 'IPv4', port, size: data.length });
  }
}

describe('UdpTransport', () => {
  let socket: FakeSocket;
  let transport: UdpTransport;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    socket = new FakeSocket();
    transport = new UdpTransport({
      port: 0,
      broadcastAddress: '10.0.0.255',
      broadcastPort: 50999,
      createSocket: () => socket,
    });
    await transport.open();
  });

  it('should bind and enable broadcast', () => {
    expect(transport.address()).toEqual({ address: '0.0.0.0', port: 41234 });
    expect(socket.broadcast).toBe(true);
  });

  it('should hand out queued datagrams with their source', async () => {
    socket.deliver('TYPE:DM\n\n');
    const datagram = await transport.receive(50);
    expect(datagram?.data.toString()).toBe('TYPE:DM\n\n');
    expect(datagram?.source).toEqual({ address: '10.0.0.2', port: 40001 });
  });

  it('should resolve a waiting receive when a datagram arrives', async () => {
    const pending = transport.receive(1000);
    socket.deliver('late');
    expect((await pending)?.data.toString()).toBe('late');
  });

  it('should return null when nothing arrives in time', async () => {
    expect(await transport.receive(10)).toBeNull();
  });

  it('should keep receiving after a socket error', async () => {
    socket.emit('error', new Error('ECONNRESET'));
    socket.deliver('after-error');
    expect((await transport.receive(50))?.data.toString()).toBe('after-error');
    expect(transport.closed).toBe(false);
  });

  it('should resolve pending receives with null on close', async () => {
    const pending = transport.receive(10_000);
    await transport.close();
    expect(await pending).toBeNull();
    expect(socket.closed).toBe(true);
    expect(await transport.receive(10_000)).toBeNull();
  });

  it('should send broadcasts to the broadcast address and discovery port', async () => {
    await transport.sendBroadcast(Buffer.from('hello'));
    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0]).toMatchObject({ address: '10.0.0.255', port: 50999 });
  });

  it('should reject failed sends', async () => {
    socket.failSends = true;
    await expect(transport.sendUnicast(Buffer.from('x'), { address: '10.0.0.2', port: 40001 }))
      .rejects.toThrow('EHOSTUNREACH');
  });
});
