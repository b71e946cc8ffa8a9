/**
 * UI Bridge
 * WebSocket push of node events and intake of user intents
 */

import { WebSocket, WebSocketServer } from 'ws';
import { BridgeFrame, NodeEvents, NodeEventType } from './types';
import { PeerNode } from './peerNode';
import { describeError, PeerError } from './errors';
import { asPayload, isPayload } from './payload';
import { isIntentAction, performIntent } from './intents';
import { gameView, groupView } from './views';

/** The slice of a ws connection the bridge relies on */
export interface BridgeSocket {
  readonly readyState: number;
  send(data: string): void;
  on(event: 'message', listener: (data: { toString(): string }) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Client → bridge: `{ action, payload, requestId? }`.
 * Replies go to the requesting client only, as `ack` or `error` frames.
 */
export class UiBridge {
  private clients: Set<BridgeSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly node: PeerNode) {}

  /**
   * Start forwarding node events and accept connections from `wss`.
   */
  initialize(wss?: WebSocketServer): void {
    if (!this.unsubscribe) {
      this.unsubscribe = this.node.events.onAny((type, payload) => this.broadcastEvent(type, payload));
    }

    wss?.on('connection', (ws: WebSocket) => this.handleConnection(ws));
    console.log('[Bridge] Handler initialized');
  }

  shutdown(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clients.clear();
  }

  get clientCount(): number {
    return this.clients.size;
  }

  handleConnection(ws: BridgeSocket): void {
    this.clients.add(ws);
    console.log(`[Bridge] Client connected (${this.clients.size} total)`);

    ws.on('message', data => {
      void this.handleMessage(ws, data.toString());
    });
    ws.on('close', () => this.handleDisconnect(ws));
    ws.on('error', err => {
      console.error('[Bridge] Error:', err.message);
      this.handleDisconnect(ws);
    });

    this.send(ws, { type: 'snapshot', payload: this.snapshot(), timestamp: Date.now() });
  }

  private handleDisconnect(ws: BridgeSocket): void {
    if (this.clients.delete(ws)) {
      console.log(`[Bridge] Client disconnected (${this.clients.size} left)`);
    }
  }

  /**
   * Run one intent; failures become an error frame for this client only.
   */
  async handleMessage(ws: BridgeSocket, raw: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.sendError(ws, 'Invalid message format');
      return;
    }
    if (!isPayload(parsed)) {
      this.sendError(ws, 'Invalid message format');
      return;
    }

    const { action, requestId } = parsed;
    if (!isIntentAction(action)) {
      this.sendError(ws, `Unknown action: ${String(action)}`, requestId);
      return;
    }

    try {
      const result = await performIntent(this.node.router, action, asPayload(parsed.payload));
      this.send(ws, { type: 'ack', payload: { action, requestId, result }, timestamp: Date.now() });
    } catch (e) {
      const code = e instanceof PeerError ? e.code : 'INTERNAL';
      if (!(e instanceof PeerError)) {
        console.error(`[Bridge] ${action} failed:`, describeError(e));
      }
      this.sendError(ws, describeError(e), requestId, code);
    }
  }

  snapshot() {
    const router = this.node.router;
    return {
      userId: this.node.userId,
      peers: this.node.registry.snapshot(),
      groups: router.groups.listForUser(this.node.userId).map(groupView),
      games: router.games.list().map(gameView),
    };
  }

  broadcastEvent<K extends NodeEventType>(type: K, payload: NodeEvents[K]): void {
    const frame: BridgeFrame = { type, payload, timestamp: Date.now() };
    for (const ws of this.clients) {
      this.send(ws, frame);
    }
  }

  private send(ws: BridgeSocket, frame: BridgeFrame): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(frame));
    }
  }

  private sendError(ws: BridgeSocket, error: string, requestId?: unknown, code?: string): void {
    this.send(ws, { type: 'error', payload: { error, code, requestId }, timestamp: Date.now() });
  }
}
