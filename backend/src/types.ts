/**
 * Peerline Core Types
 * Shared across the codec, registry, router and control surface
 */

// ════════════════════════════════════════════════════════════════════
// WIRE MESSAGE
// ════════════════════════════════════════════════════════════════════

export type MessageType =
  | 'POST'
  | 'DM'
  | 'PROFILE'
  | 'PEER_DISCOVERY'
  | 'PEER_LIST_REQUEST'
  | 'PEER_LIST_RESPONSE'
  | 'FOLLOW'
  | 'UNFOLLOW'
  | 'GROUP_CREATE'
  | 'GROUP_UPDATE'
  | 'GROUP_MESSAGE'
  | 'LIKE'
  | 'UNLIKE'
  | 'TICTACTOE_INVITE'
  | 'TICTACTOE_MOVE'
  | 'TICTACTOE_RESULT'
  | 'REVOKE';

/**
 * Open KEY→VALUE mapping. Receivers read the keys they understand and
 * carry the rest untouched.
 */
export type MessageFields = Record<string, string>;

export interface SocketAddress {
  address: string;
  port: number;
}

export interface Datagram {
  data: Buffer;
  source: SocketAddress;
}

// ════════════════════════════════════════════════════════════════════
// PEER / PROFILE
// ════════════════════════════════════════════════════════════════════

export interface Profile {
  displayName: string;
  status: string;
  hasAvatar: boolean;
  avatarType?: string;
}

export interface Peer {
  userId: string;               // username@ip
  ip: string;
  port: number;                 // announced unicast port
  lastSeen: number;             // ms epoch
  profile?: Profile;
}

export type PeerChange =
  | { kind: 'joined'; peer: Peer }
  | { kind: 'left'; peer: Peer }
  | { kind: 'updated'; peer: Peer };

// ════════════════════════════════════════════════════════════════════
// SOCIAL
// ════════════════════════════════════════════════════════════════════

export interface Post {
  id: string;                   // MESSAGE_ID of the POST
  author: string;
  content: string;
  timestamp: number;            // unix seconds
  ttl: number;                  // seconds
  receivedAt: number;           // ms epoch
}

export type DmDirection = 'in' | 'out';

export interface DmEntry {
  messageId: string;
  direction: DmDirection;
  timestamp: number;
  content: string;
}

export interface GroupMessage {
  messageId: string;
  from: string;
  content: string;
  timestamp: number;
}

export interface Group {
  id: string;
  name: string;
  creatorId: string;
  createdAt: number;
  memberIds: Set<string>;
  log: GroupMessage[];
}

// ════════════════════════════════════════════════════════════════════
// GAME
// ════════════════════════════════════════════════════════════════════

export type GameSymbol = 'X' | 'O';
export type Cell = GameSymbol | null;
export type GameState = 'INVITED' | 'IN_PROGRESS' | 'COMPLETED';

export type GameOutcome =
  | { result: 'WIN'; symbol: GameSymbol; line: readonly [number, number, number] }
  | { result: 'DRAW' };

export interface GameSession {
  id: string;                   // g0..g255
  players: Record<GameSymbol, string>;
  localSymbol: GameSymbol;
  board: Cell[];
  turn: GameSymbol;
  moveCount: number;
  state: GameState;
  outcome?: GameOutcome;
  createdAt: number;
}

// ════════════════════════════════════════════════════════════════════
// NODE EVENTS (consumed by the UI bridge)
// ════════════════════════════════════════════════════════════════════

export interface NodeEvents {
  'peer-joined': Peer;
  'peer-left': Peer;
  'message-received': { type: MessageType; from: string; fields: MessageFields };
  'game-updated': GameSession;
}

export type NodeEventType = keyof NodeEvents;

export interface BridgeFrame {
  type: NodeEventType | 'snapshot' | 'ack' | 'error';
  payload: unknown;
  timestamp: number;
}
