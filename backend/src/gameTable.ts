/**
 * Game Table
 * Active tic-tac-toe sessions. Ids (g0..g255) come from each inviter's own
 * wrapping counter, so a session is keyed by opponent and id together.
 */

import { GameOutcome, GameSession, GameSymbol } from './types';
import { BadRequest, GameNotFound, InvalidMove } from './errors';
import { applyMove, emptyBoard, otherSymbol } from './ticTacToe';

export const GAME_ID_SPACE = 256;

export class GameIdAllocator {
  private counter = 0;

  next(): string {
    const id = `g${this.counter}`;
    this.counter = (this.counter + 1) % GAME_ID_SPACE;
    return id;
  }
}

export interface OpenGameParams {
  id: string;
  localUserId: string;
  localSymbol: GameSymbol;
  opponentId: string;
}

export interface MoveResult {
  session: GameSession;
  outcome: GameOutcome | null;
}

function sessionKey(opponentId: string, gameId: string): string {
  return `${opponentId}/${gameId}`;
}

export function opponentOf(session: GameSession): string {
  return session.players[otherSymbol(session.localSymbol)];
}

export class GameTable {
  private sessions: Map<string, GameSession> = new Map();
  private allocator = new GameIdAllocator();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Next id from the wrapping counter that no active session holds,
   * whoever the opponent.
   */
  allocateId(): string {
    for (let attempt = 0; attempt < GAME_ID_SPACE; attempt++) {
      const id = this.allocator.next();
      if (!this.list().some(s => s.id === id)) return id;
    }
    throw new InvalidMove(`All ${GAME_ID_SPACE} game ids are in use`);
  }

  /** New session in INVITED state; X always moves first. */
  open(params: OpenGameParams): GameSession {
    if (params.localUserId === params.opponentId) {
      throw new InvalidMove('A game needs two distinct players');
    }
    const key = sessionKey(params.opponentId, params.id);
    if (this.sessions.has(key)) {
      throw new InvalidMove(`Game ${params.id} with ${params.opponentId} is already active`);
    }

    const opponentSymbol = otherSymbol(params.localSymbol);
    const players: Record<GameSymbol, string> = params.localSymbol === 'X'
      ? { X: params.localUserId, O: params.opponentId }
      : { X: params.opponentId, O: params.localUserId };
    const session: GameSession = {
      id: params.id,
      players,
      localSymbol: params.localSymbol,
      board: emptyBoard(),
      turn: 'X',
      moveCount: 0,
      state: 'INVITED',
      createdAt: this.now(),
    };
    this.sessions.set(key, session);

    console.log(`[GameTable] ${session.id}: ${params.localUserId} (${params.localSymbol}) vs ${params.opponentId} (${opponentSymbol})`);
    return session;
  }

  /** Invitations are accepted as soon as they exist. */
  accept(session: GameSession): GameSession {
    if (session.state === 'INVITED') {
      session.state = 'IN_PROGRESS';
    }
    return session;
  }

  /**
   * Without an opponent the id must name a single active session.
   */
  get(gameId: string, opponentId?: string): GameSession | undefined {
    if (opponentId !== undefined) {
      return this.sessions.get(sessionKey(opponentId, gameId));
    }
    const matches = this.list().filter(s => s.id === gameId);
    if (matches.length > 1) {
      throw new BadRequest(`Game ${gameId} is active with ${matches.length} opponents; name the opponent`);
    }
    return matches[0];
  }

  require(gameId: string, opponentId?: string): GameSession {
    const session = this.get(gameId, opponentId);
    if (!session) throw new GameNotFound(opponentId ? `${gameId} with ${opponentId}` : gameId);
    return session;
  }

  list(): GameSession[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Apply a move; a terminal outcome completes the session and drops it
   * from the table.
   */
  move(session: GameSession, symbol: GameSymbol, position: number): MoveResult {
    const outcome = applyMove(session, symbol, position);
    if (outcome) {
      this.complete(session, outcome);
    }
    return { session, outcome };
  }

  /** Drop a session that never got going (failed invite). */
  discard(session: GameSession): void {
    this.sessions.delete(sessionKey(opponentOf(session), session.id));
  }

  complete(session: GameSession, outcome: GameOutcome): void {
    session.state = 'COMPLETED';
    session.outcome = outcome;
    this.sessions.delete(sessionKey(opponentOf(session), session.id));
    console.log(
      `[GameTable] ${session.id} completed: ${outcome.result === 'WIN' ? `${outcome.symbol} wins` : 'draw'}`
    );
  }
}
