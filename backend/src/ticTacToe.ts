/**
 * Tic-tac-toe rules: board evaluation and move validation.
 * Positions on the wire are 1–9, row by row; boards are indexed 0–8.
 */

import { Cell, GameOutcome, GameSession, GameSymbol } from './types';
import { InvalidMove } from './errors';

export const WINNING_LINES: readonly (readonly [number, number, number])[] = [
  [0, 1, 2], [3, 4, 5], [6, 7, 8],   // rows
  [0, 3, 6], [1, 4, 7], [2, 5, 8],   // columns
  [0, 4, 8], [2, 4, 6],              // diagonals
];

export function emptyBoard(): Cell[] {
  return Array.from({ length: 9 }, (): Cell => null);
}

export function otherSymbol(symbol: GameSymbol): GameSymbol {
  return symbol === 'X' ? 'O' : 'X';
}

export function isGameSymbol(value: string | undefined): value is GameSymbol {
  return value === 'X' || value === 'O';
}

/**
 * WIN when a line holds three equal symbols, DRAW when the board is full,
 * otherwise null (game continues).
 */
export function evaluateBoard(board: readonly Cell[]): GameOutcome | null {
  for (const line of WINNING_LINES) {
    const [a, b, c] = line;
    const symbol = board[a];
    if (symbol !== null && symbol === board[b] && symbol === board[c]) {
      return { result: 'WIN', symbol, line };
    }
  }
  return board.every(cell => cell !== null) ? { result: 'DRAW' } : null;
}

/**
 * Throw InvalidMove unless `symbol` may take `position` now.
 */
export function checkMove(session: GameSession, symbol: GameSymbol, position: number): void {
  if (session.state !== 'IN_PROGRESS') {
    throw new InvalidMove(`Game ${session.id} is ${session.state}`);
  }
  if (symbol !== session.turn) {
    throw new InvalidMove(`Not ${symbol}'s turn in ${session.id}`);
  }
  if (!Number.isInteger(position) || position < 1 || position > 9) {
    throw new InvalidMove(`Position ${position} out of range 1-9`);
  }
  if (session.board[position - 1] !== null) {
    throw new InvalidMove(`Position ${position} is already taken`);
  }
}

/**
 * Validate and apply one move. The session is untouched when this throws.
 */
export function applyMove(session: GameSession, symbol: GameSymbol, position: number): GameOutcome | null {
  checkMove(session, symbol, position);

  session.board[position - 1] = symbol;
  session.moveCount++;
  session.turn = otherSymbol(symbol);
  return evaluateBoard(session.board);
}

export function renderBoard(board: readonly Cell[]): string {
  const rows: string[] = [];
  for (let r = 0; r < 3; r++) {
    rows.push(board.slice(r * 3, r * 3 + 3).map((cell, c) => cell ?? String(r * 3 + c + 1)).join(' | '));
  }
  return rows.join('\n---------\n');
}
