import { describe, it, expect } from 'vitest';
import { applyMove, checkMove, emptyBoard, evaluateBoard, renderBoard, WINNING_LINES } from './ticTacToe';
import { Cell, GameSession } from './types';
import { InvalidMove } from './errors';

function session(): GameSession {
  return {
    id: 'g0',
    players: { X: 'alice@10.0.0.1', O: 'bob@10.0.0.2' },
    localSymbol: 'X',
    board: emptyBoard(),
    turn: 'X',
    moveCount: 0,
    state: 'IN_PROGRESS',
    createdAt: 0,
  };
}

function boardFrom(text: string): Cell[] {
  return text.split('').map((c): Cell => (c === 'X' || c === 'O' ? c : null));
}

describe('ticTacToe', () => {
  it('should detect every winning line', () => {
    for (const line of WINNING_LINES) {
      const board = emptyBoard();
      for (const index of line) board[index] = 'O';
      expect(evaluateBoard(board)).toEqual({ result: 'WIN', symbol: 'O', line });
    }
    expect(WINNING_LINES).toHaveLength(8);
  });

  it('should call a full board without a line a draw', () => {
    expect(evaluateBoard(boardFrom('XOXXOOOXX'))).toEqual({ result: 'DRAW' });
  });

  it('should report an unfinished game as ongoing', () => {
    expect(evaluateBoard(boardFrom('XO.......'))).toBeNull();
  });

  it('should apply a move and pass the turn', () => {
    const game = session();
    expect(applyMove(game, 'X', 5)).toBeNull();
    expect(game.board[4]).toBe('X');
    expect(game.turn).toBe('O');
    expect(game.moveCount).toBe(1);
  });

  it('should reject an occupied cell and leave the board unchanged', () => {
    const game = session();
    applyMove(game, 'X', 5);
    const before = [...game.board];

    expect(() => applyMove(game, 'O', 5)).toThrow(InvalidMove);
    expect(game.board).toEqual(before);
    expect(game.turn).toBe('O');
    expect(game.moveCount).toBe(1);
  });

  it('should reject out-of-turn and out-of-range moves', () => {
    const game = session();
    expect(() => applyMove(game, 'O', 1)).toThrow("Not O's turn in g0");
    expect(() => applyMove(game, 'X', 0)).toThrow('Position 0 out of range 1-9');
    expect(() => applyMove(game, 'X', 10)).toThrow(InvalidMove);
    expect(() => applyMove(game, 'X', 2.5)).toThrow(InvalidMove);
  });

  it('should reject moves in a finished game', () => {
    const game = { ...session(), state: 'COMPLETED' as const };
    expect(() => applyMove(game, 'X', 1)).toThrow('Game g0 is COMPLETED');
  });

  it('should check a move without touching the session', () => {
    const game = session();
    expect(() => checkMove(game, 'X', 3)).not.toThrow();
    expect(() => checkMove(game, 'O', 3)).toThrow("Not O's turn in g0");
    expect(game).toEqual(session());
  });

  it('should render the board with free positions numbered', () => {
    expect(renderBoard(boardFrom('X...O...X'))).toBe('X | 2 | 3\n---------\n4 | O | 6\n---------\n7 | 8 | X');
  });
});
