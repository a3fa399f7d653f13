/**
 * Game State Tests
 *
 * Status classification, draw rules, position history and captured pieces
 */

import { describe, it, expect } from 'vitest';
import { Position } from '../src/chess/ChessBoard.js';
import { findLegalMove, hasLegalMove, isInCheck, legalMoves } from '../src/chess/ChessMoveGen.js';
import {
  CapturedSet,
  PositionHistory,
  captureBalance,
  drawReason,
  historyOf,
  isInsufficientMaterial,
  isTerminal,
  materialPoints,
  status,
} from '../src/chess/ChessGameState.js';
import { parseCoordinateMove, parseFen } from '../src/chess/ChessNotation.js';

/** Play coordinate moves, recording every reached position */
function play(position: Position, history: PositionHistory, ...moves: string[]): void {
  for (const text of moves) {
    position.makeMove(findLegalMove(position, parseCoordinateMove(text)));
    history.push(position.hash);
  }
}

// =============================================================================
// Status
// =============================================================================

describe('status', () => {
  it('should report an ongoing game at the start', () => {
    expect(status(Position.initial())).toEqual({ kind: 'ongoing' });
  });

  it('should report check with the side in check', () => {
    expect(status(parseFen('4k3/8/8/8/8/8/8/4R1K1 b - - 0 1'))).toEqual({ kind: 'check', side: 'b' });
  });

  it('should report checkmate with the winner', () => {
    const position = Position.initial();
    const history = historyOf(position);
    play(position, history, 'f2f3', 'e7e5', 'g2g4', 'd8h4');
    expect(status(position, history)).toEqual({ kind: 'checkmate', winner: 'b' });
  });

  it('should report stalemate', () => {
    expect(status(parseFen('7k/5Q2/6K1/8/8/8/8/8 b - - 0 1'))).toEqual({ kind: 'stalemate' });
  });

  it('should prefer checkmate over the fifty-move rule', () => {
    expect(status(parseFen('R5k1/5ppp/8/8/8/8/8/6K1 b - - 120 80'))).toEqual({ kind: 'checkmate', winner: 'w' });
  });

  it('should prefer the fifty-move rule over insufficient material', () => {
    expect(status(parseFen('8/8/8/8/8/8/8/K6k w - - 100 90'))).toEqual({ kind: 'draw', reason: 'fifty_move' });
  });

  it('should report check when nothing else applies', () => {
    const position = parseFen('4k3/8/8/8/8/8/8/4R1K1 b - - 0 1');
    expect(isTerminal(status(position))).toBe(false);
  });
});

describe('isTerminal', () => {
  it('should treat only ongoing and check as unfinished', () => {
    expect(isTerminal({ kind: 'ongoing' })).toBe(false);
    expect(isTerminal({ kind: 'check', side: 'w' })).toBe(false);
    expect(isTerminal({ kind: 'stalemate' })).toBe(true);
    expect(isTerminal({ kind: 'checkmate', winner: 'w' })).toBe(true);
    expect(isTerminal({ kind: 'draw', reason: 'repetition' })).toBe(true);
  });
});

// =============================================================================
// Draw Rules
// =============================================================================

describe('Fifty-move rule', () => {
  it('should draw once the clock reaches 100 half-moves', () => {
    const position = parseFen('4k3/8/8/8/8/8/8/R3K3 w - - 99 60');
    const history = historyOf(position);
    expect(status(position, history)).toEqual({ kind: 'ongoing' });

    play(position, history, 'a1a2');
    expect(position.halfMoveClock).toBe(100);
    expect(status(position, history)).toEqual({ kind: 'draw', reason: 'fifty_move' });
  });

  it('should draw on the hundredth quiet half-move of a real game and not before', () => {
    const position = parseFen('4k2r/8/8/8/8/8/8/R3K3 w - - 0 1');
    const history = historyOf(position);

    for (let ply = 1; ply <= 100; ply++) {
      // First quiet move that gives no check, reaches a new position and leaves a reply
      const next = legalMoves(position).find(move => {
        if (move.captured || move.piece === 'p') return false;
        const undo = position.makeMove(move);
        const fresh = !isInCheck(position) && history.count(position.hash) === 0 && hasLegalMove(position);
        position.unmakeMove(undo);
        return fresh;
      });
      expect(next).toBeDefined();
      if (!next) return;

      position.makeMove(next);
      history.push(position.hash);

      expect(position.halfMoveClock).toBe(ply);
      expect(status(position, history)).toEqual(
        ply < 100 ? { kind: 'ongoing' } : { kind: 'draw', reason: 'fifty_move' }
      );
    }
  });
});

describe('Threefold repetition', () => {
  const fen = '4k3/8/8/8/8/8/8/R3K3 w - - 0 1';
  const shuffle = ['a1a2', 'e8d8', 'a2a1', 'd8e8'];

  it('should not draw on the second occurrence', () => {
    const position = parseFen(fen);
    const history = historyOf(position);
    play(position, history, ...shuffle);

    expect(history.count(position.hash)).toBe(2);
    expect(status(position, history)).toEqual({ kind: 'ongoing' });
  });

  it('should draw on the third occurrence', () => {
    const position = parseFen(fen);
    const history = historyOf(position);
    play(position, history, ...shuffle, ...shuffle);

    expect(history.count(position.hash)).toBe(3);
    expect(status(position, history)).toEqual({ kind: 'draw', reason: 'repetition' });
  });

  it('should ignore repetitions the history does not hold', () => {
    const position = parseFen(fen);
    const history = historyOf(position);
    play(position, history, ...shuffle, ...shuffle);

    expect(status(position)).toEqual({ kind: 'ongoing' });
  });
});

describe('isInsufficientMaterial', () => {
  it.each([
    ['8/8/8/8/8/8/8/K6k w - - 0 1', true],
    ['8/8/8/8/8/8/8/KN5k w - - 0 1', true],
    ['8/8/8/8/8/8/8/Kb5k w - - 0 1', true],
    ['8/8/8/8/8/8/2b5/KB5k w - - 0 1', true],
    ['8/8/8/8/8/8/8/KB4bk w - - 0 1', false],
    ['8/8/8/8/8/8/8/KNN4k w - - 0 1', false],
    ['8/8/8/8/8/8/8/KR5k b - - 0 1', false],
    ['8/8/8/8/8/8/P7/K6k w - - 0 1', false],
  ])('%s should be %s', (fen, expected) => {
    expect(isInsufficientMaterial(parseFen(fen))).toBe(expected);
  });

  it('should end the game as a draw', () => {
    expect(status(parseFen('8/8/8/8/8/8/8/KN5k w - - 0 1'))).toEqual({
      kind: 'draw',
      reason: 'insufficient_material',
    });
  });
});

describe('drawReason', () => {
  it('should be null in a normal position', () => {
    const position = Position.initial();
    expect(drawReason(position, historyOf(position))).toBeNull();
  });
});

// =============================================================================
// Position History
// =============================================================================

describe('PositionHistory', () => {
  it('should count and forget hashes', () => {
    const history = new PositionHistory([1n, 2n, 1n]);
    expect(history.length).toBe(3);
    expect(history.count(1n)).toBe(2);

    expect(history.pop()).toBe(1n);
    expect(history.count(1n)).toBe(1);
    expect(history.hashes()).toEqual([1n, 2n]);
  });

  it('should return undefined when popping an empty history', () => {
    expect(new PositionHistory().pop()).toBeUndefined();
  });

  it('should clone independently', () => {
    const history = new PositionHistory([5n]);
    const copy = history.clone();
    copy.push(5n);

    expect(history.count(5n)).toBe(1);
    expect(copy.count(5n)).toBe(2);
  });
});

// =============================================================================
// Captured Pieces
// =============================================================================

describe('CapturedSet', () => {
  it('should record and retract captures', () => {
    const position = Position.initial();
    const captured = new CapturedSet();

    const moves = ['e2e4', 'd7d5', 'e4d5', 'd8d5'].map(text => {
      const move = findLegalMove(position, parseCoordinateMove(text));
      position.makeMove(move);
      captured.record(move);
      return move;
    });

    expect(captured.get('b')).toEqual([{ type: 'p', color: 'b' }]);
    expect(captured.get('w')).toEqual([{ type: 'p', color: 'w' }]);
    expect(captureBalance(captured)).toBe(0);

    captured.retract(moves[3]);
    expect(captured.get('w')).toEqual([]);
    expect(captureBalance(captured)).toBe(1);

    // A quiet move leaves the lists alone
    captured.retract(moves[0]);
    expect(captured.get('b')).toHaveLength(1);
  });

  it('should record en passant captures', () => {
    const position = parseFen('4k3/8/8/3pP3/8/8/8/4K3 w - d6 0 1');
    const captured = new CapturedSet();
    captured.record(findLegalMove(position, { from: 'e5', to: 'd6' }));

    expect(captured.toJSON()).toEqual({ white: [], black: [{ type: 'p', color: 'b' }] });
    expect(captureBalance(captured)).toBe(1);
  });

  it('should empty on clear', () => {
    const captured = new CapturedSet();
    captured.record(findLegalMove(parseFen('4k3/8/8/3p4/8/8/8/3RK3 w - - 0 1'), { from: 'd1', to: 'd5' }));
    captured.clear();
    expect(captured.toJSON()).toEqual({ white: [], black: [] });
  });
});

describe('materialPoints', () => {
  it('should total 39 for a full army', () => {
    expect(materialPoints(Position.initial().pieces('w'))).toBe(39);
  });
});
