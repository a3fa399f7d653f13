/**
 * Board Model Tests
 *
 * - Initial arrangement and queries
 * - Construction invariants
 * - makeMove/unmakeMove for every move kind
 * - Castling rights, en passant target and move counters
 */

import { describe, it, expect } from 'vitest';
import { Position } from '../src/chess/ChessBoard.js';
import { findLegalMove } from '../src/chess/ChessMoveGen.js';
import { parseCoordinateMove, parseFen, toFen } from '../src/chess/ChessNotation.js';
import { InvariantError } from '../src/chess/errors.js';

function play(position: Position, ...moves: string[]): void {
  for (const text of moves) {
    position.makeMove(findLegalMove(position, parseCoordinateMove(text)));
  }
}

// =============================================================================
// Initial Position
// =============================================================================

describe('Position.initial', () => {
  it('should place all 32 pieces', () => {
    const position = Position.initial();
    expect(position.pieces()).toHaveLength(32);
    expect(position.pieces('w')).toHaveLength(16);
    expect(position.pieces('b')).toHaveLength(16);
  });

  it('should list pieces from a1 upwards', () => {
    const [first] = Position.initial().pieces('w');
    expect(first).toEqual({ type: 'r', color: 'w', square: 'a1' });
  });

  it('should set up the standard state', () => {
    const position = Position.initial();
    expect(position.turn).toBe('w');
    expect(position.castling).toEqual({
      whiteKingside: true,
      whiteQueenside: true,
      blackKingside: true,
      blackQueenside: true,
    });
    expect(position.enPassant).toBeNull();
    expect(position.halfMoveClock).toBe(0);
    expect(position.fullMoveNumber).toBe(1);
  });

  it('should track both kings', () => {
    const position = Position.initial();
    expect(position.kingSquare('w')).toBe('e1');
    expect(position.kingSquare('b')).toBe('e8');
    expect(position.pieceAt('d8')).toEqual({ type: 'q', color: 'b' });
    expect(position.pieceAt('e4')).toBeNull();
  });
});

// =============================================================================
// Invariants
// =============================================================================

describe('Position invariants', () => {
  it('should reject a board without a white king', () => {
    const setup = Position.initial().toSetup();
    setup.squares[4] = null;
    expect(() => Position.fromSetup(setup)).toThrow(InvariantError);
  });

  it('should reject a board with two black kings', () => {
    const setup = Position.initial().toSetup();
    setup.squares[59] = { type: 'k', color: 'b' };
    expect(() => Position.fromSetup(setup)).toThrow(InvariantError);
  });

  it('should reject a board where the side not to move is in check', () => {
    const setup = parseFen('k7/8/8/8/8/8/8/R3K3 b - - 0 1').toSetup();
    setup.turn = 'w';
    expect(() => Position.fromSetup(setup)).toThrow(InvariantError);
  });

  it('should reject a board of the wrong size', () => {
    const setup = Position.initial().toSetup();
    setup.squares.pop();
    expect(() => Position.fromSetup(setup)).toThrow(InvariantError);
  });
});

// =============================================================================
// Make / Unmake
// =============================================================================

describe('makeMove / unmakeMove', () => {
  it('should set the en passant target after a double push', () => {
    const position = Position.initial();
    play(position, 'e2e4');

    expect(position.pieceAt('e4')).toEqual({ type: 'p', color: 'w' });
    expect(position.pieceAt('e2')).toBeNull();
    expect(position.enPassant).toBe('e3');
    expect(position.turn).toBe('b');
    expect(position.halfMoveClock).toBe(0);
    expect(position.fullMoveNumber).toBe(1);
  });

  it('should clear the en passant target on the next move', () => {
    const position = Position.initial();
    play(position, 'e2e4', 'g8f6');
    expect(position.enPassant).toBeNull();
  });

  it('should count half-moves and full moves', () => {
    const position = Position.initial();
    play(position, 'g1f3');
    expect(position.halfMoveClock).toBe(1);
    expect(position.fullMoveNumber).toBe(1);

    play(position, 'g8f6');
    expect(position.halfMoveClock).toBe(2);
    expect(position.fullMoveNumber).toBe(2);

    play(position, 'e2e4');
    expect(position.halfMoveClock).toBe(0);
  });

  it('should reset the half-move clock on a capture', () => {
    const position = parseFen('4k3/8/8/3p4/8/8/8/3RK3 w - - 7 20');
    play(position, 'd1d5');
    expect(position.halfMoveClock).toBe(0);
    expect(position.pieceAt('d5')).toEqual({ type: 'r', color: 'w' });
  });

  it('should restore the exact position on unmake', () => {
    const position = Position.initial();
    const before = position.clone();

    const record = position.makeMove(findLegalMove(position, { from: 'e2', to: 'e4' }));
    expect(position.equals(before)).toBe(false);

    position.unmakeMove(record);
    expect(position.equals(before)).toBe(true);
    expect(position.hash).toBe(before.hash);
  });

  it('should unmake a sequence in reverse order', () => {
    const position = Position.initial();
    const fen = toFen(position);
    const records = ['e2e4', 'd7d5', 'e4d5', 'd8d5', 'b1c3'].map(text => {
      return position.makeMove(findLegalMove(position, parseCoordinateMove(text)));
    });

    for (const record of records.reverse()) {
      position.unmakeMove(record);
    }
    expect(toFen(position)).toBe(fen);
    expect(position.equals(Position.initial())).toBe(true);
  });

  it('should keep clones independent', () => {
    const position = Position.initial();
    const copy = position.clone();
    play(copy, 'e2e4');

    expect(position.pieceAt('e2')).toEqual({ type: 'p', color: 'w' });
    expect(copy.pieceAt('e2')).toBeNull();
  });
});

// =============================================================================
// Special Moves
// =============================================================================

describe('Castling', () => {
  const fen = 'r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1';

  it('should move the rook with the king', () => {
    const position = parseFen(fen);
    play(position, 'e1g1');

    expect(position.pieceAt('g1')).toEqual({ type: 'k', color: 'w' });
    expect(position.pieceAt('f1')).toEqual({ type: 'r', color: 'w' });
    expect(position.pieceAt('h1')).toBeNull();
    expect(position.kingSquare('w')).toBe('g1');
  });

  it('should clear both rights of the side that castled', () => {
    const position = parseFen(fen);
    play(position, 'e1c1');

    expect(position.pieceAt('d1')).toEqual({ type: 'r', color: 'w' });
    expect(position.castling).toEqual({
      whiteKingside: false,
      whiteQueenside: false,
      blackKingside: true,
      blackQueenside: true,
    });
  });

  it('should restore rook and rights on unmake', () => {
    const position = parseFen(fen);
    const record = position.makeMove(findLegalMove(position, { from: 'e1', to: 'g1' }));
    position.unmakeMove(record);

    expect(position.equals(parseFen(fen))).toBe(true);
    expect(position.kingSquare('w')).toBe('e1');
  });

  it('should clear one right when a rook leaves home', () => {
    const position = parseFen(fen);
    play(position, 'h1h4');
    expect(position.castling.whiteKingside).toBe(false);
    expect(position.castling.whiteQueenside).toBe(true);
  });

  it('should clear the right of a rook captured on its home square', () => {
    const position = parseFen(fen);
    play(position, 'a1a8');
    expect(position.castling).toEqual({
      whiteKingside: true,
      whiteQueenside: false,
      blackKingside: true,
      blackQueenside: false,
    });
  });

  it('should never grant a right back', () => {
    const position = parseFen(fen);
    play(position, 'h1h2', 'h8h7', 'h2h1', 'h7h8');
    expect(position.castling.whiteKingside).toBe(false);
    expect(position.castling.blackKingside).toBe(false);
  });
});

describe('En passant', () => {
  it('should remove the pawn that double-pushed', () => {
    const position = parseFen('4k3/8/8/3pP3/8/8/8/4K3 w - d6 0 1');
    play(position, 'e5d6');

    expect(position.pieceAt('d6')).toEqual({ type: 'p', color: 'w' });
    expect(position.pieceAt('d5')).toBeNull();
    expect(position.pieceAt('e5')).toBeNull();
  });

  it('should put the captured pawn back on unmake', () => {
    const position = parseFen('4k3/8/8/3pP3/8/8/8/4K3 w - d6 0 1');
    const record = position.makeMove(findLegalMove(position, { from: 'e5', to: 'd6' }));
    position.unmakeMove(record);

    expect(position.pieceAt('d5')).toEqual({ type: 'p', color: 'b' });
    expect(position.pieceAt('e5')).toEqual({ type: 'p', color: 'w' });
    expect(position.pieceAt('d6')).toBeNull();
    expect(position.enPassant).toBe('d6');
  });
});

describe('Promotion', () => {
  it('should replace the pawn with the chosen piece', () => {
    const position = parseFen('8/P6k/8/8/8/8/8/K7 w - - 0 1');
    play(position, 'a7a8n');
    expect(position.pieceAt('a8')).toEqual({ type: 'n', color: 'w' });
    expect(position.pieceAt('a7')).toBeNull();
  });

  it('should restore the pawn on unmake', () => {
    const position = parseFen('1r5k/P7/8/8/8/8/8/K7 w - - 0 1');
    const record = position.makeMove(findLegalMove(position, { from: 'a7', to: 'b8', promotion: 'q' }));
    expect(position.pieceAt('b8')).toEqual({ type: 'q', color: 'w' });

    position.unmakeMove(record);
    expect(position.pieceAt('a7')).toEqual({ type: 'p', color: 'w' });
    expect(position.pieceAt('b8')).toEqual({ type: 'r', color: 'b' });
  });
});
