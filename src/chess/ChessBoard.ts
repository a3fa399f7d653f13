/**
 * ChessBoard - Board model
 *
 * A Position holds piece placement, side to move, castling rights, the
 * en passant target, both move counters, a king-square index per color and
 * an incrementally maintained Zobrist hash.
 *
 * Moves are applied in place with makeMove(), which returns the UndoRecord
 * that unmakeMove() needs. Callers must unmake in strict stack order.
 */

import type {
  BoardPosition,
  CastlingRights,
  Color,
  Move,
  Piece,
  PieceOnBoard,
  PieceType,
  PositionSetup,
  Square,
} from './types.js';
import { fileOf, indexToSquare, opponent, squareToIndex } from './types.js';
import {
  computeZobristHash,
  getCastlingKey,
  getEnPassantKey,
  getPieceKey,
  getSideKey,
} from './ChessZobrist.js';
import { isSquareAttacked } from './ChessMoveGen.js';
import { InvariantError } from './errors.js';

// =============================================================================
// Piece Instances
// =============================================================================

/** Shared immutable piece objects, so the board never allocates per move */
const PIECES: Record<Color, Record<PieceType, Piece>> = {
  w: buildPieces('w'),
  b: buildPieces('b'),
};

function buildPieces(color: Color): Record<PieceType, Piece> {
  return {
    p: Object.freeze({ type: 'p', color }),
    n: Object.freeze({ type: 'n', color }),
    b: Object.freeze({ type: 'b', color }),
    r: Object.freeze({ type: 'r', color }),
    q: Object.freeze({ type: 'q', color }),
    k: Object.freeze({ type: 'k', color }),
  };
}

export function pieceOf(type: PieceType, color: Color): Piece {
  return PIECES[color][type];
}

// =============================================================================
// Castling Geometry
// =============================================================================

const A1 = 0, E1 = 4, H1 = 7, A8 = 56, E8 = 60, H8 = 63;

/** Rook home squares and the right each one guards */
const ROOK_HOMES: ReadonlyArray<[number, keyof CastlingRights]> = [
  [H1, 'whiteKingside'],
  [A1, 'whiteQueenside'],
  [H8, 'blackKingside'],
  [A8, 'blackQueenside'],
];

/** Rook relocation for castling moves: [kingTo, rookFrom, rookTo] */
const CASTLE_ROOK_MOVES: ReadonlyArray<[number, number, number]> = [
  [6, H1, 5],
  [2, A1, 3],
  [62, H8, 61],
  [58, A8, 59],
];

function castleRookMove(kingTo: number): [number, number] {
  for (const [to, rookFrom, rookTo] of CASTLE_ROOK_MOVES) {
    if (to === kingTo) return [rookFrom, rookTo];
  }
  throw new InvariantError(`No castling rook for king destination ${indexToSquare(kingTo)}`);
}

// =============================================================================
// Undo Records
// =============================================================================

/** State needed to retract a move made with makeMove() */
export interface UndoRecord {
  readonly move: Move;
  readonly castling: Readonly<CastlingRights>;
  readonly enPassant: number;
  readonly halfMoveClock: number;
  readonly fullMoveNumber: number;
  readonly hash: bigint;
}

// =============================================================================
// Position
// =============================================================================

export class Position implements BoardPosition {
  private squares: (Piece | null)[];
  private side: Color;
  private rights: CastlingRights;
  /** En passant target index, -1 when none */
  private epIndex: number;
  private halfMoves: number;
  private fullMoves: number;
  private kings: Record<Color, number>;
  private zobrist: bigint;

  private constructor(setup: PositionSetup) {
    if (setup.squares.length !== 64) {
      throw new InvariantError(`Board must have 64 squares, got ${setup.squares.length}`);
    }
    this.squares = setup.squares.map(p => (p ? pieceOf(p.type, p.color) : null));
    this.side = setup.turn;
    this.rights = { ...setup.castling };
    this.epIndex = setup.enPassant ? squareToIndex(setup.enPassant) : -1;
    this.halfMoves = setup.halfMoveClock;
    this.fullMoves = setup.fullMoveNumber;
    this.kings = { w: this.locateKing('w'), b: this.locateKing('b') };
    this.zobrist = computeZobristHash(this);

    const waiting = opponent(this.side);
    if (isSquareAttacked(this, this.kings[waiting], this.side)) {
      throw new InvariantError(
        `${waiting === 'w' ? 'White' : 'Black'} king is in check but it is ${this.side === 'w' ? 'White' : 'Black'} to move`
      );
    }
  }

  /** Standard initial arrangement */
  static initial(): Position {
    const backRank: PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];
    const squares: (Piece | null)[] = new Array<Piece | null>(64).fill(null);
    for (let file = 0; file < 8; file++) {
      squares[file] = pieceOf(backRank[file], 'w');
      squares[8 + file] = pieceOf('p', 'w');
      squares[48 + file] = pieceOf('p', 'b');
      squares[56 + file] = pieceOf(backRank[file], 'b');
    }
    return new Position({
      squares,
      turn: 'w',
      castling: { whiteKingside: true, whiteQueenside: true, blackKingside: true, blackQueenside: true },
      enPassant: null,
      halfMoveClock: 0,
      fullMoveNumber: 1,
    });
  }

  /**
   * Build a position from raw data. Throws InvariantError unless there is
   * exactly one king of each color and the side not to move is out of check.
   */
  static fromSetup(setup: PositionSetup): Position {
    return new Position(setup);
  }

  private locateKing(color: Color): number {
    let found = -1;
    for (let i = 0; i < 64; i++) {
      const piece = this.squares[i];
      if (piece && piece.type === 'k' && piece.color === color) {
        if (found !== -1) {
          throw new InvariantError(`More than one ${color === 'w' ? 'white' : 'black'} king`);
        }
        found = i;
      }
    }
    if (found === -1) {
      throw new InvariantError(`Missing ${color === 'w' ? 'white' : 'black'} king`);
    }
    return found;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get turn(): Color {
    return this.side;
  }

  get castling(): Readonly<CastlingRights> {
    return this.rights;
  }

  get enPassant(): Square | null {
    return this.epIndex === -1 ? null : indexToSquare(this.epIndex);
  }

  /** En passant target as a square index, -1 when none */
  get enPassantIndex(): number {
    return this.epIndex;
  }

  get halfMoveClock(): number {
    return this.halfMoves;
  }

  get fullMoveNumber(): number {
    return this.fullMoves;
  }

  /** Zobrist hash (piece placement, side to move, castling rights, en passant) */
  get hash(): bigint {
    return this.zobrist;
  }

  pieceAt(square: Square): Piece | null {
    return this.squares[squareToIndex(square)];
  }

  pieceAtIndex(index: number): Piece | null {
    return this.squares[index] ?? null;
  }

  kingSquare(color: Color): Square {
    return indexToSquare(this.kings[color]);
  }

  kingIndex(color: Color): number {
    return this.kings[color];
  }

  /** All pieces on the board, a1 first */
  pieces(color?: Color): PieceOnBoard[] {
    const out: PieceOnBoard[] = [];
    for (let i = 0; i < 64; i++) {
      const piece = this.squares[i];
      if (piece && (color === undefined || piece.color === color)) {
        out.push({ type: piece.type, color: piece.color, square: indexToSquare(i) });
      }
    }
    return out;
  }

  /** Raw data copy, suitable for serialization */
  toSetup(): PositionSetup {
    return {
      squares: [...this.squares],
      turn: this.side,
      castling: { ...this.rights },
      enPassant: this.enPassant,
      halfMoveClock: this.halfMoves,
      fullMoveNumber: this.fullMoves,
    };
  }

  clone(): Position {
    return new Position(this.toSetup());
  }

  /** Same placement, side, rights, en passant target and clocks */
  equals(other: Position): boolean {
    if (this.zobrist !== other.zobrist) return false;
    if (this.side !== other.side || this.epIndex !== other.epIndex) return false;
    if (this.halfMoves !== other.halfMoves || this.fullMoves !== other.fullMoves) return false;
    if (
      this.rights.whiteKingside !== other.rights.whiteKingside ||
      this.rights.whiteQueenside !== other.rights.whiteQueenside ||
      this.rights.blackKingside !== other.rights.blackKingside ||
      this.rights.blackQueenside !== other.rights.blackQueenside
    ) {
      return false;
    }
    for (let i = 0; i < 64; i++) {
      if (this.squares[i] !== other.squares[i]) return false;
    }
    return true;
  }

  // ===========================================================================
  // Make / Unmake
  // ===========================================================================

  private put(index: number, piece: Piece): void {
    this.squares[index] = piece;
    this.zobrist ^= getPieceKey(piece.color, piece.type, index);
  }

  private remove(index: number): Piece {
    const piece = this.squares[index];
    if (!piece) {
      throw new InvariantError(`No piece to remove on ${indexToSquare(index)}`);
    }
    this.squares[index] = null;
    this.zobrist ^= getPieceKey(piece.color, piece.type, index);
    return piece;
  }

  /**
   * Apply a move produced by the move generator for this position.
   * The move is trusted; legality is the caller's concern.
   */
  makeMove(move: Move): UndoRecord {
    const record: UndoRecord = {
      move,
      castling: { ...this.rights },
      enPassant: this.epIndex,
      halfMoveClock: this.halfMoves,
      fullMoveNumber: this.fullMoves,
      hash: this.zobrist,
    };

    const us = this.side;
    const from = squareToIndex(move.from);
    const to = squareToIndex(move.to);

    if (this.epIndex !== -1) {
      this.zobrist ^= getEnPassantKey(fileOf(this.epIndex));
    }

    if (move.flags.includes('e')) {
      this.remove(us === 'w' ? to - 8 : to + 8);
    } else if (move.captured) {
      this.remove(to);
    }

    const moving = this.remove(from);
    this.put(to, move.promotion ? pieceOf(move.promotion, us) : moving);

    if (moving.type === 'k') {
      this.kings[us] = to;
      if (move.flags.includes('k') || move.flags.includes('q')) {
        const [rookFrom, rookTo] = castleRookMove(to);
        this.put(rookTo, this.remove(rookFrom));
      }
    }

    this.zobrist ^= getCastlingKey(this.rights);
    this.updateCastlingRights(from, to);
    this.zobrist ^= getCastlingKey(this.rights);

    if (move.flags.includes('b')) {
      this.epIndex = (from + to) >> 1;
      this.zobrist ^= getEnPassantKey(fileOf(this.epIndex));
    } else {
      this.epIndex = -1;
    }

    this.halfMoves = moving.type === 'p' || move.captured ? 0 : this.halfMoves + 1;
    if (us === 'b') {
      this.fullMoves++;
    }

    this.side = opponent(us);
    this.zobrist ^= getSideKey();

    return record;
  }

  /** Retract the most recent makeMove() */
  unmakeMove(record: UndoRecord): void {
    const { move } = record;
    const us = opponent(this.side);
    const from = squareToIndex(move.from);
    const to = squareToIndex(move.to);

    this.squares[to] = null;
    this.squares[from] = pieceOf(move.piece, us);

    if (move.piece === 'k') {
      this.kings[us] = from;
      if (move.flags.includes('k') || move.flags.includes('q')) {
        const [rookFrom, rookTo] = castleRookMove(to);
        this.squares[rookTo] = null;
        this.squares[rookFrom] = pieceOf('r', us);
      }
    }

    if (move.captured) {
      const them = opponent(us);
      if (move.flags.includes('e')) {
        this.squares[us === 'w' ? to - 8 : to + 8] = pieceOf('p', them);
      } else {
        this.squares[to] = pieceOf(move.captured, them);
      }
    }

    this.side = us;
    this.rights = { ...record.castling };
    this.epIndex = record.enPassant;
    this.halfMoves = record.halfMoveClock;
    this.fullMoves = record.fullMoveNumber;
    this.zobrist = record.hash;
  }

  /** Rights are only ever cleared: king or rook leaves home, or a rook is taken there */
  private updateCastlingRights(from: number, to: number): void {
    if (from === E1) {
      this.rights.whiteKingside = false;
      this.rights.whiteQueenside = false;
    } else if (from === E8) {
      this.rights.blackKingside = false;
      this.rights.blackQueenside = false;
    }
    for (const [home, right] of ROOK_HOMES) {
      if (from === home || to === home) {
        this.rights[right] = false;
      }
    }
  }
}
