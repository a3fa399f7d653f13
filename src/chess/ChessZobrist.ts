/**
 * ChessZobrist - 64-bit Zobrist Hashing
 *
 * Position identity for the transposition table and repetition history:
 * - 64-bit keys using BigInt
 * - Pre-generated keys for pieces, castling, en passant, side to move
 * - Incremental update support (XOR in/out), used by Position.makeMove
 *
 * Collisions (two positions sharing a key) are possible and accepted; the
 * search re-validates any move it takes from the table.
 *
 * @module chess/ChessZobrist
 */

import type { BoardPosition, CastlingRights, Color, PieceType } from './types.js';
import { squareToIndex, fileOf } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Zobrist key tables */
export interface ZobristKeys {
  /** Piece keys: [colorIndex][pieceIndex][squareIndex] */
  pieces: bigint[][][];
  /** Key for black to move (XOR when it's black's turn) */
  sideToMove: bigint;
  /** Castling rights keys [K, Q, k, q] */
  castling: bigint[];
  /** En passant file keys [a-h files] */
  enPassant: bigint[];
}

/** Piece type to index mapping */
const PIECE_INDEX: Record<PieceType, number> = {
  p: 0, n: 1, b: 2, r: 3, q: 4, k: 5,
};

/** Color to index mapping */
const COLOR_INDEX: Record<Color, number> = {
  w: 0, b: 1,
};

// =============================================================================
// Random Number Generation
// =============================================================================

/**
 * Seeded xorshift64* generator, so keys are identical across runs
 */
class PRNG {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = seed;
  }

  next(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x ^= (x << 25n) & 0xFFFFFFFFFFFFFFFFn;
    x ^= x >> 27n;
    this.state = x;
    return (x * 0x2545F4914F6CDD1Dn) & 0xFFFFFFFFFFFFFFFFn;
  }
}

// =============================================================================
// Key Generation
// =============================================================================

function generateZobristKeys(): ZobristKeys {
  const rng = new PRNG(0x1234567890ABCDEFn);

  // 2 colors × 6 piece types × 64 squares = 768 keys
  const pieces: bigint[][][] = [];
  for (let color = 0; color < 2; color++) {
    const byType: bigint[][] = [];
    for (let piece = 0; piece < 6; piece++) {
      const bySquare: bigint[] = [];
      for (let square = 0; square < 64; square++) {
        bySquare.push(rng.next());
      }
      byType.push(bySquare);
    }
    pieces.push(byType);
  }

  const sideToMove = rng.next();
  const castling = [rng.next(), rng.next(), rng.next(), rng.next()];

  // Only the file matters: the rank is implied by the side to move
  const enPassant: bigint[] = [];
  for (let file = 0; file < 8; file++) {
    enPassant.push(rng.next());
  }

  return { pieces, sideToMove, castling, enPassant };
}

const ZOBRIST_KEYS = generateZobristKeys();

// =============================================================================
// Key Lookup
// =============================================================================

/**
 * Get the Zobrist key for a piece on a square index
 */
export function getPieceKey(color: Color, pieceType: PieceType, index: number): bigint {
  return ZOBRIST_KEYS.pieces[COLOR_INDEX[color]][PIECE_INDEX[pieceType]][index];
}

export function getSideKey(): bigint {
  return ZOBRIST_KEYS.sideToMove;
}

/**
 * Combined key for a set of castling rights
 */
export function getCastlingKey(rights: Readonly<CastlingRights>): bigint {
  let key = 0n;
  if (rights.whiteKingside) key ^= ZOBRIST_KEYS.castling[0];
  if (rights.whiteQueenside) key ^= ZOBRIST_KEYS.castling[1];
  if (rights.blackKingside) key ^= ZOBRIST_KEYS.castling[2];
  if (rights.blackQueenside) key ^= ZOBRIST_KEYS.castling[3];
  return key;
}

/**
 * Get the Zobrist key for en passant on a file (0-7)
 */
export function getEnPassantKey(file: number): bigint {
  return ZOBRIST_KEYS.enPassant[file];
}

// =============================================================================
// Hash Computation
// =============================================================================

/**
 * Compute the hash from scratch. Position keeps its hash up to date
 * incrementally; this is the reference it is checked against.
 */
export function computeZobristHash(position: BoardPosition): bigint {
  let hash = 0n;

  for (let index = 0; index < 64; index++) {
    const piece = position.pieceAtIndex(index);
    if (piece) {
      hash ^= getPieceKey(piece.color, piece.type, index);
    }
  }

  if (position.turn === 'b') {
    hash ^= ZOBRIST_KEYS.sideToMove;
  }

  hash ^= getCastlingKey(position.castling);

  if (position.enPassant) {
    hash ^= getEnPassantKey(fileOf(squareToIndex(position.enPassant)));
  }

  return hash;
}

/**
 * Get the pre-generated Zobrist keys (for testing/debugging)
 */
export function getZobristKeys(): Readonly<ZobristKeys> {
  return ZOBRIST_KEYS;
}
