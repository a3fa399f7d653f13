/**
 * ChessMoveGen - Move generation and attack detection
 *
 * Pseudo-legal moves follow the movement rules of each piece. legalMoves()
 * then plays each candidate on the board and discards the ones that leave
 * the mover's king attacked.
 *
 * Attack detection works from precomputed attack patterns and never goes
 * through the legality filter.
 */

import type { Position } from './ChessBoard.js';
import type { Color, Move, MoveInput, PieceType, PromotionType, Square } from './types.js';
import { PROMOTION_TYPES, fileOf, indexToSquare, opponent, rankOf, squareToIndex } from './types.js';
import { IllegalMoveError, IncompleteMoveError } from './errors.js';

// =============================================================================
// Attack Tables
// =============================================================================

type Delta = readonly [number, number];

const KNIGHT_DELTAS: readonly Delta[] = [[1, 2], [2, 1], [2, -1], [1, -2], [-1, -2], [-2, -1], [-2, 1], [-1, 2]];
const KING_DELTAS: readonly Delta[] = [[1, 0], [1, 1], [0, 1], [-1, 1], [-1, 0], [-1, -1], [0, -1], [1, -1]];
const ORTHOGONAL: readonly Delta[] = [[1, 0], [-1, 0], [0, 1], [0, -1]];
const DIAGONAL: readonly Delta[] = [[1, 1], [1, -1], [-1, 1], [-1, -1]];

/** Index reached by stepping (df, dr) from index, or -1 off the board */
function step(index: number, df: number, dr: number): number {
  const file = fileOf(index) + df;
  const rank = rankOf(index) + dr;
  if (file < 0 || file > 7 || rank < 0 || rank > 7) return -1;
  return rank * 8 + file;
}

function buildTargets(deltas: readonly Delta[]): number[][] {
  const table: number[][] = [];
  for (let index = 0; index < 64; index++) {
    table.push(deltas.map(([df, dr]) => step(index, df, dr)).filter(t => t !== -1));
  }
  return table;
}

/** Per square, one list of squares for each direction, nearest first */
function buildRays(deltas: readonly Delta[]): number[][][] {
  const table: number[][][] = [];
  for (let index = 0; index < 64; index++) {
    const rays: number[][] = [];
    for (const [df, dr] of deltas) {
      const ray: number[] = [];
      let current = step(index, df, dr);
      while (current !== -1) {
        ray.push(current);
        current = step(current, df, dr);
      }
      if (ray.length > 0) rays.push(ray);
    }
    table.push(rays);
  }
  return table;
}

const KNIGHT_TARGETS = buildTargets(KNIGHT_DELTAS);
const KING_TARGETS = buildTargets(KING_DELTAS);
const ROOK_RAYS = buildRays(ORTHOGONAL);
const BISHOP_RAYS = buildRays(DIAGONAL);

/** Squares a pawn of the given color must stand on to attack each square */
const PAWN_ATTACKERS: Record<Color, number[][]> = {
  w: buildTargets([[-1, -1], [1, -1]]),
  b: buildTargets([[-1, 1], [1, 1]]),
};

// =============================================================================
// Attack Detection
// =============================================================================

/**
 * Check if a square is attacked by a color
 * @param square - Square (or square index) to check
 * @param byColor - Attacking color
 */
export function isSquareAttacked(position: Position, square: Square | number, byColor: Color): boolean {
  const target = typeof square === 'number' ? square : squareToIndex(square);

  for (const from of PAWN_ATTACKERS[byColor][target]) {
    const piece = position.pieceAtIndex(from);
    if (piece && piece.color === byColor && piece.type === 'p') return true;
  }

  for (const from of KNIGHT_TARGETS[target]) {
    const piece = position.pieceAtIndex(from);
    if (piece && piece.color === byColor && piece.type === 'n') return true;
  }

  for (const from of KING_TARGETS[target]) {
    const piece = position.pieceAtIndex(from);
    if (piece && piece.color === byColor && piece.type === 'k') return true;
  }

  if (rayHits(position, ROOK_RAYS[target], byColor, 'r')) return true;
  return rayHits(position, BISHOP_RAYS[target], byColor, 'b');
}

/** True when the first piece along any ray is an enemy slider of the given kind (or a queen) */
function rayHits(position: Position, rays: number[][], byColor: Color, slider: 'r' | 'b'): boolean {
  for (const ray of rays) {
    for (const index of ray) {
      const piece = position.pieceAtIndex(index);
      if (!piece) continue;
      if (piece.color === byColor && (piece.type === slider || piece.type === 'q')) return true;
      break;
    }
  }
  return false;
}

/** Is the king of `color` (default: side to move) attacked */
export function isInCheck(position: Position, color: Color = position.turn): boolean {
  return isSquareAttacked(position, position.kingIndex(color), opponent(color));
}

// =============================================================================
// Pseudo-legal Generation
// =============================================================================

function createMove(
  from: number,
  to: number,
  piece: PieceType,
  color: Color,
  flags: string,
  captured?: PieceType,
  promotion?: PromotionType,
): Move {
  return {
    from: indexToSquare(from),
    to: indexToSquare(to),
    piece,
    color,
    captured,
    promotion,
    flags,
  };
}

/** King start, squares that must be empty, squares that must not be attacked, king destination */
interface CastleRule {
  right: 'whiteKingside' | 'whiteQueenside' | 'blackKingside' | 'blackQueenside';
  kingFrom: number;
  kingTo: number;
  rookFrom: number;
  empty: number[];
  safe: number[];
  flag: 'k' | 'q';
}

const CASTLE_RULES: Record<Color, CastleRule[]> = {
  w: [
    { right: 'whiteKingside', kingFrom: 4, kingTo: 6, rookFrom: 7, empty: [5, 6], safe: [4, 5, 6], flag: 'k' },
    { right: 'whiteQueenside', kingFrom: 4, kingTo: 2, rookFrom: 0, empty: [3, 2, 1], safe: [4, 3, 2], flag: 'q' },
  ],
  b: [
    { right: 'blackKingside', kingFrom: 60, kingTo: 62, rookFrom: 63, empty: [61, 62], safe: [60, 61, 62], flag: 'k' },
    { right: 'blackQueenside', kingFrom: 60, kingTo: 58, rookFrom: 56, empty: [59, 58, 57], safe: [60, 59, 58], flag: 'q' },
  ],
};

function pushPawnMoves(position: Position, from: number, us: Color, moves: Move[]): void {
  const them = opponent(us);
  const forward = us === 'w' ? 1 : -1;
  const startRank = us === 'w' ? 1 : 6;
  const lastRank = us === 'w' ? 7 : 0;

  const one = step(from, 0, forward);
  if (one !== -1 && !position.pieceAtIndex(one)) {
    if (rankOf(one) === lastRank) {
      for (const promo of PROMOTION_TYPES) {
        moves.push(createMove(from, one, 'p', us, 'p', undefined, promo));
      }
    } else {
      moves.push(createMove(from, one, 'p', us, 'n'));
      const two = step(one, 0, forward);
      if (rankOf(from) === startRank && two !== -1 && !position.pieceAtIndex(two)) {
        moves.push(createMove(from, two, 'p', us, 'b'));
      }
    }
  }

  for (const df of [-1, 1]) {
    const to = step(from, df, forward);
    if (to === -1) continue;
    const target = position.pieceAtIndex(to);
    if (target && target.color === them) {
      if (rankOf(to) === lastRank) {
        for (const promo of PROMOTION_TYPES) {
          moves.push(createMove(from, to, 'p', us, 'cp', target.type, promo));
        }
      } else {
        moves.push(createMove(from, to, 'p', us, 'c', target.type));
      }
    } else if (to === position.enPassantIndex && us === position.turn) {
      const victim = position.pieceAtIndex(to - forward * 8);
      if (victim && victim.color === them && victim.type === 'p') {
        moves.push(createMove(from, to, 'p', us, 'e', 'p'));
      }
    }
  }
}

function pushTargets(position: Position, from: number, piece: PieceType, us: Color, targets: number[], moves: Move[]): void {
  for (const to of targets) {
    const target = position.pieceAtIndex(to);
    if (!target) {
      moves.push(createMove(from, to, piece, us, 'n'));
    } else if (target.color !== us) {
      moves.push(createMove(from, to, piece, us, 'c', target.type));
    }
  }
}

function pushSlides(position: Position, from: number, piece: PieceType, us: Color, rays: number[][], moves: Move[]): void {
  for (const ray of rays) {
    for (const to of ray) {
      const target = position.pieceAtIndex(to);
      if (!target) {
        moves.push(createMove(from, to, piece, us, 'n'));
        continue;
      }
      if (target.color !== us) {
        moves.push(createMove(from, to, piece, us, 'c', target.type));
      }
      break;
    }
  }
}

function pushCastles(position: Position, us: Color, moves: Move[]): void {
  const them = opponent(us);
  for (const rule of CASTLE_RULES[us]) {
    if (!position.castling[rule.right]) continue;
    if (position.kingIndex(us) !== rule.kingFrom) continue;
    const rook = position.pieceAtIndex(rule.rookFrom);
    if (!rook || rook.type !== 'r' || rook.color !== us) continue;
    if (rule.empty.some(index => position.pieceAtIndex(index) !== null)) continue;
    if (rule.safe.some(index => isSquareAttacked(position, index, them))) continue;
    moves.push(createMove(rule.kingFrom, rule.kingTo, 'k', us, rule.flag));
  }
}

/**
 * Moves that obey piece movement rules; some may leave the mover in check.
 * Castling is only offered when the king's start, transit and destination
 * squares are safe, since that is part of the castling rule itself.
 * @param color - Side to generate for (default: side to move)
 */
export function generatePseudoLegalMoves(position: Position, color: Color = position.turn): Move[] {
  const moves: Move[] = [];

  for (let from = 0; from < 64; from++) {
    const piece = position.pieceAtIndex(from);
    if (!piece || piece.color !== color) continue;

    switch (piece.type) {
      case 'p':
        pushPawnMoves(position, from, color, moves);
        break;
      case 'n':
        pushTargets(position, from, 'n', color, KNIGHT_TARGETS[from], moves);
        break;
      case 'b':
        pushSlides(position, from, 'b', color, BISHOP_RAYS[from], moves);
        break;
      case 'r':
        pushSlides(position, from, 'r', color, ROOK_RAYS[from], moves);
        break;
      case 'q':
        pushSlides(position, from, 'q', color, ROOK_RAYS[from], moves);
        pushSlides(position, from, 'q', color, BISHOP_RAYS[from], moves);
        break;
      case 'k':
        pushTargets(position, from, 'k', color, KING_TARGETS[from], moves);
        pushCastles(position, color, moves);
        break;
    }
  }

  return moves;
}

// =============================================================================
// Legal Generation
// =============================================================================

/**
 * Get all legal moves for the side to move.
 * The position is mutated while filtering and restored before returning.
 */
export function legalMoves(position: Position): Move[] {
  const us = position.turn;
  const them = opponent(us);
  const legal: Move[] = [];

  for (const move of generatePseudoLegalMoves(position, us)) {
    const record = position.makeMove(move);
    try {
      if (!isSquareAttacked(position, position.kingIndex(us), them)) {
        legal.push(move);
      }
    } finally {
      position.unmakeMove(record);
    }
  }

  return legal;
}

/** Does the side to move have at least one legal move */
export function hasLegalMove(position: Position): boolean {
  const us = position.turn;
  const them = opponent(us);

  for (const move of generatePseudoLegalMoves(position, us)) {
    const record = position.makeMove(move);
    const safe = !isSquareAttacked(position, position.kingIndex(us), them);
    position.unmakeMove(record);
    if (safe) return true;
  }
  return false;
}

/** Coordinate key of a move, e.g. "e2e4" or "e7e8q" */
export function moveKey(move: MoveInput): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

export function sameMove(a: MoveInput, b: MoveInput): boolean {
  return a.from === b.from && a.to === b.to && (a.promotion ?? null) === (b.promotion ?? null);
}

/**
 * Resolve a caller's move against the legal set
 * @throws IncompleteMoveError when a promotion needs a piece and none was given
 * @throws IllegalMoveError for anything else not in the legal set
 */
export function findLegalMove(position: Position, input: MoveInput): Move {
  const candidates = legalMoves(position).filter(m => m.from === input.from && m.to === input.to);

  if (candidates.length === 0) {
    throw new IllegalMoveError(input);
  }

  if (candidates[0].promotion) {
    if (!input.promotion) {
      throw new IncompleteMoveError(input);
    }
    const match = candidates.find(m => m.promotion === input.promotion);
    if (!match) {
      throw new IllegalMoveError(input, 'promotion piece must be one of q, r, b, n');
    }
    return match;
  }

  if (input.promotion) {
    throw new IllegalMoveError(input, 'only a pawn reaching the last rank promotes');
  }
  return candidates[0];
}

// =============================================================================
// Perft
// =============================================================================

/**
 * Perft - count leaf nodes of the legal move tree, for move generator checks
 */
export function perft(position: Position, depth: number): number {
  if (depth === 0) return 1;

  const moves = legalMoves(position);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) {
    const record = position.makeMove(move);
    try {
      nodes += perft(position, depth - 1);
    } finally {
      position.unmakeMove(record);
    }
  }
  return nodes;
}

/**
 * Divide - Perft with per-move breakdown, keyed by coordinate notation
 */
export function divide(position: Position, depth: number): Map<string, number> {
  const result = new Map<string, number>();

  for (const move of legalMoves(position)) {
    const record = position.makeMove(move);
    try {
      result.set(moveKey(move), perft(position, depth - 1));
    } finally {
      position.unmakeMove(record);
    }
  }

  return result;
}
