/**
 * ChessGameState - Position classification and game bookkeeping
 *
 * status() applies the rules in a fixed order: checkmate, stalemate,
 * fifty-move rule, threefold repetition, insufficient material, check.
 * Nothing here is cached; a status is always derived from a Position plus
 * its PositionHistory.
 */

import type { Position } from './ChessBoard.js';
import type { CapturedPieces, Color, GameStatus, Move, Piece } from './types.js';
import { MATERIAL_POINTS, fileOf, opponent, rankOf, squareToIndex } from './types.js';
import { hasLegalMove, isInCheck } from './ChessMoveGen.js';
import { pieceOf } from './ChessBoard.js';

/** Half-moves without a pawn move or capture that end the game */
export const FIFTY_MOVE_LIMIT = 100;

/** Occurrences of a position that end the game */
export const REPETITION_LIMIT = 3;

// =============================================================================
// Position History
// =============================================================================

/**
 * Ordered hashes of every position of a game, current position last,
 * with a running count per hash for repetition checks
 */
export class PositionHistory {
  private entries: bigint[] = [];
  private counts: Map<bigint, number> = new Map();

  constructor(hashes: Iterable<bigint> = []) {
    for (const hash of hashes) {
      this.push(hash);
    }
  }

  push(hash: bigint): void {
    this.entries.push(hash);
    this.counts.set(hash, (this.counts.get(hash) ?? 0) + 1);
  }

  /** Remove the most recent hash; returns undefined when empty */
  pop(): bigint | undefined {
    const hash = this.entries.pop();
    if (hash === undefined) return undefined;

    const count = (this.counts.get(hash) ?? 1) - 1;
    if (count === 0) {
      this.counts.delete(hash);
    } else {
      this.counts.set(hash, count);
    }
    return hash;
  }

  /** How many times a position has occurred */
  count(hash: bigint): number {
    return this.counts.get(hash) ?? 0;
  }

  get length(): number {
    return this.entries.length;
  }

  hashes(): readonly bigint[] {
    return [...this.entries];
  }

  clone(): PositionHistory {
    return new PositionHistory(this.entries);
  }
}

/** History holding only the given position */
export function historyOf(position: Position): PositionHistory {
  return new PositionHistory([position.hash]);
}

// =============================================================================
// Draw Rules
// =============================================================================

/**
 * Neither side can possibly mate: K v K, K+minor v K, or kings plus
 * bishops that all stand on the same square color.
 */
export function isInsufficientMaterial(position: Position): boolean {
  let knights = 0;
  let bishops = 0;
  const bishopSquareColors = new Set<number>();

  for (const piece of position.pieces()) {
    switch (piece.type) {
      case 'k':
        break;
      case 'n':
        knights++;
        break;
      case 'b': {
        bishops++;
        const index = squareToIndex(piece.square);
        bishopSquareColors.add((fileOf(index) + rankOf(index)) % 2);
        break;
      }
      default:
        // Any pawn, rook or queen is mating material
        return false;
    }
  }

  if (knights === 0 && bishops === 0) return true;
  if (knights + bishops === 1) return true;
  return knights === 0 && bishopSquareColors.size === 1;
}

/**
 * Draw reason that applies to a position with legal moves, if any.
 * Rule order matches status().
 */
export function drawReason(position: Position, history: PositionHistory): 'fifty_move' | 'repetition' | 'insufficient_material' | null {
  if (position.halfMoveClock >= FIFTY_MOVE_LIMIT) return 'fifty_move';
  if (history.count(position.hash) >= REPETITION_LIMIT) return 'repetition';
  if (isInsufficientMaterial(position)) return 'insufficient_material';
  return null;
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Classify a position
 * @param history - Every position of the game including this one;
 *                  defaults to this position alone
 */
export function status(position: Position, history: PositionHistory = historyOf(position)): GameStatus {
  const us = position.turn;
  const inCheck = isInCheck(position, us);

  if (!hasLegalMove(position)) {
    return inCheck ? { kind: 'checkmate', winner: opponent(us) } : { kind: 'stalemate' };
  }

  const reason = drawReason(position, history);
  if (reason) {
    return { kind: 'draw', reason };
  }

  return inCheck ? { kind: 'check', side: us } : { kind: 'ongoing' };
}

/** Checkmate, stalemate and draws end the game */
export function isTerminal(gameStatus: GameStatus): boolean {
  return gameStatus.kind !== 'ongoing' && gameStatus.kind !== 'check';
}

// =============================================================================
// Captured Pieces
// =============================================================================

/**
 * Pieces removed from the board, per color, in capture order.
 * Grows on captures and shrinks when those captures are retracted.
 */
export class CapturedSet {
  private white: Piece[] = [];
  private black: Piece[] = [];

  /** Record the capture made by a move, if any (en passant included) */
  record(move: Move): void {
    if (!move.captured) return;
    const victimColor = opponent(move.color);
    this.listFor(victimColor).push(pieceOf(move.captured, victimColor));
  }

  /** Retract the capture made by a move being undone */
  retract(move: Move): void {
    if (!move.captured) return;
    this.listFor(opponent(move.color)).pop();
  }

  /** Pieces of `color` that have been captured */
  get(color: Color): readonly Piece[] {
    return [...this.listFor(color)];
  }

  toJSON(): CapturedPieces {
    return { white: [...this.white], black: [...this.black] };
  }

  clear(): void {
    this.white = [];
    this.black = [];
  }

  private listFor(color: Color): Piece[] {
    return color === 'w' ? this.white : this.black;
  }
}

/** Sum of point values (pawn 1, minor 3, rook 5, queen 9) */
export function materialPoints(pieces: readonly Piece[]): number {
  return pieces.reduce((sum, piece) => sum + MATERIAL_POINTS[piece.type], 0);
}

/**
 * Material balance from captures, in points from White's view:
 * black material captured minus white material captured
 */
export function captureBalance(captured: CapturedSet): number {
  return materialPoints(captured.get('b')) - materialPoints(captured.get('w'));
}
